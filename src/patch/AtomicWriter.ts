import { randomUUID } from "node:crypto";
import { promises as fs } from "node:fs";
import path from "node:path";
import { IOFailure, StaleFileError } from "../runtime/DocgapErrors.js";
import { checksumOf } from "../source/SourceFile.js";

export interface WriterFileSystem {
  readFile(filePath: string): Promise<Buffer>;
  realpath(filePath: string): Promise<string>;
  stat(filePath: string): Promise<{ mode: number }>;
  /** Creates the file exclusively, writes and fsyncs it. */
  writeDurable(filePath: string, bytes: Buffer, mode: number): Promise<void>;
  rename(from: string, to: string): Promise<void>;
  remove(filePath: string): Promise<void>;
}

export const nodeWriterFileSystem: WriterFileSystem = {
  readFile: (filePath) => fs.readFile(filePath),
  realpath: (filePath) => fs.realpath(filePath),
  stat: (filePath) => fs.stat(filePath),
  writeDurable: async (filePath, bytes, mode) => {
    const handle = await fs.open(filePath, "wx", mode);
    try {
      await handle.writeFile(bytes);
      await handle.chmod(mode);
      await handle.sync();
    } finally {
      await handle.close();
    }
  },
  rename: (from, to) => fs.rename(from, to),
  remove: (filePath) => fs.rm(filePath, { force: true }),
};

export interface AtomicWriteOptions {
  /** Checksum the target must still have when the temp file replaces it. */
  expectedChecksum: string;
}

export const tempPathFor = (target: string): string =>
  path.join(path.dirname(target), `.${path.basename(target)}.docgap-${randomUUID().slice(0, 8)}.tmp`);

export class AtomicWriter {
  constructor(private readonly fileSystem: WriterFileSystem = nodeWriterFileSystem) {}

  /**
   * Replaces `target` with `bytes` via a sibling temp file and a rename.
   * On failure the temp file is removed and the target keeps its old content.
   * A symlinked target is resolved first so the link keeps pointing at the
   * patched file.
   */
  async write(target: string, bytes: Buffer, options: AtomicWriteOptions): Promise<void> {
    let resolved: string;
    let mode: number;
    try {
      resolved = await this.fileSystem.realpath(target);
      mode = (await this.fileSystem.stat(resolved)).mode & 0o7777;
    } catch (error) {
      throw new IOFailure(target, "stat", error);
    }
    const tempPath = tempPathFor(resolved);
    try {
      await this.fileSystem.writeDurable(tempPath, bytes, mode);
      const current = checksumOf(await this.fileSystem.readFile(resolved));
      if (current !== options.expectedChecksum) {
        throw new StaleFileError(target, options.expectedChecksum, current);
      }
      await this.fileSystem.rename(tempPath, resolved);
    } catch (error) {
      await this.fileSystem.remove(tempPath).catch(() => undefined);
      if (error instanceof StaleFileError) throw error;
      throw new IOFailure(target, "write", error);
    }
  }
}
