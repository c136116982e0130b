import { promises as fs, type Dirent, type Stats } from "node:fs";
import path from "node:path";
import { hasErrorCode, IOFailure, PathResolutionError } from "../runtime/DocgapErrors.js";

export const DEFAULT_EXTENSIONS = [".py"];
export const ALWAYS_EXCLUDED_DIRS = ["__pycache__", "node_modules", "site-packages"];
const VIRTUALENV_MARKER = "pyvenv.cfg";

export interface CollectorFileSystem {
  readdir(dir: string): Promise<Dirent[]>;
  stat(target: string): Promise<Stats>;
}

export const nodeCollectorFileSystem: CollectorFileSystem = {
  readdir: (dir) => fs.readdir(dir, { withFileTypes: true }),
  stat: (target) => fs.stat(target),
};

export interface CollectOptions {
  cwd?: string;
  extensions?: string[];
  exclude?: string[];
  fileSystem?: CollectorFileSystem;
  /**
   * Receives directories that could not be listed. Without it the first such
   * directory rejects the whole collection.
   */
  onDirectoryError?: (error: IOFailure) => void;
}

interface WalkContext {
  extensions: string[];
  exclude: Set<string>;
  fileSystem: CollectorFileSystem;
  onDirectoryError?: (error: IOFailure) => void;
}

const statPath = async (fileSystem: CollectorFileSystem, target: string, display: string): Promise<Stats> => {
  try {
    return await fileSystem.stat(target);
  } catch (error) {
    if (hasErrorCode(error, "ENOENT") || hasErrorCode(error, "ENOTDIR")) {
      throw new PathResolutionError(display, "no such file or directory");
    }
    throw new PathResolutionError(display, error instanceof Error ? error.message : String(error));
  }
};

const isExcludedDir = (entry: Dirent, exclude: Set<string>): boolean =>
  entry.name.startsWith(".") || exclude.has(entry.name);

const hasExtension = (name: string, extensions: string[]): boolean =>
  extensions.some((extension) => name.endsWith(extension));

// Symlinked files are followed; symlinked directories are not, so link cycles cannot recurse.
const isLinkedFile = async (fileSystem: CollectorFileSystem, fullPath: string): Promise<boolean> => {
  const stats = await fileSystem.stat(fullPath).catch(() => undefined);
  return stats?.isFile() ?? false;
};

const walk = async (dir: string, context: WalkContext, files: string[]): Promise<string[]> => {
  let entries: Dirent[];
  try {
    entries = await context.fileSystem.readdir(dir);
  } catch (error) {
    const failure = new IOFailure(dir, "read directory", error);
    if (!context.onDirectoryError) throw failure;
    context.onDirectoryError(failure);
    return files;
  }
  if (entries.some((entry) => entry.isFile() && entry.name === VIRTUALENV_MARKER)) return files;
  const sorted = [...entries].sort((left, right) => (left.name < right.name ? -1 : left.name > right.name ? 1 : 0));
  for (const entry of sorted) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      if (!isExcludedDir(entry, context.exclude)) await walk(fullPath, context, files);
    } else if (hasExtension(entry.name, context.extensions)) {
      if (entry.isFile() || (entry.isSymbolicLink() && (await isLinkedFile(context.fileSystem, fullPath)))) {
        files.push(fullPath);
      }
    }
  }
  return files;
};

/**
 * Expands files and directories into the sorted list of source files to scan.
 * Explicitly named files are kept regardless of extension.
 */
export const collectSources = async (paths: string[], options: CollectOptions = {}): Promise<string[]> => {
  const cwd = options.cwd ?? process.cwd();
  const extensions = options.extensions && options.extensions.length > 0 ? options.extensions : DEFAULT_EXTENSIONS;
  const context: WalkContext = {
    extensions,
    exclude: new Set([...ALWAYS_EXCLUDED_DIRS, ...(options.exclude ?? [])]),
    fileSystem: options.fileSystem ?? nodeCollectorFileSystem,
    onDirectoryError: options.onDirectoryError,
  };
  const targets = paths.length > 0 ? paths : ["."];
  const collected = new Set<string>();
  for (const target of targets) {
    const resolved = path.resolve(cwd, target);
    const stats = await statPath(context.fileSystem, resolved, target);
    if (stats.isDirectory()) {
      for (const file of await walk(resolved, context, [])) collected.add(file);
    } else {
      collected.add(resolved);
    }
  }
  return [...collected].sort();
};
