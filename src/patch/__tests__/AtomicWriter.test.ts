import test from "node:test";
import assert from "node:assert/strict";
import { chmodSync, lstatSync, mkdtempSync, readdirSync, readFileSync, statSync, symlinkSync, writeFileSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { IOFailure, StaleFileError } from "../../runtime/DocgapErrors.js";
import { checksumOf } from "../../source/SourceFile.js";
import { AtomicWriter, nodeWriterFileSystem } from "../AtomicWriter.js";

const createFile = (content: string): { dir: string; filePath: string } => {
  const dir = mkdtempSync(path.join(os.tmpdir(), "docgap-write-"));
  const filePath = path.join(dir, "m.py");
  writeFileSync(filePath, content);
  return { dir, filePath };
};

test("AtomicWriter replaces the file and keeps its mode", { concurrency: false }, async () => {
  const { dir, filePath } = createFile("x = 1\n");
  chmodSync(filePath, 0o640);
  await new AtomicWriter().write(filePath, Buffer.from("x = 2\n"), {
    expectedChecksum: checksumOf(Buffer.from("x = 1\n")),
  });
  assert.equal(readFileSync(filePath, "utf8"), "x = 2\n");
  assert.equal(statSync(filePath).mode & 0o777, 0o640);
  assert.deepEqual(readdirSync(dir), ["m.py"]);
});

test("AtomicWriter refuses to replace a file that changed", { concurrency: false }, async () => {
  const { dir, filePath } = createFile("x = 1\n");
  await assert.rejects(
    () => new AtomicWriter().write(filePath, Buffer.from("x = 2\n"), { expectedChecksum: "stale" }),
    StaleFileError,
  );
  assert.equal(readFileSync(filePath, "utf8"), "x = 1\n");
  assert.deepEqual(readdirSync(dir), ["m.py"]);
});

test("AtomicWriter removes the temp file when the rename fails", { concurrency: false }, async () => {
  const { dir, filePath } = createFile("x = 1\n");
  const writer = new AtomicWriter({
    ...nodeWriterFileSystem,
    rename: async () => {
      throw new Error("disk full");
    },
  });
  await assert.rejects(
    () => writer.write(filePath, Buffer.from("x = 2\n"), { expectedChecksum: checksumOf(Buffer.from("x = 1\n")) }),
    (error: unknown) => error instanceof IOFailure && error.message === `Failed to write ${filePath}: disk full`,
  );
  assert.equal(readFileSync(filePath, "utf8"), "x = 1\n");
  assert.deepEqual(readdirSync(dir), ["m.py"]);
});

test("AtomicWriter reports a missing target as an IO failure", { concurrency: false }, async () => {
  const { dir } = createFile("x = 1\n");
  await assert.rejects(
    () => new AtomicWriter().write(path.join(dir, "gone.py"), Buffer.from(""), { expectedChecksum: "x" }),
    (error: unknown) => error instanceof IOFailure && error.code === "io_failure",
  );
});

test("AtomicWriter writes through a symlink and keeps the link", { concurrency: false }, async () => {
  const { dir, filePath } = createFile("x = 1\n");
  const linkPath = path.join(dir, "link.py");
  symlinkSync(filePath, linkPath);
  await new AtomicWriter().write(linkPath, Buffer.from("x = 2\n"), {
    expectedChecksum: checksumOf(Buffer.from("x = 1\n")),
  });
  assert.equal(lstatSync(linkPath).isSymbolicLink(), true);
  assert.equal(readFileSync(filePath, "utf8"), "x = 2\n");
  assert.deepEqual(readdirSync(dir).sort(), ["link.py", "m.py"]);
});
