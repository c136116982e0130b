import test from "node:test";
import assert from "node:assert/strict";
import { createHash } from "node:crypto";
import { mkdtempSync, writeFileSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { InvalidDocstringError, ParseFailure } from "../../runtime/DocgapErrors.js";
import {
  computeLineStarts,
  createSourceFile,
  detectLineEnding,
  encodeSourceText,
  loadSourceFile,
  splitSourceLines,
} from "../SourceFile.js";

test("createSourceFile describes a CRLF utf-8 file", { concurrency: false }, () => {
  const bytes = Buffer.from("def a():\r\n    pass\r\n", "utf8");
  const source = createSourceFile("a.py", bytes);
  assert.equal(source.lineEnding, "CRLF");
  assert.equal(source.encoding, "utf-8");
  assert.equal(source.hasBom, false);
  assert.equal(source.text, "def a():\r\n    pass\r\n");
  assert.equal(source.checksum, createHash("sha256").update(bytes).digest("hex"));
});

test("createSourceFile strips a utf-8 BOM from the text", { concurrency: false }, () => {
  const bytes = Buffer.concat([Buffer.from([0xef, 0xbb, 0xbf]), Buffer.from("x = 1\n", "utf8")]);
  const source = createSourceFile("bom.py", bytes);
  assert.equal(source.hasBom, true);
  assert.equal(source.text, "x = 1\n");
  assert.deepEqual(encodeSourceText(source, "y = 2\n"), Buffer.concat([Buffer.from([0xef, 0xbb, 0xbf]), Buffer.from("y = 2\n")]));
});

test("createSourceFile honours a latin-1 coding declaration", { concurrency: false }, () => {
  const bytes = Buffer.from("# -*- coding: latin-1 -*-\ns = 'café'\n", "latin1");
  const source = createSourceFile("latin.py", bytes);
  assert.equal(source.encoding, "latin-1");
  assert.equal(source.text, "# -*- coding: latin-1 -*-\ns = 'café'\n");
  assert.deepEqual(encodeSourceText(source, source.text), bytes);
  assert.throws(() => encodeSourceText(source, "€"), InvalidDocstringError);
});

test("createSourceFile rejects invalid utf-8 and unknown encodings", { concurrency: false }, () => {
  assert.throws(
    () => createSourceFile("bad.py", Buffer.from([0x78, 0x0a, 0xff])),
    (error: unknown) => error instanceof ParseFailure && error.line === 2 && error.reason === "source is not valid utf-8",
  );
  assert.throws(
    () => createSourceFile("sjis.py", Buffer.from("# coding: shift_jis\n")),
    (error: unknown) => error instanceof ParseFailure && error.reason === "unsupported source encoding 'shift_jis'",
  );
});

test("loadSourceFile reads bytes from disk", { concurrency: false }, async () => {
  const tmpDir = mkdtempSync(path.join(os.tmpdir(), "docgap-source-"));
  const filePath = path.join(tmpDir, "m.py");
  writeFileSync(filePath, "x = 1\r");
  const source = await loadSourceFile(filePath);
  assert.equal(source.path, filePath);
  assert.equal(source.lineEnding, "CR");
});

test("line helpers handle every line ending", { concurrency: false }, () => {
  assert.equal(detectLineEnding("a\rb"), "CR");
  assert.equal(detectLineEnding("no newline"), "LF");
  assert.deepEqual(computeLineStarts("a\r\nb\rc\nd"), [0, 3, 5, 7]);
  assert.deepEqual(splitSourceLines("a\nb\n"), ["a", "b"]);
  assert.deepEqual(splitSourceLines("a\r\nb"), ["a", "b"]);
});
