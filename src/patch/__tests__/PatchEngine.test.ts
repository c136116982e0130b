import test from "node:test";
import assert from "node:assert/strict";
import { mkdtempSync, readdirSync, readFileSync, writeFileSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { InvalidDocstringError, IOFailure, StaleFileError } from "../../runtime/DocgapErrors.js";
import { GapScanner, type Gap } from "../../scanner/GapScanner.js";
import { loadSourceFile } from "../../source/SourceFile.js";
import { nodeWriterFileSystem } from "../AtomicWriter.js";
import { PatchEngine } from "../PatchEngine.js";

const WORKED_EXAMPLE = 'def a(): pass\ndef b():\n    """Has one."""\n    return 1\n';

const writeSource = (content: string | Buffer): string => {
  const dir = mkdtempSync(path.join(os.tmpdir(), "docgap-patch-"));
  const filePath = path.join(dir, "m.py");
  writeFileSync(filePath, content);
  return filePath;
};

const scanGaps = async (filePath: string): Promise<Gap[]> =>
  new GapScanner().findGaps(await loadSourceFile(filePath));

const firstGap = async (filePath: string): Promise<Gap> => {
  const [gap] = await scanGaps(filePath);
  assert.ok(gap);
  return gap;
};

test("PatchEngine moves an inline body below the new docstring", { concurrency: false }, async () => {
  const filePath = writeSource(WORKED_EXAMPLE);
  const result = await new PatchEngine().apply(await firstGap(filePath), "Does a.");
  assert.ok(result.ok);
  assert.equal(result.value.patch.line, 1);
  assert.equal(result.value.patch.offset, 8);
  assert.equal(result.value.patch.deleteLength, 1);
  assert.equal(
    readFileSync(filePath, "utf8"),
    'def a():\n    """Does a."""\n    pass\ndef b():\n    """Has one."""\n    return 1\n',
  );
  assert.deepEqual(await scanGaps(filePath), []);
  assert.equal(result.value.source.text, readFileSync(filePath, "utf8"));
});

test("PatchEngine inserts before the first statement of a CRLF block body", { concurrency: false }, async () => {
  const filePath = writeSource("def f(x):\r\n    # why\r\n    return x\r\n");
  const result = await new PatchEngine().apply(await firstGap(filePath), "Returns x.");
  assert.ok(result.ok);
  assert.equal(result.value.patch.line, 3);
  assert.equal(readFileSync(filePath, "utf8"), 'def f(x):\r\n    # why\r\n    """Returns x."""\r\n    return x\r\n');
});

test("PatchEngine follows the file's quoting convention", { concurrency: false }, async () => {
  const filePath = writeSource("def a():\n    '''Doc.'''\n\ndef b():\n    return 2\n");
  const result = await new PatchEngine().apply(await firstGap(filePath), "Mine.\n\nMore.");
  assert.ok(result.ok);
  assert.equal(
    readFileSync(filePath, "utf8"),
    "def a():\n    '''Doc.'''\n\ndef b():\n    '''Mine.\n\n    More.\n    '''\n    return 2\n",
  );
});

test("PatchEngine detects files changed since the scan", { concurrency: false }, async () => {
  const filePath = writeSource(WORKED_EXAMPLE);
  const gap = await firstGap(filePath);
  writeFileSync(filePath, `# edited\n${WORKED_EXAMPLE}`);
  const result = await new PatchEngine().apply(gap, "Does a.");
  assert.equal(result.ok, false);
  assert.ok(!result.ok && result.error instanceof StaleFileError);
  assert.equal(readFileSync(filePath, "utf8"), `# edited\n${WORKED_EXAMPLE}`);
});

test("PatchEngine applies a gap exactly once", { concurrency: false }, async () => {
  const filePath = writeSource(WORKED_EXAMPLE);
  const gap = await firstGap(filePath);
  const engine = new PatchEngine();
  assert.equal((await engine.apply(gap, "Does a.")).ok, true);
  const second = await engine.apply(gap, "Does a.");
  assert.ok(!second.ok && second.error instanceof StaleFileError);
  assert.equal(readFileSync(filePath, "utf8").split('"""Does a."""').length, 2);
});

test("PatchEngine never patches a documented span", { concurrency: false }, async () => {
  const filePath = writeSource(WORKED_EXAMPLE);
  const source = await loadSourceFile(filePath);
  const scanner = new GapScanner();
  const documented = scanner.scan(source).find((span) => span.qualifiedName === "b");
  assert.ok(documented);
  const result = await new PatchEngine().apply(
    { path: filePath, checksum: source.checksum, span: documented },
    "Other.",
  );
  assert.ok(!result.ok);
  assert.ok(result.error instanceof InvalidDocstringError);
  assert.equal(result.error.message, "b already has a docstring.");
  assert.equal(readFileSync(filePath, "utf8"), WORKED_EXAMPLE);
});

test("PatchEngine rejects text containing the delimiter before writing", { concurrency: false }, async () => {
  const filePath = writeSource(WORKED_EXAMPLE);
  const result = await new PatchEngine().apply(await firstGap(filePath), 'Oops """ here');
  assert.ok(!result.ok && result.error instanceof InvalidDocstringError);
  assert.equal(readFileSync(filePath, "utf8"), WORKED_EXAMPLE);
});

test("PatchEngine leaves the original untouched when the write fails", { concurrency: false }, async () => {
  const filePath = writeSource(WORKED_EXAMPLE);
  const engine = new PatchEngine({
    fileSystem: {
      ...nodeWriterFileSystem,
      rename: async () => {
        throw new Error("disk full");
      },
    },
  });
  const result = await engine.apply(await firstGap(filePath), "Does a.");
  assert.ok(!result.ok && result.error instanceof IOFailure);
  assert.equal(readFileSync(filePath, "utf8"), WORKED_EXAMPLE);
  assert.deepEqual(readdirSync(path.dirname(filePath)), ["m.py"]);
});

test("PatchEngine keeps latin-1 bytes outside the insertion", { concurrency: false }, async () => {
  const original = Buffer.from("# coding: latin-1\ndef café():\n    return 'é'\n", "latin1");
  const filePath = writeSource(original);
  const engine = new PatchEngine();
  const refused = await engine.apply(await firstGap(filePath), "Costs €1.");
  assert.ok(!refused.ok && refused.error instanceof InvalidDocstringError);

  const result = await engine.apply(await firstGap(filePath), "Serves café.");
  assert.ok(result.ok);
  assert.deepEqual(
    readFileSync(filePath),
    Buffer.from("# coding: latin-1\ndef café():\n    \"\"\"Serves café.\"\"\"\n    return 'é'\n", "latin1"),
  );
});
