import test from "node:test";
import assert from "node:assert/strict";
import { mkdirSync, mkdtempSync, writeFileSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { IOFailure, ParseFailure } from "../../runtime/DocgapErrors.js";
import { nodeCollectorFileSystem } from "../SourceCollector.js";
import { scanFiles, scanSources } from "../ScanRunner.js";

const createProject = (): string => {
  const root = mkdtempSync(path.join(os.tmpdir(), "docgap-scan-"));
  writeFileSync(path.join(root, "good.py"), 'def a(): pass\ndef b():\n    """Has one."""\n    return 1\n');
  writeFileSync(path.join(root, "broken.py"), "def f(:\n");
  writeFileSync(path.join(root, "binary.py"), Buffer.from([0x78, 0x0a, 0xff]));
  return root;
};

test("scanSources isolates per-file parse failures", { concurrency: false }, async () => {
  const root = createProject();
  const summary = await scanSources([root], { concurrency: 2 });

  assert.deepEqual(
    summary.files.map((file) => [path.basename(file.path), file.status]),
    [
      ["binary.py", "failed"],
      ["broken.py", "failed"],
      ["good.py", "ok"],
    ],
  );
  assert.deepEqual(
    summary.gaps.map((gap) => gap.span.qualifiedName),
    ["a"],
  );
  const broken = summary.failures.find((failure) => path.basename(failure.path) === "broken.py");
  assert.ok(broken);
  assert.ok(broken.error instanceof ParseFailure);
  assert.equal(broken.error.reason, "'(' was never closed");
  assert.equal(broken.error.line, 1);
});

test("scanFiles applies the stub policy", { concurrency: false }, async () => {
  const root = createProject();
  const good = path.join(root, "good.py");
  const reported = await scanFiles([good], { concurrency: 1 });
  const excluded = await scanFiles([good], { stubPolicy: "exclude" });
  assert.equal(reported.gaps.length, 1);
  assert.equal(excluded.gaps.length, 0);
});

test("scanFiles reports unreadable files", { concurrency: false }, async () => {
  const root = createProject();
  const summary = await scanFiles([path.join(root, "gone.py")]);
  const [failure] = summary.failures;
  assert.equal(failure?.error.code, "io_failure");
});

test("scanSources keeps scanning when a directory cannot be listed", { concurrency: false }, async () => {
  const root = mkdtempSync(path.join(os.tmpdir(), "docgap-scan-"));
  writeFileSync(path.join(root, "a.py"), "def a(): pass\n");
  const blocked = path.join(root, "locked");
  mkdirSync(blocked);
  writeFileSync(path.join(blocked, "b.py"), "def b(): pass\n");

  const summary = await scanSources([root], {
    fileSystem: {
      ...nodeCollectorFileSystem,
      readdir: async (dir) => {
        if (dir === blocked) throw new Error("permission denied");
        return nodeCollectorFileSystem.readdir(dir);
      },
    },
  });

  assert.deepEqual(
    summary.gaps.map((gap) => gap.span.qualifiedName),
    ["a"],
  );
  assert.equal(summary.failures.length, 1);
  const [failure] = summary.failures;
  assert.ok(failure);
  assert.equal(failure.path, blocked);
  assert.ok(failure.error instanceof IOFailure);
  assert.equal(summary.files.length, 2);
});
