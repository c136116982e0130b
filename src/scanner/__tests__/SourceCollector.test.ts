import test from "node:test";
import assert from "node:assert/strict";
import { mkdirSync, mkdtempSync, symlinkSync, writeFileSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { IOFailure, PathResolutionError } from "../../runtime/DocgapErrors.js";
import { collectSources, nodeCollectorFileSystem, type CollectorFileSystem } from "../SourceCollector.js";

const createTree = (): string => {
  const root = mkdtempSync(path.join(os.tmpdir(), "docgap-collect-"));
  const files: Record<string, string> = {
    "a.py": "x = 1\n",
    "b.txt": "not python\n",
    "pkg/c.py": "y = 2\n",
    ".hidden/d.py": "z = 3\n",
    "__pycache__/e.py": "z = 4\n",
    "venv/pyvenv.cfg": "home = /usr\n",
    "venv/f.py": "z = 5\n",
    "build/g.py": "z = 6\n",
  };
  for (const [relative, content] of Object.entries(files)) {
    const fullPath = path.join(root, relative);
    mkdirSync(path.dirname(fullPath), { recursive: true });
    writeFileSync(fullPath, content);
  }
  return root;
};

test("collectSources walks directories with exclusions", { concurrency: false }, async () => {
  const root = createTree();
  const files = await collectSources([root], { exclude: ["build"] });
  assert.deepEqual(files, [path.join(root, "a.py"), path.join(root, "pkg", "c.py")]);
});

test("collectSources defaults to the working directory", { concurrency: false }, async () => {
  const root = createTree();
  const files = await collectSources([], { cwd: root });
  assert.deepEqual(files, [path.join(root, "a.py"), path.join(root, "build", "g.py"), path.join(root, "pkg", "c.py")]);
});

test("collectSources keeps explicit files and deduplicates", { concurrency: false }, async () => {
  const root = createTree();
  const files = await collectSources(["b.txt", "a.py", "."], { cwd: root, exclude: ["build", "pkg"] });
  assert.deepEqual(files, [path.join(root, "a.py"), path.join(root, "b.txt")]);
});

test("collectSources rejects missing paths", { concurrency: false }, async () => {
  const root = createTree();
  await assert.rejects(
    () => collectSources(["missing.py"], { cwd: root }),
    (error: unknown) =>
      error instanceof PathResolutionError && error.message === "Cannot scan missing.py: no such file or directory",
  );
});

test("collectSources follows symlinked files but not symlinked directories", { concurrency: false }, async () => {
  const root = mkdtempSync(path.join(os.tmpdir(), "docgap-collect-"));
  const outside = mkdtempSync(path.join(os.tmpdir(), "docgap-outside-"));
  writeFileSync(path.join(outside, "real.py"), "def a(): pass\n");
  symlinkSync(path.join(outside, "real.py"), path.join(root, "link.py"));
  symlinkSync(path.join(root, "missing.py"), path.join(root, "dangling.py"));
  symlinkSync(outside, path.join(root, "linked-dir"));
  const files = await collectSources([root]);
  assert.deepEqual(files, [path.join(root, "link.py")]);
});

const failingReaddir = (blocked: string): CollectorFileSystem => ({
  ...nodeCollectorFileSystem,
  readdir: async (dir) => {
    if (dir === blocked) throw Object.assign(new Error("permission denied"), { code: "EACCES" });
    return nodeCollectorFileSystem.readdir(dir);
  },
});

test("collectSources reports unreadable directories and keeps walking", { concurrency: false }, async () => {
  const root = createTree();
  const blocked = path.join(root, "pkg");
  const errors: IOFailure[] = [];
  const files = await collectSources([root], {
    exclude: ["build"],
    fileSystem: failingReaddir(blocked),
    onDirectoryError: (error) => errors.push(error),
  });
  assert.deepEqual(files, [path.join(root, "a.py")]);
  assert.deepEqual(
    errors.map((error) => error.message),
    [`Failed to read directory ${blocked}: permission denied`],
  );
});

test("collectSources rejects an unreadable directory without an error handler", { concurrency: false }, async () => {
  const root = createTree();
  const blocked = path.join(root, "pkg");
  await assert.rejects(
    () => collectSources([root], { fileSystem: failingReaddir(blocked) }),
    (error: unknown) => error instanceof IOFailure && error.path === blocked,
  );
});
