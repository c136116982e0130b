import test from "node:test";
import assert from "node:assert/strict";
import { mkdtempSync, readFileSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { RunLogger } from "../RunLogger.js";
import { getDefaultLogDir, toDisplayPath } from "../StoragePaths.js";

test("RunLogger appends JSONL events in call order", { concurrency: false }, async () => {
  const dir = path.join(mkdtempSync(path.join(os.tmpdir(), "docgap-log-")), "nested", "logs");
  const logger = new RunLogger(dir, "run-1");

  await Promise.all([logger.log("run_started", { paths: ["."] }), logger.log("scan_completed", { gaps: 2 })]);
  await logger.log("run_finished", { exitCode: 1 });

  assert.equal(logger.logPath, path.join(dir, "run-1.jsonl"));
  const lines = readFileSync(logger.logPath, "utf8").trimEnd().split("\n");
  assert.equal(lines.length, 3);
  const events = await logger.readEvents();
  assert.deepEqual(
    events.map((event) => [event.type, event.data]),
    [
      ["run_started", { paths: ["."] }],
      ["scan_completed", { gaps: 2 }],
      ["run_finished", { exitCode: 1 }],
    ],
  );
  assert.ok(events.every((event) => !Number.isNaN(Date.parse(event.timestamp))));
});

test("RunLogger reads no events before the first write", { concurrency: false }, async () => {
  const logger = new RunLogger(mkdtempSync(path.join(os.tmpdir(), "docgap-log-")), "empty");
  assert.deepEqual(await logger.readEvents(), []);
});

test("getDefaultLogDir lives under the home directory", { concurrency: false }, () => {
  assert.equal(getDefaultLogDir({ HOME: "/home/tester" }), path.join("/home/tester", ".docgap", "logs"));
});

test("toDisplayPath is relative inside cwd and absolute outside it", { concurrency: false }, () => {
  const cwd = path.resolve("/work/project");
  assert.equal(toDisplayPath(path.join(cwd, "pkg", "m.py"), cwd), "pkg/m.py");
  assert.equal(toDisplayPath("pkg/m.py", cwd), "pkg/m.py");
  assert.equal(toDisplayPath(path.resolve("/work/other/m.py"), cwd), path.resolve("/work/other/m.py").split(path.sep).join("/"));
});
