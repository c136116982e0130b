import test from "node:test";
import assert from "node:assert/strict";
import { mkdtempSync, writeFileSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { ConfigError } from "../../runtime/DocgapErrors.js";
import { hasLlmCredential } from "../Config.js";
import { loadConfig, loadEnvConfig, mergeConfigs, normalizeConfigSource } from "../ConfigLoader.js";

const tmp = (): string => mkdtempSync(path.join(os.tmpdir(), "docgap-config-"));

test("loadConfig merges cli over env over file", { concurrency: false }, async () => {
  const tmpDir = tmp();
  writeFileSync(
    path.join(tmpDir, "docgap.config.yaml"),
    [
      "scan:",
      "  stubPolicy: exclude",
      "  exclude: [build]",
      "  concurrency: 2",
      "llm:",
      "  model: file-model",
      "  timeoutMs: 1000",
      "output:",
      "  showBody: true",
      "",
    ].join("\n"),
  );

  const config = await loadConfig({
    cwd: tmpDir,
    env: { HOME: tmpDir, DOCGAP_LLM_MODEL: "env-model", DOCGAP_LLM_TIMEOUT_MS: "2000" },
    cli: { llm: { model: "cli-model" } },
  });

  assert.equal(config.scan.stubPolicy, "exclude");
  assert.deepEqual(config.scan.exclude, ["build"]);
  assert.equal(config.scan.concurrency, 2);
  assert.deepEqual(config.scan.extensions, [".py"]);
  assert.equal(config.llm.model, "cli-model");
  assert.equal(config.llm.timeoutMs, 2000);
  assert.equal(config.output.showBody, true);
  assert.equal(config.output.format, "text");
});

test("loadConfig applies defaults and resolves the log directory", { concurrency: false }, async () => {
  const tmpDir = tmp();
  const config = await loadConfig({ cwd: tmpDir, env: { HOME: tmpDir } });

  assert.equal(config.scan.stubPolicy, "report");
  assert.equal(config.llm.baseUrl, "https://api.openai.com/v1");
  assert.equal(config.llm.apiKey, undefined);
  assert.equal(config.logging.enabled, true);
  assert.equal(config.logging.directory, path.join(tmpDir, ".docgap", "logs"));
  assert.equal(config.editor.command, undefined);
  assert.equal(hasLlmCredential(config), false);
});

test("loadConfig reads credentials and editor from the environment", { concurrency: false }, async () => {
  const tmpDir = tmp();
  const config = await loadConfig({
    cwd: tmpDir,
    env: { HOME: tmpDir, OPENAI_API_KEY: "test-secret", VISUAL: "code --wait", EDITOR: "vi" },
  });

  assert.equal(config.llm.apiKey, "test-secret");
  assert.equal(config.editor.command, "code --wait");
  assert.equal(hasLlmCredential(config), true);
});

test("loadConfig resolves an explicit JSON config path and the report path", { concurrency: false }, async () => {
  const tmpDir = tmp();
  writeFileSync(
    path.join(tmpDir, "custom.json"),
    JSON.stringify({ output: { format: "json", reportPath: "out/gaps.json" } }),
  );

  const config = await loadConfig({ cwd: tmpDir, env: { HOME: tmpDir }, configPath: "custom.json" });

  assert.equal(config.output.format, "json");
  assert.equal(config.output.reportPath, path.join(tmpDir, "out", "gaps.json"));
});

test("loadConfig rejects a missing explicit config path", { concurrency: false }, async () => {
  const tmpDir = tmp();
  await assert.rejects(
    () => loadConfig({ cwd: tmpDir, env: { HOME: tmpDir }, configPath: "missing.yaml" }),
    (error: unknown) => error instanceof ConfigError && error.message === "Config file not found: missing.yaml",
  );
});

test("loadConfig rejects malformed YAML", { concurrency: false }, async () => {
  const tmpDir = tmp();
  writeFileSync(path.join(tmpDir, "docgap.config.yaml"), "scan: [unclosed\n");
  await assert.rejects(
    () => loadConfig({ cwd: tmpDir, env: { HOME: tmpDir } }),
    (error: unknown) => error instanceof ConfigError && error.message.startsWith("Invalid config file "),
  );
});

test("loadConfig rejects out-of-range values", { concurrency: false }, async () => {
  const tmpDir = tmp();
  await assert.rejects(
    () => loadConfig({ cwd: tmpDir, env: { HOME: tmpDir }, cli: { scan: { concurrency: 0 }, llm: { timeoutMs: -1 } } }),
    (error: unknown) =>
      error instanceof ConfigError && error.message === "Invalid config values: scan.concurrency, llm.timeoutMs",
  );
});

test("loadEnvConfig validates numbers, booleans and stub policies", { concurrency: false }, () => {
  assert.throws(() => loadEnvConfig({ DOCGAP_LLM_TIMEOUT_MS: "soon" }), /Invalid DOCGAP_LLM_TIMEOUT_MS: expected number\./);
  assert.throws(() => loadEnvConfig({ DOCGAP_LOG_ENABLED: "maybe" }), /Invalid DOCGAP_LOG_ENABLED: expected boolean\./);
  assert.throws(
    () => loadEnvConfig({ DOCGAP_STUB_POLICY: "ignore" }),
    /Invalid DOCGAP_STUB_POLICY: expected one of report, exclude\./,
  );

  const source = loadEnvConfig({ DOCGAP_LOG_ENABLED: "off", DOCGAP_EXCLUDE: "build, dist,," });
  assert.equal(source.logging?.enabled, false);
  assert.deepEqual(source.scan?.exclude, ["build", "dist"]);
  assert.deepEqual(source.llm, {});
});

test("normalizeConfigSource rejects values of the wrong type", { concurrency: false }, () => {
  assert.throws(
    () => normalizeConfigSource({ scan: { extensions: ".py" } }, "docgap.config.yaml"),
    /Invalid docgap\.config\.yaml\.scan\.extensions: expected a list of strings\./,
  );
  assert.throws(() => normalizeConfigSource({ llm: "gpt" }), /Invalid config\.llm: expected a mapping\./);
});

test("mergeConfigs keeps earlier values when later sources omit them", { concurrency: false }, () => {
  const base = mergeConfigs(
    {
      scan: { extensions: [".py"], exclude: [], stubPolicy: "report", concurrency: 8 },
      editor: {},
      llm: {
        baseUrl: "http://127.0.0.1:9999/v1",
        model: "base",
        timeoutMs: 10,
        temperature: 0,
        maxTokens: 10,
        contextLines: 1,
      },
      output: { format: "text", quiet: false, showBody: false },
      logging: { enabled: true },
    },
    { llm: { model: "first" } },
    undefined,
    { llm: { timeoutMs: 20 } },
  );
  assert.equal(base.llm.model, "first");
  assert.equal(base.llm.timeoutMs, 20);
  assert.equal(base.llm.baseUrl, "http://127.0.0.1:9999/v1");
});
