import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import path from "node:path";
import YAML from "yaml";
import { ConfigError } from "../runtime/DocgapErrors.js";
import { getDefaultLogDir } from "../runtime/StoragePaths.js";
import { STUB_POLICIES, type StubPolicy } from "../scanner/GapScanner.js";
import {
  DEFAULT_LLM,
  DEFAULT_LOGGING,
  DEFAULT_OUTPUT,
  DEFAULT_SCAN,
  REPORT_FORMATS,
  type DocgapConfig,
  type EditorConfig,
  type LlmConfig,
  type LoggingConfig,
  type OutputConfig,
  type ReportFormat,
  type ScanConfig,
} from "./Config.js";

export interface ConfigSource {
  scan?: Partial<ScanConfig>;
  editor?: Partial<EditorConfig>;
  llm?: Partial<LlmConfig>;
  output?: Partial<OutputConfig>;
  logging?: Partial<LoggingConfig>;
}

export interface LoadConfigOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  cli?: ConfigSource;
  configPath?: string;
}

export const CONFIG_FILE_NAMES = ["docgap.config.yaml", "docgap.config.yml", ".docgaprc", "docgap.config.json"];

type UnknownRecord = Record<string, unknown>;

const isRecord = (value: unknown): value is UnknownRecord =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const parseNumberStrict = (value: string | undefined, label: string): number | undefined => {
  if (!value) return undefined;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ConfigError(`Invalid ${label}: expected number.`, { label });
  }
  return parsed;
};

const parseBooleanStrict = (value: string | undefined, label: string): boolean | undefined => {
  if (!value) return undefined;
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  throw new ConfigError(`Invalid ${label}: expected boolean.`, { label });
};

const parseList = (value: string | undefined): string[] | undefined => {
  if (!value) return undefined;
  const items = value
    .split(",")
    .map((entry) => entry.trim())
    .filter(Boolean);
  return items.length ? items : undefined;
};

const firstNonEmpty = (...values: Array<string | undefined>): string | undefined =>
  values.find((value) => value !== undefined && value.trim().length > 0);

export const parseStubPolicy = (value: string | undefined, label: string): StubPolicy | undefined => {
  if (value === undefined) return undefined;
  const match = STUB_POLICIES.find((policy) => policy === value);
  if (!match) throw new ConfigError(`Invalid ${label}: expected one of ${STUB_POLICIES.join(", ")}.`, { label });
  return match;
};

export const parseReportFormat = (value: string | undefined, label: string): ReportFormat | undefined => {
  if (value === undefined) return undefined;
  const match = REPORT_FORMATS.find((format) => format === value);
  if (!match) throw new ConfigError(`Invalid ${label}: expected one of ${REPORT_FORMATS.join(", ")}.`, { label });
  return match;
};

const normalizeStringField = (value: unknown, label: string): string | undefined => {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") throw new ConfigError(`Invalid ${label}: expected string.`, { label });
  return value;
};

const normalizeNumberField = (value: unknown, label: string): number | undefined => {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new ConfigError(`Invalid ${label}: expected number.`, { label });
  }
  return value;
};

const normalizeBooleanField = (value: unknown, label: string): boolean | undefined => {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "boolean") throw new ConfigError(`Invalid ${label}: expected boolean.`, { label });
  return value;
};

const normalizeListField = (value: unknown, label: string): string[] | undefined => {
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === "string")) {
    throw new ConfigError(`Invalid ${label}: expected a list of strings.`, { label });
  }
  return value;
};

const section = (value: unknown, label: string): UnknownRecord => {
  if (value === undefined || value === null) return {};
  if (!isRecord(value)) throw new ConfigError(`Invalid ${label}: expected a mapping.`, { label });
  return value;
};

const compact = <T extends object>(value: T): T =>
  Object.fromEntries(Object.entries(value).filter(([, entry]) => entry !== undefined)) as T;

/** Validates a parsed config file and keeps only the keys docgap knows. */
export const normalizeConfigSource = (value: unknown, label = "config"): ConfigSource => {
  const root = section(value, label);
  const scan = section(root.scan, `${label}.scan`);
  const editor = section(root.editor, `${label}.editor`);
  const llm = section(root.llm, `${label}.llm`);
  const output = section(root.output, `${label}.output`);
  const logging = section(root.logging, `${label}.logging`);
  return {
    scan: compact({
      extensions: normalizeListField(scan.extensions, `${label}.scan.extensions`),
      exclude: normalizeListField(scan.exclude, `${label}.scan.exclude`),
      stubPolicy: parseStubPolicy(normalizeStringField(scan.stubPolicy, `${label}.scan.stubPolicy`), `${label}.scan.stubPolicy`),
      concurrency: normalizeNumberField(scan.concurrency, `${label}.scan.concurrency`),
    }),
    editor: compact({
      command: normalizeStringField(editor.command, `${label}.editor.command`),
    }),
    llm: compact({
      baseUrl: normalizeStringField(llm.baseUrl, `${label}.llm.baseUrl`),
      apiKey: normalizeStringField(llm.apiKey, `${label}.llm.apiKey`),
      model: normalizeStringField(llm.model, `${label}.llm.model`),
      timeoutMs: normalizeNumberField(llm.timeoutMs, `${label}.llm.timeoutMs`),
      temperature: normalizeNumberField(llm.temperature, `${label}.llm.temperature`),
      maxTokens: normalizeNumberField(llm.maxTokens, `${label}.llm.maxTokens`),
      contextLines: normalizeNumberField(llm.contextLines, `${label}.llm.contextLines`),
    }),
    output: compact({
      format: parseReportFormat(normalizeStringField(output.format, `${label}.output.format`), `${label}.output.format`),
      quiet: normalizeBooleanField(output.quiet, `${label}.output.quiet`),
      showBody: normalizeBooleanField(output.showBody, `${label}.output.showBody`),
      reportPath: normalizeStringField(output.reportPath, `${label}.output.reportPath`),
    }),
    logging: compact({
      enabled: normalizeBooleanField(logging.enabled, `${label}.logging.enabled`),
      directory: normalizeStringField(logging.directory, `${label}.logging.directory`),
    }),
  };
};

export const findConfigFile = (cwd: string): string | undefined => {
  for (const candidate of CONFIG_FILE_NAMES) {
    const candidatePath = path.join(cwd, candidate);
    if (existsSync(candidatePath)) {
      return candidatePath;
    }
  }
  return undefined;
};

export const readConfigFile = async (configPath?: string): Promise<ConfigSource | undefined> => {
  if (!configPath) return undefined;
  const content = await readFile(configPath, "utf8");
  if (!content.trim()) return undefined;
  let parsed: unknown;
  try {
    // JSON is a subset of YAML, so one parser covers every candidate file
    parsed = YAML.parse(content);
  } catch (error) {
    throw new ConfigError(`Invalid config file ${configPath}: ${error instanceof Error ? error.message : String(error)}`, {
      path: configPath,
    });
  }
  return normalizeConfigSource(parsed, path.basename(configPath));
};

export const loadEnvConfig = (env: NodeJS.ProcessEnv): ConfigSource => {
  const timeoutMs = parseNumberStrict(env.DOCGAP_LLM_TIMEOUT_MS, "DOCGAP_LLM_TIMEOUT_MS");
  const enabled = parseBooleanStrict(env.DOCGAP_LOG_ENABLED, "DOCGAP_LOG_ENABLED");
  return {
    scan: compact({
      stubPolicy: parseStubPolicy(firstNonEmpty(env.DOCGAP_STUB_POLICY), "DOCGAP_STUB_POLICY"),
      exclude: parseList(env.DOCGAP_EXCLUDE),
    }),
    editor: compact({
      command: firstNonEmpty(env.DOCGAP_EDITOR, env.VISUAL, env.EDITOR),
    }),
    llm: compact({
      baseUrl: firstNonEmpty(env.DOCGAP_LLM_BASE_URL, env.OPENAI_BASE_URL),
      apiKey: firstNonEmpty(env.DOCGAP_LLM_API_KEY, env.OPENAI_API_KEY),
      model: firstNonEmpty(env.DOCGAP_LLM_MODEL),
      timeoutMs,
    }),
    logging: compact({
      enabled,
      directory: firstNonEmpty(env.DOCGAP_LOG_DIR),
    }),
  };
};

const mergeSection = <T extends object>(base: T, parts: Array<Partial<T> | undefined>): T =>
  parts.reduce<T>((merged, part) => (part ? { ...merged, ...compact(part) } : merged), base);

export const mergeConfigs = (defaults: DocgapConfig, ...sources: Array<ConfigSource | undefined>): DocgapConfig => ({
  scan: mergeSection(defaults.scan, sources.map((source) => source?.scan)),
  editor: mergeSection(defaults.editor, sources.map((source) => source?.editor)),
  llm: mergeSection(defaults.llm, sources.map((source) => source?.llm)),
  output: mergeSection(defaults.output, sources.map((source) => source?.output)),
  logging: mergeSection(defaults.logging, sources.map((source) => source?.logging)),
});

const assertValid = (config: DocgapConfig): void => {
  const errors: string[] = [];
  if (!Number.isInteger(config.scan.concurrency) || config.scan.concurrency < 1) errors.push("scan.concurrency");
  if (config.scan.extensions.some((extension) => !extension.startsWith("."))) errors.push("scan.extensions");
  if (config.llm.timeoutMs <= 0) errors.push("llm.timeoutMs");
  if (config.llm.maxTokens <= 0) errors.push("llm.maxTokens");
  if (config.llm.contextLines < 0) errors.push("llm.contextLines");
  if (!config.llm.baseUrl.trim()) errors.push("llm.baseUrl");
  if (errors.length) {
    throw new ConfigError(`Invalid config values: ${errors.join(", ")}`, { fields: errors });
  }
};

export const loadConfig = async (options: LoadConfigOptions = {}): Promise<DocgapConfig> => {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  let configPath = findConfigFile(cwd);
  if (options.configPath) {
    configPath = path.resolve(cwd, options.configPath);
    if (!existsSync(configPath)) {
      throw new ConfigError(`Config file not found: ${options.configPath}`, { path: configPath });
    }
  }
  const fileConfig = await readConfigFile(configPath);
  const envConfig = loadEnvConfig(env);

  const defaults: DocgapConfig = {
    scan: DEFAULT_SCAN,
    editor: {},
    llm: DEFAULT_LLM,
    output: DEFAULT_OUTPUT,
    logging: { ...DEFAULT_LOGGING, directory: getDefaultLogDir(env) },
  };

  const merged = mergeConfigs(defaults, fileConfig, envConfig, options.cli);
  const finalized: DocgapConfig = {
    ...merged,
    logging: {
      ...merged.logging,
      directory: merged.logging.directory ? path.resolve(cwd, merged.logging.directory) : undefined,
    },
    output: {
      ...merged.output,
      reportPath: merged.output.reportPath ? path.resolve(cwd, merged.output.reportPath) : undefined,
    },
  };
  assertValid(finalized);
  return finalized;
};
