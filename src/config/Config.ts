import type { StubPolicy } from "../scanner/GapScanner.js";

export type ReportFormat = "text" | "json";

export const REPORT_FORMATS: readonly ReportFormat[] = ["text", "json"];

export interface ScanConfig {
  extensions: string[];
  /** Directory names skipped while walking, on top of the built-in ones. */
  exclude: string[];
  stubPolicy: StubPolicy;
  concurrency: number;
}

export interface EditorConfig {
  /** Shell-style command; the temp file path is appended. */
  command?: string;
}

export interface LlmConfig {
  baseUrl: string;
  apiKey?: string;
  model: string;
  timeoutMs: number;
  temperature: number;
  maxTokens: number;
  contextLines: number;
}

export interface OutputConfig {
  format: ReportFormat;
  quiet: boolean;
  showBody: boolean;
  reportPath?: string;
}

export interface LoggingConfig {
  enabled: boolean;
  directory?: string;
}

export interface DocgapConfig {
  scan: ScanConfig;
  editor: EditorConfig;
  llm: LlmConfig;
  output: OutputConfig;
  logging: LoggingConfig;
}

export const DEFAULT_SCAN: ScanConfig = {
  extensions: [".py"],
  exclude: [],
  stubPolicy: "report",
  concurrency: 8,
};

export const DEFAULT_LLM: LlmConfig = {
  baseUrl: "https://api.openai.com/v1",
  model: "gpt-4o-mini",
  timeoutMs: 30_000,
  temperature: 0.2,
  maxTokens: 400,
  contextLines: 20,
};

export const DEFAULT_OUTPUT: OutputConfig = {
  format: "text",
  quiet: false,
  showBody: false,
};

export const DEFAULT_LOGGING: LoggingConfig = {
  enabled: true,
};

/** Suggestions are only offered when a credential is configured. */
export const hasLlmCredential = (config: DocgapConfig): boolean =>
  typeof config.llm.apiKey === "string" && config.llm.apiKey.trim().length > 0;
