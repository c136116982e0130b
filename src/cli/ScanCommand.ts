import { randomUUID } from "node:crypto";
import { promises as fs } from "node:fs";
import { createRequire } from "node:module";
import path from "node:path";
import process from "node:process";
import {
  hasLlmCredential,
  type DocgapConfig,
  type LlmConfig,
  type OutputConfig,
  type ReportFormat,
} from "../config/Config.js";
import { loadConfig, parseReportFormat, parseStubPolicy, type ConfigSource } from "../config/ConfigLoader.js";
import { ExternalEditor } from "../editor/ExternalEditor.js";
import { InlineEditor, type LineIO } from "../editor/InlineEditor.js";
import { OpenAiCompatibleProvider } from "../providers/OpenAiCompatibleProvider.js";
import { render, renderFailures, renderJson, summarize, summarizeSession, type ReportFailure } from "../report/Reporter.js";
import { ConfigError, describeError, IOFailure, PathResolutionError } from "../runtime/DocgapErrors.js";
import { RunLogger } from "../runtime/RunLogger.js";
import { GapScanner, type Gap, type StubPolicy } from "../scanner/GapScanner.js";
import { scanSources, type ScanSummary } from "../scanner/ScanRunner.js";
import { SessionController } from "../session/SessionController.js";
import type { DocstringEditor, SessionPrompter, SessionResult, SuggestionProvider } from "../session/SessionTypes.js";
import { LlmSuggestionProvider } from "../suggestion/LlmSuggestionProvider.js";
import { TerminalIO, type TerminalControl } from "./TerminalIO.js";
import { TerminalPrompter } from "./TerminalPrompter.js";

export const EXIT_CLEAN = 0;
export const EXIT_GAPS = 1;
export const EXIT_FATAL = 2;

export const HELP_TEXT =
  "Usage: docgap [paths...] [options]\n" +
  "\n" +
  "Reports Python functions and methods that have no docstring.\n" +
  "\n" +
  "Options:\n" +
  "  -i, --interactive     Walk through each gap and insert docstrings\n" +
  "  -q, --quiet           Do not print the report on stdout\n" +
  "  -r, --report <file>   Also write the report to <file>\n" +
  "  --format <text|json>  Report format (default: text)\n" +
  "  --stubs <report|exclude>\n" +
  "                        Whether bodies of only pass or ... are reported\n" +
  "  --show-body           Show the whole definition while reviewing\n" +
  "  --config <file>       Read configuration from <file>\n" +
  "  --model <name>        Model used for suggestions\n" +
  "  --timeout-ms <n>      Suggestion request timeout\n" +
  "  -h, --help            Show help\n" +
  "  -v, --version         Show version\n" +
  "\n" +
  "Exit status: 0 when no gaps remain, 1 when gaps remain, 2 on fatal errors.";

export interface ParsedArgs {
  paths: string[];
  interactive?: boolean;
  quiet?: boolean;
  reportPath?: string;
  format?: ReportFormat;
  stubPolicy?: StubPolicy;
  showBody?: boolean;
  configPath?: string;
  model?: string;
  timeoutMs?: number;
  help?: boolean;
  version?: boolean;
}

export interface ScanCommandContext {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
  io?: LineIO;
  prompter?: SessionPrompter;
  editor?: DocstringEditor;
  provider?: SuggestionProvider;
  signal?: AbortSignal;
  runId?: string;
}

const readCliVersion = (): string => {
  const require = createRequire(import.meta.url);
  try {
    const pkg = require("../../package.json") as { version?: string };
    return pkg.version ?? "0.0.0";
  } catch {
    return "0.0.0";
  }
};

export const parseArgs = (argv: string[]): ParsedArgs => {
  const requireValue = (flag: string, value: string | undefined): string => {
    if (value === undefined || (value.startsWith("-") && value !== "-")) {
      throw new ConfigError(`Missing value for ${flag}.`, { flag });
    }
    return value;
  };

  const parsed: ParsedArgs = { paths: [] };
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i] ?? "";
    const next = argv[i + 1];
    if (arg === "--") {
      parsed.paths.push(...argv.slice(i + 1));
      break;
    }
    if (arg === "-i" || arg === "--interactive") {
      parsed.interactive = true;
      continue;
    }
    if (arg === "-q" || arg === "--quiet") {
      parsed.quiet = true;
      continue;
    }
    if (arg === "--show-body") {
      parsed.showBody = true;
      continue;
    }
    if (arg === "-h" || arg === "--help") {
      parsed.help = true;
      continue;
    }
    if (arg === "-v" || arg === "--version") {
      parsed.version = true;
      continue;
    }
    if (arg === "-r" || arg === "--report") {
      parsed.reportPath = requireValue(arg, next);
      i += 1;
      continue;
    }
    if (arg === "--format") {
      parsed.format = parseReportFormat(requireValue(arg, next), arg);
      i += 1;
      continue;
    }
    if (arg === "--stubs") {
      parsed.stubPolicy = parseStubPolicy(requireValue(arg, next), arg);
      i += 1;
      continue;
    }
    if (arg === "--config") {
      parsed.configPath = requireValue(arg, next);
      i += 1;
      continue;
    }
    if (arg === "--model") {
      parsed.model = requireValue(arg, next);
      i += 1;
      continue;
    }
    if (arg === "--timeout-ms") {
      const value = Number(requireValue(arg, next));
      if (!Number.isFinite(value) || value <= 0) {
        throw new ConfigError(`Invalid ${arg}: expected a positive number.`, { flag: arg });
      }
      parsed.timeoutMs = value;
      i += 1;
      continue;
    }
    if (arg.startsWith("-") && arg !== "-") {
      throw new ConfigError(`Unknown option: ${arg}`, { option: arg });
    }
    parsed.paths.push(arg);
  }
  return parsed;
};

export const toCliConfig = (parsed: ParsedArgs): ConfigSource => {
  const cli: ConfigSource = {};
  if (parsed.stubPolicy) cli.scan = { stubPolicy: parsed.stubPolicy };

  const llm: Partial<LlmConfig> = {};
  if (parsed.model) llm.model = parsed.model;
  if (parsed.timeoutMs !== undefined) llm.timeoutMs = parsed.timeoutMs;
  if (Object.keys(llm).length) cli.llm = llm;

  const output: Partial<OutputConfig> = {};
  if (parsed.format) output.format = parsed.format;
  if (parsed.quiet) output.quiet = true;
  if (parsed.showBody) output.showBody = true;
  if (parsed.reportPath) output.reportPath = parsed.reportPath;
  if (Object.keys(output).length) cli.output = output;
  return cli;
};

export const createSuggestionProvider = (config: DocgapConfig): SuggestionProvider | undefined => {
  if (!hasLlmCredential(config)) return undefined;
  const provider = new OpenAiCompatibleProvider({
    model: config.llm.model,
    apiKey: config.llm.apiKey,
    baseUrl: config.llm.baseUrl,
    timeoutMs: config.llm.timeoutMs,
  });
  return new LlmSuggestionProvider(provider, {
    model: config.llm.model,
    temperature: config.llm.temperature,
    maxTokens: config.llm.maxTokens,
  });
};

export const createEditor = (config: DocgapConfig, io: LineIO, terminal?: TerminalControl): DocstringEditor => {
  const inline = new InlineEditor(io);
  if (!config.editor.command) return inline;
  return new ExternalEditor({
    command: config.editor.command,
    fallback: inline,
    onWarning: (message) => io.print(message),
    terminal,
  });
};

const openRunLogger = async (
  config: DocgapConfig,
  runId: string,
  stderr: (text: string) => void,
  data: Record<string, unknown>,
): Promise<RunLogger | undefined> => {
  if (!config.logging.enabled || !config.logging.directory) return undefined;
  const logger = new RunLogger(config.logging.directory, runId);
  try {
    await logger.log("run_started", data);
    return logger;
  } catch (error) {
    stderr(`docgap: warning: run log disabled: ${describeError(error)}\n`);
    return undefined;
  }
};

export class ScanCommand {
  static async run(argv: string[], context: ScanCommandContext = {}): Promise<number> {
    const cwd = context.cwd ?? process.cwd();
    const env = context.env ?? process.env;
    const stdout =
      context.stdout ??
      ((text: string) => {
        process.stdout.write(text);
      });
    const stderr =
      context.stderr ??
      ((text: string) => {
        process.stderr.write(text);
      });

    let parsed: ParsedArgs;
    let config: DocgapConfig;
    try {
      parsed = parseArgs(argv);
      if (parsed.help) {
        stdout(`${HELP_TEXT}\n`);
        return EXIT_CLEAN;
      }
      if (parsed.version) {
        stdout(`${readCliVersion()}\n`);
        return EXIT_CLEAN;
      }
      config = await loadConfig({ cwd, env, cli: toCliConfig(parsed), configPath: parsed.configPath });
    } catch (error) {
      if (error instanceof ConfigError) {
        stderr(`docgap: error: ${error.message}\n`);
        return EXIT_FATAL;
      }
      throw error;
    }

    const paths = parsed.paths.length ? parsed.paths : ["."];
    const logger = await openRunLogger(config, context.runId ?? randomUUID(), stderr, {
      cwd,
      paths,
      interactive: parsed.interactive ?? false,
    });
    const finish = async (exitCode: number, data: Record<string, unknown> = {}): Promise<number> => {
      await logger?.log("run_finished", { exitCode, ...data });
      return exitCode;
    };

    let summary: ScanSummary;
    try {
      summary = await scanSources(paths, {
        cwd,
        extensions: config.scan.extensions,
        exclude: config.scan.exclude,
        stubPolicy: config.scan.stubPolicy,
        concurrency: config.scan.concurrency,
      });
    } catch (error) {
      if (error instanceof PathResolutionError) {
        stderr(`docgap: error: ${error.message}\n`);
        return finish(EXIT_FATAL, { error: error.message });
      }
      throw error;
    }

    await logger?.log("scan_completed", {
      files: summary.files.length,
      gaps: summary.gaps.length,
      failures: summary.failures.length,
    });
    for (const failure of summary.failures) {
      await logger?.log("parse_failure", { path: failure.path, code: failure.error.code, message: failure.error.message });
    }
    if (summary.failures.length) stderr(renderFailures(summary.failures, { cwd }));
    if (summary.files.length > 0 && summary.failures.length === summary.files.length) {
      stderr("docgap: error: none of the files could be scanned.\n");
      return finish(EXIT_FATAL, { gaps: 0 });
    }

    const quiet = config.output.quiet;
    const emitReport = async (gaps: Gap[], failures: ReportFailure[]): Promise<number> => {
      const report =
        config.output.format === "json" ? renderJson(gaps, failures, { cwd }) : render(gaps, { cwd });
      if (!quiet && report) stdout(report);
      const reportPath = config.output.reportPath;
      if (reportPath) {
        try {
          await fs.mkdir(path.dirname(reportPath), { recursive: true });
          await fs.writeFile(reportPath, report, "utf8");
        } catch (error) {
          stderr(`docgap: error: ${new IOFailure(reportPath, "write report", error).message}\n`);
          return EXIT_FATAL;
        }
      }
      return gaps.length > 0 ? EXIT_GAPS : EXIT_CLEAN;
    };

    if (!parsed.interactive || summary.gaps.length === 0) {
      if (!quiet) stderr(`${summarize(summary.gaps, { files: summary.files.length, failures: summary.failures.length })}\n`);
      return finish(await emitReport(summary.gaps, summary.failures), { gaps: summary.gaps.length });
    }

    let terminal: TerminalIO | undefined;
    let io: LineIO;
    if (context.io) {
      io = context.io;
    } else {
      terminal = new TerminalIO();
      io = terminal;
    }
    const prompter = context.prompter ?? new TerminalPrompter(io);
    const editor = context.editor ?? createEditor(config, io, terminal);
    const provider = context.provider ?? createSuggestionProvider(config);
    if (!provider) {
      prompter.notify("No LLM credential is configured; suggestions are disabled.");
    }
    const session = new SessionController({
      prompter,
      editor,
      provider,
      logger,
      cwd,
      scanner: new GapScanner({ stubPolicy: config.scan.stubPolicy }),
      showBody: config.output.showBody,
      contextLines: config.llm.contextLines,
      signal: context.signal,
    });
    let result: SessionResult;
    try {
      result = await session.run(summary.gaps);
    } finally {
      terminal?.close();
    }
    if (!quiet) stderr(`${summarizeSession(result.outcomes, result.remaining.length)}\n`);
    const exitCode = await emitReport(result.remaining, summary.failures);
    return finish(exitCode, {
      gaps: result.remaining.length,
      applied: result.outcomes.filter((outcome) => outcome.outcome === "applied").length,
      quit: result.quit,
    });
  }
}
