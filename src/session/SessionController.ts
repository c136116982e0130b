import {
  describeError,
  InvalidDocstringError,
  ProviderFailure,
  StaleFileError,
} from "../runtime/DocgapErrors.js";
import type { RunLogger } from "../runtime/RunLogger.js";
import { toDisplayPath } from "../runtime/StoragePaths.js";
import { docstringContent, docstringTemplate, renderDocstring } from "../patch/DocstringBlock.js";
import { PatchEngine } from "../patch/PatchEngine.js";
import { GapScanner, gapKey, gapLine, type Gap } from "../scanner/GapScanner.js";
import { loadSourceFile, type SourceFile } from "../source/SourceFile.js";
import { parseSource, type TripleDelimiter } from "../source/SourceModel.js";
import type {
  DocstringEditor,
  FixSource,
  GapOutcome,
  GapResult,
  GapStateName,
  GapView,
  SessionPrompter,
  SessionResult,
  SuggestionProvider,
} from "./SessionTypes.js";
import { buildSuggestionContext, definitionText, signaturePreview } from "./SuggestionContext.js";

export interface SessionControllerOptions {
  prompter: SessionPrompter;
  editor: DocstringEditor;
  provider?: SuggestionProvider;
  scanner?: GapScanner;
  patchEngine?: PatchEngine;
  logger?: RunLogger;
  cwd?: string;
  showBody?: boolean;
  contextLines?: number;
  signal?: AbortSignal;
}

type GapState =
  | { name: "pending" }
  | { name: "editing_manual"; initial: string }
  | { name: "requesting_suggestion" }
  | { name: "reviewing"; candidate: FixSource }
  | { name: "failed"; error: ProviderFailure };

type GapRun = { outcome: GapOutcome; source?: FixSource["kind"]; error?: string } | { outcome: "quit" };

interface FileState {
  source: SourceFile;
  gaps: Gap[];
  delimiter: TripleDelimiter;
}

export class SessionController {
  private readonly scanner: GapScanner;
  private readonly patchEngine: PatchEngine;
  private readonly cwd: string;
  private presented = 0;
  private total = 0;

  constructor(private readonly options: SessionControllerOptions) {
    this.scanner = options.scanner ?? new GapScanner();
    this.patchEngine = options.patchEngine ?? new PatchEngine();
    this.cwd = options.cwd ?? process.cwd();
  }

  /** Walks every gap, file by file, rescanning a file after each patch to it. */
  async run(gaps: Gap[]): Promise<SessionResult> {
    const byPath = new Map<string, Gap[]>();
    for (const gap of gaps) {
      const list = byPath.get(gap.path) ?? [];
      list.push(gap);
      byPath.set(gap.path, list);
    }
    this.total = gaps.length;
    this.presented = 0;
    const outcomes: GapResult[] = [];
    let quit = false;

    for (const [filePath, initial] of byPath) {
      if (quit || this.isAborted()) {
        quit = true;
        break;
      }
      quit = await this.runFile(filePath, initial, outcomes);
    }

    const remaining: Gap[] = [];
    for (const [filePath, initial] of byPath) {
      const state = await this.tryLoad(filePath);
      remaining.push(...(state ? state.gaps : initial));
    }
    return { outcomes, remaining, quit };
  }

  private isAborted(): boolean {
    return this.options.signal?.aborted ?? false;
  }

  private display(filePath: string): string {
    return toDisplayPath(filePath, this.cwd);
  }

  private async loadFile(filePath: string): Promise<FileState> {
    const source = await loadSourceFile(filePath);
    const parsed = parseSource(source.text, source.path);
    return {
      source,
      gaps: this.scanner.findGaps(source, parsed.spans),
      delimiter: parsed.preferredDelimiter,
    };
  }

  private async tryLoad(filePath: string): Promise<FileState | undefined> {
    try {
      return await this.loadFile(filePath);
    } catch (error) {
      if (error instanceof Error) {
        this.options.prompter.notify(`${this.display(filePath)}: error: ${describeError(error)}`);
        return undefined;
      }
      throw error;
    }
  }

  private async runFile(filePath: string, initial: Gap[], outcomes: GapResult[]): Promise<boolean> {
    const handled = new Set<string>();
    let state = await this.tryLoad(filePath);
    if (!state) {
      for (const gap of initial) {
        outcomes.push(this.result(gap, { outcome: "failed", error: "file could not be reloaded" }));
      }
      return false;
    }
    while (true) {
      const current: FileState = state;
      const gap = current.gaps.find((candidate) => !handled.has(gapKey(candidate.span)));
      if (!gap) return false;
      if (this.isAborted()) return true;
      handled.add(gapKey(gap.span));
      this.presented += 1;
      if (this.presented > this.total) this.total = this.presented;

      const run = await this.runGap(gap, current);
      if (run.outcome === "quit") return true;
      outcomes.push(this.result(gap, run));
      if (run.outcome === "applied" || run.outcome === "resolved_externally") {
        state = await this.tryLoad(filePath);
        if (!state) return false;
      }
    }
  }

  private result(gap: Gap, run: Exclude<GapRun, { outcome: "quit" }>): GapResult {
    return {
      path: gap.path,
      qualifiedName: gap.span.qualifiedName,
      ordinal: gap.span.ordinal,
      line: gapLine(gap),
      outcome: run.outcome,
      source: run.source,
      error: run.error,
    };
  }

  private view(gap: Gap, file: FileState): GapView {
    const source = file.source;
    return {
      gap,
      displayPath: this.display(gap.path),
      index: this.presented,
      total: this.total,
      preview: this.options.showBody ? definitionText(source, gap.span) : signaturePreview(source, gap.span),
    };
  }

  private async logState(gap: Gap, state: GapStateName, data: Record<string, unknown> = {}): Promise<void> {
    if (!this.options.logger) return;
    await this.options.logger.log("gap_state", {
      path: gap.path,
      qualifiedName: gap.span.qualifiedName,
      ordinal: gap.span.ordinal,
      state,
      ...data,
    });
  }

  /** Runs the per-gap state machine until the gap reaches a terminal state. */
  private async runGap(initialGap: Gap, initialFile: FileState): Promise<GapRun> {
    const { prompter, editor, provider } = this.options;
    let gap = initialGap;
    let file = initialFile;
    let state: GapState = { name: "pending" };

    while (true) {
      if (this.isAborted()) return { outcome: "quit" };
      await this.logState(gap, state.name);
      const view = this.view(gap, file);

      switch (state.name) {
        case "pending": {
          const choice = await prompter.choosePending(view, { canSuggest: provider !== undefined });
          if (choice === "quit") return { outcome: "quit" };
          if (choice === "skip") {
            await this.logState(gap, "skipped");
            return { outcome: "skipped" };
          }
          if (choice === "suggest" && !provider) {
            prompter.notify("No suggestion provider is configured; choose manual instead.");
            break;
          }
          state =
            choice === "suggest"
              ? { name: "requesting_suggestion" }
              : {
                  name: "editing_manual",
                  initial: docstringTemplate({ indent: gap.span.bodyIndent, delimiter: file.delimiter }),
                };
          break;
        }

        case "editing_manual": {
          let text: string;
          try {
            text = await editor.edit({
              initial: state.initial,
              title: `Docstring for ${gap.span.qualifiedName} (${view.displayPath}:${gapLine(gap)})`,
            });
          } catch (error) {
            if (!(error instanceof Error)) throw error;
            prompter.notify(`${view.displayPath}:${gapLine(gap)}: error: ${error.message}`);
            state = { name: "pending" };
            break;
          }
          if (docstringContent(text) === "") {
            prompter.notify("Empty docstring; nothing to insert.");
            state = { name: "pending" };
            break;
          }
          state = { name: "reviewing", candidate: { kind: "manual_edit", text } };
          break;
        }

        case "requesting_suggestion": {
          if (!provider) {
            state = { name: "pending" };
            break;
          }
          try {
            const suggestion = await provider.suggest({
              qualifiedName: gap.span.qualifiedName,
              kind: gap.span.kind,
              signature: gap.span.signatureText,
              context: buildSuggestionContext(file.source, gap.span, { contextLines: this.options.contextLines }),
              displayPath: view.displayPath,
              signal: this.options.signal,
            });
            await this.options.logger?.log("suggestion_received", {
              path: gap.path,
              qualifiedName: gap.span.qualifiedName,
              model: suggestion.model,
              raw: suggestion.raw,
            });
            if (docstringContent(suggestion.text) === "") {
              throw new ProviderFailure("The provider returned an empty docstring.");
            }
            state = {
              name: "reviewing",
              candidate: { kind: "llm_suggestion", text: suggestion.text, raw: suggestion.raw, model: suggestion.model },
            };
          } catch (error) {
            if (this.isAborted()) return { outcome: "quit" };
            const failure =
              error instanceof ProviderFailure ? error : new ProviderFailure(describeError(error), { cause: error });
            await this.options.logger?.log("provider_failure", {
              path: gap.path,
              qualifiedName: gap.span.qualifiedName,
              message: failure.message,
              timedOut: failure.timedOut,
            });
            state = { name: "failed", error: failure };
          }
          break;
        }

        case "failed": {
          const choice = await prompter.chooseFailed(view, state.error);
          if (choice === "quit") return { outcome: "quit" };
          if (choice === "give_up") return { outcome: "failed", error: state.error.message };
          state =
            choice === "retry"
              ? { name: "requesting_suggestion" }
              : {
                  name: "editing_manual",
                  initial: docstringTemplate({ indent: gap.span.bodyIndent, delimiter: file.delimiter }),
                };
          break;
        }

        case "reviewing": {
          const candidate: FixSource = state.candidate;
          const choice = await prompter.chooseReview(view, candidate);
          if (choice === "quit") return { outcome: "quit" };
          if (choice === "reject") {
            await this.logState(gap, "skipped");
            return { outcome: "skipped", source: candidate.kind };
          }
          if (choice === "regenerate") {
            if (candidate.kind !== "llm_suggestion" || !provider) {
              prompter.notify("Only suggestions can be regenerated.");
              break;
            }
            state = { name: "requesting_suggestion" };
            break;
          }
          if (choice === "edit") {
            state = { name: "editing_manual", initial: this.editorText(candidate, gap, file) };
            break;
          }

          const result = await this.patchEngine.apply(gap, candidate.text);
          if (result.ok) {
            await this.options.logger?.log("patch_applied", {
              path: gap.path,
              qualifiedName: gap.span.qualifiedName,
              line: result.value.patch.line,
              source: candidate.kind,
            });
            await this.logState(gap, "applied");
            return { outcome: "applied", source: candidate.kind };
          }
          const { error } = result;
          await this.options.logger?.log("patch_failed", {
            path: gap.path,
            qualifiedName: gap.span.qualifiedName,
            code: error.code,
            message: error.message,
          });
          if (error instanceof StaleFileError) {
            const refreshed = await this.tryLoad(gap.path);
            if (!refreshed) return { outcome: "failed", source: candidate.kind, error: error.message };
            const key = gapKey(gap.span);
            const again = refreshed.gaps.find((candidateGap) => gapKey(candidateGap.span) === key);
            if (!again) {
              prompter.notify(`${view.displayPath}: ${gap.span.qualifiedName} no longer needs a docstring.`);
              return { outcome: "resolved_externally" };
            }
            prompter.notify(`${view.displayPath} changed on disk; rescanned, review the docstring again.`);
            gap = again;
            file = refreshed;
            break;
          }
          prompter.notify(`${view.displayPath}:${gapLine(gap)}: error: ${error.message}`);
          break;
        }
      }
    }
  }

  private editorText(candidate: FixSource, gap: Gap, file: FileState): string {
    try {
      return renderDocstring(candidate.text, { indent: gap.span.bodyIndent, delimiter: file.delimiter }).lines.join("\n");
    } catch (error) {
      if (error instanceof InvalidDocstringError) return candidate.text;
      throw error;
    }
  }
}
