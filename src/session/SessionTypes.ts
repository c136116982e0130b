import type { ProviderFailure } from "../runtime/DocgapErrors.js";
import type { Gap } from "../scanner/GapScanner.js";
import type { DefinitionKind } from "../source/SourceModel.js";

/** Where the candidate docstring text came from. */
export type FixSource =
  | { kind: "manual_edit"; text: string }
  | { kind: "llm_suggestion"; text: string; raw: string; model?: string };

export type PendingChoice = "manual" | "suggest" | "skip" | "quit";
export type ReviewChoice = "accept" | "edit" | "reject" | "regenerate" | "quit";
export type FailedChoice = "retry" | "manual" | "give_up" | "quit";

export type GapStateName =
  | "pending"
  | "editing_manual"
  | "requesting_suggestion"
  | "reviewing"
  | "applied"
  | "skipped"
  | "failed";

export interface GapView {
  gap: Gap;
  displayPath: string;
  /** 1-based position among the gaps presented so far. */
  index: number;
  total: number;
  /** Signature (with decorators) or the whole definition. */
  preview: string;
}

export interface SessionPrompter {
  choosePending(view: GapView, options: { canSuggest: boolean }): Promise<PendingChoice>;
  chooseReview(view: GapView, candidate: FixSource): Promise<ReviewChoice>;
  chooseFailed(view: GapView, error: ProviderFailure): Promise<FailedChoice>;
  notify(message: string): void;
}

export interface EditRequest {
  initial: string;
  /** Shown to the user above the editable text. */
  title: string;
}

/** Acquire, always read back, always release. */
export interface DocstringEditor {
  edit(request: EditRequest): Promise<string>;
}

export interface SuggestionRequest {
  qualifiedName: string;
  kind: DefinitionKind;
  signature: string;
  /** Bounded window of source around the definition. */
  context: string;
  displayPath: string;
  signal?: AbortSignal;
}

export interface Suggestion {
  text: string;
  /** Provider response before extraction, kept for the run log. */
  raw: string;
  model?: string;
}

export interface SuggestionProvider {
  suggest(request: SuggestionRequest): Promise<Suggestion>;
}

export type GapOutcome = "applied" | "skipped" | "failed" | "resolved_externally";

export interface GapResult {
  path: string;
  qualifiedName: string;
  ordinal: number;
  line: number;
  outcome: GapOutcome;
  source?: FixSource["kind"];
  error?: string;
}

export interface SessionResult {
  outcomes: GapResult[];
  /** Gaps left after the session, from a fresh scan of every file it covered. */
  remaining: Gap[];
  quit: boolean;
}
