import type { IOFailure, ParseFailure } from "../runtime/DocgapErrors.js";
import { toDisplayPath } from "../runtime/StoragePaths.js";
import { gapLine, type Gap } from "../scanner/GapScanner.js";
import type { GapResult } from "../session/SessionTypes.js";

export interface ReportOptions {
  cwd: string;
}

export interface ReportFailure {
  path: string;
  error: ParseFailure | IOFailure;
}

interface ReportRow {
  path: string;
  line: number;
  qualifiedName: string;
  gap: Gap;
}

// plain code-unit order, independent of locale
const compareText = (left: string, right: string): number => (left < right ? -1 : left > right ? 1 : 0);

const toRows = (gaps: Gap[], cwd: string): ReportRow[] =>
  gaps
    .map((gap) => ({ path: toDisplayPath(gap.path, cwd), line: gapLine(gap), qualifiedName: gap.span.qualifiedName, gap }))
    .sort(
      (left, right) =>
        compareText(left.path, right.path) ||
        left.line - right.line ||
        compareText(left.qualifiedName, right.qualifiedName),
    );

/** One `<path>:<line>: <qualified_name>` line per gap. */
export const render = (gaps: Gap[], options: ReportOptions): string =>
  toRows(gaps, options.cwd)
    .map((row) => `${row.path}:${row.line}: ${row.qualifiedName}\n`)
    .join("");

const failureLine = (failure: ReportFailure): number | undefined =>
  "line" in failure.error ? failure.error.line : undefined;

const failureMessage = (failure: ReportFailure): string =>
  "reason" in failure.error ? failure.error.reason : failure.error.message;

export const renderFailures = (failures: ReportFailure[], options: ReportOptions): string =>
  failures
    .map((failure) => {
      const display = toDisplayPath(failure.path, options.cwd);
      const line = failureLine(failure);
      const location = line === undefined ? display : `${display}:${line}`;
      return `${location}: error: ${failureMessage(failure)}\n`;
    })
    .join("");

export const renderJson = (gaps: Gap[], failures: ReportFailure[], options: ReportOptions): string => {
  const payload = {
    gaps: toRows(gaps, options.cwd).map((row) => ({
      path: row.path,
      line: row.line,
      column: row.gap.span.signatureStart.column + 1,
      qualifiedName: row.qualifiedName,
      kind: row.gap.span.kind,
      isStub: row.gap.span.isStub,
    })),
    failures: failures.map((failure) => ({
      path: toDisplayPath(failure.path, options.cwd),
      line: failureLine(failure),
      code: failure.error.code,
      message: failureMessage(failure),
    })),
  };
  return `${JSON.stringify(payload, null, 2)}\n`;
};

const plural = (count: number, word: string): string => `${count} ${word}${count === 1 ? "" : "s"}`;

export const summarize = (gaps: Gap[], counts: { files: number; failures: number }): string => {
  const filesWithGaps = new Set(gaps.map((gap) => gap.path)).size;
  const head =
    gaps.length === 0
      ? `No missing docstrings in ${plural(counts.files - counts.failures, "file")}.`
      : `${plural(gaps.length, "missing docstring")} in ${filesWithGaps} of ${plural(counts.files - counts.failures, "file")}.`;
  return counts.failures > 0 ? `${head} ${plural(counts.failures, "file")} could not be scanned.` : head;
};

export const summarizeSession = (outcomes: GapResult[], remaining: number): string => {
  const count = (outcome: GapResult["outcome"]): number =>
    outcomes.filter((result) => result.outcome === outcome).length;
  return [
    `Applied ${count("applied")}`,
    `skipped ${count("skipped")}`,
    `failed ${count("failed")}`,
    `resolved elsewhere ${count("resolved_externally")}`,
    `remaining ${remaining}`,
  ].join(", ");
};
