import { splitSourceLines, type SourceFile } from "../source/SourceFile.js";
import type { DefinitionSpan } from "../source/SourceModel.js";

export const DEFAULT_CONTEXT_LINES = 20;
export const DEFAULT_CONTEXT_CHARS = 6000;

export interface ContextWindowOptions {
  /** Lines kept before and after the definition. */
  contextLines?: number;
  maxChars?: number;
}

const firstLineOf = (span: DefinitionSpan): number => span.decoratorLine ?? span.signatureStart.line;

/** Decorators and signature, as shown when not displaying the body. */
export const signaturePreview = (source: SourceFile, span: DefinitionSpan): string => {
  const lines = splitSourceLines(source.text);
  const decorators = lines.slice(firstLineOf(span) - 1, span.signatureStart.line - 1).map((line) => line.trim());
  return [...decorators, span.signatureText.trim()].join("\n");
};

export const definitionText = (source: SourceFile, span: DefinitionSpan): string =>
  splitSourceLines(source.text)
    .slice(firstLineOf(span) - 1, span.endLine)
    .join("\n");

/**
 * Source around a definition for the suggestion prompt. The definition itself
 * is kept whole; surrounding lines are trimmed to fit `maxChars`.
 */
export const buildSuggestionContext = (
  source: SourceFile,
  span: DefinitionSpan,
  options: ContextWindowOptions = {},
): string => {
  const contextLines = options.contextLines ?? DEFAULT_CONTEXT_LINES;
  const maxChars = options.maxChars ?? DEFAULT_CONTEXT_CHARS;
  const lines = splitSourceLines(source.text);
  const start = firstLineOf(span) - 1;
  const end = span.endLine;
  let before = lines.slice(Math.max(0, start - contextLines), start);
  let after = lines.slice(end, Math.min(lines.length, end + contextLines));
  const body = lines.slice(start, end);
  const size = (parts: string[]) => parts.reduce((total, line) => total + line.length + 1, 0);
  while (size(before) + size(body) + size(after) > maxChars && (before.length > 0 || after.length > 0)) {
    if (before.length >= after.length) before = before.slice(1);
    else after = after.slice(0, -1);
  }
  return [...before, ...body, ...after].join("\n");
};
