import { InvalidDocstringError } from "../runtime/DocgapErrors.js";
import type { TripleDelimiter } from "../source/SourceModel.js";

export interface RenderOptions {
  /** Indentation of the body the docstring opens. */
  indent: string;
  delimiter: TripleDelimiter;
}

export interface RenderedDocstring {
  /** Indented source lines without line terminators. */
  lines: string[];
  /** Docstring content after dedenting, without delimiters. */
  body: string;
  prefix: "" | "r";
  delimiter: TripleDelimiter;
}

const DELIMITED_PATTERN = /^\s*[rRuU]?("""|''')([\s\S]*)\1\s*$/;

const leadingWhitespace = (line: string): number => line.length - line.trimStart().length;

const isTripleDelimiter = (value: string | undefined): value is TripleDelimiter => value === '"""' || value === "'''";

/** Strips the first line, dedents the rest and drops surrounding blank lines. */
export const cleanDocstringText = (text: string): string[] => {
  const lines = text.replace(/\r\n|\r/g, "\n").split("\n");
  const [first = "", ...rest] = lines;
  const indents = rest.filter((line) => line.trim().length > 0).map(leadingWhitespace);
  const margin = indents.length > 0 ? Math.min(...indents) : 0;
  const cleaned = [first.trim(), ...rest.map((line) => line.slice(margin).trimEnd())];
  while (cleaned.length > 0 && cleaned[0] === "") cleaned.shift();
  while (cleaned.length > 0 && cleaned[cleaned.length - 1] === "") cleaned.pop();
  return cleaned;
};

/**
 * Turns editor or provider text into docstring source lines at the given indentation.
 * Accepts bare text or an already-quoted triple string literal.
 */
export const renderDocstring = (text: string, options: RenderOptions): RenderedDocstring => {
  if (text.includes("\0")) {
    throw new InvalidDocstringError("Docstring text contains a NUL character.");
  }
  let delimiter = options.delimiter;
  let content = text;
  const delimited = DELIMITED_PATTERN.exec(text);
  if (delimited && isTripleDelimiter(delimited[1])) {
    delimiter = delimited[1];
    content = delimited[2] ?? "";
  }

  const lines = cleanDocstringText(content);
  if (lines.length === 0) {
    throw new InvalidDocstringError("Docstring text is empty.");
  }
  const body = lines.join("\n");
  if (body.includes(delimiter)) {
    throw new InvalidDocstringError(`Docstring text contains the ${delimiter} delimiter.`, { delimiter });
  }

  const prefix = body.includes("\\") ? "r" : "";
  const { indent } = options;
  const [firstLine = ""] = lines;
  const lastChar = body[body.length - 1];
  // a trailing quote or backslash would run into the closing delimiter
  const fitsOneLine = lines.length === 1 && lastChar !== delimiter[0] && lastChar !== "\\";
  if (fitsOneLine) {
    return { lines: [`${indent}${prefix}${delimiter}${firstLine}${delimiter}`], body, prefix, delimiter };
  }
  const rendered = [
    `${indent}${prefix}${delimiter}${firstLine}`,
    ...lines.slice(1).map((line) => (line.length > 0 ? `${indent}${line}` : "")),
    `${indent}${delimiter}`,
  ];
  return { lines: rendered, body, prefix, delimiter };
};

/** Docstring content of editor or provider text, empty when there is none. */
export const docstringContent = (text: string): string => {
  const delimited = DELIMITED_PATTERN.exec(text);
  const content = delimited && isTripleDelimiter(delimited[1]) ? delimited[2] ?? "" : text;
  return cleanDocstringText(content).join("\n");
};

/** An empty docstring skeleton at body indentation, for preloading an editor. */
export const docstringTemplate = (options: RenderOptions, summary = ""): string =>
  [`${options.indent}${options.delimiter}`, `${options.indent}${summary}`, `${options.indent}${options.delimiter}`].join("\n");
