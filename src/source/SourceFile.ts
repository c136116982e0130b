import { createHash } from "node:crypto";
import { readFile } from "node:fs/promises";
import { InvalidDocstringError, ParseFailure } from "../runtime/DocgapErrors.js";

export type LineEnding = "LF" | "CRLF" | "CR";
export type SourceEncoding = "utf-8" | "latin-1";

export interface SourceFile {
  readonly path: string;
  readonly bytes: Buffer;
  readonly text: string;
  readonly lineEnding: LineEnding;
  readonly encoding: SourceEncoding;
  readonly hasBom: boolean;
  readonly checksum: string;
}

const UTF8_BOM = Buffer.from([0xef, 0xbb, 0xbf]);
const CODING_PATTERN = /^[ \t\f]*#.*?coding[:=][ \t]*([-\w.]+)/;

const ENCODING_ALIASES: Record<string, SourceEncoding> = {
  "utf-8": "utf-8",
  utf8: "utf-8",
  "utf_8": "utf-8",
  "latin-1": "latin-1",
  latin1: "latin-1",
  "latin_1": "latin-1",
  "iso-8859-1": "latin-1",
  "iso8859-1": "latin-1",
  "iso_8859_1": "latin-1",
  l1: "latin-1",
};

export const EOL_SEQUENCES: Record<LineEnding, string> = {
  LF: "\n",
  CRLF: "\r\n",
  CR: "\r",
};

export const checksumOf = (bytes: Buffer): string => createHash("sha256").update(bytes).digest("hex");

export const detectLineEnding = (text: string): LineEnding => {
  const index = text.search(/[\r\n]/);
  if (index < 0) return "LF";
  if (text[index] === "\n") return "LF";
  return text[index + 1] === "\n" ? "CRLF" : "CR";
};

/**
 * Reads the PEP 263 declaration from the first two lines. Only the encodings
 * docgap can round-trip byte for byte are accepted.
 */
const declaredEncoding = (filePath: string, bytes: Buffer): SourceEncoding | undefined => {
  const head = bytes.subarray(0, 1024).toString("latin1").split(/\r\n|\r|\n/).slice(0, 2);
  for (let index = 0; index < head.length; index += 1) {
    const line = head[index] ?? "";
    const match = CODING_PATTERN.exec(line);
    if (match) {
      const name = (match[1] ?? "").toLowerCase();
      const normalized = ENCODING_ALIASES[name] ?? ENCODING_ALIASES[name.replace(/-(unix|dos|mac)$/, "")];
      if (!normalized) {
        throw new ParseFailure(filePath, `unsupported source encoding '${name}'`, index + 1, 0);
      }
      return normalized;
    }
    // the declaration only counts on line 2 when line 1 is a comment or blank
    if (line.trim() !== "" && !line.trimStart().startsWith("#")) break;
  }
  return undefined;
};

const decodeUtf8 = (filePath: string, bytes: Buffer): string => {
  try {
    return new TextDecoder("utf-8", { fatal: true, ignoreBOM: true }).decode(bytes);
  } catch {
    const lossy = bytes.toString("utf8");
    const badIndex = lossy.indexOf("\ufffd");
    const before = badIndex < 0 ? lossy : lossy.slice(0, badIndex);
    const line = before.split(/\r\n|\r|\n/).length;
    throw new ParseFailure(filePath, "source is not valid utf-8", line, 0);
  }
};

export const createSourceFile = (filePath: string, bytes: Buffer): SourceFile => {
  const hasBom = bytes.subarray(0, 3).equals(UTF8_BOM);
  const body = hasBom ? bytes.subarray(3) : bytes;
  const declared = declaredEncoding(filePath, body);
  if (hasBom && declared && declared !== "utf-8") {
    throw new ParseFailure(filePath, `encoding problem: ${declared} with BOM`, 1, 0);
  }
  const encoding: SourceEncoding = declared ?? "utf-8";
  const text = encoding === "utf-8" ? decodeUtf8(filePath, body) : body.toString("latin1");
  return {
    path: filePath,
    bytes,
    text,
    lineEnding: detectLineEnding(text),
    encoding,
    hasBom,
    checksum: checksumOf(bytes),
  };
};

export const loadSourceFile = async (filePath: string): Promise<SourceFile> => {
  const bytes = await readFile(filePath);
  return createSourceFile(filePath, bytes);
};

/** Encodes replacement text the same way the original file was encoded. */
export const encodeSourceText = (source: SourceFile, text: string): Buffer => {
  if (source.encoding === "latin-1") {
    const unsupported = text.search(/[^\u0000-\u00ff]/);
    if (unsupported >= 0) {
      throw new InvalidDocstringError(
        `Character '${text[unsupported]}' cannot be written to ${source.path} (latin-1 source).`,
        { path: source.path },
      );
    }
    return Buffer.from(text, "latin1");
  }
  const encoded = Buffer.from(text, "utf8");
  return source.hasBom ? Buffer.concat([UTF8_BOM, encoded]) : encoded;
};

export const computeLineStarts = (text: string): number[] => {
  const starts = [0];
  for (let index = 0; index < text.length; index += 1) {
    const char = text[index];
    if (char === "\r") {
      if (text[index + 1] === "\n") index += 1;
      starts.push(index + 1);
    } else if (char === "\n") {
      starts.push(index + 1);
    }
  }
  return starts;
};

export const splitSourceLines = (text: string): string[] => {
  const lines = text.split(/\r\n|\r|\n/);
  if (lines.length > 1 && lines[lines.length - 1] === "") lines.pop();
  return lines;
};
