import { ParseFailure } from "../runtime/DocgapErrors.js";
import { computeLineStarts } from "./SourceFile.js";

export type TokenType =
  | "NAME"
  | "NUMBER"
  | "STRING"
  | "OP"
  | "NEWLINE"
  | "INDENT"
  | "DEDENT"
  | "ENDMARKER";

export interface Position {
  /** 1-based */
  line: number;
  /** 0-based, in UTF-16 code units */
  column: number;
  offset: number;
}

export interface Token {
  type: TokenType;
  value: string;
  start: Position;
  end: Position;
}

const OPENING: Record<string, string> = { "(": ")", "[": "]", "{": "}" };
const CLOSING: Record<string, string> = { ")": "(", "]": "[", "}": "{" };

const OPERATORS = [
  "**=", "//=", ">>=", "<<=", "...", "!=", "->", ":=", "==", "<=", ">=", "**", "//", "<<", ">>",
  "+=", "-=", "*=", "/=", "%=", "&=", "|=", "^=", "@=", "(", ")", "[", "]", "{", "}", ":", ",",
  ";", ".", "+", "-", "*", "/", "%", "&", "|", "^", "~", "<", ">", "=", "@", "!",
];

const STRING_PREFIXES = new Set(["r", "u", "b", "f", "br", "rb", "fr", "rf"]);
const NUMBER_PATTERN =
  /0[xX](?:_?[0-9a-fA-F])+|0[bB](?:_?[01])+|0[oO](?:_?[0-7])+|(?:\d(?:_?\d)*(?:\.(?:\d(?:_?\d)*)?)?|\.\d(?:_?\d)*)(?:[eE][+-]?\d(?:_?\d)*)?[jJ]?/y;
const IDENTIFIER_START = /[\p{L}\p{Nl}_]/u;
const IDENTIFIER_PART = /[\p{L}\p{Nl}\p{Mn}\p{Mc}\p{Nd}\p{Pc}_]/u;

const isNewlineChar = (char: string | undefined): boolean => char === "\n" || char === "\r";

/** The whole code point at `offset`, so astral identifier characters stay intact. */
const codePointAt = (text: string, offset: number): string => {
  const codePoint = text.codePointAt(offset);
  return codePoint === undefined ? "" : String.fromCodePoint(codePoint);
};

export const splitStringPrefix = (value: string): { prefix: string; body: string } => {
  const quoteIndex = value.search(/["']/);
  if (quoteIndex < 0) return { prefix: "", body: value };
  return { prefix: value.slice(0, quoteIndex), body: value.slice(quoteIndex) };
};

class Tokenizer {
  private readonly lineStarts: number[];
  private readonly tokens: Token[] = [];
  private readonly indents: number[] = [0];
  private readonly brackets: Array<{ char: string; offset: number }> = [];
  private pos = 0;

  constructor(private readonly text: string, private readonly filePath: string) {
    this.lineStarts = computeLineStarts(text);
  }

  run(): Token[] {
    let atLineStart = true;
    while (this.pos < this.text.length) {
      if (atLineStart) {
        atLineStart = false;
        if (!this.readIndentation()) {
          atLineStart = true;
          continue;
        }
      }
      const char = this.text[this.pos] ?? "";
      if (char === " " || char === "\t" || char === "\f") {
        this.pos += 1;
      } else if (char === "#") {
        this.skipComment();
      } else if (char === "\\") {
        this.readContinuation();
      } else if (isNewlineChar(char)) {
        const start = this.pos;
        this.skipNewline();
        if (this.brackets.length === 0) {
          this.push("NEWLINE", start, this.pos);
          atLineStart = true;
        }
      } else if (char === "\"" || char === "'") {
        this.readString(this.pos, this.pos);
      } else if (/[0-9]/.test(char) || (char === "." && /[0-9]/.test(this.text[this.pos + 1] ?? ""))) {
        this.readNumber();
      } else if (IDENTIFIER_START.test(codePointAt(this.text, this.pos))) {
        this.readName();
      } else {
        this.readOperator();
      }
    }
    this.finish();
    return this.tokens;
  }

  private position(offset: number): Position {
    let low = 0;
    let high = this.lineStarts.length - 1;
    while (low < high) {
      const mid = (low + high + 1) >> 1;
      if ((this.lineStarts[mid] ?? 0) <= offset) low = mid;
      else high = mid - 1;
    }
    return { line: low + 1, column: offset - (this.lineStarts[low] ?? 0), offset };
  }

  private fail(message: string, offset: number): never {
    const position = this.position(offset);
    throw new ParseFailure(this.filePath, message, position.line, position.column);
  }

  private push(type: TokenType, start: number, end: number): void {
    this.tokens.push({
      type,
      value: this.text.slice(start, end),
      start: this.position(start),
      end: this.position(end),
    });
  }

  private skipNewline(): void {
    if (this.text[this.pos] === "\r" && this.text[this.pos + 1] === "\n") this.pos += 2;
    else this.pos += 1;
  }

  private skipComment(): void {
    while (this.pos < this.text.length && !isNewlineChar(this.text[this.pos])) this.pos += 1;
  }

  /**
   * Measures the indentation of a new logical line and emits INDENT/DEDENT.
   * Returns false when the line is blank or holds only a comment.
   */
  private readIndentation(): boolean {
    const lineStart = this.pos;
    let column = 0;
    while (this.pos < this.text.length) {
      const char = this.text[this.pos];
      if (char === " ") column += 1;
      else if (char === "\t") column = Math.floor(column / 8) * 8 + 8;
      else if (char === "\f") column = 0;
      else break;
      this.pos += 1;
    }
    if (this.pos >= this.text.length) return false;
    const char = this.text[this.pos];
    if (char === "#") {
      this.skipComment();
      if (this.pos < this.text.length) this.skipNewline();
      return false;
    }
    if (isNewlineChar(char)) {
      this.skipNewline();
      return false;
    }
    const current = this.indents[this.indents.length - 1] ?? 0;
    if (column > current) {
      this.indents.push(column);
      this.push("INDENT", lineStart, this.pos);
      return true;
    }
    while (column < (this.indents[this.indents.length - 1] ?? 0)) {
      this.indents.pop();
      this.push("DEDENT", this.pos, this.pos);
    }
    if (column !== (this.indents[this.indents.length - 1] ?? 0)) {
      this.fail("unindent does not match any outer indentation level", this.pos);
    }
    return true;
  }

  private readContinuation(): void {
    const next = this.text[this.pos + 1];
    if (next === undefined) {
      this.fail("unexpected EOF after line continuation character", this.pos);
    }
    if (!isNewlineChar(next)) {
      this.fail("unexpected character after line continuation character", this.pos);
    }
    this.pos += 1;
    this.skipNewline();
  }

  private readNumber(): void {
    NUMBER_PATTERN.lastIndex = this.pos;
    const match = NUMBER_PATTERN.exec(this.text);
    const length = match?.[0].length ?? 0;
    if (length === 0) this.fail("invalid decimal literal", this.pos);
    const start = this.pos;
    this.pos += length;
    this.push("NUMBER", start, this.pos);
  }

  private readName(): void {
    const start = this.pos;
    this.pos += codePointAt(this.text, start).length;
    while (this.pos < this.text.length) {
      const char = codePointAt(this.text, this.pos);
      if (!IDENTIFIER_PART.test(char)) break;
      this.pos += char.length;
    }
    const word = this.text.slice(start, this.pos);
    const next = this.text[this.pos];
    if ((next === "\"" || next === "'") && STRING_PREFIXES.has(word.toLowerCase())) {
      this.readString(start, this.pos);
      return;
    }
    this.push("NAME", start, this.pos);
  }

  private readOperator(): void {
    const start = this.pos;
    const operator = OPERATORS.find((candidate) => this.text.startsWith(candidate, start));
    if (!operator) {
      this.fail(`invalid character '${codePointAt(this.text, start)}'`, start);
    }
    if (OPENING[operator]) {
      this.brackets.push({ char: operator, offset: start });
    } else if (CLOSING[operator]) {
      const open = this.brackets.pop();
      if (!open) this.fail(`unmatched '${operator}'`, start);
      if (open.char !== CLOSING[operator]) {
        this.fail(`closing parenthesis '${operator}' does not match opening parenthesis '${open.char}'`, start);
      }
    }
    this.pos += operator.length;
    this.push("OP", start, this.pos);
  }

  private readString(start: number, quoteOffset: number): void {
    const prefix = this.text.slice(start, quoteOffset).toLowerCase();
    this.pos = quoteOffset;
    this.scanStringBody(prefix.includes("f"), start);
    this.push("STRING", start, this.pos);
  }

  /** Advances `pos` from an opening quote to just past the closing quote. */
  private scanStringBody(formatted: boolean, start: number): void {
    const quote = this.text[this.pos] ?? "\"";
    const triple = this.text.startsWith(quote.repeat(3), this.pos);
    const closing = triple ? quote.repeat(3) : quote;
    this.pos += closing.length;
    while (true) {
      if (this.pos >= this.text.length) {
        this.fail(triple ? "unterminated triple-quoted string literal" : "unterminated string literal", start);
      }
      const char = this.text[this.pos];
      if (char === "\\") {
        this.pos += 1;
        if (this.pos < this.text.length) {
          if (isNewlineChar(this.text[this.pos])) this.skipNewline();
          else this.pos += 1;
        }
        continue;
      }
      if (isNewlineChar(char)) {
        if (!triple) this.fail("unterminated string literal", start);
        this.skipNewline();
        continue;
      }
      if (this.text.startsWith(closing, this.pos)) {
        this.pos += closing.length;
        return;
      }
      if (formatted && char === "{") {
        if (this.text[this.pos + 1] === "{") {
          this.pos += 2;
          continue;
        }
        this.pos += 1;
        this.scanReplacementField(start);
        continue;
      }
      this.pos += 1;
    }
  }

  /** Skips an f-string `{...}` field, including nested strings and format specs. */
  private scanReplacementField(start: number): void {
    let depth = 0;
    let inFormatSpec = false;
    while (true) {
      if (this.pos >= this.text.length) this.fail("f-string: expecting '}'", start);
      const char = this.text[this.pos] ?? "";
      if (inFormatSpec) {
        if (char === "{") {
          this.pos += 1;
          this.scanReplacementField(start);
          continue;
        }
        if (char === "}") {
          this.pos += 1;
          return;
        }
        if (char === "\\" && this.pos + 1 < this.text.length) this.pos += 1;
        this.pos += 1;
        continue;
      }
      if (char === "\"" || char === "'") {
        this.scanStringBody(false, start);
        continue;
      }
      const prefixMatch = /^[rRbBuUfF]{1,2}(?=["'])/.exec(this.text.slice(this.pos, this.pos + 3));
      if (prefixMatch && STRING_PREFIXES.has(prefixMatch[0].toLowerCase())) {
        this.pos += prefixMatch[0].length;
        this.scanStringBody(prefixMatch[0].toLowerCase().includes("f"), start);
        continue;
      }
      if (char === "(" || char === "[" || char === "{") depth += 1;
      else if (char === ")" || char === "]") depth -= 1;
      else if (char === "}") {
        if (depth === 0) {
          this.pos += 1;
          return;
        }
        depth -= 1;
      } else if (char === ":" && depth === 0 && this.text[this.pos + 1] !== "=") {
        inFormatSpec = true;
      } else if (char === "\r" || char === "\n") {
        this.skipNewline();
        continue;
      }
      this.pos += 1;
    }
  }

  private finish(): void {
    const open = this.brackets[this.brackets.length - 1];
    if (open) {
      this.fail(`'${open.char}' was never closed`, open.offset);
    }
    const last = this.tokens[this.tokens.length - 1];
    if (last && last.type !== "NEWLINE" && last.type !== "DEDENT") {
      this.push("NEWLINE", this.text.length, this.text.length);
    }
    while (this.indents.length > 1) {
      this.indents.pop();
      this.push("DEDENT", this.text.length, this.text.length);
    }
    this.push("ENDMARKER", this.text.length, this.text.length);
  }
}

export const tokenize = (text: string, filePath = "<string>"): Token[] => new Tokenizer(text, filePath).run();
