import { ParseFailure } from "../runtime/DocgapErrors.js";
import type { SourceFile } from "./SourceFile.js";
import { splitStringPrefix, tokenize, type Position, type Token } from "./PythonTokenizer.js";

export type DefinitionKind = "function" | "method" | "async function";
export type DefinitionScope = "module" | "class" | "function";
export type TripleDelimiter = '"""' | "'''";

export const DEFAULT_DELIMITER: TripleDelimiter = '"""';
export const DEFAULT_INDENT_UNIT = "    ";

export interface DefinitionSpan {
  name: string;
  qualifiedName: string;
  ordinal: number;
  kind: DefinitionKind;
  scope: DefinitionScope;
  decorators: string[];
  decoratorLine?: number;
  signatureStart: Position;
  bodyStart: Position;
  /** Offset just past the colon that ends the signature. */
  headerEnd: number;
  signatureText: string;
  endLine: number;
  definitionIndent: string;
  bodyIndent: string;
  inlineBody: boolean;
  hasDocstring: boolean;
  docstringDelimiter?: TripleDelimiter;
  isStub: boolean;
}

export type ModelNodeKind = "module" | "class" | "function";

export interface ModelNode {
  kind: ModelNodeKind;
  name: string;
  /** Index of the enclosing node in the arena; undefined for the module. */
  parent?: number;
}

export interface ParsedSource {
  nodes: ModelNode[];
  spans: DefinitionSpan[];
  preferredDelimiter: TripleDelimiter;
  indentUnit: string;
  hasModuleDocstring: boolean;
}

export interface SourceModel extends ParsedSource {
  file: SourceFile;
}

export type BodyStatement = { kind: "simple"; tokens: Token[] } | { kind: "compound" };

interface StatementResult {
  statements: BodyStatement[];
  endLine: number;
}

interface BodyResult extends StatementResult {
  inline: boolean;
  bodyStart: Token;
  bodyIndent?: string;
}

export interface DocstringInfo {
  present: boolean;
  delimiter?: TripleDelimiter;
}

type PendingSpan = Omit<DefinitionSpan, "qualifiedName" | "ordinal" | "bodyIndent"> & {
  node: number;
  bodyIndent?: string;
};

const OPENERS = new Set(["(", "[", "{"]);
const CLOSERS = new Set([")", "]", "}"]);
const DOCSTRING_PREFIXES = new Set(["", "r", "u"]);

const isOp = (token: Token | undefined, value: string): boolean => token?.type === "OP" && token.value === value;
const isName = (token: Token | undefined, value: string): boolean => token?.type === "NAME" && token.value === value;

const stripRedundantParens = (tokens: Token[]): Token[] => {
  let current = tokens;
  while (current.length >= 2 && isOp(current[0], "(") && isOp(current[current.length - 1], ")")) {
    let depth = 0;
    let closesAtEnd = true;
    for (let index = 0; index < current.length; index += 1) {
      const token = current[index];
      if (token?.type !== "OP") continue;
      if (OPENERS.has(token.value)) depth += 1;
      else if (CLOSERS.has(token.value)) depth -= 1;
      if (depth === 0 && index < current.length - 1) {
        closesAtEnd = false;
        break;
      }
    }
    if (!closesAtEnd) break;
    current = current.slice(1, -1);
  }
  return current;
};

const tripleDelimiterOf = (token: Token): TripleDelimiter | undefined => {
  const { body } = splitStringPrefix(token.value);
  if (body.startsWith('"""')) return '"""';
  if (body.startsWith("'''")) return "'''";
  return undefined;
};

/** Plain (non-bytes, non-f) string literals, optionally concatenated and parenthesized. */
export const docstringOf = (statements: BodyStatement[]): DocstringInfo => {
  const first = statements[0];
  if (!first || first.kind !== "simple") return { present: false };
  const tokens = stripRedundantParens(first.tokens);
  if (tokens.length === 0) return { present: false };
  for (const token of tokens) {
    if (token.type !== "STRING") return { present: false };
    if (!DOCSTRING_PREFIXES.has(splitStringPrefix(token.value).prefix.toLowerCase())) return { present: false };
  }
  const [head] = tokens;
  return { present: true, delimiter: head ? tripleDelimiterOf(head) : undefined };
};

const isStubStatement = (statement: BodyStatement): boolean => {
  if (statement.kind !== "simple" || statement.tokens.length !== 1) return false;
  const [token] = statement.tokens;
  return isName(token, "pass") || isOp(token, "...");
};

const isStubBody = (statements: BodyStatement[], docstring: DocstringInfo): boolean => {
  const rest = docstring.present ? statements.slice(1) : statements;
  return rest.length > 0 && rest.every(isStubStatement);
};

const splitSimpleStatements = (tokens: Token[]): BodyStatement[] => {
  const statements: BodyStatement[] = [];
  let current: Token[] = [];
  let depth = 0;
  for (const token of tokens) {
    if (token.type === "OP") {
      if (OPENERS.has(token.value)) depth += 1;
      else if (CLOSERS.has(token.value)) depth -= 1;
      else if (token.value === ";" && depth === 0) {
        if (current.length > 0) statements.push({ kind: "simple", tokens: current });
        current = [];
        continue;
      }
    }
    current.push(token);
  }
  if (current.length > 0) statements.push({ kind: "simple", tokens: current });
  return statements;
};

class StatementParser {
  private index = 0;
  readonly nodes: ModelNode[] = [{ kind: "module", name: "" }];
  readonly pending: PendingSpan[] = [];
  readonly delimiterCounts: Record<TripleDelimiter, number> = { '"""': 0, "'''": 0 };

  constructor(
    private readonly text: string,
    private readonly tokens: Token[],
    private readonly filePath: string,
  ) {}

  parseModule(): boolean {
    const result = this.parseBlock(0);
    const docstring = docstringOf(result.statements);
    this.countDelimiter(docstring);
    return docstring.present;
  }

  private peek(offset = 0): Token {
    const token = this.tokens[this.index + offset] ?? this.tokens[this.tokens.length - 1];
    if (!token) throw new ParseFailure(this.filePath, "empty token stream", 1, 0);
    return token;
  }

  private next(): Token {
    const token = this.peek();
    if (token.type !== "ENDMARKER") this.index += 1;
    return token;
  }

  private fail(message: string, token: Token): never {
    throw new ParseFailure(this.filePath, message, token.start.line, token.start.column);
  }

  private countDelimiter(docstring: DocstringInfo): void {
    if (docstring.present && docstring.delimiter) this.delimiterCounts[docstring.delimiter] += 1;
  }

  private parseBlock(parent: number): StatementResult {
    const statements: BodyStatement[] = [];
    let endLine = this.peek().start.line;
    while (true) {
      const token = this.peek();
      if (token.type === "ENDMARKER") break;
      if (token.type === "DEDENT") {
        this.next();
        break;
      }
      if (token.type === "INDENT") this.fail("unexpected indent", token);
      if (token.type === "NEWLINE") {
        this.next();
        continue;
      }
      const result = this.parseStatement(parent);
      statements.push(...result.statements);
      endLine = result.endLine;
    }
    return { statements, endLine };
  }

  private parseStatement(parent: number): StatementResult {
    const token = this.peek();
    if (isOp(token, "@")) return this.parseDecorated(parent);
    if (isName(token, "def") || (isName(token, "async") && isName(this.peek(1), "def"))) {
      return this.parseFunction(parent, [], undefined);
    }
    if (isName(token, "class")) return this.parseClass(parent);
    return this.parseLine(parent);
  }

  private parseDecorated(parent: number): StatementResult {
    const decorators: string[] = [];
    const decoratorLine = this.peek().start.line;
    while (isOp(this.peek(), "@")) {
      const at = this.next();
      let last = at;
      while (this.peek().type !== "NEWLINE" && this.peek().type !== "ENDMARKER") last = this.next();
      if (last === at) this.fail("invalid syntax", this.peek());
      decorators.push(this.text.slice(at.end.offset, last.end.offset).trim());
      this.next();
    }
    const token = this.peek();
    if (isName(token, "def") || (isName(token, "async") && isName(this.peek(1), "def"))) {
      return this.parseFunction(parent, decorators, decoratorLine);
    }
    if (isName(token, "class")) return this.parseClass(parent);
    this.fail("invalid syntax", token);
  }

  /** Consumes tokens up to and including the colon that closes a def/class header. */
  private parseHeaderColon(): Token {
    let depth = 0;
    while (true) {
      const token = this.peek();
      if (token.type === "NEWLINE" || token.type === "ENDMARKER") this.fail("expected ':'", token);
      this.next();
      if (token.type !== "OP") continue;
      if (OPENERS.has(token.value)) depth += 1;
      else if (CLOSERS.has(token.value)) depth -= 1;
      else if (token.value === ":" && depth === 0) return token;
    }
  }

  private parseBody(node: number, label: string, headerLine: number): BodyResult {
    if (this.peek().type === "NEWLINE") {
      this.next();
      const indent = this.peek();
      if (indent.type !== "INDENT") {
        this.fail(`expected an indented block after ${label} on line ${headerLine}`, indent);
      }
      this.next();
      const bodyStart = this.peek();
      const block = this.parseBlock(node);
      return { ...block, inline: false, bodyStart, bodyIndent: indent.value };
    }
    const bodyStart = this.peek();
    const tokens: Token[] = [];
    while (this.peek().type !== "NEWLINE" && this.peek().type !== "ENDMARKER") tokens.push(this.next());
    const newline = this.next();
    return {
      statements: splitSimpleStatements(tokens),
      endLine: newline.start.line,
      inline: true,
      bodyStart,
    };
  }

  private lineIndent(token: Token): string {
    const lineStart = token.start.offset - token.start.column;
    return this.text.slice(lineStart, token.start.offset);
  }

  private parseFunction(parent: number, decorators: string[], decoratorLine: number | undefined): StatementResult {
    const start = this.next();
    const isAsync = isName(start, "async");
    if (isAsync) this.next();
    const nameToken = this.next();
    if (nameToken.type !== "NAME") this.fail("invalid syntax", nameToken);
    const colon = this.parseHeaderColon();

    const node = this.nodes.length;
    this.nodes.push({ kind: "function", name: nameToken.value, parent });
    const parentKind = this.nodes[parent]?.kind ?? "module";
    const body = this.parseBody(node, `function definition`, start.start.line);
    const docstring = docstringOf(body.statements);
    this.countDelimiter(docstring);

    this.pending.push({
      node,
      name: nameToken.value,
      kind: isAsync ? "async function" : parentKind === "class" ? "method" : "function",
      scope: parentKind,
      decorators,
      decoratorLine,
      signatureStart: start.start,
      bodyStart: body.bodyStart.start,
      headerEnd: colon.end.offset,
      signatureText: this.text.slice(start.start.offset, colon.end.offset),
      endLine: body.endLine,
      definitionIndent: this.lineIndent(start),
      bodyIndent: body.bodyIndent,
      inlineBody: body.inline,
      hasDocstring: docstring.present,
      docstringDelimiter: docstring.delimiter,
      isStub: isStubBody(body.statements, docstring),
    });
    return { statements: [{ kind: "compound" }], endLine: body.endLine };
  }

  private parseClass(parent: number): StatementResult {
    const start = this.next();
    const nameToken = this.next();
    if (nameToken.type !== "NAME") this.fail("invalid syntax", nameToken);
    this.parseHeaderColon();
    const node = this.nodes.length;
    this.nodes.push({ kind: "class", name: nameToken.value, parent });
    const body = this.parseBody(node, "class definition", start.start.line);
    this.countDelimiter(docstringOf(body.statements));
    return { statements: [{ kind: "compound" }], endLine: body.endLine };
  }

  private parseLine(parent: number): StatementResult {
    const first = this.peek();
    const tokens: Token[] = [];
    while (this.peek().type !== "NEWLINE" && this.peek().type !== "ENDMARKER") tokens.push(this.next());
    const newline = this.next();
    if (!isOp(tokens[tokens.length - 1], ":")) {
      return { statements: splitSimpleStatements(tokens), endLine: newline.start.line };
    }
    const indent = this.peek();
    if (indent.type !== "INDENT") {
      this.fail(`expected an indented block after '${first.value}' statement on line ${first.start.line}`, indent);
    }
    this.next();
    const block = this.parseBlock(parent);
    return { statements: [{ kind: "compound" }], endLine: block.endLine };
  }
}

const qualifiedNameOf = (nodes: ModelNode[], index: number): string => {
  const parts: string[] = [];
  let current: number | undefined = index;
  while (current !== undefined) {
    const node: ModelNode | undefined = nodes[current];
    if (!node || node.kind === "module") break;
    parts.unshift(node.name);
    current = node.parent;
  }
  return parts.join(".");
};

/** Parses Python text into the arena of scopes and the ordered definition spans. */
export const parseSource = (text: string, filePath = "<string>"): ParsedSource => {
  const tokens = tokenize(text, filePath);
  const parser = new StatementParser(text, tokens, filePath);
  const hasModuleDocstring = parser.parseModule();
  const indentUnit = tokens.find((token) => token.type === "INDENT")?.value ?? DEFAULT_INDENT_UNIT;

  const ordinals = new Map<string, number>();
  const spans = [...parser.pending]
    .sort((left, right) => left.signatureStart.offset - right.signatureStart.offset)
    .map(({ node, bodyIndent, ...rest }): DefinitionSpan => {
      const qualifiedName = qualifiedNameOf(parser.nodes, node);
      const ordinal = ordinals.get(qualifiedName) ?? 0;
      ordinals.set(qualifiedName, ordinal + 1);
      return {
        ...rest,
        qualifiedName,
        ordinal,
        bodyIndent: bodyIndent ?? `${rest.definitionIndent}${indentUnit}`,
      };
    });

  const counts = parser.delimiterCounts;
  const preferredDelimiter: TripleDelimiter = counts["'''"] > counts['"""'] ? "'''" : '"""';
  return { nodes: parser.nodes, spans, preferredDelimiter, indentUnit, hasModuleDocstring };
};

export const buildSourceModel = (file: SourceFile): SourceModel => ({
  file,
  ...parseSource(file.text, file.path),
});
