import {
  InvalidDocstringError,
  IOFailure,
  ParseFailure,
  StaleFileError,
  type PatchError,
} from "../runtime/DocgapErrors.js";
import { gapKey, type Gap } from "../scanner/GapScanner.js";
import {
  checksumOf,
  createSourceFile,
  encodeSourceText,
  EOL_SEQUENCES,
  type SourceFile,
} from "../source/SourceFile.js";
import { parseSource, type DefinitionSpan, type ParsedSource } from "../source/SourceModel.js";
import { AtomicWriter, nodeWriterFileSystem, type WriterFileSystem } from "./AtomicWriter.js";
import { renderDocstring } from "./DocstringBlock.js";

export interface Patch {
  path: string;
  /** Character offset into the decoded text. */
  offset: number;
  deleteLength: number;
  text: string;
  /** Line the docstring is inserted at (1-based). */
  line: number;
  expectedChecksum: string;
}

export interface AppliedPatch {
  gap: Gap;
  patch: Patch;
  /** The file as written. */
  source: SourceFile;
}

export type PatchResult = { ok: true; value: AppliedPatch } | { ok: false; error: PatchError };

export interface PatchEngineOptions {
  fileSystem?: WriterFileSystem;
  writer?: AtomicWriter;
}

const isPatchError = (error: unknown): error is PatchError =>
  error instanceof StaleFileError || error instanceof IOFailure || error instanceof InvalidDocstringError;

const findSpan = (spans: DefinitionSpan[], key: string): DefinitionSpan | undefined =>
  spans.find((span) => gapKey(span) === key);

/** Computes the edit that gives `span` a docstring; pure. */
export const planPatch = (
  source: SourceFile,
  parsed: Pick<ParsedSource, "preferredDelimiter">,
  span: DefinitionSpan,
  text: string,
): Patch => {
  const eol = EOL_SEQUENCES[source.lineEnding];
  const { lines } = renderDocstring(text, { indent: span.bodyIndent, delimiter: parsed.preferredDelimiter });
  if (span.inlineBody) {
    return {
      path: source.path,
      offset: span.headerEnd,
      deleteLength: span.bodyStart.offset - span.headerEnd,
      text: `${eol}${lines.join(eol)}${eol}${span.bodyIndent}`,
      line: span.bodyStart.line,
      expectedChecksum: source.checksum,
    };
  }
  return {
    path: source.path,
    offset: span.bodyStart.offset - span.bodyStart.column,
    deleteLength: 0,
    text: lines.map((line) => `${line}${eol}`).join(""),
    line: span.bodyStart.line,
    expectedChecksum: source.checksum,
  };
};

export const spliceText = (text: string, patch: Pick<Patch, "offset" | "deleteLength" | "text">): string =>
  `${text.slice(0, patch.offset)}${patch.text}${text.slice(patch.offset + patch.deleteLength)}`;

/** Re-parses the patched text and checks that only the target span changed state. */
const verifyPatchedText = (filePath: string, before: ParsedSource, text: string, key: string): void => {
  let after: ParsedSource;
  try {
    after = parseSource(text, filePath);
  } catch (error) {
    const reason = error instanceof ParseFailure ? error.reason : String(error);
    throw new InvalidDocstringError(`Inserting the docstring would break ${filePath}: ${reason}`, { path: filePath });
  }
  const patched = findSpan(after.spans, key);
  if (!patched?.hasDocstring) {
    throw new InvalidDocstringError(`The inserted text is not a docstring of ${key.split("#")[0] ?? key}.`, {
      path: filePath,
    });
  }
  const documented = (parsed: ParsedSource) => parsed.spans.filter((span) => span.hasDocstring).length;
  if (after.spans.length !== before.spans.length || documented(after) !== documented(before) + 1) {
    throw new InvalidDocstringError(`Inserting the docstring would change other definitions in ${filePath}.`, {
      path: filePath,
    });
  }
};

export class PatchEngine {
  private readonly writer: AtomicWriter;
  private readonly fileSystem: WriterFileSystem;

  constructor(options: PatchEngineOptions = {}) {
    this.fileSystem = options.fileSystem ?? nodeWriterFileSystem;
    this.writer = options.writer ?? new AtomicWriter(this.fileSystem);
  }

  async apply(gap: Gap, text: string): Promise<PatchResult> {
    try {
      return { ok: true, value: await this.applyOrThrow(gap, text) };
    } catch (error) {
      if (isPatchError(error)) return { ok: false, error };
      throw error;
    }
  }

  private async applyOrThrow(gap: Gap, text: string): Promise<AppliedPatch> {
    let bytes: Buffer;
    try {
      bytes = await this.fileSystem.readFile(gap.path);
    } catch (error) {
      throw new IOFailure(gap.path, "read", error);
    }
    const actual = checksumOf(bytes);
    if (actual !== gap.checksum) {
      throw new StaleFileError(gap.path, gap.checksum, actual);
    }
    const source = createSourceFile(gap.path, bytes);
    const parsed = parseSource(source.text, source.path);
    const key = gapKey(gap.span);
    const span = findSpan(parsed.spans, key);
    if (!span) {
      throw new StaleFileError(gap.path, gap.checksum, actual);
    }
    if (span.hasDocstring) {
      throw new InvalidDocstringError(`${span.qualifiedName} already has a docstring.`, { path: gap.path });
    }

    const patch = planPatch(source, parsed, span, text);
    const nextText = spliceText(source.text, patch);
    verifyPatchedText(gap.path, parsed, nextText, key);
    const nextBytes = encodeSourceText(source, nextText);
    await this.writer.write(gap.path, nextBytes, { expectedChecksum: gap.checksum });
    return { gap, patch, source: createSourceFile(gap.path, nextBytes) };
  }
}
