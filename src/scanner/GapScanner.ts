import type { SourceFile } from "../source/SourceFile.js";
import { buildSourceModel, type DefinitionSpan, type SourceModel } from "../source/SourceModel.js";

export type StubPolicy = "report" | "exclude";

export const STUB_POLICIES: readonly StubPolicy[] = ["report", "exclude"];

export interface Gap {
  path: string;
  /** Checksum of the file bytes the gap was computed from. */
  checksum: string;
  span: DefinitionSpan;
}

export interface GapScannerOptions {
  stubPolicy?: StubPolicy;
}

/** Identity of a gap that survives rescans of its file. */
export const gapKey = (span: Pick<DefinitionSpan, "qualifiedName" | "ordinal">): string =>
  `${span.qualifiedName}#${span.ordinal}`;

export const gapLine = (gap: Gap): number => gap.span.signatureStart.line;

export class GapScanner {
  readonly stubPolicy: StubPolicy;

  constructor(options: GapScannerOptions = {}) {
    this.stubPolicy = options.stubPolicy ?? "report";
  }

  /** Parses the file; throws ParseFailure for syntax errors. */
  model(file: SourceFile): SourceModel {
    return buildSourceModel(file);
  }

  scan(file: SourceFile): DefinitionSpan[] {
    return this.model(file).spans;
  }

  findGaps(file: SourceFile, spans: DefinitionSpan[] = this.scan(file)): Gap[] {
    return spans
      .filter((span) => !span.hasDocstring)
      .filter((span) => this.stubPolicy === "report" || !span.isStub)
      .map((span) => ({ path: file.path, checksum: file.checksum, span }));
  }
}
