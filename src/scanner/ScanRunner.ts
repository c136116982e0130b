import { IOFailure, ParseFailure } from "../runtime/DocgapErrors.js";
import { loadSourceFile, type SourceFile } from "../source/SourceFile.js";
import type { DefinitionSpan } from "../source/SourceModel.js";
import { collectSources, type CollectOptions } from "./SourceCollector.js";
import { GapScanner, type Gap, type StubPolicy } from "./GapScanner.js";

export const DEFAULT_SCAN_CONCURRENCY = 8;

export type FileScanResult =
  | { status: "ok"; path: string; source: SourceFile; spans: DefinitionSpan[]; gaps: Gap[] }
  | { status: "failed"; path: string; error: ParseFailure | IOFailure };

export interface ScanOptions extends CollectOptions {
  stubPolicy?: StubPolicy;
  concurrency?: number;
}

export interface ScanSummary {
  files: FileScanResult[];
  gaps: Gap[];
  failures: Array<Extract<FileScanResult, { status: "failed" }>>;
}

export const scanFile = async (filePath: string, scanner: GapScanner): Promise<FileScanResult> => {
  let source: SourceFile;
  try {
    source = await loadSourceFile(filePath);
  } catch (error) {
    if (error instanceof ParseFailure) return { status: "failed", path: filePath, error };
    return { status: "failed", path: filePath, error: new IOFailure(filePath, "read", error) };
  }
  try {
    const spans = scanner.scan(source);
    return { status: "ok", path: filePath, source, spans, gaps: scanner.findGaps(source, spans) };
  } catch (error) {
    if (error instanceof ParseFailure) return { status: "failed", path: filePath, error };
    throw error;
  }
};

const mapWithConcurrency = async <T, R>(
  items: T[],
  limit: number,
  worker: (item: T) => Promise<R>,
): Promise<R[]> => {
  const results: R[] = new Array<R>(items.length);
  let nextIndex = 0;
  const runners = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, async () => {
    while (nextIndex < items.length) {
      const index = nextIndex;
      nextIndex += 1;
      const item = items[index];
      if (item === undefined) continue;
      results[index] = await worker(item);
    }
  });
  await Promise.all(runners);
  return results;
};

/** Scans already-collected files; results keep the order of `files`. */
export const scanFiles = async (
  files: string[],
  options: Pick<ScanOptions, "stubPolicy" | "concurrency"> = {},
): Promise<ScanSummary> => {
  const scanner = new GapScanner({ stubPolicy: options.stubPolicy });
  const results = await mapWithConcurrency(files, options.concurrency ?? DEFAULT_SCAN_CONCURRENCY, (file) =>
    scanFile(file, scanner),
  );
  const gaps: Gap[] = [];
  const failures: ScanSummary["failures"] = [];
  for (const result of results) {
    if (result.status === "ok") gaps.push(...result.gaps);
    else failures.push(result);
  }
  return { files: results, gaps, failures };
};

/** Unreadable directories are reported as failures next to the files that could not be scanned. */
export const scanSources = async (paths: string[], options: ScanOptions = {}): Promise<ScanSummary> => {
  const directoryFailures: Array<Extract<FileScanResult, { status: "failed" }>> = [];
  const files = await collectSources(paths, {
    ...options,
    onDirectoryError: (error) => directoryFailures.push({ status: "failed", path: error.path, error }),
  });
  const summary = await scanFiles(files, options);
  return {
    files: [...summary.files, ...directoryFailures],
    gaps: summary.gaps,
    failures: [...summary.failures, ...directoryFailures],
  };
};
