export type DocgapErrorCode =
  | "parse_failure"
  | "stale_file"
  | "io_failure"
  | "invalid_docstring"
  | "provider_failure"
  | "path_resolution"
  | "config_invalid";

export type DocgapErrorDetails = Record<string, unknown>;

type DocgapErrorInput = {
  code: DocgapErrorCode;
  message: string;
  details?: DocgapErrorDetails;
  name?: string;
  cause?: unknown;
};

export class DocgapError extends Error {
  readonly code: DocgapErrorCode;
  readonly details?: DocgapErrorDetails;

  constructor({ code, message, details, name, cause }: DocgapErrorInput) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = name ?? "DocgapError";
    this.code = code;
    this.details = details;
  }
}

export class ParseFailure extends DocgapError {
  readonly path: string;
  readonly line: number;
  readonly column: number;

  constructor(path: string, message: string, line: number, column: number) {
    super({
      code: "parse_failure",
      message: `${message} (line ${line}, column ${column + 1})`,
      details: { path, line, column, reason: message },
      name: "ParseFailure",
    });
    this.path = path;
    this.line = line;
    this.column = column;
  }

  /** The failure reason without the position suffix. */
  get reason(): string {
    const reason = this.details?.reason;
    return typeof reason === "string" ? reason : this.message;
  }
}

export class StaleFileError extends DocgapError {
  constructor(readonly path: string, expected: string, actual: string) {
    super({
      code: "stale_file",
      message: `${path} changed on disk since it was scanned; rescan before patching.`,
      details: { path, expected, actual },
      name: "StaleFileError",
    });
  }
}

export class IOFailure extends DocgapError {
  constructor(readonly path: string, operation: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super({
      code: "io_failure",
      message: `Failed to ${operation} ${path}: ${reason}`,
      details: { path, operation },
      name: "IOFailure",
      cause,
    });
  }
}

export class InvalidDocstringError extends DocgapError {
  constructor(message: string, details?: DocgapErrorDetails) {
    super({ code: "invalid_docstring", message, details, name: "InvalidDocstringError" });
  }
}

export class ProviderFailure extends DocgapError {
  readonly timedOut: boolean;

  constructor(message: string, options: { timedOut?: boolean; cause?: unknown } = {}) {
    super({
      code: "provider_failure",
      message,
      details: { timedOut: options.timedOut ?? false },
      name: "ProviderFailure",
      cause: options.cause,
    });
    this.timedOut = options.timedOut ?? false;
  }
}

export class PathResolutionError extends DocgapError {
  constructor(readonly path: string, reason: string) {
    super({
      code: "path_resolution",
      message: `Cannot scan ${path}: ${reason}`,
      details: { path },
      name: "PathResolutionError",
    });
  }
}

export class ConfigError extends DocgapError {
  constructor(message: string, details?: DocgapErrorDetails) {
    super({ code: "config_invalid", message, details, name: "ConfigError" });
  }
}

export type PatchError = StaleFileError | IOFailure | InvalidDocstringError;

export const isDocgapError = (error: unknown): error is DocgapError => error instanceof DocgapError;

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export const hasErrorCode = (error: unknown, code: string): boolean =>
  error instanceof Error && "code" in error && error.code === code;
