/**
 * Classified run errors
 */

export type ScraperErrorKind =
  | "malformed-storage"
  | "empty-extraction"
  | "write-failure"
  | "fetch"
  | "extraction"
  | "config";

export class ScraperError extends Error {
  constructor(
    message: string,
    public readonly kind: ScraperErrorKind,
    public readonly hint?: string,
  ) {
    super(message);
    this.name = "ScraperError";
  }
}

/** History could not be written; the run must not report success */
export class HistoryWriteError extends ScraperError {
  constructor(
    public readonly filePath: string,
    cause: unknown,
  ) {
    super(
      `Could not write history file ${filePath}: ${describeError(cause)}`,
      "write-failure",
      "Check that the history directory exists and is writable (HISTORY_DIR)",
    );
    this.name = "HistoryWriteError";
  }
}

export class FetchError extends ScraperError {
  constructor(message: string, hint?: string) {
    super(message, "fetch", hint);
    this.name = "FetchError";
  }
}

export class ExtractionError extends ScraperError {
  constructor(message: string, hint?: string) {
    super(message, "extraction", hint);
    this.name = "ExtractionError";
  }
}

export class ConfigError extends ScraperError {
  constructor(message: string, hint?: string) {
    super(message, "config", hint);
    this.name = "ConfigError";
  }
}

/**
 * Turns anything thrown into a one-line message for the operator
 */
export function describeError(error: unknown): string {
  if (error instanceof ScraperError && error.hint) {
    return `${error.message} (${error.hint})`;
  }
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  return String(error);
}
