/**
 * Error taxonomy for the ingestion and normalization pipeline.
 *
 * Row-level errors (IngestRowError) never abort a file. Page-level fetch
 * failures (FetchError) abort an import run once retries are exhausted.
 * Profile preconditions (InsufficientDataError, ConfigurationError) are
 * fatal to a single site's profile run only.
 */
export class PipelineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * One decode strategy's failure, kept for diagnostics.
 */
export interface StrategyFailure {
  strategy: string;
  reason: string;
}

/**
 * Raised when no decode strategy could turn a payload into an object.
 */
export class ParseError extends PipelineError {
  constructor(
    message: string,
    public readonly excerpt: string,
    public readonly failures: StrategyFailure[] = [],
  ) {
    super(message);
  }
}

export interface FetchErrorDetails {
  attempts: number;
  retryable: boolean;
  status?: number;
  cause?: unknown;
}

/**
 * Transport or HTTP fault from the monitoring API.
 * `retryable` separates transient faults from terminal ones.
 */
export class FetchError extends PipelineError {
  readonly attempts: number;
  readonly retryable: boolean;
  readonly status?: number;

  constructor(message: string, details: FetchErrorDetails) {
    super(message, { cause: details.cause });
    this.attempts = details.attempts;
    this.retryable = details.retryable;
    this.status = details.status;
  }
}

/**
 * A single unusable CSV row. Counted and reported, never fatal to the file.
 */
export class IngestRowError extends PipelineError {
  constructor(
    public readonly rowNumber: number,
    message: string,
  ) {
    super(`Row ${rowNumber}: ${message}`);
  }
}

/**
 * CSV file is structurally unusable (e.g. required columns missing).
 */
export class CsvFormatError extends PipelineError {}

export class InsufficientDataError extends PipelineError {
  constructor(
    public readonly siteId: number,
    public readonly monthsCovered: number,
    public readonly monthsRequired: number,
  ) {
    super(
      `Site ${siteId} has data for ${monthsCovered}/${monthsRequired} months`,
    );
  }
}

export class ConfigurationError extends PipelineError {}

export class StageTransitionError extends PipelineError {}

/**
 * Format an unknown thrown value for summaries and logs.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
