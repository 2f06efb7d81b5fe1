// ─── Error taxonomy ───────────────────────────────────────────────────────────
// Every error raised by the analyzer core is recoverable at the HTTP boundary.

export type TelemetryAnalyzerErrorCode = 'parse_error' | 'validation_error' | 'not_found';

export abstract class TelemetryAnalyzerError extends Error {
  abstract readonly code: TelemetryAnalyzerErrorCode;
  abstract readonly status: number;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Malformed CSV header or row. `line` is 1-based and counts the header. */
export class ParseError extends TelemetryAnalyzerError {
  readonly code = 'parse_error';
  readonly status = 422;

  constructor(
    message: string,
    readonly line: number,
  ) {
    super(`line ${line}: ${message}`);
  }
}

export class ValidationError extends TelemetryAnalyzerError {
  readonly code = 'validation_error';
  readonly status = 400;

  constructor(
    message: string,
    readonly issues: readonly string[] = [message],
  ) {
    super(message);
  }
}

export class NotFoundError extends TelemetryAnalyzerError {
  readonly code = 'not_found';
  readonly status = 404;

  constructor(
    readonly entity: string,
    readonly key: string,
  ) {
    super(`${entity} not found: ${key}`);
  }
}
