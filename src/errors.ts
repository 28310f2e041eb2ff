/**
 * Timetable error taxonomy
 *
 * Every failure surfaced by the library is a TimetableError subclass so
 * callers can branch on `instanceof` without string matching.
 */

export class TimetableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Caller input was malformed or rejected by the timetable form. Not retryable. */
export class InvalidParameterError extends TimetableError {
  constructor(readonly parameter: string, message: string) {
    super(message);
  }
}

export type TransportFailure = 'network' | 'timeout' | 'status';

/** Network, timeout, or HTTP status failure. Retry is up to the caller. */
export class TransportError extends TimetableError {
  constructor(
    readonly kind: TransportFailure,
    message: string,
    readonly status: number | null = null,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** Page structure did not match what the parser expects. */
export class ParseError extends TimetableError {}

export class NotFoundError extends TimetableError {}

export class AmbiguousResultError extends TimetableError {
  constructor(message: string, readonly count: number) {
    super(message);
  }
}
