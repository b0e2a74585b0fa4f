export type ErrorDetails = Record<string, unknown>;

// Base type for every error the pricer raises on purpose
export abstract class DonationError extends Error {
  public abstract readonly code: string;
  public readonly details?: ErrorDetails;

  constructor(message: string, details?: ErrorDetails, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.details = details;

    Error.captureStackTrace(this, new.target);
  }
}

/**
 * A donation line that cannot be read as `[quantity] name`.
 * The line is skipped and listed in the report.
 */
export class ParseError extends DonationError {
  public readonly code = 'PARSE_ERROR';

  constructor(message: string, public readonly lineNumber: number, public readonly text: string) {
    super(message, { lineNumber, text });
  }
}

export type UnresolvedReason = 'no-match' | 'no-price' | 'lookup-failed';

export class ResolutionError extends DonationError {
  public readonly code = 'UNRESOLVED';

  constructor(
    message: string,
    public readonly reason: UnresolvedReason,
    public readonly rawName: string,
    public readonly itemId?: string,
  ) {
    super(message, { reason, rawName, itemId });
  }
}

/**
 * Failure talking to the price service. `retryable` is true for rate limiting,
 * 5xx responses, timeouts and network errors.
 */
export class LookupError extends DonationError {
  public readonly code = 'LOOKUP_ERROR';

  constructor(
    message: string,
    public readonly retryable: boolean,
    public readonly itemId?: string,
    public readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, { itemId, status, retryable }, options);
  }
}

/**
 * Unrecoverable: bad configuration, rejected credentials, unreadable input,
 * unreachable catalog.
 */
export class FatalError extends DonationError {
  public readonly code = 'FATAL_ERROR';
}

export function isRetryableLookup(error: unknown): error is LookupError {
  return error instanceof LookupError && error.retryable;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
