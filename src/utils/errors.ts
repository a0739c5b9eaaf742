/**
 * Domain errors. Each carries the HTTP status and the machine-readable code the
 * error middleware puts on the wire.
 */

export abstract class AppError extends Error {
  abstract readonly statusCode: number;
  abstract readonly code: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A duration token that does not match `PT[#H][#M]`. */
export class MalformedDurationError extends AppError {
  readonly statusCode = 502;
  readonly code = 'MALFORMED_DURATION';

  constructor(readonly token: string) {
    super(`Malformed duration token: "${token}"`);
  }
}

/** One per-date flight-offer query failed. Absorbed by the offer client. */
export class UpstreamQueryError extends AppError {
  readonly statusCode = 502;
  readonly code = 'UPSTREAM_QUERY_FAILED';

  constructor(
    message: string,
    readonly date: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class NoFlightsFoundError extends AppError {
  readonly statusCode = 404;
  readonly code = 'NO_FLIGHTS_FOUND';

  constructor(message = 'No flights found for the specified criteria') {
    super(message);
  }
}

export class AuthFailureError extends AppError {
  readonly statusCode = 502;
  readonly code = 'UPSTREAM_AUTH_FAILED';
}

/** Generative provider call or parse failure. Always answered with the fallback table. */
export class RecommendationProviderError extends AppError {
  readonly statusCode = 502;
  readonly code = 'RECOMMENDATION_PROVIDER_FAILED';
}

export class InvalidInputError extends AppError {
  readonly statusCode = 400;
  readonly code = 'INVALID_INPUT';

  constructor(
    message: string,
    readonly errors: Array<{ path: string; message: string }> = [],
  ) {
    super(message);
  }
}

/** The aggregation ran out of time or its caller gave up; nothing partial is returned. */
export class SearchAbortedError extends AppError {
  readonly statusCode = 504;
  readonly code = 'SEARCH_ABORTED';
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
