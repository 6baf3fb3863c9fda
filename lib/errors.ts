/**
 * Error taxonomy for the metrics pipeline.
 *
 * Every failure the vendor client, normalizer or store can raise is one of
 * these classes. `retryable` tells the retry helper whether another attempt
 * can succeed; `kind` is the stable identifier written into failure reports.
 */

export type IngestErrorKind =
  | 'auth'
  | 'rate_limited'
  | 'not_found'
  | 'vendor_unavailable'
  | 'malformed_payload'
  | 'store_unavailable'
  | 'invalid_record'
  | 'invalid_range';

export abstract class IngestError extends Error {
  abstract readonly kind: IngestErrorKind;
  abstract readonly retryable: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Credentials rejected by the vendor (401/403). */
export class AuthError extends IngestError {
  readonly kind = 'auth';
  readonly retryable = false;
}

/** Vendor throttled the request (429). */
export class RateLimitedError extends IngestError {
  readonly kind = 'rate_limited';
  readonly retryable = true;

  constructor(
    message: string,
    public readonly retryAfterMs: number | null = null,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** Vendor has no record for the requested date or id. Treated as "no data". */
export class NotFoundError extends IngestError {
  readonly kind = 'not_found';
  readonly retryable = false;
}

/** 5xx responses and network failures. */
export class VendorUnavailableError extends IngestError {
  readonly kind = 'vendor_unavailable';
  readonly retryable = true;

  constructor(
    message: string,
    public readonly status: number | null = null,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class MalformedPayloadError extends IngestError {
  readonly kind = 'malformed_payload';
  readonly retryable = false;

  constructor(
    message: string,
    public readonly issues: string[] = [],
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class StoreUnavailableError extends IngestError {
  readonly kind = 'store_unavailable';
  readonly retryable = true;
}

/** A record violated a store constraint. Indicates a normalizer bug. */
export class InvalidRecordError extends IngestError {
  readonly kind = 'invalid_record';
  readonly retryable = false;
}

export class InvalidRangeError extends IngestError {
  readonly kind = 'invalid_range';
  readonly retryable = false;
}

export function isRetryable(error: unknown): boolean {
  return error instanceof IngestError && error.retryable;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
