// Error types shared by every package
//
// The set is closed: callers discriminate on `code` (or instanceof) and
// decide whether to retry, treat the failure as an empty result, or report
// it upward as a schema mismatch.

import type { ResourceKind } from './types/common.js';

export type DatatrackerErrorCode =
  | 'VALIDATION_ERROR'
  | 'FETCH_ERROR'
  | 'NOT_FOUND'
  | 'DECODE_ERROR'
  | 'INVARIANT_VIOLATION'
  | 'PAGINATION_LOOP';

/**
 * Base class for all client errors.
 * Provides structured error information for debugging and logging.
 */
export class DatatrackerError extends Error {
  readonly code: DatatrackerErrorCode;

  /**
   * Whether repeating the same call may succeed
   */
  readonly retryable: boolean;

  constructor(
    code: DatatrackerErrorCode,
    message: string,
    options?: { retryable?: boolean; cause?: unknown }
  ) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'DatatrackerError';
    this.code = code;
    this.retryable = options?.retryable ?? false;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      retryable: this.retryable,
    };
  }
}

/**
 * Validation error for a malformed identifier, filter, or configuration value.
 */
export class ValidationError extends DatatrackerError {
  readonly field?: string;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    options?: { field?: string; details?: Record<string, unknown> }
  ) {
    super('VALIDATION_ERROR', message);
    this.name = 'ValidationError';
    this.field = options?.field;
    this.details = options?.details;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), field: this.field, details: this.details };
  }
}

/**
 * Error when a string does not match the URI pattern of its kind.
 */
export class InvalidUriError extends ValidationError {
  readonly kind: ResourceKind;
  readonly input: string;

  constructor(kind: ResourceKind, input: string) {
    super(`Invalid ${kind} URI: "${input}"`, {
      field: 'uri',
      details: { kind, input },
    });
    this.name = 'InvalidUriError';
    this.kind = kind;
    this.input = input;
  }
}

/**
 * How the transport failed
 */
export type FetchFailureReason = 'timeout' | 'network' | 'http_status';

/**
 * Transport-level failure: timeout, refused connection, or an
 * unexpected HTTP status. Always retryable.
 */
export class FetchError extends DatatrackerError {
  readonly path: string;
  readonly reason: FetchFailureReason;
  readonly status?: number;

  constructor(
    path: string,
    reason: FetchFailureReason,
    message: string,
    options?: { status?: number; cause?: unknown }
  ) {
    super('FETCH_ERROR', `Fetch of ${path} failed: ${message}`, {
      retryable: true,
      cause: options?.cause,
    });
    this.name = 'FetchError';
    this.path = path;
    this.reason = reason;
    this.status = options?.status;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), path: this.path, reason: this.reason, status: this.status };
  }
}

/**
 * The service confirmed the record does not exist, or a lookup matched nothing.
 */
export class NotFoundError extends DatatrackerError {
  /**
   * Path or lookup description that produced no record
   */
  readonly target: string;

  constructor(target: string, message?: string) {
    super('NOT_FOUND', message ?? `Not found: ${target}`);
    this.name = 'NotFoundError';
    this.target = target;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), target: this.target };
  }
}

/**
 * One problem found while decoding a document
 */
export type DecodeIssue = {
  /**
   * Dotted path to the offending field; empty for the document itself
   */
  path: string;
  message: string;
};

/**
 * The response did not have the expected shape.
 * Signals drift between this client and the service schema.
 */
export class DecodeError extends DatatrackerError {
  readonly path: string;
  readonly issues: DecodeIssue[];

  constructor(path: string, issues: DecodeIssue[]) {
    const summary = issues
      .slice(0, 3)
      .map((i) => (i.path ? `${i.path}: ${i.message}` : i.message))
      .join('; ');
    super('DECODE_ERROR', `Unexpected document at ${path}: ${summary}`);
    this.name = 'DecodeError';
    this.path = path;
    this.issues = issues;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), path: this.path, issues: this.issues };
  }
}

/**
 * A locally checked invariant does not hold for data returned by the service,
 * e.g. an identity with two current snapshots.
 */
export class InvariantViolationError extends DatatrackerError {
  readonly invariant: string;
  readonly details?: Record<string, unknown>;

  constructor(
    invariant: string,
    message: string,
    details?: Record<string, unknown>,
    code: 'INVARIANT_VIOLATION' | 'PAGINATION_LOOP' = 'INVARIANT_VIOLATION'
  ) {
    super(code, message);
    this.name = 'InvariantViolationError';
    this.invariant = invariant;
    this.details = details;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), invariant: this.invariant, details: this.details };
  }
}

/**
 * Pagination revisited a page or exceeded the page cap.
 */
export class PaginationLoopError extends InvariantViolationError {
  readonly pagesFetched: number;
  readonly repeatedPath?: string;

  constructor(pagesFetched: number, repeatedPath?: string) {
    super(
      'pagination-terminates',
      repeatedPath
        ? `Pagination loop suspected: ${repeatedPath} was already fetched`
        : `Pagination loop suspected: more than ${pagesFetched} pages`,
      { pagesFetched, repeatedPath },
      'PAGINATION_LOOP'
    );
    this.name = 'PaginationLoopError';
    this.pagesFetched = pagesFetched;
    this.repeatedPath = repeatedPath;
  }
}

/**
 * Whether repeating the call that produced `error` may succeed
 */
export function isRetryable(error: unknown): boolean {
  return error instanceof DatatrackerError && error.retryable;
}
