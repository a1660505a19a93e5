/**
 * Error codes surfaced by repositories.
 */
export type RepositoryErrorCode =
  | 'NOT_FOUND'
  | 'UNAUTHORIZED'
  | 'FORBIDDEN'
  | 'VALIDATION'
  | 'RATE_LIMITED'
  | 'SERVER_ERROR'
  | 'CONNECTIVITY'
  | 'TIMEOUT'
  | 'DECODE'
  | 'CANCELLED'
  | 'DOMAIN_RULE';

/**
 * Domain rules checked by a repository against cached state before any
 * network call.
 */
export type DomainRule =
  | 'INVALID_AMOUNT'
  | 'INSUFFICIENT_FUNDS'
  | 'TRANSFER_NOT_CANCELLABLE'
  | 'CANNOT_DELETE_DEFAULT_PORTFOLIO'
  | 'EMPTY_MESSAGE'
  | 'INVALID_SYMBOL';

/**
 * Error returned by every repository and remote data source operation.
 */
export interface RepositoryError {
  readonly code: RepositoryErrorCode;
  readonly message: string;
  /** HTTP status for errors that came from a response */
  readonly status?: number | undefined;
  /** Server-provided wait before retrying, for RATE_LIMITED */
  readonly retryAfterMs?: number | undefined;
  /** Violated rule, for DOMAIN_RULE */
  readonly rule?: DomainRule | undefined;
  readonly cause?: unknown;
}
