import { z } from 'zod';
import type { HttpError } from '../http/types.js';
import type { DomainRule, RepositoryError, RepositoryErrorCode } from './types.js';

/**
 * Error envelope the API sends, either flat or nested under `error`.
 */
const errorEnvelopeSchema = z.union([
  z.object({
    error: z.object({ code: z.string(), message: z.string() }),
  }),
  z.object({
    error: z.string().optional(),
    message: z.string(),
  }),
]);

/**
 * Default user-facing messages per error code.
 */
const defaultMessages: Record<RepositoryErrorCode, string> = {
  NOT_FOUND: 'The requested resource was not found',
  UNAUTHORIZED: 'Your session has expired. Please sign in again.',
  FORBIDDEN: "You don't have permission to perform this action",
  VALIDATION: 'The request was rejected',
  RATE_LIMITED: 'Too many requests. Please try again later.',
  SERVER_ERROR: 'Server error. Please try again later.',
  CONNECTIVITY: 'No internet connection. Please check your network.',
  TIMEOUT: 'Request timed out. Please try again.',
  DECODE: 'Failed to process server response',
  CANCELLED: 'Request was cancelled',
  DOMAIN_RULE: 'The operation is not allowed',
};

const domainRuleMessages: Record<DomainRule, string> = {
  INVALID_AMOUNT: 'Amount must be greater than zero',
  INSUFFICIENT_FUNDS: 'Insufficient funds for this withdrawal',
  TRANSFER_NOT_CANCELLABLE: 'This transfer cannot be cancelled in its current status',
  CANNOT_DELETE_DEFAULT_PORTFOLIO: 'The default portfolio cannot be deleted',
  EMPTY_MESSAGE: 'Message cannot be empty',
  INVALID_SYMBOL: 'Stock symbol cannot be empty',
};

/**
 * Extracts the server's message from an error body, if it has a known shape.
 */
export const extractServerMessage = (body: string | undefined): string | undefined => {
  if (body === undefined) {
    return undefined;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return undefined;
  }

  const envelope = errorEnvelopeSchema.safeParse(parsed);
  if (!envelope.success) {
    return undefined;
  }

  const data = envelope.data;
  return 'message' in data ? data.message : data.error.message;
};

/**
 * Parses a Retry-After header given in seconds.
 */
const parseRetryAfterMs = (headers: Readonly<Record<string, string>> | undefined): number | undefined => {
  const raw = headers?.['retry-after'];
  if (raw === undefined) {
    return undefined;
  }
  const seconds = Number(raw);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : undefined;
};

/**
 * Creates a RepositoryError with the code's default message when none is given.
 */
export const createRepositoryError = (
  code: RepositoryErrorCode,
  message?: string,
  cause?: unknown
): RepositoryError => ({
  code,
  message: message ?? defaultMessages[code],
  cause,
});

/**
 * Creates a NOT_FOUND error.
 *
 * @param message - What was not found
 */
export const createNotFoundError = (message: string, cause?: unknown): RepositoryError =>
  createRepositoryError('NOT_FOUND', message, cause);

/**
 * Creates a DECODE error for a payload that failed schema validation.
 */
export const createDecodeError = (message: string, cause?: unknown): RepositoryError =>
  createRepositoryError('DECODE', message, cause);

/**
 * Creates a CANCELLED error for a caller that stopped waiting.
 */
export const createCancelledError = (cause?: unknown): RepositoryError =>
  createRepositoryError('CANCELLED', undefined, cause);

/**
 * Creates a DOMAIN_RULE error raised before any network call.
 *
 * @param rule - The violated rule
 * @param message - Overrides the rule's default message
 */
export const createDomainRuleError = (rule: DomainRule, message?: string): RepositoryError => ({
  code: 'DOMAIN_RULE',
  message: message ?? domainRuleMessages[rule],
  rule,
});

/**
 * Maps a transport error from the HTTP client to a RepositoryError.
 *
 * @param error - The HTTP client error
 * @returns A RepositoryError classified by status and failure type
 */
export const fromHttpError = (error: HttpError): RepositoryError => {
  switch (error.type) {
    case 'network':
      return createRepositoryError('CONNECTIVITY', undefined, error);
    case 'timeout':
      return createRepositoryError('TIMEOUT', undefined, error);
    case 'cancelled':
      return createCancelledError(error);
    case 'parse':
      return createDecodeError(error.message, error);
    case 'http':
      break;
  }

  const status = error.status ?? 0;
  const serverMessage = extractServerMessage(error.body);

  if (status === 401) {
    return { code: 'UNAUTHORIZED', message: defaultMessages.UNAUTHORIZED, status, cause: error };
  }
  if (status === 403) {
    return { code: 'FORBIDDEN', message: defaultMessages.FORBIDDEN, status, cause: error };
  }
  if (status === 404) {
    return { code: 'NOT_FOUND', message: serverMessage ?? defaultMessages.NOT_FOUND, status, cause: error };
  }
  if (status === 429) {
    return {
      code: 'RATE_LIMITED',
      message: defaultMessages.RATE_LIMITED,
      status,
      retryAfterMs: parseRetryAfterMs(error.headers),
      cause: error,
    };
  }
  if (status >= 500) {
    return {
      code: 'SERVER_ERROR',
      message: serverMessage ?? `Server error (${String(status)})`,
      status,
      cause: error,
    };
  }
  return {
    code: 'VALIDATION',
    message: serverMessage ?? `Request failed (${String(status)})`,
    status,
    cause: error,
  };
};

/**
 * Whether repeating the same request may succeed.
 */
export const isRetryableError = (error: RepositoryError): boolean =>
  error.code === 'SERVER_ERROR' ||
  error.code === 'CONNECTIVITY' ||
  error.code === 'TIMEOUT' ||
  error.code === 'RATE_LIMITED';

/**
 * Whether the user must sign in again.
 */
export const requiresReauthentication = (error: RepositoryError): boolean =>
  error.code === 'UNAUTHORIZED';

/**
 * Renders a short user-facing description of the error.
 */
export const describeError = (error: RepositoryError): string => {
  if (error.code === 'RATE_LIMITED' && error.retryAfterMs !== undefined) {
    return `Too many requests. Please try again in ${String(Math.ceil(error.retryAfterMs / 1000))} seconds.`;
  }
  return error.message;
};
