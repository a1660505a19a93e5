import { describe, it, expect } from 'vitest';
import {
  createDomainRuleError,
  describeError,
  extractServerMessage,
  fromHttpError,
  isRetryableError,
  requiresReauthentication,
} from './errors.js';
import type { HttpError } from '../http/types.js';

const httpError = (status: number, body?: string, headers?: Record<string, string>): HttpError => ({
  type: 'http',
  message: `HTTP ${String(status)}`,
  status,
  body,
  headers,
});

describe('fromHttpError', () => {
  describe('given transport failures', () => {
    it('maps network to CONNECTIVITY', () => {
      expect(fromHttpError({ type: 'network', message: 'fetch failed' }).code).toBe('CONNECTIVITY');
    });

    it('maps timeout to TIMEOUT', () => {
      expect(fromHttpError({ type: 'timeout', message: 'timed out' }).code).toBe('TIMEOUT');
    });

    it('maps cancelled to CANCELLED', () => {
      expect(fromHttpError({ type: 'cancelled', message: 'cancelled' }).code).toBe('CANCELLED');
    });

    it('maps parse to DECODE keeping the message', () => {
      const error = fromHttpError({ type: 'parse', message: 'Failed to parse JSON response' });

      expect(error.code).toBe('DECODE');
      expect(error.message).toBe('Failed to parse JSON response');
    });
  });

  describe('given HTTP statuses', () => {
    it.each([
      [401, 'UNAUTHORIZED'],
      [403, 'FORBIDDEN'],
      [404, 'NOT_FOUND'],
      [429, 'RATE_LIMITED'],
      [400, 'VALIDATION'],
      [422, 'VALIDATION'],
      [500, 'SERVER_ERROR'],
      [503, 'SERVER_ERROR'],
    ])('maps %i to %s', (status, code) => {
      const error = fromHttpError(httpError(status));

      expect(error.code).toBe(code);
      expect(error.status).toBe(status);
    });

    it('uses the server message for validation errors', () => {
      const error = fromHttpError(httpError(422, '{"error":"invalid","message":"Name is required"}'));

      expect(error.message).toBe('Name is required');
    });

    it('falls back to the status when the body has no message', () => {
      const error = fromHttpError(httpError(400, 'oops'));

      expect(error.message).toBe('Request failed (400)');
    });

    it('reads Retry-After seconds for rate limiting', () => {
      const error = fromHttpError(httpError(429, undefined, { 'retry-after': '12' }));

      expect(error.retryAfterMs).toBe(12_000);
    });
  });
});

describe('extractServerMessage', () => {
  it('reads the flat envelope', () => {
    expect(extractServerMessage('{"error":"bad_request","message":"Amount too small"}')).toBe(
      'Amount too small'
    );
  });

  it('reads the nested envelope', () => {
    expect(
      extractServerMessage('{"error":{"code":"GOAL_LIMIT","message":"Too many goals"}}')
    ).toBe('Too many goals');
  });

  it('returns undefined for non-JSON bodies', () => {
    expect(extractServerMessage('<html>')).toBeUndefined();
  });

  it('returns undefined for missing bodies', () => {
    expect(extractServerMessage(undefined)).toBeUndefined();
  });
});

describe('isRetryableError', () => {
  it('is true for transient failures only', () => {
    expect(isRetryableError(fromHttpError(httpError(500)))).toBe(true);
    expect(isRetryableError(fromHttpError(httpError(429)))).toBe(true);
    expect(isRetryableError(fromHttpError({ type: 'timeout', message: 't' }))).toBe(true);
    expect(isRetryableError(fromHttpError({ type: 'network', message: 'n' }))).toBe(true);
    expect(isRetryableError(fromHttpError(httpError(404)))).toBe(false);
    expect(isRetryableError(createDomainRuleError('INSUFFICIENT_FUNDS'))).toBe(false);
  });
});

describe('requiresReauthentication', () => {
  it('is true only for UNAUTHORIZED', () => {
    expect(requiresReauthentication(fromHttpError(httpError(401)))).toBe(true);
    expect(requiresReauthentication(fromHttpError(httpError(403)))).toBe(false);
  });
});

describe('createDomainRuleError', () => {
  it('carries the rule and its default message', () => {
    const error = createDomainRuleError('TRANSFER_NOT_CANCELLABLE');

    expect(error).toEqual({
      code: 'DOMAIN_RULE',
      rule: 'TRANSFER_NOT_CANCELLABLE',
      message: 'This transfer cannot be cancelled in its current status',
    });
  });
});

describe('describeError', () => {
  it('includes the wait for rate limiting', () => {
    const error = fromHttpError(httpError(429, undefined, { 'retry-after': '1.5' }));

    expect(describeError(error)).toBe('Too many requests. Please try again in 2 seconds.');
  });

  it('returns the message otherwise', () => {
    expect(describeError(createDomainRuleError('EMPTY_MESSAGE'))).toBe('Message cannot be empty');
  });
});
