import type { Result } from 'neverthrow';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/**
 * HTTP request configuration.
 */
export interface HttpRequest {
  readonly url: string;
  readonly method: HttpMethod;
  readonly headers?: Readonly<Record<string, string>> | undefined;
  readonly body?: string | undefined;
  /** Caller-side cancellation, combined with the client's timeout */
  readonly signal?: AbortSignal | undefined;
}

/**
 * HTTP response with typed body.
 */
export interface HttpResponse<T> {
  readonly status: number;
  readonly statusText: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly body: T;
}

/**
 * HTTP error with status and message.
 * `cancelled` is reported when the caller's own signal aborted the request.
 */
export interface HttpError {
  readonly type: 'network' | 'timeout' | 'parse' | 'http' | 'cancelled';
  readonly message: string;
  readonly status?: number | undefined;
  /** Raw error response body, when the server sent one */
  readonly body?: string | undefined;
  /** Response headers of a failed request (lower-cased names) */
  readonly headers?: Readonly<Record<string, string>> | undefined;
  readonly cause?: unknown;
}

/**
 * HTTP client interface for making requests.
 * Abstraction over fetch for dependency injection and testing.
 */
export interface HttpClient {
  /**
   * Makes an HTTP request and parses the JSON response.
   * An empty body (204, or zero length) parses to undefined.
   * @param request - The request configuration
   * @returns Result with parsed response or error
   */
  readonly json: (request: HttpRequest) => Promise<Result<HttpResponse<unknown>, HttpError>>;
}

/**
 * Options for creating an HTTP client.
 */
export interface HttpClientOptions {
  /** Request timeout in milliseconds (default: 30000) */
  readonly timeoutMs?: number | undefined;
  /** Headers sent with every request; per-request headers win */
  readonly baseHeaders?: Readonly<Record<string, string>> | undefined;
  /** fetch implementation, defaults to the global fetch */
  readonly fetch?: typeof fetch | undefined;
}
