import { ok, err } from 'neverthrow';
import type { Result } from 'neverthrow';
import type {
  HttpClient,
  HttpClientOptions,
  HttpRequest,
  HttpResponse,
  HttpError,
} from './types.js';

/** Default request timeout: 30 seconds */
const DEFAULT_TIMEOUT_MS = 30_000;

/**
 * Extracts headers from a fetch Response into a plain object.
 */
const extractHeaders = (headers: Headers): Record<string, string> => {
  const result: Record<string, string> = {};
  headers.forEach((value, key) => {
    result[key] = value;
  });
  return result;
};

/**
 * Reads an error body without letting a broken stream mask the HTTP status.
 */
const readErrorBody = async (response: Response): Promise<string | undefined> => {
  try {
    const body = await response.text();
    return body.length > 0 ? body : undefined;
  } catch {
    return undefined;
  }
};

/**
 * Creates an HTTP client using the native fetch API.
 *
 * @param options - Optional client configuration
 * @returns An HttpClient instance
 *
 * @example
 * ```typescript
 * const client = createFetchClient({ timeoutMs: 5000 });
 * const result = await client.json({ url: 'https://api.example.com/v1/goals', method: 'GET' });
 *
 * if (result.isOk()) {
 *   console.log(result.value.body);
 * } else {
 *   console.error(result.error.message);
 * }
 * ```
 */
export const createFetchClient = (options: HttpClientOptions = {}): HttpClient => {
  const { timeoutMs = DEFAULT_TIMEOUT_MS, baseHeaders = {} } = options;
  const fetchImpl = options.fetch ?? fetch;

  /**
   * Executes a fetch request with timeout, caller cancellation and error handling.
   */
  const executeFetch = async (request: HttpRequest): Promise<Result<Response, HttpError>> => {
    const controller = new AbortController();
    let cancelledByCaller = false;

    const onCallerAbort = (): void => {
      cancelledByCaller = true;
      controller.abort();
    };

    if (request.signal?.aborted === true) {
      return err({ type: 'cancelled', message: 'Request was cancelled' });
    }
    request.signal?.addEventListener('abort', onCallerAbort, { once: true });

    const timeoutId = setTimeout(() => {
      controller.abort();
    }, timeoutMs);

    const cleanup = (): void => {
      clearTimeout(timeoutId);
      request.signal?.removeEventListener('abort', onCallerAbort);
    };

    try {
      const fetchOptions: RequestInit = {
        method: request.method,
        headers: {
          ...baseHeaders,
          ...request.headers,
        },
        signal: controller.signal,
      };

      // Only set body if provided (exactOptionalPropertyTypes compliance)
      if (request.body !== undefined) {
        fetchOptions.body = request.body;
      }

      const response = await fetchImpl(request.url, fetchOptions);

      cleanup();

      if (!response.ok) {
        return err({
          type: 'http',
          message: `HTTP ${String(response.status)}: ${response.statusText}`,
          status: response.status,
          body: await readErrorBody(response),
          headers: extractHeaders(response.headers),
        });
      }

      return ok(response);
    } catch (error) {
      cleanup();

      if (error instanceof Error && error.name === 'AbortError') {
        if (cancelledByCaller) {
          return err({ type: 'cancelled', message: 'Request was cancelled', cause: error });
        }
        return err({
          type: 'timeout',
          message: `Request timed out after ${String(timeoutMs)}ms`,
          cause: error,
        });
      }

      return err({
        type: 'network',
        message: error instanceof Error ? error.message : 'Network error',
        cause: error,
      });
    }
  };

  const json = async (request: HttpRequest): Promise<Result<HttpResponse<unknown>, HttpError>> => {
    const fetchResult = await executeFetch({
      ...request,
      headers: {
        Accept: 'application/json',
        ...(request.body !== undefined ? { 'Content-Type': 'application/json' } : {}),
        ...request.headers,
      },
    });

    if (fetchResult.isErr()) {
      return err(fetchResult.error);
    }

    const response = fetchResult.value;

    try {
      const raw = await response.text();
      const body: unknown = raw.length === 0 ? undefined : JSON.parse(raw);
      return ok({
        status: response.status,
        statusText: response.statusText,
        headers: extractHeaders(response.headers),
        body,
      });
    } catch (error) {
      return err({
        type: 'parse',
        message: 'Failed to parse JSON response',
        status: response.status,
        cause: error,
      });
    }
  };

  return {
    json,
  };
};
