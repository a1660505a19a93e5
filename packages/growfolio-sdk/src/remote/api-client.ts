import { ok, err } from 'neverthrow';
import type { Result } from 'neverthrow';
import type { z } from 'zod';
import type { HttpClient, HttpMethod } from '../http/types.js';
import { createDecodeError, fromHttpError } from '../errors/errors.js';
import type { RepositoryError } from '../errors/types.js';

export type QueryValue = string | number | boolean | undefined;

/**
 * Request without a response payload.
 */
export interface ApiCall {
  readonly method: HttpMethod;
  /** Path below the base URL, starting with `/v1/` */
  readonly path: string;
  readonly query?: Readonly<Record<string, QueryValue>> | undefined;
  /** Serialized to JSON */
  readonly body?: unknown;
  readonly signal?: AbortSignal | undefined;
}

/**
 * Request whose JSON response is decoded with `schema`.
 */
export interface ApiRequest<T> extends ApiCall {
  readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;
}

/**
 * Supplies the bearer token for each request; undefined sends none.
 */
export type AccessTokenProvider = () => Promise<string | undefined> | string | undefined;

export interface ApiClientConfig {
  /** API origin, e.g. https://api.growfolio.app */
  readonly baseUrl: string;
  readonly httpClient: HttpClient;
  readonly getAccessToken?: AccessTokenProvider | undefined;
}

/**
 * Typed access to the Growfolio REST API.
 */
export interface ApiClient {
  /**
   * Sends a request and decodes the response body.
   * @returns The decoded payload, or a classified RepositoryError
   */
  readonly request: <T>(request: ApiRequest<T>) => Promise<Result<T, RepositoryError>>;

  /**
   * Sends a request and ignores any response body.
   */
  readonly send: (call: ApiCall) => Promise<Result<void, RepositoryError>>;
}

/**
 * Joins the base URL, path and defined query parameters.
 */
export const buildUrl = (
  baseUrl: string,
  path: string,
  query?: Readonly<Record<string, QueryValue>>
): string => {
  const url = `${baseUrl.replace(/\/+$/, '')}${path}`;
  if (query === undefined) {
    return url;
  }

  const params = new URLSearchParams();
  for (const [name, value] of Object.entries(query)) {
    if (value !== undefined) {
      params.append(name, String(value));
    }
  }
  const search = params.toString();
  return search.length > 0 ? `${url}?${search}` : url;
};

/**
 * Creates the API client over an HTTP client.
 *
 * @param config - Base URL, HTTP client and token provider
 * @returns An ApiClient instance
 *
 * @example
 * ```typescript
 * const api = createApiClient({
 *   baseUrl: 'https://api.growfolio.app',
 *   httpClient: createFetchClient(),
 *   getAccessToken: () => session.token,
 * });
 * const goals = await api.request({ method: 'GET', path: '/v1/goals', schema: z.array(goalSchema) });
 * ```
 */
export const createApiClient = (config: ApiClientConfig): ApiClient => {
  const { baseUrl, httpClient, getAccessToken } = config;

  const authHeaders = async (): Promise<Record<string, string>> => {
    const token = getAccessToken === undefined ? undefined : await getAccessToken();
    return token === undefined ? {} : { Authorization: `Bearer ${token}` };
  };

  const execute = async (call: ApiCall): Promise<Result<unknown, RepositoryError>> => {
    const result = await httpClient.json({
      url: buildUrl(baseUrl, call.path, call.query),
      method: call.method,
      headers: await authHeaders(),
      body: call.body === undefined ? undefined : JSON.stringify(call.body),
      signal: call.signal,
    });

    if (result.isErr()) {
      return err(fromHttpError(result.error));
    }
    return ok(result.value.body);
  };

  const request = async <T>(req: ApiRequest<T>): Promise<Result<T, RepositoryError>> => {
    const result = await execute(req);
    if (result.isErr()) {
      return err(result.error);
    }

    const decoded = req.schema.safeParse(result.value);
    if (!decoded.success) {
      return err(
        createDecodeError(`Unexpected response from ${req.method} ${req.path}`, decoded.error)
      );
    }
    return ok(decoded.data);
  };

  const send = async (call: ApiCall): Promise<Result<void, RepositoryError>> => {
    const result = await execute(call);
    return result.map(() => undefined);
  };

  return {
    request,
    send,
  };
};
