import { ok, err } from 'neverthrow';
import type { Result } from 'neverthrow';
import type {
  HttpClient,
  HttpClientOptions,
  HttpRequest,
  HttpResponse,
  HttpError,
} from './types.js';

/** Default request timeout: 10 seconds */
const DEFAULT_TIMEOUT_MS = 10_000;

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
 * Creates an HTTP client using the native fetch API.
 *
 * @param options - Optional client configuration
 * @returns An HttpClient instance
 *
 * @example
 * ```typescript
 * const client = createFetchClient({ timeoutMs: 5000 });
 * const result = await client.json<unknown>({
 *   url: 'https://contoso.b2clogin.com/contoso.onmicrosoft.com/discovery/v2.0/keys',
 *   method: 'GET',
 * });
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

  /**
   * Executes a fetch request with timeout, caller cancellation and error handling.
   */
  const executeFetch = async (request: HttpRequest): Promise<Result<Response, HttpError>> => {
    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);

    const { signal } = request;
    const onCallerAbort = (): void => {
      controller.abort();
    };

    if (signal?.aborted === true) {
      clearTimeout(timeoutId);
      return err({ type: 'aborted', message: 'Request was aborted', cause: signal.reason });
    }
    signal?.addEventListener('abort', onCallerAbort, { once: true });

    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: {
          ...baseHeaders,
          ...request.headers,
        },
        signal: controller.signal,
      });

      if (!response.ok) {
        return err({
          type: 'http',
          message: `HTTP ${String(response.status)}: ${response.statusText}`,
          status: response.status,
        });
      }

      return ok(response);
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        if (timedOut) {
          return err({
            type: 'timeout',
            message: `Request timed out after ${String(timeoutMs)}ms`,
            cause: error,
          });
        }
        return err({ type: 'aborted', message: 'Request was aborted', cause: error });
      }

      return err({
        type: 'network',
        message: error instanceof Error ? error.message : 'Network error',
        cause: error,
      });
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onCallerAbort);
    }
  };

  const json = async <T>(request: HttpRequest): Promise<Result<HttpResponse<T>, HttpError>> => {
    const fetchResult = await executeFetch({
      ...request,
      headers: {
        Accept: 'application/json',
        ...request.headers,
      },
    });

    if (fetchResult.isErr()) {
      return err(fetchResult.error);
    }

    const response = fetchResult.value;

    try {
      const body = (await response.json()) as T;
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

  return { json };
};
