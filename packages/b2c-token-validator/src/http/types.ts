import type { Result } from 'neverthrow';

/**
 * HTTP request configuration.
 */
export interface HttpRequest {
  readonly url: string;
  readonly method: 'GET';
  readonly headers?: Readonly<Record<string, string>>;
  /** Aborts the request; reported as an `aborted` error */
  readonly signal?: AbortSignal;
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
 */
export interface HttpError {
  readonly type: 'network' | 'timeout' | 'aborted' | 'parse' | 'http';
  readonly message: string;
  readonly status?: number | undefined;
  readonly cause?: unknown;
}

/**
 * HTTP client interface for fetching discovery and key-set documents.
 * Abstraction over fetch for dependency injection and testing.
 */
export interface HttpClient {
  /**
   * Makes an HTTP request and parses JSON response.
   * @param request - The request configuration
   * @returns Result with parsed response or error
   */
  readonly json: <T>(request: HttpRequest) => Promise<Result<HttpResponse<T>, HttpError>>;
}

/**
 * Options for creating an HTTP client.
 */
export interface HttpClientOptions {
  /** Request timeout in milliseconds (default: 10000) */
  readonly timeoutMs?: number;
  /** Base headers to include in all requests */
  readonly baseHeaders?: Readonly<Record<string, string>>;
}
