/**
 * HTTP client type definitions
 *
 * Board APIs are read-only, so requests carry no body.
 */

export type HttpMethod = "GET" | "HEAD" | "POST";

/**
 * Per-request overrides of the client's retry policy
 */
export interface HttpRetryConfig {
  /** Attempts including the first one */
  maxAttempts?: number;
  /** First backoff step; doubles per attempt */
  baseDelayMs?: number;
  maxDelayMs?: number;
  /** Upper bound on a server-supplied Retry-After wait */
  maxRetryAfterMs?: number;
  /**
   * Status codes retried by the client itself. Callers that handle a status
   * on their own (politeFetch handles 429) pass a list without it.
   */
  retryableStatuses?: readonly number[];
}

export type HttpRetryPolicy = Required<HttpRetryConfig>;

export type QueryValue = string | number | boolean | Array<string | number | boolean>;

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  query?: Record<string, QueryValue>;
  timeoutMs?: number;
  retry?: HttpRetryConfig;
}

export interface HttpErrorDetails {
  status: number;
  statusText: string;
  url: string;
  bodySnippet?: string;
  headers?: Headers;
}

/**
 * HTTP request function type for dependency injection
 */
export type HttpRequestFn = <T>(req: HttpRequest) => Promise<T>;
