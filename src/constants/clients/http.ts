/**
 * HTTP client defaults
 */

import type { HttpMethod, HttpRetryPolicy } from "@/types";

export const DEFAULT_HTTP_TIMEOUT_MS = 30_000;

/**
 * Sent unless the caller overrides Accept; boards answer JSON, career
 * pages HTML
 */
export const DEFAULT_ACCEPT_HEADER = "application/json, text/html;q=0.9, */*;q=0.8";

export const ERROR_BODY_SNIPPET_MAX_LENGTH = 200;

/**
 * 3 attempts, backoff ~1 s then ~2 s (with jitter), Retry-After capped at 60 s
 */
export const DEFAULT_RETRY_POLICY: HttpRetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 1_000,
  maxDelayMs: 30_000,
  maxRetryAfterMs: 60_000,
  retryableStatuses: [408, 429, 500, 502, 503, 504],
};

/**
 * Idempotent methods; nothing else is retried
 */
export const RETRYABLE_HTTP_METHODS: readonly HttpMethod[] = ["GET", "HEAD"];

/**
 * Statuses whose Retry-After header is honored
 */
export const RETRY_AFTER_STATUSES: readonly number[] = [429, 503];
