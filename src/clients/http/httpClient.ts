/**
 * HTTP client: read-only fetches over native fetch
 *
 * One call = up to `maxAttempts` attempts, each under its own timeout.
 * Network errors, timeouts and retryable statuses back off exponentially
 * (with jitter) for idempotent methods; Retry-After wins when the server
 * sends it on 429/503. Job-board collaborators call this through
 * politeFetch, which owns 429 handling and passes a status list without it.
 *
 * JSON responses are parsed; anything else comes back as text.
 */

import type { HttpRequest, HttpRetryPolicy, QueryValue } from "@/types";
import { HttpError } from "./httpError";
import {
  DEFAULT_ACCEPT_HEADER,
  DEFAULT_HTTP_TIMEOUT_MS,
  DEFAULT_RETRY_POLICY,
  ERROR_BODY_SNIPPET_MAX_LENGTH,
  RETRY_AFTER_STATUSES,
  RETRYABLE_HTTP_METHODS,
} from "@/constants/clients/http";
import * as logger from "@/logger";

/**
 * Array values become repeated params (`dept=1&dept=2`)
 */
function buildUrl(baseUrl: string, query?: Record<string, QueryValue>): string {
  if (!query) {
    return baseUrl;
  }

  const url = new URL(baseUrl);
  for (const [key, value] of Object.entries(query)) {
    const values = Array.isArray(value) ? value : [value];
    for (const item of values) {
      url.searchParams.append(key, String(item));
    }
  }
  return url.toString();
}

function resolveRetryPolicy(req: HttpRequest): HttpRetryPolicy {
  return { ...DEFAULT_RETRY_POLICY, ...req.retry };
}

async function readErrorSnippet(response: Response): Promise<string | undefined> {
  const text = await response.text().catch(() => "");
  if (!text) {
    return undefined;
  }
  return text.length > ERROR_BODY_SNIPPET_MAX_LENGTH
    ? `${text.slice(0, ERROR_BODY_SNIPPET_MAX_LENGTH)}...`
    : text;
}

function isJsonContentType(contentType: string | null): boolean {
  return contentType !== null && /application\/json|\+json/.test(contentType);
}

/**
 * Seconds or HTTP-date; null when missing, invalid or already past
 */
function parseRetryAfterMs(header: string | null): number | null {
  if (!header) {
    return null;
  }

  const seconds = Number(header);
  if (Number.isFinite(seconds)) {
    return seconds > 0 ? seconds * 1000 : null;
  }

  const at = Date.parse(header);
  if (Number.isNaN(at)) {
    return null;
  }
  const delayMs = at - Date.now();
  return delayMs > 0 ? delayMs : null;
}

/**
 * min(maxDelay, base * 2^(attempt-1)) scaled by a jitter in [0.5, 1)
 */
function backoffDelayMs(attempt: number, policy: HttpRetryPolicy): number {
  const capped = Math.min(policy.baseDelayMs * 2 ** (attempt - 1), policy.maxDelayMs);
  return Math.floor(capped * (0.5 + Math.random() * 0.5));
}

/**
 * Delay before the next attempt, or null when the error is final
 */
function retryDelayMs(
  error: unknown,
  req: HttpRequest,
  attempt: number,
  policy: HttpRetryPolicy,
): number | null {
  if (attempt >= policy.maxAttempts || !RETRYABLE_HTTP_METHODS.includes(req.method)) {
    return null;
  }

  if (error instanceof HttpError) {
    if (!policy.retryableStatuses.includes(error.status)) {
      return null;
    }
    const retryAfterMs = RETRY_AFTER_STATUSES.includes(error.status)
      ? parseRetryAfterMs(error.retryAfter)
      : null;
    return retryAfterMs !== null
      ? Math.min(retryAfterMs, policy.maxRetryAfterMs)
      : backoffDelayMs(attempt, policy);
  }

  // AbortError is our timeout, TypeError is how fetch reports network failures
  if (error instanceof Error && (error.name === "AbortError" || error.name === "TypeError")) {
    return backoffDelayMs(attempt, policy);
  }

  return null;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * One attempt, no retries
 *
 * @throws {HttpError} On a non-2xx status
 * @throws {Error} When a JSON response does not parse
 */
async function performRequest<T>(req: HttpRequest, url: string): Promise<T> {
  const controller = new AbortController();
  const timeoutId = setTimeout(
    () => controller.abort(),
    req.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS,
  );

  try {
    const response = await fetch(url, {
      method: req.method,
      headers: { Accept: DEFAULT_ACCEPT_HEADER, ...req.headers },
      signal: controller.signal,
    });

    if (!response.ok) {
      throw new HttpError({
        status: response.status,
        statusText: response.statusText,
        url,
        bodySnippet: await readErrorSnippet(response),
        headers: response.headers,
      });
    }

    const text = await response.text();
    if (!isJsonContentType(response.headers.get("content-type"))) {
      return text as T;
    }

    try {
      return JSON.parse(text) as T;
    } catch (parseError) {
      throw new Error(
        `Invalid JSON from ${url}: ${
          parseError instanceof Error ? parseError.message : String(parseError)
        }`,
      );
    }
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Perform a request with timeout and retries
 *
 * @returns Parsed JSON, or the body text for non-JSON responses
 * @throws {HttpError} On a non-2xx status once retries are exhausted
 * @throws {Error} On network errors, timeouts or unparseable JSON
 */
export async function httpRequest<T>(req: HttpRequest): Promise<T> {
  const url = buildUrl(req.url, req.query);
  const policy = resolveRetryPolicy(req);

  for (let attempt = 1; ; attempt++) {
    try {
      return await performRequest<T>(req, url);
    } catch (error) {
      const delayMs = retryDelayMs(error, req, attempt, policy);
      if (delayMs === null) {
        throw error;
      }

      logger.debug("Retrying HTTP request", {
        method: req.method,
        url,
        attempt,
        maxAttempts: policy.maxAttempts,
        delayMs,
        reason:
          error instanceof HttpError
            ? `status ${error.status}`
            : error instanceof Error
              ? error.name
              : String(error),
      });
      await sleep(delayMs);
    }
  }
}
