/**
 * Source collaborator constants: politeness defaults
 */

import type { PolitenessOptions } from "@/types";

/**
 * Every request waits a random 1-3 s first; an HTTP 429 waits 30 s and is
 * retried exactly once.
 */
export const DEFAULT_POLITENESS: PolitenessOptions = {
  minDelayMs: 1_000,
  maxDelayMs: 3_000,
  rateLimitBackoffMs: 30_000,
};

/**
 * Status codes the HTTP client may retry on its own behalf when a source
 * request goes through politeFetch. 429 is excluded: politeFetch owns it.
 */
export const SOURCE_RETRYABLE_STATUS_CODES: readonly number[] = [
  408, 500, 502, 503, 504,
];

export const SOURCE_USER_AGENT = "internship-crawl-pipeline/0.1";
