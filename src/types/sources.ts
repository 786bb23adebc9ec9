/**
 * Source collaborator type definitions
 */

import type { HttpRequestFn } from "./clients/http";

/**
 * Politeness settings applied to every source request
 */
export type PolitenessOptions = {
  /** Lower bound of the random pre-request delay */
  minDelayMs: number;
  /** Upper bound of the random pre-request delay */
  maxDelayMs: number;
  /** Fixed wait after an HTTP 429 before the single retry */
  rateLimitBackoffMs: number;
};

/**
 * Outcome of a polite fetch. A request that stays rate limited after its
 * one retry is not an error: the caller yields no postings for it.
 */
export type PoliteFetchResult<T> =
  | { ok: true; data: T }
  | { ok: false; reason: "rate_limited"; attempts: number };

/**
 * Dependencies handed to every source factory at registry build time
 */
export type SourceFactoryDeps = {
  httpRequest?: HttpRequestFn;
  politeness?: Partial<PolitenessOptions>;
  /** Injected sleep (tests pass a no-op) */
  sleep?: (ms: number) => Promise<void>;
};
