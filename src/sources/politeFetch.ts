/**
 * Polite fetching for job-board sources
 *
 * Every request waits a random delay first. An HTTP 429 backs off for a
 * fixed period and is retried once; if the retry is rate limited too, the
 * request is given up and reported as { ok: false, reason: "rate_limited" }.
 * Any other failure propagates (after the HTTP client's own retries).
 */

import type {
  HttpRequest,
  HttpRequestFn,
  PoliteFetchResult,
  PolitenessOptions,
  SourceFactoryDeps,
} from "@/types";
import { DEFAULT_POLITENESS, SOURCE_RETRYABLE_STATUS_CODES } from "@/constants";
import { httpRequest as defaultHttpRequest, HttpError } from "@/clients/http";
import * as logger from "@/logger";

const RATE_LIMITED_STATUS = 429;

export type PoliteFetcher = <T>(req: HttpRequest) => Promise<PoliteFetchResult<T>>;

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Uniform random delay in [minDelayMs, maxDelayMs]
 */
export function randomDelayMs(options: PolitenessOptions): number {
  const span = Math.max(0, options.maxDelayMs - options.minDelayMs);
  return options.minDelayMs + Math.floor(Math.random() * (span + 1));
}

function isRateLimited(err: unknown): boolean {
  return err instanceof HttpError && err.status === RATE_LIMITED_STATUS;
}

export function createPoliteFetcher(deps: SourceFactoryDeps = {}): PoliteFetcher {
  const httpRequest: HttpRequestFn = deps.httpRequest ?? defaultHttpRequest;
  const sleep = deps.sleep ?? defaultSleep;
  const options: PolitenessOptions = { ...DEFAULT_POLITENESS, ...deps.politeness };

  /**
   * One delayed attempt; null when rate limited, other errors rethrown
   */
  async function attempt<T>(req: HttpRequest): Promise<{ data: T } | null> {
    await sleep(randomDelayMs(options));
    try {
      return { data: await httpRequest<T>(req) };
    } catch (err) {
      if (isRateLimited(err)) {
        return null;
      }
      throw err;
    }
  }

  return async <T>(req: HttpRequest): Promise<PoliteFetchResult<T>> => {
    const request: HttpRequest = {
      ...req,
      retry: {
        ...req.retry,
        retryableStatuses: req.retry?.retryableStatuses ?? SOURCE_RETRYABLE_STATUS_CODES,
      },
    };

    const first = await attempt<T>(request);
    if (first) {
      return { ok: true, data: first.data };
    }

    logger.warn("Rate limited, backing off before one retry", {
      url: req.url,
      backoffMs: options.rateLimitBackoffMs,
    });
    await sleep(options.rateLimitBackoffMs);

    const second = await attempt<T>(request);
    if (second) {
      return { ok: true, data: second.data };
    }

    logger.warn("Still rate limited after retry, giving up on request", {
      url: req.url,
    });
    return { ok: false, reason: "rate_limited", attempts: 2 };
  };
}
