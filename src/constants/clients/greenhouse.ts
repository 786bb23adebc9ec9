/**
 * Greenhouse source constants: base URL, HTTP tunables, limits
 *
 * Job Board API documentation: https://developers.greenhouse.io/job-board.html
 */

import { SOURCE_USER_AGENT } from "../sources";

export const GREENHOUSE_API_BASE_URL = "https://boards-api.greenhouse.io/v1";

export const GREENHOUSE_HTTP_TIMEOUT_MS = 15000;

/**
 * Attempts for transient failures (429 excluded, see politeFetch)
 */
export const GREENHOUSE_HTTP_MAX_ATTEMPTS = 2;

export const GREENHOUSE_HTTP_HEADERS: Record<string, string> = {
  Accept: "application/json",
  "User-Agent": SOURCE_USER_AGENT,
};

export const GREENHOUSE_LIMITS = {
  /** Applied after sorting by job id so the selection is deterministic */
  MAX_JOBS_PER_BOARD: 200,
  /** Descriptions are cut to this length before ingestion */
  MAX_DESCRIPTION_CHARS: 50000,
} as const;
