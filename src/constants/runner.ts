/**
 * Runner/orchestration constants
 *
 * Defaults for the crawl runner; each can be overridden from the
 * environment (see src/config).
 */

import type { RunMode } from "@/types";

export const DEFAULT_RUN_MODE: RunMode = "once";

export const DEFAULT_DB_PATH = "data/app.db";

/**
 * Owner seed file synced into the owners table at start-up
 */
export const DEFAULT_OWNERS_FILE = "data/owners.json";

/**
 * Owners crawled in parallel per cycle (1 = sequential)
 */
export const DEFAULT_CRAWL_CONCURRENCY = 1;

/**
 * Per-owner crawl timeout (5 minutes)
 */
export const DEFAULT_OWNER_TIMEOUT_MS = 300_000;

/**
 * Delay between cycles in forever mode (15 minutes)
 */
export const DEFAULT_CYCLE_INTERVAL_MS = 900_000;

/**
 * Stored crawl run error messages are truncated to this length
 */
export const MAX_ERROR_MESSAGE_LENGTH = 500;

/**
 * Default owner priority (1 = high, larger = later)
 */
export const DEFAULT_OWNER_PRIORITY = 2;
