/**
 * Runner/orchestration type definitions
 */

import type { CrawlRunStatus } from "./db";
import type { LogLevel } from "./logger";

export type RunMode = "once" | "forever";

/**
 * Validated runner configuration (see src/config)
 */
export type RunnerConfig = {
  runMode: RunMode;
  logLevel: LogLevel;
  dbPath: string;
  ownersFile: string;
  /** Owners crawled in parallel within one cycle */
  crawlConcurrency: number;
  /** Upper bound on one owner's candidate fetch */
  ownerTimeoutMs: number;
  /** Delay between the end of one cycle and the start of the next */
  cycleIntervalMs: number;
};

/**
 * Outcome of one owner's crawl. Never thrown: failures are data.
 */
export type CrawlOwnerResult = {
  ownerId: number;
  ownerName: string;
  runId: number | null;
  status: Exclude<CrawlRunStatus, "started">;
  jobsFound: number;
  jobsNew: number;
  elapsedMs: number;
  error?: string;
};

/**
 * Totals for one scheduler pass over all due owners
 */
export type CrawlCycleResult = {
  due: number;
  completed: number;
  failed: number;
  jobsFound: number;
  jobsNew: number;
  results: CrawlOwnerResult[];
};
