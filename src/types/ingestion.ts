/**
 * Ingestion type definitions
 *
 * Types for the per-owner candidate ingestion batch.
 */

import type { OwnerRow } from "./db";
import type { CandidatePosting } from "./postings";

/**
 * Owner fields the ingestion engine needs
 */
export type IngestionOwner = Pick<OwnerRow, "id" | "name">;

/**
 * Result of persisting one validated candidate
 */
export type CandidatePersistResult =
  | { ok: true; outcome: "created"; postingId: number }
  | { ok: true; outcome: "existing"; postingId: number; refreshed: boolean }
  | { ok: true; outcome: "conflict" }
  | { ok: false; reason: "db_error"; error: string };

/**
 * Counters for one owner's batch
 *
 * jobsFound counts every candidate that passed the validity filter, new or
 * existing, including candidates whose write failed.
 */
export type IngestCandidatesResult = {
  jobsFound: number;
  jobsNew: number;
  existing: number;
  refreshed: number;
  rejected: number;
  failed: number;
};

export type IngestCandidatesInput = {
  owner: IngestionOwner;
  candidates: CandidatePosting[];
  /** Override "now" for discovery_date and date defaults */
  now?: Date;
};

/**
 * Open crawl run, as returned by startRun
 */
export type CrawlRunHandle = {
  runId: number;
  ownerId: number;
  startedAt: string;
};

/**
 * Counters written when a run finishes
 */
export type CrawlRunCounts = {
  jobsFound: number;
  jobsNew: number;
};
