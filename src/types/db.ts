/**
 * Database type definitions
 *
 * Row types mirror migrations/0001_init.sql column for column (snake_case).
 * SQLite has no boolean type: flags are stored as 0/1 integers.
 */

import type { Category } from "./postings";

export type OwnerKind = "company" | "source";

/**
 * Crawl owner (company career board or named job-board source)
 */
export type OwnerRow = {
  id: number;
  name: string;
  kind: OwnerKind;
  /** Registry tag of the collaborator that crawls this owner */
  source_type: string;
  target_url: string;
  board_token: string | null;
  cadence_minutes: number;
  last_crawled_at: string | null;
  /** Lower value = crawled first */
  priority: number;
  is_active: number;
  created_at: string;
  updated_at: string;
};

/**
 * Owner upsert input, keyed by name
 */
export type OwnerInput = {
  name: string;
  kind: OwnerKind;
  source_type: string;
  target_url: string;
  board_token?: string | null;
  cadence_minutes: number;
  priority?: number;
  is_active?: boolean;
};

/**
 * Stored posting
 */
export type PostingRow = {
  id: number;
  owner_id: number;
  title: string;
  link: string;
  posting_date: string;
  discovery_date: string;
  category: Category;
  description: string | null;
  requirements_summary: string | null;
  is_active: number;
  source_label: string | null;
  source_job_id: string | null;
  location: string | null;
  salary_info: string | null;
  created_at: string;
  updated_at: string;
};

/**
 * Posting insert input (discovery_date and is_active are set by the repo)
 */
export type PostingInsert = {
  owner_id: number;
  title: string;
  link: string;
  posting_date: string;
  category: Category;
  description: string | null;
  requirements_summary: string | null;
  source_label: string | null;
  source_job_id: string | null;
  location: string | null;
  salary_info: string | null;
};

/**
 * Explicit administrative update. The pipeline never calls this for
 * posting_date, discovery_date or category.
 */
export type PostingUpdate = Partial<{
  title: string;
  posting_date: string;
  discovery_date: string;
  category: Category;
  description: string | null;
  requirements_summary: string | null;
  is_active: boolean;
  location: string | null;
  salary_info: string | null;
}>;

export type CrawlRunStatus = "started" | "completed" | "failed";

/**
 * Crawl run log entry
 */
export type CrawlRunRow = {
  id: number;
  owner_id: number;
  status: CrawlRunStatus;
  started_at: string;
  finished_at: string | null;
  jobs_found: number;
  jobs_new: number;
  error_message: string | null;
};

/**
 * Terminal transition applied to a started run
 */
export type CrawlRunFinish = {
  status: Exclude<CrawlRunStatus, "started">;
  finished_at: string;
  jobs_found: number;
  jobs_new: number;
  error_message: string | null;
};
