/**
 * Crawl runs repository
 *
 * Data access layer for crawl_runs table. A run is created as "started"
 * and finished exactly once: the finishing UPDATE only matches rows that
 * are still started.
 */

import type { CrawlRunFinish, CrawlRunRow } from "@/types";
import { getDb } from "../connection";

/**
 * Create a new run in status "started"
 *
 * @returns The run id
 */
export function createCrawlRun(ownerId: number, startedAt: string): number {
  const result = getDb()
    .prepare(
      "INSERT INTO crawl_runs (owner_id, status, started_at) VALUES (?, 'started', ?)",
    )
    .run(ownerId, startedAt);

  return Number(result.lastInsertRowid);
}

/**
 * Move a started run to its terminal status
 *
 * @returns false when the run does not exist or is already finished
 */
export function finishCrawlRun(runId: number, finish: CrawlRunFinish): boolean {
  const result = getDb()
    .prepare(
      `
    UPDATE crawl_runs
    SET status = ?, finished_at = ?, jobs_found = ?, jobs_new = ?, error_message = ?
    WHERE id = ? AND status = 'started'
  `,
    )
    .run(
      finish.status,
      finish.finished_at,
      finish.jobs_found,
      finish.jobs_new,
      finish.error_message,
      runId,
    );

  return result.changes === 1;
}

export function getCrawlRunById(id: number): CrawlRunRow | undefined {
  return getDb()
    .prepare<[number], CrawlRunRow>("SELECT * FROM crawl_runs WHERE id = ?")
    .get(id);
}

/**
 * Runs for one owner, newest first
 */
export function listCrawlRunsByOwner(ownerId: number): CrawlRunRow[] {
  return getDb()
    .prepare<[number], CrawlRunRow>(
      "SELECT * FROM crawl_runs WHERE owner_id = ? ORDER BY id DESC",
    )
    .all(ownerId);
}

export function getLatestCrawlRun(ownerId: number): CrawlRunRow | undefined {
  return getDb()
    .prepare<[number], CrawlRunRow>(
      "SELECT * FROM crawl_runs WHERE owner_id = ? ORDER BY id DESC LIMIT 1",
    )
    .get(ownerId);
}
