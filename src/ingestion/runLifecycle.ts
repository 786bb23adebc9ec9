/**
 * Crawl run lifecycle: one run per owner crawl attempt
 *
 * started -> completed | failed, exactly once. The run is created before
 * any fetch so an attempt that dies early still leaves a record.
 */

import type {
  CrawlRunCounts,
  CrawlRunHandle,
  CrawlRunStatus,
  IngestionOwner,
} from "@/types";
import { MAX_ERROR_MESSAGE_LENGTH } from "@/constants";
import { createCrawlRun, finishCrawlRun } from "@/db";

/**
 * Thrown when finishing a run that is unknown or already terminal
 */
export class CrawlRunStateError extends Error {
  constructor(
    public readonly runId: number,
    message: string,
  ) {
    super(`Crawl run ${runId}: ${message}`);
    this.name = "CrawlRunStateError";
  }
}

function truncateErrorMessage(message: string): string {
  return message.length > MAX_ERROR_MESSAGE_LENGTH
    ? message.substring(0, MAX_ERROR_MESSAGE_LENGTH) + "..."
    : message;
}

/**
 * Open a run in status "started"
 */
export function startRun(owner: IngestionOwner, now: Date = new Date()): CrawlRunHandle {
  const startedAt = now.toISOString();
  return {
    runId: createCrawlRun(owner.id, startedAt),
    ownerId: owner.id,
    startedAt,
  };
}

/**
 * Move a started run to its terminal status
 *
 * @param error - Stored (truncated) as error_message on failed runs
 * @throws {CrawlRunStateError} If the run was already finished
 */
export function finishRun(
  handle: CrawlRunHandle,
  status: Exclude<CrawlRunStatus, "started">,
  counts: CrawlRunCounts,
  error?: string,
): void {
  const finished = finishCrawlRun(handle.runId, {
    status,
    finished_at: new Date().toISOString(),
    jobs_found: counts.jobsFound,
    jobs_new: counts.jobsNew,
    error_message: error !== undefined ? truncateErrorMessage(error) : null,
  });

  if (!finished) {
    throw new CrawlRunStateError(
      handle.runId,
      `cannot transition to "${status}": run is not in status "started"`,
    );
  }
}

/**
 * Execute a crawl within a run lifecycle
 *
 * Guarantees the run is finalized:
 * - fn resolves: completed with the counters it returned
 * - fn throws: failed with the error message and zero counters, then the
 *   error is rethrown
 */
export async function withCrawlRun<T extends CrawlRunCounts>(
  owner: IngestionOwner,
  fn: (handle: CrawlRunHandle) => Promise<T>,
): Promise<T> {
  const handle = startRun(owner);

  let result: T;
  try {
    result = await fn(handle);
  } catch (err) {
    finishRun(
      handle,
      "failed",
      { jobsFound: 0, jobsNew: 0 },
      err instanceof Error ? err.message : String(err),
    );
    throw err;
  }

  finishRun(handle, "completed", {
    jobsFound: result.jobsFound,
    jobsNew: result.jobsNew,
  });
  return result;
}
