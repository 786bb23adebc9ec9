/**
 * Crawl cycle: one scheduler pass over every due owner
 *
 * Owners are crawled by a small pool of workers pulling from the due list
 * in order; with concurrency 1 the cycle is strictly sequential. Results
 * keep the due-list order.
 */

import type { CrawlCycleResult, CrawlOwnerResult, OwnerRow } from "@/types";
import { dueOwners } from "@/scheduler";
import * as logger from "@/logger";
import { crawlOwner, type CrawlOwnerDeps } from "./crawlOwner";

export type CrawlCycleDeps = CrawlOwnerDeps & {
  /** Owners crawled at the same time (>= 1) */
  concurrency: number;
};

/**
 * Crawl the given owners with at most `concurrency` in flight
 */
export async function crawlOwners(
  owners: readonly OwnerRow[],
  deps: CrawlCycleDeps,
): Promise<CrawlOwnerResult[]> {
  const results: CrawlOwnerResult[] = new Array(owners.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < owners.length) {
      const index = next++;
      results[index] = await crawlOwner(owners[index], deps);
    }
  };

  const workerCount = Math.max(1, Math.min(deps.concurrency, owners.length));
  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  return results;
}

export async function runCrawlCycle(
  deps: CrawlCycleDeps,
  now: Date = new Date(),
): Promise<CrawlCycleResult> {
  const owners = dueOwners(now);

  if (owners.length === 0) {
    logger.info("Crawl cycle: no owners due");
    return { due: 0, completed: 0, failed: 0, jobsFound: 0, jobsNew: 0, results: [] };
  }

  logger.info("Crawl cycle starting", {
    due: owners.length,
    concurrency: deps.concurrency,
  });

  const results = await crawlOwners(owners, deps);

  const summary: CrawlCycleResult = {
    due: owners.length,
    completed: results.filter((r) => r.status === "completed").length,
    failed: results.filter((r) => r.status === "failed").length,
    jobsFound: results.reduce((sum, r) => sum + r.jobsFound, 0),
    jobsNew: results.reduce((sum, r) => sum + r.jobsNew, 0),
    results,
  };

  logger.info("Crawl cycle finished", {
    due: summary.due,
    completed: summary.completed,
    failed: summary.failed,
    jobsFound: summary.jobsFound,
    jobsNew: summary.jobsNew,
  });

  return summary;
}
