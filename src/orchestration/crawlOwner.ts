/**
 * Per-owner crawl boundary
 *
 * run started -> collaborator fetch (under the owner timeout) -> ingest ->
 * run completed -> last_crawled_at advanced. Any failure on the way marks
 * the run failed and leaves last_crawled_at untouched, so the owner is due
 * again on the next cycle. Nothing is thrown past this function.
 */

import type { CrawlOwnerResult, OwnerRow } from "@/types";
import type { PostingNotifier } from "@/interfaces";
import { markOwnerCrawled } from "@/db";
import { ingestCandidates, withCrawlRun, type PostingEnricher } from "@/ingestion";
import type { SourceRegistry } from "@/sources";
import * as logger from "@/logger";

export class OwnerTimeoutError extends Error {
  constructor(
    public readonly ownerName: string,
    public readonly timeoutMs: number,
  ) {
    super(`Crawl of "${ownerName}" timed out after ${timeoutMs}ms`);
    this.name = "OwnerTimeoutError";
  }
}

export type CrawlOwnerDeps = {
  registry: SourceRegistry;
  enricher: PostingEnricher;
  notifier?: PostingNotifier;
  ownerTimeoutMs: number;
};

/**
 * Reject with OwnerTimeoutError when the work outlives the timeout
 *
 * The work itself is not cancelled; its late result is ignored.
 */
export async function withOwnerTimeout<T>(
  work: Promise<T>,
  owner: Pick<OwnerRow, "name">,
  timeoutMs: number,
): Promise<T> {
  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(
      () => reject(new OwnerTimeoutError(owner.name, timeoutMs)),
      timeoutMs,
    );
  });

  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timeoutId);
  }
}

export async function crawlOwner(
  owner: OwnerRow,
  deps: CrawlOwnerDeps,
): Promise<CrawlOwnerResult> {
  const log = logger.withContext({ ownerId: owner.id, owner: owner.name });
  const startedMs = Date.now();
  let runId: number | null = null;

  try {
    const counts = await withCrawlRun(owner, async (handle) => {
      runId = handle.runId;

      const collaborator = deps.registry.get(owner.source_type);
      const candidates = await withOwnerTimeout(
        collaborator.fetchCandidates(owner),
        owner,
        deps.ownerTimeoutMs,
      );

      return ingestCandidates(
        { owner, candidates },
        { enricher: deps.enricher, notifier: deps.notifier, logger: log },
      );
    });

    markOwnerCrawled(owner.id, new Date().toISOString());

    const elapsedMs = Date.now() - startedMs;
    log.info("Owner crawl completed", {
      runId,
      jobsFound: counts.jobsFound,
      jobsNew: counts.jobsNew,
      existing: counts.existing,
      refreshed: counts.refreshed,
      rejected: counts.rejected,
      failed: counts.failed,
      elapsedMs,
    });

    return {
      ownerId: owner.id,
      ownerName: owner.name,
      runId,
      status: "completed",
      jobsFound: counts.jobsFound,
      jobsNew: counts.jobsNew,
      elapsedMs,
    };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    const elapsedMs = Date.now() - startedMs;

    log.error("Owner crawl failed", {
      runId,
      error: message,
      errorName: err instanceof Error ? err.name : undefined,
      elapsedMs,
    });

    return {
      ownerId: owner.id,
      ownerName: owner.name,
      runId,
      status: "failed",
      jobsFound: 0,
      jobsNew: 0,
      elapsedMs,
      error: message,
    };
  }
}
