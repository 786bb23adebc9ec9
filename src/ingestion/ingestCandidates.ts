/**
 * Candidate batch ingestion: one owner's crawl output into postings
 *
 * The whole batch runs inside one SQLite transaction. Each candidate is
 * written inside a nested transaction (a savepoint in better-sqlite3), so
 * a failing candidate rolls back alone and the batch carries on.
 *
 * Per candidate, in order:
 * 1. validity filter (dropped candidates are not counted as found)
 * 2. enrichment of a missing category / requirements summary
 * 3. identity lookup by (owner, canonical link)
 *    - found: not new; refresh a low-quality summary, backfill a missing
 *      description; posting_date, discovery_date and category stay as-is
 *    - not found: insert with discovery_date = now
 * 4. a UNIQUE violation on insert means "already exists"
 *
 * New postings are handed to the notifier after commit.
 */

import type {
  CandidatePersistResult,
  IngestCandidatesInput,
  IngestCandidatesResult,
  IngestionOwner,
  Logger,
  PostingRow,
  ValidCandidate,
} from "@/types";
import type { PostingNotifier } from "@/interfaces";
import {
  getDb,
  getPostingById,
  getPostingByOwnerAndLink,
  insertPosting,
  refreshPostingEnrichment,
} from "@/db";
import { isLowQualitySummary } from "@/requirements";
import { isRecord, isUniqueConstraintError, optionalString } from "@/utils";
import * as defaultLogger from "@/logger";
import { validateCandidate } from "./candidateFilter";
import type { PostingEnricher } from "./postingEnricher";

export type IngestCandidatesDeps = {
  enricher: PostingEnricher;
  notifier?: PostingNotifier;
  logger?: Logger;
};

/**
 * Title for log lines; candidates are untrusted until validated
 */
function candidateTitle(raw: unknown): string | null {
  return isRecord(raw) ? optionalString(raw.title) ?? null : null;
}

/**
 * Summary/description patch for a posting seen again
 */
function buildRefreshPatch(
  existing: PostingRow,
  candidate: ValidCandidate,
  freshSummary: string,
): { requirements_summary?: string; description?: string } {
  const patch: { requirements_summary?: string; description?: string } = {};

  if (
    isLowQualitySummary(existing.requirements_summary) &&
    !isLowQualitySummary(freshSummary)
  ) {
    patch.requirements_summary = freshSummary;
  }
  if (existing.description === null && candidate.description !== null) {
    patch.description = candidate.description;
  }

  return patch;
}

/**
 * Write one validated candidate
 *
 * Runs inside its own savepoint; any error other than a UNIQUE violation
 * rolls the savepoint back and is reported as db_error.
 */
function persistCandidate(
  owner: IngestionOwner,
  candidate: ValidCandidate,
  enricher: PostingEnricher,
  discoveryDate: string,
  log: Logger,
): CandidatePersistResult {
  const db = getDb();

  const write = db.transaction((): CandidatePersistResult => {
    const existing = getPostingByOwnerAndLink(owner.id, candidate.link);

    const summary =
      candidate.requirementsSummary ?? enricher.summarize(candidate.description);

    if (existing) {
      const patch = buildRefreshPatch(existing, candidate, summary);
      const refreshed = Object.keys(patch).length > 0;
      if (refreshed) {
        refreshPostingEnrichment(existing.id, patch);
      }
      return { ok: true, outcome: "existing", postingId: existing.id, refreshed };
    }

    const category =
      candidate.category ?? enricher.categorize(candidate.title, candidate.description);

    const postingId = insertPosting(
      {
        owner_id: owner.id,
        title: candidate.title,
        link: candidate.link,
        posting_date: candidate.postingDate,
        category,
        description: candidate.description,
        requirements_summary: summary,
        source_label: candidate.sourceLabel,
        source_job_id: candidate.sourceJobId,
        location: candidate.location,
        salary_info: candidate.salaryInfo,
      },
      discoveryDate,
    );

    return { ok: true, outcome: "created", postingId };
  });

  try {
    return write();
  } catch (err) {
    if (isUniqueConstraintError(err)) {
      log.warn("Posting already exists (unique conflict)", {
        link: candidate.link,
      });
      return { ok: true, outcome: "conflict" };
    }

    log.error("Failed to persist posting", {
      link: candidate.link,
      error: err instanceof Error ? err.message : String(err),
    });
    return {
      ok: false,
      reason: "db_error",
      error: err instanceof Error ? err.message : String(err),
    };
  }
}

/**
 * Hand new postings to the notifier without waiting; failures are logged
 */
function emitNewPostings(
  postingIds: number[],
  ownerName: string,
  notifier: PostingNotifier,
  log: Logger,
): void {
  const emittedAt = new Date().toISOString();

  for (const postingId of postingIds) {
    const posting = getPostingById(postingId);
    if (!posting) {
      continue;
    }

    const onError = (err: unknown): void => {
      log.warn("Posting notification failed", {
        postingId,
        error: err instanceof Error ? err.message : String(err),
      });
    };

    try {
      void Promise.resolve(
        notifier.notifyNewPosting({ posting, ownerName, emittedAt }),
      ).catch(onError);
    } catch (err) {
      onError(err);
    }
  }
}

/**
 * Ingest one owner's candidates
 *
 * Never throws for per-candidate failures: an unexpected error counts the
 * candidate as rejected (before validation) or failed (after) and the
 * batch moves on. Errors that abort the batch transaction itself (e.g. the
 * database is gone) propagate to the caller, which records a failed run.
 */
export function ingestCandidates(
  input: IngestCandidatesInput,
  deps: IngestCandidatesDeps,
): IngestCandidatesResult {
  const { owner, candidates } = input;
  const now = input.now ?? new Date();
  const discoveryDate = now.toISOString();
  const log =
    deps.logger ?? defaultLogger.withContext({ ownerId: owner.id, owner: owner.name });

  const result: IngestCandidatesResult = {
    jobsFound: 0,
    jobsNew: 0,
    existing: 0,
    refreshed: 0,
    rejected: 0,
    failed: 0,
  };
  const createdIds: number[] = [];

  const runBatch = getDb().transaction(() => {
    for (const raw of candidates) {
      let validated = false;

      try {
        const validation = validateCandidate(raw, now);
        if (!validation.ok) {
          result.rejected++;
          log.debug("Candidate dropped", {
            reason: validation.reason,
            title: candidateTitle(raw),
          });
          continue;
        }

        validated = true;
        result.jobsFound++;

        const persisted = persistCandidate(
          owner,
          validation.candidate,
          deps.enricher,
          discoveryDate,
          log,
        );

        if (!persisted.ok) {
          result.failed++;
          continue;
        }

        switch (persisted.outcome) {
          case "created":
            result.jobsNew++;
            createdIds.push(persisted.postingId);
            break;
          case "existing":
            result.existing++;
            if (persisted.refreshed) {
              result.refreshed++;
            }
            break;
          case "conflict":
            result.existing++;
            break;
        }
      } catch (err) {
        if (validated) {
          result.failed++;
        } else {
          result.rejected++;
        }
        log.error("Candidate skipped after unexpected error", {
          title: candidateTitle(raw),
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }
  });

  runBatch();

  if (deps.notifier && createdIds.length > 0) {
    emitNewPostings(createdIds, owner.name, deps.notifier, log);
  }

  return result;
}
