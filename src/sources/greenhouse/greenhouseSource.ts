/**
 * Greenhouse source collaborator
 *
 * One request per board: GET /v1/boards/{token}/jobs?content=true returns
 * every open job with its description. Jobs are sorted by id and capped
 * so the selection is deterministic.
 */

import type {
  CandidatePosting,
  OwnerRow,
  SourceFactoryDeps,
} from "@/types";
import type { SourceCollaborator } from "@/interfaces";
import {
  GREENHOUSE_API_BASE_URL,
  GREENHOUSE_HTTP_HEADERS,
  GREENHOUSE_HTTP_MAX_ATTEMPTS,
  GREENHOUSE_HTTP_TIMEOUT_MS,
  GREENHOUSE_LIMITS,
} from "@/constants";
import * as logger from "@/logger";
import { createPoliteFetcher, type PoliteFetcher } from "../politeFetch";
import { resolveBoardToken } from "../payload";
import {
  GREENHOUSE_SOURCE_TYPE,
  isGreenhouseJob,
  mapGreenhouseJob,
  readGreenhouseJobs,
} from "./mappers";

export class GreenhouseSource implements SourceCollaborator {
  readonly sourceType = GREENHOUSE_SOURCE_TYPE;
  private readonly fetch: PoliteFetcher;

  constructor(deps: SourceFactoryDeps = {}) {
    this.fetch = createPoliteFetcher(deps);
  }

  /**
   * @throws {Error} If the owner has no board token or the payload is malformed
   */
  async fetchCandidates(owner: OwnerRow): Promise<CandidatePosting[]> {
    const boardToken = resolveBoardToken(owner);
    if (!boardToken) {
      throw new Error(`Greenhouse owner "${owner.name}" has no board token`);
    }

    const result = await this.fetch<unknown>({
      method: "GET",
      url: `${GREENHOUSE_API_BASE_URL}/boards/${encodeURIComponent(boardToken)}/jobs`,
      query: { content: "true" },
      headers: GREENHOUSE_HTTP_HEADERS,
      timeoutMs: GREENHOUSE_HTTP_TIMEOUT_MS,
      retry: { maxAttempts: GREENHOUSE_HTTP_MAX_ATTEMPTS },
    });

    if (!result.ok) {
      return [];
    }

    const jobs = readGreenhouseJobs(result.data).filter(isGreenhouseJob);
    const capped = [...jobs]
      .sort((a, b) => a.id - b.id)
      .slice(0, GREENHOUSE_LIMITS.MAX_JOBS_PER_BOARD);

    const candidates = capped.map(mapGreenhouseJob);

    logger.debug("Greenhouse jobs fetched and mapped", {
      boardToken,
      totalJobsFromApi: jobs.length,
      candidates: candidates.length,
    });

    return candidates;
  }
}

export function createGreenhouseSource(deps: SourceFactoryDeps = {}): GreenhouseSource {
  return new GreenhouseSource(deps);
}
