/**
 * Lever source collaborator
 *
 * GET /v0/postings/{site}?mode=json returns every published posting,
 * content included, in one response.
 */

import type {
  CandidatePosting,
  OwnerRow,
  SourceFactoryDeps,
} from "@/types";
import type { SourceCollaborator } from "@/interfaces";
import {
  LEVER_API_BASE_URL,
  LEVER_HTTP_HEADERS,
  LEVER_HTTP_MAX_ATTEMPTS,
  LEVER_HTTP_TIMEOUT_MS,
  LEVER_LIMITS,
} from "@/constants";
import * as logger from "@/logger";
import { createPoliteFetcher, type PoliteFetcher } from "../politeFetch";
import { resolveBoardToken } from "../payload";
import {
  LEVER_SOURCE_TYPE,
  isLeverPosting,
  mapLeverPosting,
  readLeverPostings,
} from "./mappers";

export class LeverSource implements SourceCollaborator {
  readonly sourceType = LEVER_SOURCE_TYPE;
  private readonly fetch: PoliteFetcher;

  constructor(deps: SourceFactoryDeps = {}) {
    this.fetch = createPoliteFetcher(deps);
  }

  async fetchCandidates(owner: OwnerRow): Promise<CandidatePosting[]> {
    const site = resolveBoardToken(owner);
    if (!site) {
      throw new Error(`Lever owner "${owner.name}" has no site name`);
    }

    const result = await this.fetch<unknown>({
      method: "GET",
      url: `${LEVER_API_BASE_URL}/postings/${encodeURIComponent(site)}`,
      query: { mode: "json" },
      headers: LEVER_HTTP_HEADERS,
      timeoutMs: LEVER_HTTP_TIMEOUT_MS,
      retry: { maxAttempts: LEVER_HTTP_MAX_ATTEMPTS },
    });

    if (!result.ok) {
      return [];
    }

    const postings = readLeverPostings(result.data).filter(isLeverPosting);
    const candidates = postings
      .slice(0, LEVER_LIMITS.MAX_POSTINGS_PER_SITE)
      .map(mapLeverPosting);

    logger.debug("Lever postings fetched and mapped", {
      site,
      totalPostingsFromApi: postings.length,
      candidates: candidates.length,
    });

    return candidates;
  }
}

export function createLeverSource(deps: SourceFactoryDeps = {}): LeverSource {
  return new LeverSource(deps);
}
