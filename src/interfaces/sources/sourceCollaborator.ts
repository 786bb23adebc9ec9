/**
 * SourceCollaborator interface: one crawl target type (job board API,
 * career page) that yields raw candidate postings for an owner
 */

import type { CandidatePosting, OwnerRow } from "@/types";

export interface SourceCollaborator {
  /**
   * Registry tag this collaborator is registered under (e.g. "greenhouse")
   */
  readonly sourceType: string;

  /**
   * Fetch and parse the owner's current postings
   *
   * Rejects only when the whole fetch stage fails; the caller records that
   * as a failed crawl run. A rate-limited request that stays limited after
   * its retry yields no candidates instead of rejecting.
   */
  fetchCandidates(owner: OwnerRow): Promise<CandidatePosting[]>;
}
