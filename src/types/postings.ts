/**
 * Posting type definitions: canonical job records and raw candidates
 */

/**
 * Posting category label produced by the classifier
 */
export type Category = "software" | "hardware";

/**
 * Raw, unvalidated posting yielded by a source collaborator
 *
 * Only title and link are expected; everything else is optional and may
 * be missing or malformed. The ingestion engine validates and defaults.
 */
export type CandidatePosting = {
  title?: string | null;
  link?: string | null;
  /** Author-asserted posting date (ISO string, epoch ms or Date) */
  postingDate?: string | number | Date | null;
  description?: string | null;
  category?: Category | null;
  requirementsSummary?: string | null;
  location?: string | null;
  salaryInfo?: string | null;
  sourceJobId?: string | null;
  /** Which collaborator produced the candidate (e.g. "greenhouse") */
  sourceLabel?: string | null;
};

/**
 * Candidate that passed the validity filter, with link canonicalized
 */
export type ValidCandidate = {
  title: string;
  link: string;
  postingDate: string;
  description: string | null;
  category: Category | null;
  requirementsSummary: string | null;
  location: string | null;
  salaryInfo: string | null;
  sourceJobId: string | null;
  sourceLabel: string | null;
};

/**
 * Why a candidate was dropped by the validity filter
 */
export type CandidateRejectionReason =
  | "malformed"
  | "missing_title"
  | "missing_link"
  | "invalid_link"
  | "boilerplate_title"
  | "ui_noise_title";

export type CandidateValidationResult =
  | { ok: true; candidate: ValidCandidate }
  | { ok: false; reason: CandidateRejectionReason };
