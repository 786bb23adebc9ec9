/**
 * Greenhouse Job Board API payload types
 *
 * Documentation: https://developers.greenhouse.io/job-board.html
 *
 * These shapes are internal to the Greenhouse source and are NOT re-exported
 * from the global types barrel. They are mapped to CandidatePosting before
 * ingestion.
 */

export type GreenhouseLocation = {
  name?: string;
};

/**
 * Greenhouse job from GET /v1/boards/{token}/jobs?content=true
 *
 * Only the fields the mapper reads are typed.
 */
export type GreenhouseJob = {
  id: number;
  title: string;
  absolute_url: string;
  /** ISO 8601 */
  updated_at?: string;
  /** ISO 8601; missing on older boards */
  first_published?: string;
  location?: GreenhouseLocation;
  /** HTML-escaped description (only present with content=true) */
  content?: string;
};
