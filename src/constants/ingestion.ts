/**
 * Ingestion constants: candidate validity filter
 */

/**
 * Titles that are never job postings (compared trimmed, case-insensitive)
 */
export const BOILERPLATE_TITLES: readonly string[] = [
  "share this role",
  "share this role.",
  "share this job",
  "view all jobs",
];

/**
 * UI words that, in a short title, indicate page chrome rather than a job
 */
export const UI_NOISE_WORDS: readonly string[] = [
  "share",
  "favorite",
  "login",
  "sign in",
  "apply",
  "submit",
];

/**
 * Titles containing a UI noise word are dropped only when shorter than this
 */
export const UI_NOISE_TITLE_MAX_LENGTH = 30;

/**
 * Allowed link protocols for canonical posting links
 */
export const ALLOWED_LINK_PROTOCOLS: readonly string[] = ["http:", "https:"];
