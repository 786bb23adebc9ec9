/**
 * Lever postings API payload types
 *
 * Documentation: https://github.com/lever/postings-api
 *
 * Internal to the Lever source; NOT re-exported from the global types
 * barrel.
 */

export type LeverSalaryRange = {
  min?: number;
  max?: number;
  currency?: string;
  /** e.g. "per-year-salary", "per-hour-wage" */
  interval?: string;
};

/**
 * Lever posting from GET /v0/postings/{site}?mode=json
 */
export type LeverPosting = {
  id: string;
  /** Posting title */
  text: string;
  hostedUrl: string;
  applyUrl?: string;
  /** Milliseconds since epoch */
  createdAt?: number;
  categories?: {
    team?: string;
    location?: string;
    commitment?: string;
    department?: string;
  };
  description?: string;
  descriptionPlain?: string;
  /** Titled sections ("Requirements", "Benefits"); content is HTML */
  lists?: Array<{
    text: string;
    content: string;
  }>;
  additional?: string;
  additionalPlain?: string;
  salaryRange?: LeverSalaryRange;
};
