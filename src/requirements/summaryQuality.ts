/**
 * Low-quality summary predicate
 *
 * A stored summary is refilled on re-ingestion when this returns true for
 * it and false for the freshly extracted one.
 */

import {
  EXTRACTION_FAILED_SENTINEL,
  LEGACY_NO_REQUIREMENTS_SENTINEL,
  LOW_QUALITY_SUMMARY_PREFIX,
  MIN_SUMMARY_LENGTH,
  NO_REQUIREMENTS_SENTINEL,
  UI_CHROME_MARKERS,
} from "@/constants";

const SENTINELS: readonly string[] = [
  NO_REQUIREMENTS_SENTINEL,
  EXTRACTION_FAILED_SENTINEL,
  LEGACY_NO_REQUIREMENTS_SENTINEL,
];

/**
 * True when the summary is:
 * - missing or blank
 * - shorter than MIN_SUMMARY_LENGTH after trimming
 * - one of the sentinels, or starts with "No specific requirements"
 * - polluted with page chrome ("sign in", "apply now", ...; any case)
 */
export function isLowQualitySummary(summary: string | null | undefined): boolean {
  if (summary === null || summary === undefined) {
    return true;
  }

  const trimmed = summary.trim();
  if (trimmed.length < MIN_SUMMARY_LENGTH) {
    return true;
  }
  if (SENTINELS.includes(trimmed) || trimmed.startsWith(LOW_QUALITY_SUMMARY_PREFIX)) {
    return true;
  }

  const lower = trimmed.toLowerCase();
  return UI_CHROME_MARKERS.some((marker) => lower.includes(marker));
}
