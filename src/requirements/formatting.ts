/**
 * Summary rendering
 *
 * Key Requirements:
 *
 * Education:
 * • Bachelor's degree in Electrical Engineering.
 *
 * Experience:
 * • ...
 */

import type { RequirementBucket } from "@/types";
import {
  BUCKET_LAYOUT,
  SUMMARY_CHAR_BUDGET,
  SUMMARY_HEADER,
} from "@/constants";

export type BucketedItems = Record<RequirementBucket, string[]>;

export function emptyBuckets(): BucketedItems {
  return { education: [], experience: [], technical: [], softSkills: [], other: [] };
}

/**
 * Trim, drop a dangling separator, capitalize the first letter and make
 * sure the item ends with terminal punctuation
 */
export function formatItem(item: string): string {
  let text = item.trim().replace(/[;,:]+$/, "").trim();
  if (!text) {
    return "";
  }
  text = text.charAt(0).toUpperCase() + text.slice(1);
  if (!/[.!?]$/.test(text)) {
    text += ".";
  }
  return text;
}

/**
 * Render the buckets in display order, each capped at its item limit and
 * all of them sharing the character budget
 *
 * @returns The summary, or null when nothing fits
 */
export function formatSummary(buckets: BucketedItems): string | null {
  let remaining = SUMMARY_CHAR_BUDGET;
  const sections: string[] = [];

  for (const { bucket, header, maxItems } of BUCKET_LAYOUT) {
    const lines: string[] = [];

    for (const item of buckets[bucket].slice(0, maxItems)) {
      const formatted = formatItem(item);
      if (!formatted || formatted.length > remaining) {
        continue;
      }
      remaining -= formatted.length;
      lines.push(`• ${formatted}`);
    }

    if (lines.length > 0) {
      sections.push(`${header}\n${lines.join("\n")}`);
    }
  }

  if (sections.length === 0) {
    return null;
  }

  return `${SUMMARY_HEADER}\n\n${sections.join("\n\n")}`;
}
