/**
 * Requirements extractor
 *
 * Turns a free-form posting description (plain text or HTML) into a short
 * categorized "Key Requirements" summary:
 * 1. Normalize to plain lines
 * 2. Locate the requirements section(s)
 * 3. Pull candidate items (bullets, then requirement sentences, then any
 *    readable sentence)
 * 4. Score, drop items with no vocabulary hits, rank
 * 5. Bucket and render within the per-bucket caps and the length budget
 *
 * Never throws: unusable input yields NO_REQUIREMENTS_SENTINEL and internal
 * failures yield EXTRACTION_FAILED_SENTINEL.
 */

import type { Logger } from "@/types";
import type { RequirementsSummarizer } from "@/interfaces";
import {
  EXTRACTION_FAILED_SENTINEL,
  NO_REQUIREMENTS_SENTINEL,
} from "@/constants";
import * as defaultLogger from "@/logger";
import { descriptionToText } from "@/utils/text/htmlToText";
import { locateRequirementsSection } from "./sectionLocator";
import { extractItems } from "./itemExtraction";
import { categorizeItem, rankItems, scoreItem } from "./scoring";
import { emptyBuckets, formatSummary } from "./formatting";

export type RequirementsExtractorOptions = {
  logger?: Logger;
};

export class RequirementsExtractor implements RequirementsSummarizer {
  private readonly logger: Logger;

  constructor(options: RequirementsExtractorOptions = {}) {
    this.logger = options.logger ?? defaultLogger;
  }

  extract(description: string | null | undefined): string {
    if (!description || !description.trim()) {
      return NO_REQUIREMENTS_SENTINEL;
    }

    try {
      return this.summarize(description);
    } catch (err) {
      this.logger.warn("Requirements extraction failed", {
        error: err instanceof Error ? err.message : String(err),
      });
      return EXTRACTION_FAILED_SENTINEL;
    }
  }

  private summarize(description: string): string {
    const text = descriptionToText(description);
    if (!text) {
      return NO_REQUIREMENTS_SENTINEL;
    }

    const section = locateRequirementsSection(text);
    const extracted = extractItems(section.text);

    const ranked = rankItems(
      extracted.items
        .map((item, index) => scoreItem(item, index))
        .filter((item) => item.vocabularyHits > 0),
    );

    this.logger.debug("Requirements items ranked", {
      headerFound: section.headerFound,
      source: extracted.source,
      extracted: extracted.items.length,
      relevant: ranked.length,
    });

    const buckets = emptyBuckets();
    for (const item of ranked) {
      buckets[categorizeItem(item.text)].push(item.text);
    }

    return formatSummary(buckets) ?? NO_REQUIREMENTS_SENTINEL;
  }
}
