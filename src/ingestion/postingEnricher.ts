/**
 * Posting enricher
 *
 * Wraps the classifier and the requirements summarizer behind one object
 * that is built once at start-up and handed to the ingestion engine. Both
 * operations are total: internal failures are logged and mapped to the
 * documented defaults.
 */

import type { Category, Logger } from "@/types";
import type { RequirementsSummarizer, TextClassifier } from "@/interfaces";
import { EXTRACTION_FAILED_SENTINEL } from "@/constants";
import * as defaultLogger from "@/logger";

export const DEFAULT_CATEGORY: Category = "software";

export type PostingEnricherDeps = {
  classifier: TextClassifier;
  summarizer: RequirementsSummarizer;
  logger?: Logger;
};

export class PostingEnricher {
  private readonly classifier: TextClassifier;
  private readonly summarizer: RequirementsSummarizer;
  private readonly logger: Logger;

  constructor(deps: PostingEnricherDeps) {
    this.classifier = deps.classifier;
    this.summarizer = deps.summarizer;
    this.logger = deps.logger ?? defaultLogger;
  }

  categorize(title: string, description: string | null): Category {
    try {
      return this.classifier.classify(title, description ?? "");
    } catch (err) {
      this.logger.warn("Classification failed, using default category", {
        title,
        category: DEFAULT_CATEGORY,
        error: err instanceof Error ? err.message : String(err),
      });
      return DEFAULT_CATEGORY;
    }
  }

  summarize(description: string | null): string {
    try {
      return this.summarizer.extract(description);
    } catch (err) {
      this.logger.warn("Requirements summary failed", {
        error: err instanceof Error ? err.message : String(err),
      });
      return EXTRACTION_FAILED_SENTINEL;
    }
  }
}
