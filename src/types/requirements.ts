/**
 * Requirements extractor type definitions
 */

/**
 * Summary bucket, in display priority order
 */
export type RequirementBucket =
  | "education"
  | "experience"
  | "technical"
  | "softSkills"
  | "other";

/**
 * Candidate requirement item with its relevance score
 */
export type ScoredItem = {
  text: string;
  score: number;
  /** Number of vocabulary terms the item mentions (0 = irrelevant) */
  vocabularyHits: number;
  /** Position in extraction order, used as a stable tie-breaker */
  order: number;
};

/**
 * Where candidate items were taken from
 */
export type ItemSource = "bullets" | "requirement_sentences" | "sentences";

export type ExtractedItems = {
  source: ItemSource;
  items: string[];
};
