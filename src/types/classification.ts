/**
 * Classifier type definitions
 */

import type { Category } from "./postings";

/**
 * Labeled training example for the bag-of-words fallback model
 */
export type TrainingExample = {
  title: string;
  label: Category;
};

/**
 * Which precedence rule decided a classification
 */
export type ClassificationRule =
  | "title_hardware"
  | "title_software"
  | "description_hardware"
  | "description_software"
  | "model"
  | "default";

/**
 * Classification decision plus the evidence behind it (debug logging)
 */
export type ClassificationExplanation = {
  category: Category;
  rule: ClassificationRule;
  /** First title keyword that matched (title rules only) */
  matchedKeyword?: string;
  /** Distinct hardware keywords found in the description */
  hardwareHits: number;
  /** Distinct software keywords found in the description */
  softwareHits: number;
};

/**
 * Per-class log-probabilities returned by the naive Bayes model
 */
export type ModelScores = Record<Category, number>;
