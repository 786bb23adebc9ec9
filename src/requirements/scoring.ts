/**
 * Item scoring and bucket assignment
 */

import type { RequirementBucket, ScoredItem } from "@/types";
import {
  EDUCATION_KEYWORDS,
  EXPERIENCE_KEYWORDS,
  IMPORTANT_KEYWORDS,
  READABLE_LENGTH,
  SCORE_WEIGHTS,
  SOFT_SKILL_KEYWORDS,
  TECHNICAL_KEYWORDS,
  YEARS_OF_EXPERIENCE_PATTERN,
} from "@/constants";
import {
  compileTerms,
  containsAnyTerm,
  countTerms,
  type CompiledTerm,
} from "@/utils/text/keywordMatching";

const importantTerms = compileTerms(IMPORTANT_KEYWORDS, "wordStart");

/**
 * Bucket vocabularies in first-match order; "other" has none
 */
const BUCKET_VOCABULARIES: ReadonlyArray<{
  bucket: Exclude<RequirementBucket, "other">;
  terms: CompiledTerm[];
}> = [
  { bucket: "education", terms: compileTerms(EDUCATION_KEYWORDS, "wordStart") },
  { bucket: "experience", terms: compileTerms(EXPERIENCE_KEYWORDS, "wordStart") },
  { bucket: "technical", terms: compileTerms(TECHNICAL_KEYWORDS, "wordStart") },
  { bucket: "softSkills", terms: compileTerms(SOFT_SKILL_KEYWORDS, "wordStart") },
];

const educationTerms = BUCKET_VOCABULARIES[0].terms;

const relevanceTerms = compileTerms(
  [
    ...new Set([
      ...IMPORTANT_KEYWORDS,
      ...EDUCATION_KEYWORDS,
      ...EXPERIENCE_KEYWORDS,
      ...TECHNICAL_KEYWORDS,
      ...SOFT_SKILL_KEYWORDS,
    ]),
  ],
  "wordStart",
);

/**
 * Additive relevance score:
 * base + 2 per important keyword + 2 for a digit + 3 for an education term
 * + 3 for an "N years" phrase + 1 inside the readable length range
 * (- 1 above it)
 */
export function scoreItem(text: string, order: number): ScoredItem {
  let score = SCORE_WEIGHTS.BASE;

  score += SCORE_WEIGHTS.PER_IMPORTANT_KEYWORD * countTerms(text, importantTerms);

  if (/\d/.test(text)) {
    score += SCORE_WEIGHTS.HAS_DIGIT;
  }
  if (containsAnyTerm(text, educationTerms)) {
    score += SCORE_WEIGHTS.HAS_EDUCATION_TERM;
  }
  if (YEARS_OF_EXPERIENCE_PATTERN.test(text)) {
    score += SCORE_WEIGHTS.HAS_YEARS_PHRASE;
  }

  if (text.length >= READABLE_LENGTH.MIN && text.length <= READABLE_LENGTH.MAX) {
    score += SCORE_WEIGHTS.READABLE_LENGTH_BONUS;
  } else if (text.length > READABLE_LENGTH.MAX) {
    score -= SCORE_WEIGHTS.OVERLONG_PENALTY;
  }

  return {
    text,
    score,
    vocabularyHits: countTerms(text, relevanceTerms),
    order,
  };
}

/**
 * First bucket whose vocabulary the item mentions, else "other"
 */
export function categorizeItem(text: string): RequirementBucket {
  for (const { bucket, terms } of BUCKET_VOCABULARIES) {
    if (containsAnyTerm(text, terms)) {
      return bucket;
    }
  }
  return "other";
}

/**
 * Highest score first; extraction order breaks ties
 */
export function rankItems(items: readonly ScoredItem[]): ScoredItem[] {
  return [...items].sort((a, b) => b.score - a.score || a.order - b.order);
}
