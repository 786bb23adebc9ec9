/**
 * Requirements extractor constants: headers, vocabularies, scoring and caps
 */

import type { RequirementBucket } from "@/types";

/**
 * Returned for empty or unusable input, or when every item is filtered out
 */
export const NO_REQUIREMENTS_SENTINEL = "No specific requirements listed.";

/**
 * Returned when extraction fails internally
 */
export const EXTRACTION_FAILED_SENTINEL = "Failed to summarize requirements.";

/**
 * Sentinel written by earlier versions; still recognized as low quality
 */
export const LEGACY_NO_REQUIREMENTS_SENTINEL =
  "No specific requirements extracted.";

export const SUMMARY_HEADER = "Key Requirements:";

/**
 * Header phrases that open a requirements section (regex sources, matched
 * case-insensitively against a whole line, optional trailing colon)
 */
export const REQUIREMENTS_HEADER_PATTERNS: readonly string[] = [
  "(?:basic|minimum|preferred|required|desired|key)\\s+qualifications?",
  "qualifications?(?:\\s+(?:and|&)\\s+(?:skills|experience))?",
  "(?:job|key|minimum|technical|position)\\s+requirements?",
  "requirements?",
  "(?:required|desired|technical|preferred)\\s+skills",
  "skills(?:\\s+(?:and|&)\\s+(?:experience|qualifications))?",
  "what you(?:'|’)?ll need",
  "what we(?:'|’)?re looking for",
  "what you(?:'|’)?ll bring",
  "who you are",
  "about you",
  "you have",
  "you should have",
  "the ideal candidate(?:\\s+(?:will\\s+have|has))?",
];

/**
 * Headings that end a requirements section
 */
export const OTHER_SECTION_HEADER_PATTERNS: readonly string[] = [
  "about (?:us|the company|the team|the role|the job)",
  "(?:benefits|perks)(?:\\s+(?:and|&)\\s+perks)?",
  "what we offer",
  "(?:key\\s+)?responsibilities",
  "what you(?:'|’)?ll do",
  "(?:compensation|salary)(?:\\s+(?:and|&)\\s+benefits)?",
  "how to apply",
  "equal (?:opportunity|employment)[\\w\\s]*",
  "location",
];

/**
 * A short line ending in a colon is treated as a section heading
 */
export const GENERIC_HEADING_MAX_LENGTH = 60;

/**
 * Lines that look like list items: •, -, *, ▪, ◦, ·, ‣, ●, or "1." / "1)"
 */
export const BULLET_LINE_PATTERN =
  /^(?:[•▪◦·‣●*-]|\d{1,2}[.)])\s+(.+)$/;

/**
 * Bullet items must be longer than this to count
 */
export const MIN_BULLET_LENGTH = 10;

/**
 * Sentences opening with requirement-like phrasing
 */
export const REQUIREMENT_SENTENCE_PATTERN =
  /^(?:must|should|need to|required to|ability to|experience (?:in|with))\b/i;

export const SENTENCE_MIN_LENGTH = 15;
export const SENTENCE_MAX_LENGTH = 200;

/**
 * No-header fallback: descriptions longer than this (and without bullets)
 * are cut to their leading fraction
 */
export const FALLBACK_FULL_TEXT_MAX_LENGTH = 2000;
export const FALLBACK_LEADING_FRACTION = 0.3;

export const IMPORTANT_KEYWORDS: readonly string[] = [
  "experience",
  "degree",
  "knowledge",
  "skill",
  "background",
  "proficiency",
  "proficient",
  "ability",
  "years",
  "understanding",
  "familiar",
  "bachelor",
  "master",
  "phd",
  "education",
  "required",
  "qualification",
  "programming",
  "language",
  "software",
  "hardware",
  "system",
  "design",
  "engineering",
  "computer science",
  "electrical",
  "team",
  "collaborate",
];

export const EDUCATION_KEYWORDS: readonly string[] = [
  "degree",
  "bachelor",
  "master",
  "phd",
  "bs",
  "ms",
  "bsc",
  "msc",
  "education",
  "university",
  "college",
  "graduate",
  "graduating",
  "enrolled",
  "gpa",
];

export const EXPERIENCE_KEYWORDS: readonly string[] = [
  "experience",
  "years",
  "work",
  "professional",
  "industry",
  "background",
  "internship",
];

export const TECHNICAL_KEYWORDS: readonly string[] = [
  "programming",
  "language",
  "code",
  "coding",
  "development",
  "software",
  "hardware",
  "tools",
  "platform",
  "framework",
  "library",
  "system",
  "technical",
  "python",
  "java",
  "c++",
  "verilog",
  "sql",
];

export const SOFT_SKILL_KEYWORDS: readonly string[] = [
  "communicat",
  "team",
  "collaborat",
  "interpersonal",
  "problem-solving",
  "problem solving",
  "analytical",
  "organized",
  "leadership",
  "detail",
  "time management",
  "self-motivated",
];

/**
 * "N years" / "N+ yrs" phrases
 */
export const YEARS_OF_EXPERIENCE_PATTERN = /\b\d+\+?\s*(?:years?|yrs?)\b/i;

export const SCORE_WEIGHTS = {
  BASE: 1,
  PER_IMPORTANT_KEYWORD: 2,
  HAS_DIGIT: 2,
  HAS_EDUCATION_TERM: 3,
  HAS_YEARS_PHRASE: 3,
  READABLE_LENGTH_BONUS: 1,
  OVERLONG_PENALTY: 1,
} as const;

export const READABLE_LENGTH = { MIN: 20, MAX: 200 } as const;

/**
 * Buckets in display order with their headers and item caps
 */
export const BUCKET_LAYOUT: ReadonlyArray<{
  bucket: RequirementBucket;
  header: string;
  maxItems: number;
}> = [
  { bucket: "education", header: "Education:", maxItems: 2 },
  { bucket: "experience", header: "Experience:", maxItems: 3 },
  { bucket: "technical", header: "Technical Skills:", maxItems: 4 },
  { bucket: "softSkills", header: "Soft Skills:", maxItems: 2 },
  { bucket: "other", header: "Other Requirements:", maxItems: 1 },
];

/**
 * Combined length budget for the rendered items
 */
export const SUMMARY_CHAR_BUDGET = 1000;

/**
 * Low-quality summary detection
 */
export const MIN_SUMMARY_LENGTH = 30;
export const LOW_QUALITY_SUMMARY_PREFIX = "No specific requirements";
export const UI_CHROME_MARKERS: readonly string[] = [
  "sign in",
  "submit resume",
  "apply now",
  "create alert",
  "cookie",
];
