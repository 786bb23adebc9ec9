/**
 * Candidate item extraction from a located section
 *
 * Bullet lines first; without bullets, sentences that open with
 * requirement phrasing; failing that, every readable-length sentence.
 */

import type { ExtractedItems } from "@/types";
import {
  BULLET_LINE_PATTERN,
  MIN_BULLET_LENGTH,
  REQUIREMENT_SENTENCE_PATTERN,
  SENTENCE_MAX_LENGTH,
  SENTENCE_MIN_LENGTH,
} from "@/constants";

function dedupe(items: string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const item of items) {
    const key = item.toLowerCase();
    if (!seen.has(key)) {
      seen.add(key);
      result.push(item);
    }
  }
  return result;
}

export function extractBulletItems(section: string): string[] {
  const items: string[] = [];
  for (const line of section.split("\n")) {
    const match = BULLET_LINE_PATTERN.exec(line.trim());
    if (!match) {
      continue;
    }
    const item = match[1].trim();
    if (item.length > MIN_BULLET_LENGTH) {
      items.push(item);
    }
  }
  return dedupe(items);
}

/**
 * Split on line breaks and on whitespace after terminal punctuation
 */
export function splitSentences(text: string): string[] {
  return text
    .split("\n")
    .flatMap((line) => line.split(/(?<=[.!?])\s+/))
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

export function extractItems(section: string): ExtractedItems {
  const bullets = extractBulletItems(section);
  if (bullets.length > 0) {
    return { source: "bullets", items: bullets };
  }

  const sentences = splitSentences(section);

  const requirementSentences = sentences.filter((s) =>
    REQUIREMENT_SENTENCE_PATTERN.test(s),
  );
  if (requirementSentences.length > 0) {
    return { source: "requirement_sentences", items: dedupe(requirementSentences) };
  }

  return {
    source: "sentences",
    items: dedupe(
      sentences.filter(
        (s) => s.length >= SENTENCE_MIN_LENGTH && s.length <= SENTENCE_MAX_LENGTH,
      ),
    ),
  };
}
