/**
 * Requirements section location
 *
 * Works line by line. A line that is exactly a requirements header (with
 * an optional trailing colon and inline content) opens a section; the
 * section runs until the next heading-like line. Every matching section is
 * kept, in order.
 */

import {
  BULLET_LINE_PATTERN,
  FALLBACK_FULL_TEXT_MAX_LENGTH,
  FALLBACK_LEADING_FRACTION,
  GENERIC_HEADING_MAX_LENGTH,
  OTHER_SECTION_HEADER_PATTERNS,
  REQUIREMENTS_HEADER_PATTERNS,
} from "@/constants";

export type LocatedSection = {
  text: string;
  /** false when the fallback (whole text or its leading part) was used */
  headerFound: boolean;
};

const REQUIREMENTS_HEADER = new RegExp(
  `^(?:${REQUIREMENTS_HEADER_PATTERNS.join("|")})\\s*(?::\\s*(.*))?$`,
  "i",
);

const OTHER_SECTION_HEADER = new RegExp(
  `^(?:${OTHER_SECTION_HEADER_PATTERNS.join("|")})\\s*:?$`,
  "i",
);

/**
 * Drop markdown emphasis around headings ("## Skills", "**Requirements:**")
 */
function stripHeadingDecoration(line: string): string {
  return line
    .replace(/^(?:#+|\*\*|__)\s*/, "")
    .replace(/\s*(?:\*\*|__)$/, "")
    .trim();
}

/**
 * @returns null when the line is not a requirements header, otherwise the
 *   inline content after the colon ("" when there is none)
 */
export function matchRequirementsHeader(line: string): string | null {
  const match = REQUIREMENTS_HEADER.exec(stripHeadingDecoration(line));
  if (!match) {
    return null;
  }
  return (match[1] ?? "").trim();
}

export function isBulletLine(line: string): boolean {
  return BULLET_LINE_PATTERN.test(line.trim());
}

/**
 * Heading that ends a requirements section: a known non-requirements
 * heading, or any short non-bullet line ending with a colon
 */
export function isSectionBreak(line: string): boolean {
  if (isBulletLine(line)) {
    return false;
  }
  const cleaned = stripHeadingDecoration(line);
  if (OTHER_SECTION_HEADER.test(cleaned)) {
    return true;
  }
  return cleaned.length <= GENERIC_HEADING_MAX_LENGTH && cleaned.endsWith(":");
}

/**
 * No header: the whole text when it has bullets or is short enough,
 * otherwise its leading part
 */
function fallbackSection(text: string): string {
  const hasBullets = text.split("\n").some(isBulletLine);
  if (hasBullets || text.length <= FALLBACK_FULL_TEXT_MAX_LENGTH) {
    return text;
  }
  return text.slice(0, Math.ceil(text.length * FALLBACK_LEADING_FRACTION));
}

export function locateRequirementsSection(text: string): LocatedSection {
  const captured: string[] = [];
  let inSection = false;

  for (const rawLine of text.split("\n")) {
    const line = rawLine.trim();
    if (!line) {
      continue;
    }

    const inlineContent = matchRequirementsHeader(line);
    if (inlineContent !== null) {
      inSection = true;
      if (inlineContent) {
        captured.push(inlineContent);
      }
      continue;
    }

    if (!inSection) {
      continue;
    }
    if (isSectionBreak(line)) {
      inSection = false;
      continue;
    }
    captured.push(line);
  }

  if (captured.length > 0) {
    return { text: captured.join("\n"), headerFound: true };
  }

  return { text: fallbackSection(text), headerFound: false };
}
