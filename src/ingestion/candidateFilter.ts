/**
 * Candidate validity filter
 *
 * Pure checks applied to every raw candidate before enrichment and
 * persistence. Rejected candidates are dropped silently (debug log at the
 * call site); they never count towards jobs_found.
 */

import type {
  CandidatePosting,
  CandidateValidationResult,
} from "@/types";
import {
  ALLOWED_LINK_PROTOCOLS,
  BOILERPLATE_TITLES,
  UI_NOISE_TITLE_MAX_LENGTH,
  UI_NOISE_WORDS,
} from "@/constants";
import { isCategory, isRecord, optionalString } from "@/utils";

/**
 * Canonical form of a posting link: trimmed, absolute http(s), no fragment
 *
 * Serialization follows WHATWG URL rules, so host case and an empty path
 * are normalized as well ("https://Example.com" -> "https://example.com/").
 *
 * @returns null when the link is not an absolute http(s) URL
 */
export function canonicalizeLink(raw: string): string | null {
  let url: URL;
  try {
    url = new URL(raw.trim());
  } catch {
    return null;
  }

  if (!ALLOWED_LINK_PROTOCOLS.includes(url.protocol)) {
    return null;
  }

  url.hash = "";
  return url.toString();
}

/**
 * Normalize the author-asserted posting date to ISO 8601
 *
 * Missing or unparseable values default to `now`.
 */
export function parsePostingDate(
  value: CandidatePosting["postingDate"],
  now: Date,
): string {
  if (value === null || value === undefined) {
    return now.toISOString();
  }

  const date =
    value instanceof Date
      ? value
      : typeof value === "number"
        ? new Date(value)
        : new Date(value.trim());

  return Number.isNaN(date.getTime()) ? now.toISOString() : date.toISOString();
}

export function isBoilerplateTitle(title: string): boolean {
  return BOILERPLATE_TITLES.includes(title.trim().toLowerCase());
}

/**
 * Short titles mentioning a UI word ("Share", "Login to apply") are page
 * chrome, not postings
 */
export function isUiNoiseTitle(title: string): boolean {
  if (title.length >= UI_NOISE_TITLE_MAX_LENGTH) {
    return false;
  }
  const lower = title.toLowerCase();
  return UI_NOISE_WORDS.some((word) => lower.includes(word));
}

/**
 * Trimmed text, or null when absent, blank or not a string
 */
function optionalText(value: unknown): string | null {
  const text = optionalString(value)?.trim();
  return text ? text : null;
}

/**
 * Present but not a string
 */
function isMistyped(value: unknown): boolean {
  return value !== undefined && value !== null && typeof value !== "string";
}

function readPostingDate(value: unknown): CandidatePosting["postingDate"] {
  return typeof value === "string" || typeof value === "number" || value instanceof Date
    ? value
    : null;
}

/**
 * Validate one raw candidate and normalize its fields
 *
 * Input is checked at run time: collaborators build candidates from
 * untyped payloads. A non-record, or a non-string title or link, is
 * "malformed"; other mistyped fields are treated as absent, and so is a
 * category outside the enum (the enricher classifies it instead).
 */
export function validateCandidate(
  candidate: unknown,
  now: Date,
): CandidateValidationResult {
  if (!isRecord(candidate) || isMistyped(candidate.title) || isMistyped(candidate.link)) {
    return { ok: false, reason: "malformed" };
  }

  const title = optionalText(candidate.title);
  if (!title) {
    return { ok: false, reason: "missing_title" };
  }

  const rawLink = optionalText(candidate.link);
  if (!rawLink) {
    return { ok: false, reason: "missing_link" };
  }

  const link = canonicalizeLink(rawLink);
  if (!link) {
    return { ok: false, reason: "invalid_link" };
  }

  if (isBoilerplateTitle(title)) {
    return { ok: false, reason: "boilerplate_title" };
  }
  if (isUiNoiseTitle(title)) {
    return { ok: false, reason: "ui_noise_title" };
  }

  return {
    ok: true,
    candidate: {
      title,
      link,
      postingDate: parsePostingDate(readPostingDate(candidate.postingDate), now),
      description: optionalText(candidate.description),
      category: isCategory(candidate.category) ? candidate.category : null,
      requirementsSummary: optionalText(candidate.requirementsSummary),
      location: optionalText(candidate.location),
      salaryInfo: optionalText(candidate.salaryInfo),
      sourceJobId: optionalText(candidate.sourceJobId),
      sourceLabel: optionalText(candidate.sourceLabel),
    },
  };
}
