/**
 * Lever payload mappers: raw postings to CandidatePosting
 */

import type { CandidatePosting } from "@/types";
import type { LeverPosting } from "@/types/clients/lever";
import { descriptionToText } from "@/utils/text/htmlToText";
import { isRecord, optionalNumber, optionalString } from "@/utils/payloadGuards";

export const LEVER_SOURCE_TYPE = "lever";

export function isLeverPosting(value: unknown): value is LeverPosting {
  return (
    isRecord(value) &&
    typeof value.id === "string" &&
    typeof value.text === "string" &&
    typeof value.hostedUrl === "string"
  );
}

/**
 * @throws {Error} If the payload is not an array
 */
export function readLeverPostings(payload: unknown): unknown[] {
  if (!Array.isArray(payload)) {
    throw new Error("Unexpected Lever response: expected an array of postings");
  }
  const postings: unknown[] = payload;
  return postings;
}

/**
 * Plain variant when present, otherwise the HTML variant converted to text
 *
 * Both are read through runtime checks: the type guard above only vouches
 * for id, text and hostedUrl.
 */
function pickText(plain: unknown, html: unknown): string {
  const plainText = optionalString(plain);
  if (plainText !== undefined) {
    return plainText.trim();
  }
  const htmlText = optionalString(html);
  return htmlText ? descriptionToText(htmlText) : "";
}

/**
 * Description text assembled from the posting's content fields
 *
 * List sections are emitted under their own title ("Requirements:") with
 * their items as bullet lines; entries without a string title and content
 * are skipped.
 */
export function buildLeverDescription(posting: LeverPosting): string | null {
  const parts: string[] = [];

  const intro = pickText(posting.descriptionPlain, posting.description);
  if (intro) {
    parts.push(intro);
  }

  const lists: unknown[] = Array.isArray(posting.lists) ? posting.lists : [];
  for (const list of lists) {
    if (!isRecord(list)) {
      continue;
    }
    const title = optionalString(list.text)?.trim();
    const content = optionalString(list.content);
    const items = content ? descriptionToText(content) : "";
    if (title && items) {
      parts.push(`${title}:\n${items}`);
    }
  }

  const additional = pickText(posting.additionalPlain, posting.additional);
  if (additional) {
    parts.push(additional);
  }

  return parts.length > 0 ? parts.join("\n\n") : null;
}

/**
 * "USD 25-35 per-hour-wage"; null without a numeric bound
 */
export function formatLeverSalary(range: unknown): string | null {
  if (!isRecord(range)) {
    return null;
  }
  const min = optionalNumber(range.min);
  const max = optionalNumber(range.max);
  if (min === undefined && max === undefined) {
    return null;
  }

  const amount =
    min !== undefined && max !== undefined ? `${min}-${max}` : String(min ?? max);

  return [optionalString(range.currency), amount, optionalString(range.interval)]
    .filter((part): part is string => part !== undefined && part.length > 0)
    .join(" ");
}

export function mapLeverPosting(posting: LeverPosting): CandidatePosting {
  return {
    title: posting.text,
    link: posting.hostedUrl,
    postingDate: typeof posting.createdAt === "number" ? posting.createdAt : null,
    description: buildLeverDescription(posting),
    location: isRecord(posting.categories)
      ? optionalString(posting.categories.location) ?? null
      : null,
    salaryInfo: formatLeverSalary(posting.salaryRange),
    sourceJobId: posting.id,
    sourceLabel: LEVER_SOURCE_TYPE,
  };
}
