/**
 * Greenhouse payload mappers: raw jobs to CandidatePosting
 */

import type { CandidatePosting } from "@/types";
import type { GreenhouseJob } from "@/types/clients/greenhouse";
import { GREENHOUSE_LIMITS } from "@/constants";
import { descriptionToText } from "@/utils/text/htmlToText";
import { isRecord, optionalString } from "@/utils/payloadGuards";

export const GREENHOUSE_SOURCE_TYPE = "greenhouse";

/**
 * Minimal runtime check before a job is mapped
 */
export function isGreenhouseJob(value: unknown): value is GreenhouseJob {
  return (
    isRecord(value) &&
    typeof value.id === "number" &&
    typeof value.title === "string" &&
    typeof value.absolute_url === "string"
  );
}

/**
 * Jobs array of a board response
 *
 * @throws {Error} If the payload is not a { jobs: [...] } object
 */
export function readGreenhouseJobs(payload: unknown): unknown[] {
  if (!isRecord(payload) || !Array.isArray(payload.jobs)) {
    throw new Error("Unexpected Greenhouse response: missing jobs array");
  }
  const jobs: unknown[] = payload.jobs;
  return jobs;
}

/**
 * Content arrives HTML-escaped ("&lt;p&gt;..."); it is cut to the length
 * limit and converted to text lines
 */
function mapDescription(content: string | undefined): string | null {
  if (!content) {
    return null;
  }
  const bounded = content.slice(0, GREENHOUSE_LIMITS.MAX_DESCRIPTION_CHARS);
  const text = descriptionToText(bounded);
  return text || null;
}

export function mapGreenhouseJob(job: GreenhouseJob): CandidatePosting {
  const location = isRecord(job.location) ? optionalString(job.location.name) : undefined;

  return {
    title: job.title,
    link: job.absolute_url,
    postingDate: optionalString(job.first_published) ?? optionalString(job.updated_at) ?? null,
    description: mapDescription(optionalString(job.content)),
    location: location ?? null,
    sourceJobId: String(job.id),
    sourceLabel: GREENHOUSE_SOURCE_TYPE,
  };
}
