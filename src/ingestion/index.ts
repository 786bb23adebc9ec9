/**
 * Ingestion module barrel exports
 */

export {
  startRun,
  finishRun,
  withCrawlRun,
  CrawlRunStateError,
} from "./runLifecycle";

export {
  validateCandidate,
  canonicalizeLink,
  parsePostingDate,
  isBoilerplateTitle,
  isUiNoiseTitle,
} from "./candidateFilter";

export { PostingEnricher, DEFAULT_CATEGORY } from "./postingEnricher";
export type { PostingEnricherDeps } from "./postingEnricher";

export { ingestCandidates } from "./ingestCandidates";
export type { IngestCandidatesDeps } from "./ingestCandidates";
