/**
 * Orchestration public surface
 */

export { crawlOwner, withOwnerTimeout, OwnerTimeoutError } from "./crawlOwner";
export type { CrawlOwnerDeps } from "./crawlOwner";
export { runCrawlCycle, crawlOwners } from "./crawlCycle";
export type { CrawlCycleDeps } from "./crawlCycle";
export { CrawlTimer } from "./crawlTimer";
export type { CrawlTimerOptions } from "./crawlTimer";
export {
  syncOwnersFromFile,
  syncOwners,
  validateOwnerSeed,
  OwnerSeedValidationError,
} from "./ownerSeed";
export type { OwnerSeedSyncResult } from "./ownerSeed";
