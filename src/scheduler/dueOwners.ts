/**
 * Due-for-crawl scheduler
 *
 * An active owner is due when it has never been crawled, or when at least
 * cadence_minutes have passed since last_crawled_at. Owners whose cadence
 * elapsed come first, never-crawled owners after them; both groups keep
 * their input order, and the combined list is then stably sorted by
 * ascending priority.
 */

import type { OwnerRow } from "@/types";
import { listActiveOwners } from "@/db";

const MS_PER_MINUTE = 60_000;

export type SchedulableOwner = Pick<
  OwnerRow,
  "last_crawled_at" | "cadence_minutes" | "priority"
>;

/**
 * Milliseconds since the last crawl, or null when never crawled
 *
 * An unparseable timestamp is treated as never crawled.
 */
function elapsedSinceCrawl(owner: SchedulableOwner, now: Date): number | null {
  if (owner.last_crawled_at === null) {
    return null;
  }
  const last = Date.parse(owner.last_crawled_at);
  if (Number.isNaN(last)) {
    return null;
  }
  return now.getTime() - last;
}

export function isOwnerDue(owner: SchedulableOwner, now: Date): boolean {
  const elapsed = elapsedSinceCrawl(owner, now);
  return elapsed === null || elapsed >= owner.cadence_minutes * MS_PER_MINUTE;
}

/**
 * Pure selection over an already-filtered list of active owners
 */
export function selectDueOwners<T extends SchedulableOwner>(
  owners: readonly T[],
  now: Date,
): T[] {
  const cadenceDue: T[] = [];
  const neverCrawled: T[] = [];

  for (const owner of owners) {
    const elapsed = elapsedSinceCrawl(owner, now);
    if (elapsed === null) {
      neverCrawled.push(owner);
    } else if (elapsed >= owner.cadence_minutes * MS_PER_MINUTE) {
      cadenceDue.push(owner);
    }
  }

  // Array.prototype.sort is stable
  return [...cadenceDue, ...neverCrawled].sort((a, b) => a.priority - b.priority);
}

/**
 * Active owners due at `now`, in crawl order (read-only)
 */
export function dueOwners(now: Date = new Date()): OwnerRow[] {
  return selectDueOwners(listActiveOwners(), now);
}
