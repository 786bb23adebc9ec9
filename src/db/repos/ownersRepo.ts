/**
 * Owners repository
 *
 * Data access layer for owners table. The scheduler reads owners and the
 * crawl boundary writes last_crawled_at; nothing else mutates them at
 * runtime.
 */

import type { OwnerInput, OwnerRow } from "@/types";
import { DEFAULT_OWNER_PRIORITY } from "@/constants";
import { getDb } from "../connection";

const NOW_SQL = "strftime('%Y-%m-%dT%H:%M:%fZ', 'now')";

/**
 * Insert or update an owner keyed by its unique name
 *
 * last_crawled_at is never touched here, so re-seeding does not make every
 * owner due again.
 *
 * @returns The owner id (existing or newly inserted)
 */
export function upsertOwner(input: OwnerInput): number {
  const db = getDb();

  db.prepare(
    `
    INSERT INTO owners (
      name, kind, source_type, target_url, board_token,
      cadence_minutes, priority, is_active
    )
    VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    ON CONFLICT(name) DO UPDATE SET
      kind = excluded.kind,
      source_type = excluded.source_type,
      target_url = excluded.target_url,
      board_token = excluded.board_token,
      cadence_minutes = excluded.cadence_minutes,
      priority = excluded.priority,
      is_active = excluded.is_active,
      updated_at = ${NOW_SQL}
  `,
  ).run(
    input.name,
    input.kind,
    input.source_type,
    input.target_url,
    input.board_token ?? null,
    input.cadence_minutes,
    input.priority ?? DEFAULT_OWNER_PRIORITY,
    input.is_active === false ? 0 : 1,
  );

  const row = db
    .prepare<[string], { id: number }>("SELECT id FROM owners WHERE name = ?")
    .get(input.name);
  if (!row) {
    throw new Error(`Owner upsert did not persist: ${input.name}`);
  }
  return row.id;
}

export function getOwnerById(id: number): OwnerRow | undefined {
  return getDb()
    .prepare<[number], OwnerRow>("SELECT * FROM owners WHERE id = ?")
    .get(id);
}

export function getOwnerByName(name: string): OwnerRow | undefined {
  return getDb()
    .prepare<[string], OwnerRow>("SELECT * FROM owners WHERE name = ?")
    .get(name);
}

/**
 * Active owners in insertion order (the scheduler's "original order")
 */
export function listActiveOwners(): OwnerRow[] {
  return getDb()
    .prepare<[], OwnerRow>(
      "SELECT * FROM owners WHERE is_active = 1 ORDER BY id ASC",
    )
    .all();
}

export function listOwners(): OwnerRow[] {
  return getDb()
    .prepare<[], OwnerRow>("SELECT * FROM owners ORDER BY id ASC")
    .all();
}

/**
 * Record a successful crawl
 *
 * @param crawledAt - ISO timestamp of the crawl
 */
export function markOwnerCrawled(ownerId: number, crawledAt: string): void {
  const result = getDb()
    .prepare(
      `UPDATE owners SET last_crawled_at = ?, updated_at = ${NOW_SQL} WHERE id = ?`,
    )
    .run(crawledAt, ownerId);

  if (result.changes === 0) {
    throw new Error(`Cannot mark crawled: owner id ${ownerId} not found`);
  }
}

export function setOwnerActive(ownerId: number, active: boolean): void {
  getDb()
    .prepare(
      `UPDATE owners SET is_active = ?, updated_at = ${NOW_SQL} WHERE id = ?`,
    )
    .run(active ? 1 : 0, ownerId);
}
