/**
 * Postings repository
 *
 * Data access layer for postings table. UNIQUE(owner_id, link) is the
 * deduplication point; insertPosting lets the constraint error propagate
 * so callers can treat it as "already exists".
 */

import type { PostingInsert, PostingRow, PostingUpdate } from "@/types";
import { getDb } from "../connection";

const NOW_SQL = "strftime('%Y-%m-%dT%H:%M:%fZ', 'now')";

const UPDATABLE_COLUMNS = [
  "title",
  "posting_date",
  "discovery_date",
  "category",
  "description",
  "requirements_summary",
  "is_active",
  "location",
  "salary_info",
] as const satisfies ReadonlyArray<keyof PostingUpdate>;

export function getPostingById(id: number): PostingRow | undefined {
  return getDb()
    .prepare<[number], PostingRow>("SELECT * FROM postings WHERE id = ?")
    .get(id);
}

/**
 * Look up a posting by its natural key
 */
export function getPostingByOwnerAndLink(
  ownerId: number,
  link: string,
): PostingRow | undefined {
  return getDb()
    .prepare<[number, string], PostingRow>(
      "SELECT * FROM postings WHERE owner_id = ? AND link = ?",
    )
    .get(ownerId, link);
}

/**
 * Insert a new posting (is_active defaults to 1)
 *
 * @param discoveryDate - ISO timestamp; set once, never updated by the pipeline
 * @returns The new posting id
 * @throws SQLite UNIQUE constraint error if (owner_id, link) already exists
 */
export function insertPosting(
  input: PostingInsert,
  discoveryDate: string,
): number {
  const result = getDb()
    .prepare(
      `
    INSERT INTO postings (
      owner_id, title, link, posting_date, discovery_date, category,
      description, requirements_summary, source_label, source_job_id,
      location, salary_info
    )
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  `,
    )
    .run(
      input.owner_id,
      input.title,
      input.link,
      input.posting_date,
      discoveryDate,
      input.category,
      input.description,
      input.requirements_summary,
      input.source_label,
      input.source_job_id,
      input.location,
      input.salary_info,
    );

  return Number(result.lastInsertRowid);
}

/**
 * Refresh derived fields on an existing posting during re-ingestion
 *
 * Only the fields present in the patch are written.
 */
export function refreshPostingEnrichment(
  id: number,
  patch: { requirements_summary?: string; description?: string },
): void {
  const fields: string[] = [];
  const values: string[] = [];

  if (patch.requirements_summary !== undefined) {
    fields.push("requirements_summary = ?");
    values.push(patch.requirements_summary);
  }
  if (patch.description !== undefined) {
    fields.push("description = ?");
    values.push(patch.description);
  }

  if (fields.length === 0) {
    return;
  }

  getDb()
    .prepare(
      `UPDATE postings SET ${fields.join(", ")}, updated_at = ${NOW_SQL} WHERE id = ?`,
    )
    .run(...values, id);
}

/**
 * Explicit administrative update
 *
 * The only way posting_date, discovery_date or category change after
 * creation.
 *
 * @returns true if the posting exists and was updated
 */
export function updatePostingFields(id: number, update: PostingUpdate): boolean {
  const fields: string[] = [];
  const values: Array<string | number | null> = [];

  for (const column of UPDATABLE_COLUMNS) {
    const value = update[column];
    if (value === undefined) {
      continue;
    }
    fields.push(`${column} = ?`);
    values.push(typeof value === "boolean" ? (value ? 1 : 0) : value);
  }

  if (fields.length === 0) {
    return getPostingById(id) !== undefined;
  }

  const result = getDb()
    .prepare(
      `UPDATE postings SET ${fields.join(", ")}, updated_at = ${NOW_SQL} WHERE id = ?`,
    )
    .run(...values, id);

  return result.changes > 0;
}

/**
 * Explicit administrative deletion (never called by the pipeline)
 */
export function deletePosting(id: number): boolean {
  const result = getDb().prepare("DELETE FROM postings WHERE id = ?").run(id);
  return result.changes > 0;
}

export function listPostingsByOwner(ownerId: number): PostingRow[] {
  return getDb()
    .prepare<[number], PostingRow>(
      "SELECT * FROM postings WHERE owner_id = ? ORDER BY id ASC",
    )
    .all(ownerId);
}

export function countPostingsByOwner(ownerId: number): number {
  const row = getDb()
    .prepare<[number], { count: number }>(
      "SELECT COUNT(*) AS count FROM postings WHERE owner_id = ?",
    )
    .get(ownerId);
  return row ? row.count : 0;
}
