/**
 * Owner seed sync
 *
 * Owners are declared in a JSON file (data/owners.json by default) and
 * upserted by name at start-up:
 *   {
 *     "owners": [
 *       { "name": "Acme Robotics", "kind": "company", "sourceType": "greenhouse",
 *         "targetUrl": "https://boards.greenhouse.io/acmerobotics", "cadenceHours": 6 },
 *       { "name": "Campus Board", "kind": "source", "sourceType": "lever",
 *         "targetUrl": "https://jobs.lever.co/campusboard", "cadenceMinutes": 30, "priority": 1 }
 *     ]
 *   }
 * Companies give their cadence in hours, sources in minutes; both are
 * stored as minutes. Crawl history (last_crawled_at) survives a re-sync.
 */

import * as fs from "fs";
import * as path from "path";
import type { OwnerInput, OwnerKind } from "@/types";
import { DEFAULT_OWNER_PRIORITY } from "@/constants";
import { getDb, upsertOwner } from "@/db";
import * as logger from "@/logger";

export class OwnerSeedValidationError extends Error {
  constructor(message: string) {
    super(`Owner seed validation failed: ${message}`);
    this.name = "OwnerSeedValidationError";
  }
}

export type OwnerSeedSyncResult = {
  upserted: number;
  ownerIds: number[];
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isOwnerKind(value: unknown): value is OwnerKind {
  return value === "company" || value === "source";
}

function requireString(item: Record<string, unknown>, key: string, prefix: string): string {
  const value = item[key];
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new OwnerSeedValidationError(`${prefix}.${key} must be a non-empty string`);
  }
  return value.trim();
}

function isAbsoluteUrl(value: string): boolean {
  try {
    new URL(value);
    return true;
  } catch {
    return false;
  }
}

function requirePositiveNumber(value: unknown, field: string): number {
  if (typeof value !== "number" || !Number.isFinite(value) || value <= 0) {
    throw new OwnerSeedValidationError(`${field} must be a positive number`);
  }
  return value;
}

function validateOwnerEntry(item: unknown, index: number): OwnerInput {
  const prefix = `owners[${index}]`;
  if (!isRecord(item)) {
    throw new OwnerSeedValidationError(`${prefix} must be an object`);
  }

  const kind = item.kind;
  if (!isOwnerKind(kind)) {
    throw new OwnerSeedValidationError(`${prefix}.kind must be "company" or "source"`);
  }

  const targetUrl = requireString(item, "targetUrl", prefix);
  if (!isAbsoluteUrl(targetUrl)) {
    throw new OwnerSeedValidationError(`${prefix}.targetUrl must be an absolute URL`);
  }

  const cadenceMinutes =
    kind === "company"
      ? requirePositiveNumber(item.cadenceHours, `${prefix}.cadenceHours`) * 60
      : requirePositiveNumber(item.cadenceMinutes, `${prefix}.cadenceMinutes`);

  const priority = item.priority ?? DEFAULT_OWNER_PRIORITY;
  if (typeof priority !== "number" || !Number.isInteger(priority)) {
    throw new OwnerSeedValidationError(`${prefix}.priority must be an integer`);
  }

  const boardToken = item.boardToken;
  if (boardToken !== undefined && typeof boardToken !== "string") {
    throw new OwnerSeedValidationError(`${prefix}.boardToken must be a string`);
  }

  const active = item.active ?? true;
  if (typeof active !== "boolean") {
    throw new OwnerSeedValidationError(`${prefix}.active must be a boolean`);
  }

  return {
    name: requireString(item, "name", prefix),
    kind,
    source_type: requireString(item, "sourceType", prefix),
    target_url: targetUrl,
    board_token: boardToken?.trim() || null,
    cadence_minutes: cadenceMinutes,
    priority,
    is_active: active,
  };
}

/**
 * Validate a parsed seed document
 *
 * @throws {OwnerSeedValidationError} On the first invalid entry or a duplicate name
 */
export function validateOwnerSeed(raw: unknown): OwnerInput[] {
  if (!isRecord(raw) || !Array.isArray(raw.owners)) {
    throw new OwnerSeedValidationError("root must be an object with an owners array");
  }

  const entries: unknown[] = raw.owners;
  const owners = entries.map((item, index) => validateOwnerEntry(item, index));

  const seen = new Set<string>();
  for (const owner of owners) {
    if (seen.has(owner.name)) {
      throw new OwnerSeedValidationError(`duplicate owner name "${owner.name}"`);
    }
    seen.add(owner.name);
  }

  return owners;
}

/**
 * Upsert every owner of a validated seed in one transaction
 */
export function syncOwners(owners: readonly OwnerInput[]): OwnerSeedSyncResult {
  const ownerIds = getDb().transaction(() => owners.map((owner) => upsertOwner(owner)))();
  return { upserted: ownerIds.length, ownerIds };
}

/**
 * Read, validate and upsert the seed file
 *
 * @param filePath - Path relative to cwd
 * @throws {OwnerSeedValidationError} If the file content is invalid
 */
export function syncOwnersFromFile(filePath: string): OwnerSeedSyncResult {
  const resolved = path.resolve(process.cwd(), filePath);
  const raw: unknown = JSON.parse(fs.readFileSync(resolved, "utf-8"));
  const result = syncOwners(validateOwnerSeed(raw));

  logger.info("Owners synced from seed file", {
    file: filePath,
    upserted: result.upserted,
  });

  return result;
}
