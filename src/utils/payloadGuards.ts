/**
 * Runtime shape checks for untyped payloads (board APIs, collaborator output)
 */

import type { Category } from "@/types";

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function optionalString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

export function optionalNumber(value: unknown): number | undefined {
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

export function isCategory(value: unknown): value is Category {
  return value === "software" || value === "hardware";
}
