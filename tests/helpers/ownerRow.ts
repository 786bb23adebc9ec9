/**
 * In-memory OwnerRow builder for tests that do not touch the database
 */

import type { OwnerRow } from "@/types";

export function buildOwnerRow(overrides: Partial<OwnerRow> = {}): OwnerRow {
  return {
    id: 1,
    name: "Example Robotics",
    kind: "company",
    source_type: "greenhouse",
    target_url: "https://boards.greenhouse.io/examplerobotics",
    board_token: "examplerobotics",
    cadence_minutes: 360,
    last_crawled_at: null,
    priority: 2,
    is_active: 1,
    created_at: "2024-01-01T00:00:00.000Z",
    updated_at: "2024-01-01T00:00:00.000Z",
    ...overrides,
  };
}
