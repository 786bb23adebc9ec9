/**
 * E2E: one owner's failure never affects the others in a cycle
 */

import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { getLatestCrawlRun, getOwnerById, listPostingsByOwner } from "@/db";
import { PostingEnricher } from "@/ingestion";
import { crawlOwners, runCrawlCycle, type CrawlCycleDeps } from "@/orchestration";
import { createSourceRegistry } from "@/sources";
import type { CandidatePosting, OwnerRow } from "@/types";
import { createTestDb, seedOwner, type TestDbHarness } from "../helpers/testDb";
import { createRecordingLogger } from "../helpers/recordingLogger";

function candidatesFor(owner: OwnerRow, count: number): CandidatePosting[] {
  return Array.from({ length: count }, (_, i) => ({
    title: `${owner.name} Intern ${i + 1}`,
    link: `https://example.com/${owner.id}/jobs/${i + 1}`,
  }));
}

describe("E2E: crawl cycle isolation", () => {
  let dbHarness: TestDbHarness;
  let deps: CrawlCycleDeps;

  beforeEach(() => {
    dbHarness = createTestDb();

    const registry = createSourceRegistry({
      stub_board: () => ({
        sourceType: "stub_board",
        fetchCandidates: async (owner) => candidatesFor(owner, 2),
      }),
      broken_board: () => ({
        sourceType: "broken_board",
        fetchCandidates: async () => {
          throw new Error("board exploded");
        },
      }),
      slow_board: () => ({
        sourceType: "slow_board",
        fetchCandidates: () => new Promise<CandidatePosting[]>(() => {}),
      }),
    });

    deps = {
      registry,
      enricher: new PostingEnricher({
        classifier: { classify: () => "software" },
        summarizer: { extract: () => "No specific requirements listed." },
        logger: createRecordingLogger(),
      }),
      ownerTimeoutMs: 50,
      concurrency: 1,
    };
  });

  afterEach(() => {
    dbHarness.cleanup();
  });

  it("completes healthy owners and fails the broken ones", async () => {
    const alpha = seedOwner({ name: "Alpha", source_type: "stub_board" });
    const broken = seedOwner({ name: "Broken", source_type: "broken_board" });
    const unknown = seedOwner({ name: "Unknown", source_type: "workday" });
    const slow = seedOwner({ name: "Slow", source_type: "slow_board" });
    const gamma = seedOwner({ name: "Gamma", source_type: "stub_board" });

    const cycle = await runCrawlCycle(deps, new Date());

    expect(cycle).toMatchObject({
      due: 5,
      completed: 2,
      failed: 3,
      jobsFound: 4,
      jobsNew: 4,
    });
    expect(cycle.results.map((r) => [r.ownerName, r.status, r.error])).toEqual([
      ["Alpha", "completed", undefined],
      ["Broken", "failed", "board exploded"],
      ["Unknown", "failed", 'Unknown source type: "workday"'],
      ["Slow", "failed", 'Crawl of "Slow" timed out after 50ms'],
      ["Gamma", "completed", undefined],
    ]);

    for (const owner of [alpha, gamma]) {
      expect(listPostingsByOwner(owner.id)).toHaveLength(2);
      expect(getOwnerById(owner.id)?.last_crawled_at).not.toBeNull();
      expect(getLatestCrawlRun(owner.id)).toMatchObject({
        status: "completed",
        jobs_found: 2,
        jobs_new: 2,
      });
    }

    for (const owner of [broken, unknown, slow]) {
      expect(getOwnerById(owner.id)?.last_crawled_at).toBeNull();
      expect(getLatestCrawlRun(owner.id)).toMatchObject({
        status: "failed",
        jobs_found: 0,
        jobs_new: 0,
      });
    }
    expect(getLatestCrawlRun(broken.id)?.error_message).toBe("board exploded");
  });

  it("keeps failed owners due for the next cycle", async () => {
    seedOwner({ name: "Alpha", source_type: "stub_board" });
    seedOwner({ name: "Broken", source_type: "broken_board" });

    await runCrawlCycle(deps, new Date());
    const second = await runCrawlCycle(deps, new Date());

    expect(second.due).toBe(1);
    expect(second.results.map((r) => r.ownerName)).toEqual(["Broken"]);
  });

  it("reports an idle cycle when nobody is due", async () => {
    await expect(runCrawlCycle(deps, new Date())).resolves.toEqual({
      due: 0,
      completed: 0,
      failed: 0,
      jobsFound: 0,
      jobsNew: 0,
      results: [],
    });
  });

  it("bounds concurrency and keeps result order", async () => {
    let inFlight = 0;
    let maxInFlight = 0;
    const registry = createSourceRegistry({
      stub_board: () => ({
        sourceType: "stub_board",
        fetchCandidates: async (owner) => {
          inFlight++;
          maxInFlight = Math.max(maxInFlight, inFlight);
          await new Promise((resolve) => setTimeout(resolve, 10));
          inFlight--;
          return candidatesFor(owner, 1);
        },
      }),
    });
    const owners = ["One", "Two", "Three", "Four"].map((name) =>
      seedOwner({ name, source_type: "stub_board" }),
    );

    const results = await crawlOwners(owners, { ...deps, registry, concurrency: 2 });

    expect(maxInFlight).toBe(2);
    expect(results.map((r) => [r.ownerName, r.status])).toEqual([
      ["One", "completed"],
      ["Two", "completed"],
      ["Three", "completed"],
      ["Four", "completed"],
    ]);
  });
});
