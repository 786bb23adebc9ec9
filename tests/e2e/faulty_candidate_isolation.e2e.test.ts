/**
 * E2E: a faulty candidate never takes down its batch
 *
 * Five candidates for one owner; one breaks the classifier, one breaks the
 * summarizer, one fails at the database. The run still completes, also
 * when a collaborator hands over entries of the wrong shape.
 */

import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { getLatestCrawlRun, getOwnerById, listPostingsByOwner } from "@/db";
import { PostingEnricher } from "@/ingestion";
import { crawlOwner, type CrawlOwnerDeps } from "@/orchestration";
import { createSourceRegistry } from "@/sources";
import { EXTRACTION_FAILED_SENTINEL } from "@/constants";
import type { CandidatePosting, OwnerRow } from "@/types";
import { createTestDb, seedOwner, type TestDbHarness } from "../helpers/testDb";
import { createRecordingLogger } from "../helpers/recordingLogger";

const SUMMARY = "Key Requirements:\n\nTechnical Skills:\n• Familiar with Verilog.";

const candidates: CandidatePosting[] = [1, 2, 3, 4, 5].map((n) => ({
  title: `Candidate ${n} Intern`,
  link: `https://example.com/jobs/${n}`,
  description: `Description ${n}`,
}));

describe("E2E: faulty candidate isolation", () => {
  let dbHarness: TestDbHarness;
  let owner: OwnerRow;
  let deps: CrawlOwnerDeps;

  beforeEach(() => {
    dbHarness = createTestDb();
    owner = seedOwner({ source_type: "stub_board" });

    deps = {
      registry: createSourceRegistry({
        stub_board: () => ({
          sourceType: "stub_board",
          fetchCandidates: async () => candidates,
        }),
      }),
      enricher: new PostingEnricher({
        classifier: {
          classify: (title) => {
            if (title.startsWith("Candidate 3")) {
              throw new Error("tokenizer crashed");
            }
            return "hardware";
          },
        },
        summarizer: {
          extract: (description) => {
            if (description === "Description 4") {
              throw new Error("summary crashed");
            }
            return SUMMARY;
          },
        },
        logger: createRecordingLogger(),
      }),
      ownerTimeoutMs: 5_000,
    };
  });

  afterEach(() => {
    dbHarness.cleanup();
  });

  it("stores defaults for enrichment failures", async () => {
    const result = await crawlOwner(owner, deps);

    expect(result).toMatchObject({ status: "completed", jobsFound: 5, jobsNew: 5 });

    const postings = listPostingsByOwner(owner.id);
    expect(postings.map((p) => [p.link, p.category, p.requirements_summary])).toEqual([
      ["https://example.com/jobs/1", "hardware", SUMMARY],
      ["https://example.com/jobs/2", "hardware", SUMMARY],
      ["https://example.com/jobs/3", "software", SUMMARY],
      ["https://example.com/jobs/4", "hardware", EXTRACTION_FAILED_SENTINEL],
      ["https://example.com/jobs/5", "hardware", SUMMARY],
    ]);
  });

  it("rolls back only the candidate whose write fails", async () => {
    dbHarness.db.exec(`
      CREATE TRIGGER reject_third_posting
      BEFORE INSERT ON postings
      WHEN NEW.link = 'https://example.com/jobs/3'
      BEGIN
        SELECT RAISE(ABORT, 'disk hiccup');
      END;
    `);

    const result = await crawlOwner(owner, deps);

    expect(result).toMatchObject({ status: "completed", jobsFound: 5, jobsNew: 4 });
    expect(listPostingsByOwner(owner.id).map((p) => p.link)).toEqual([
      "https://example.com/jobs/1",
      "https://example.com/jobs/2",
      "https://example.com/jobs/4",
      "https://example.com/jobs/5",
    ]);
    expect(getLatestCrawlRun(owner.id)).toMatchObject({
      status: "completed",
      jobs_found: 5,
      jobs_new: 4,
    });
    expect(getOwnerById(owner.id)?.last_crawled_at).not.toBeNull();
  });

  it("drops mistyped entries and stores the rest", async () => {
    const mixed: CandidatePosting[] = JSON.parse(`[
      { "title": "Candidate 1 Intern", "link": "https://example.com/jobs/1" },
      { "title": "Candidate 2 Intern", "link": "https://example.com/jobs/2" },
      { "title": 42, "link": "https://example.com/jobs/3" },
      null,
      "Candidate 6 Intern",
      { "title": "Candidate 4 Intern", "link": "https://example.com/jobs/4", "description": 7 },
      { "title": "Candidate 5 Intern", "link": "https://example.com/jobs/5", "category": "Embedded" }
    ]`);
    deps = {
      ...deps,
      registry: createSourceRegistry({
        stub_board: () => ({
          sourceType: "stub_board",
          fetchCandidates: async () => mixed,
        }),
      }),
    };

    const result = await crawlOwner(owner, deps);

    expect(result).toMatchObject({ status: "completed", jobsFound: 4, jobsNew: 4 });
    expect(
      listPostingsByOwner(owner.id).map((p) => [p.link, p.category, p.description]),
    ).toEqual([
      ["https://example.com/jobs/1", "hardware", null],
      ["https://example.com/jobs/2", "hardware", null],
      ["https://example.com/jobs/4", "hardware", null],
      ["https://example.com/jobs/5", "hardware", null],
    ]);
  });

  it("picks up the failed candidate on the next crawl", async () => {
    dbHarness.db.exec(`
      CREATE TRIGGER reject_third_posting
      BEFORE INSERT ON postings
      WHEN NEW.link = 'https://example.com/jobs/3'
      BEGIN
        SELECT RAISE(ABORT, 'disk hiccup');
      END;
    `);
    await crawlOwner(owner, deps);
    dbHarness.db.exec("DROP TRIGGER reject_third_posting");

    const result = await crawlOwner(owner, deps);

    expect(result).toMatchObject({ status: "completed", jobsFound: 5, jobsNew: 1 });
    expect(listPostingsByOwner(owner.id)).toHaveLength(5);
  });
});
