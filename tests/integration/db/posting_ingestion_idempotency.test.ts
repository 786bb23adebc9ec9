/**
 * Integration tests: posting ingestion identity, idempotency and refresh
 */

import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { getPostingByOwnerAndLink, listPostingsByOwner } from "@/db";
import { PostingEnricher, ingestCandidates } from "@/ingestion";
import { NO_REQUIREMENTS_SENTINEL } from "@/constants";
import type { CandidatePosting, NewPostingEvent, OwnerRow } from "@/types";
import { createTestDb, seedOwner, type TestDbHarness } from "../../helpers/testDb";
import { createRecordingLogger } from "../../helpers/recordingLogger";

const GOOD_SUMMARY = "Key Requirements:\n\nExperience:\n• Experience with Python.";

const RUN1 = new Date("2024-05-01T00:00:00.000Z");
const RUN2 = new Date("2024-05-02T00:00:00.000Z");

describe("Integration: posting ingestion", () => {
  let dbHarness: TestDbHarness;
  let owner: OwnerRow;
  let classifyCalls: string[];
  let summarizeCalls: number;
  let enricher: PostingEnricher;

  beforeEach(() => {
    dbHarness = createTestDb();
    owner = seedOwner();
    classifyCalls = [];
    summarizeCalls = 0;
    enricher = new PostingEnricher({
      classifier: {
        classify: (title) => {
          classifyCalls.push(title);
          return title.includes("PCB") ? "hardware" : "software";
        },
      },
      summarizer: {
        extract: (description) => {
          summarizeCalls++;
          return description ? GOOD_SUMMARY : NO_REQUIREMENTS_SENTINEL;
        },
      },
      logger: createRecordingLogger(),
    });
  });

  afterEach(() => {
    dbHarness.cleanup();
  });

  const firstBatch: CandidatePosting[] = [
    {
      title: "Software Engineering Intern",
      link: "https://example.com/jobs/1#apply",
      postingDate: "2024-04-01T00:00:00Z",
      description: "Requirements:\n- Experience with Python",
    },
    { title: "PCB Design Intern", link: "https://example.com/jobs/2" },
    { title: "", link: "https://example.com/jobs/3" },
  ];

  it("creates postings on first sight with enrichment", () => {
    const result = ingestCandidates(
      { owner, candidates: firstBatch, now: RUN1 },
      { enricher },
    );

    expect(result).toEqual({
      jobsFound: 2,
      jobsNew: 2,
      existing: 0,
      refreshed: 0,
      rejected: 1,
      failed: 0,
    });

    const postings = listPostingsByOwner(owner.id);
    expect(postings).toHaveLength(2);
    expect(postings[0]).toMatchObject({
      title: "Software Engineering Intern",
      link: "https://example.com/jobs/1",
      posting_date: "2024-04-01T00:00:00.000Z",
      discovery_date: RUN1.toISOString(),
      category: "software",
      requirements_summary: GOOD_SUMMARY,
      is_active: 1,
    });
    expect(postings[1]).toMatchObject({
      link: "https://example.com/jobs/2",
      posting_date: RUN1.toISOString(),
      category: "hardware",
      description: null,
      requirements_summary: NO_REQUIREMENTS_SENTINEL,
    });
    expect(classifyCalls).toEqual(["Software Engineering Intern", "PCB Design Intern"]);
  });

  it("is idempotent and keeps first-sight facts on re-ingestion", () => {
    ingestCandidates({ owner, candidates: firstBatch, now: RUN1 }, { enricher });

    const result = ingestCandidates(
      {
        owner,
        candidates: [
          {
            title: "Software Engineering Intern (updated)",
            link: "https://example.com/jobs/1",
            postingDate: "2024-04-20T00:00:00Z",
            category: "hardware",
            description: "Requirements:\n- Experience with Rust",
          },
          {
            title: "PCB Design Intern",
            link: "https://example.com/jobs/2",
            description: "Requirements:\n- Experience with KiCad",
          },
        ],
        now: RUN2,
      },
      { enricher },
    );

    expect(result).toEqual({
      jobsFound: 2,
      jobsNew: 0,
      existing: 2,
      refreshed: 1,
      rejected: 0,
      failed: 0,
    });
    expect(listPostingsByOwner(owner.id)).toHaveLength(2);

    expect(getPostingByOwnerAndLink(owner.id, "https://example.com/jobs/1")).toMatchObject({
      title: "Software Engineering Intern",
      posting_date: "2024-04-01T00:00:00.000Z",
      discovery_date: RUN1.toISOString(),
      category: "software",
      description: "Requirements:\n- Experience with Python",
      requirements_summary: GOOD_SUMMARY,
    });

    expect(getPostingByOwnerAndLink(owner.id, "https://example.com/jobs/2")).toMatchObject({
      discovery_date: RUN1.toISOString(),
      category: "hardware",
      description: "Requirements:\n- Experience with KiCad",
      requirements_summary: GOOD_SUMMARY,
    });

    // Existing postings are never reclassified
    expect(classifyCalls).toHaveLength(2);
  });

  it("stores candidate-provided category and summary verbatim", () => {
    const summary = "Key Requirements:\n\nEducation:\n• Pursuing a BS in EE.";

    ingestCandidates(
      {
        owner,
        candidates: [
          {
            title: "Lab Intern",
            link: "https://example.com/jobs/9",
            category: "hardware",
            requirementsSummary: summary,
          },
        ],
        now: RUN1,
      },
      { enricher },
    );

    expect(getPostingByOwnerAndLink(owner.id, "https://example.com/jobs/9")).toMatchObject({
      category: "hardware",
      requirements_summary: summary,
    });
    expect(classifyCalls).toEqual([]);
    expect(summarizeCalls).toBe(0);
  });

  it("scopes identity to the owner", () => {
    const other = seedOwner({ name: "Other Owner" });
    const candidates: CandidatePosting[] = [
      { title: "Firmware Intern", link: "https://example.com/jobs/shared" },
    ];

    ingestCandidates({ owner, candidates, now: RUN1 }, { enricher });
    const result = ingestCandidates({ owner: other, candidates, now: RUN1 }, { enricher });

    expect(result.jobsNew).toBe(1);
    expect(listPostingsByOwner(owner.id)).toHaveLength(1);
    expect(listPostingsByOwner(other.id)).toHaveLength(1);
  });

  it("counts a UNIQUE violation on insert as an existing posting", () => {
    dbHarness.db.exec(`
      CREATE TRIGGER concurrent_insert
      BEFORE INSERT ON postings
      BEGIN
        SELECT RAISE(ABORT, 'UNIQUE constraint failed: postings.owner_id, postings.link');
      END;
    `);

    const result = ingestCandidates(
      {
        owner,
        candidates: [{ title: "Firmware Intern", link: "https://example.com/jobs/race" }],
        now: RUN1,
      },
      { enricher, logger: createRecordingLogger() },
    );

    expect(result).toMatchObject({ jobsFound: 1, jobsNew: 0, existing: 1, failed: 0 });
    expect(listPostingsByOwner(owner.id)).toEqual([]);
  });

  describe("notifications", () => {
    it("emits one event per new posting after commit", () => {
      const events: NewPostingEvent[] = [];
      const notifier = {
        notifyNewPosting: (event: NewPostingEvent): void => {
          events.push(event);
        },
      };

      ingestCandidates({ owner, candidates: firstBatch, now: RUN1 }, { enricher, notifier });
      ingestCandidates({ owner, candidates: firstBatch, now: RUN2 }, { enricher, notifier });

      expect(events.map((e) => [e.ownerName, e.posting.link])).toEqual([
        ["Test Owner", "https://example.com/jobs/1"],
        ["Test Owner", "https://example.com/jobs/2"],
      ]);
    });

    it("logs notifier failures without affecting the result", async () => {
      const logger = createRecordingLogger();
      let calls = 0;
      const notifier = {
        notifyNewPosting: (): Promise<void> => {
          calls++;
          if (calls === 1) {
            throw new Error("socket closed");
          }
          return Promise.reject(new Error("webhook timeout"));
        },
      };

      const result = ingestCandidates(
        { owner, candidates: firstBatch, now: RUN1 },
        { enricher, notifier, logger },
      );
      await new Promise((resolve) => setImmediate(resolve));

      expect(result.jobsNew).toBe(2);
      expect(listPostingsByOwner(owner.id)).toHaveLength(2);
      expect(
        logger.entries
          .filter((e) => e.message === "Posting notification failed")
          .map((e) => e.meta?.error),
      ).toEqual(["socket closed", "webhook timeout"]);
    });
  });
});
