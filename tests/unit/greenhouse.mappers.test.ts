/**
 * Unit tests for the Greenhouse source: payload mapping and fetch flow
 */

import { beforeEach, describe, expect, it } from "vitest";
import { GreenhouseSource } from "@/sources";
import {
  isGreenhouseJob,
  mapGreenhouseJob,
  readGreenhouseJobs,
} from "@/sources/greenhouse/mappers";
import { createMockHttp, loadFixtureJson } from "../helpers/mockHttp";
import { buildOwnerRow } from "../helpers/ownerRow";

const JOBS_URL = "https://boards-api.greenhouse.io/v1/boards/examplerobotics/jobs";

function loadJobsFixture(): unknown {
  return loadFixtureJson("sources/greenhouse_jobs.json");
}

describe("Greenhouse mappers", () => {
  it("maps a job with escaped HTML content", () => {
    const [job] = readGreenhouseJobs(loadJobsFixture()).filter(isGreenhouseJob);

    expect(mapGreenhouseJob(job)).toEqual({
      title: "Hardware Validation Intern",
      link: "https://boards.greenhouse.io/examplerobotics/jobs/4002",
      postingDate: "2024-04-01T09:00:00-04:00",
      description:
        "Requirements\n• Experience with oscilloscopes\n• Pursuing a BS in EE",
      location: "Austin, TX",
      sourceJobId: "4002",
      sourceLabel: "greenhouse",
    });
  });

  it("falls back to updated_at and a null description", () => {
    const jobs = readGreenhouseJobs(loadJobsFixture()).filter(isGreenhouseJob);

    expect(mapGreenhouseJob(jobs[1])).toMatchObject({
      postingDate: "2024-04-05T10:00:00Z",
      description: null,
      location: "Remote",
    });
  });

  it("rejects a payload without a jobs array", () => {
    expect(() => readGreenhouseJobs({ data: [] })).toThrow(
      "Unexpected Greenhouse response: missing jobs array",
    );
  });

  it("filters malformed jobs", () => {
    expect(readGreenhouseJobs(loadJobsFixture()).filter(isGreenhouseJob)).toHaveLength(2);
  });
});

describe("GreenhouseSource", () => {
  const mockHttp = createMockHttp();
  const source = new GreenhouseSource({
    httpRequest: mockHttp.request,
    sleep: async () => {},
  });

  beforeEach(() => {
    mockHttp.reset();
  });

  it("fetches the board with content and returns candidates sorted by id", async () => {
    mockHttp.json(JOBS_URL, loadJobsFixture());

    const candidates = await source.fetchCandidates(buildOwnerRow());

    expect(candidates.map((c) => c.sourceJobId)).toEqual(["4001", "4002"]);
    expect(mockHttp.requests()[0].query).toEqual({ content: "true" });
  });

  it("derives the board token from the target URL", async () => {
    mockHttp.json(JOBS_URL, { jobs: [] });

    await expect(
      source.fetchCandidates(
        buildOwnerRow({
          board_token: null,
          target_url: "https://boards.greenhouse.io/examplerobotics",
        }),
      ),
    ).resolves.toEqual([]);
  });

  it("throws when no board token can be resolved", async () => {
    await expect(
      source.fetchCandidates(
        buildOwnerRow({ board_token: null, target_url: "https://example.com" }),
      ),
    ).rejects.toThrow('Greenhouse owner "Example Robotics" has no board token');
  });

  it("yields nothing when the board stays rate limited", async () => {
    mockHttp.status(JOBS_URL, 429, "");

    await expect(source.fetchCandidates(buildOwnerRow())).resolves.toEqual([]);
  });
});
