/**
 * Unit tests for the Lever source: payload mapping and fetch flow
 */

import { beforeEach, describe, expect, it } from "vitest";
import { LeverSource } from "@/sources";
import {
  buildLeverDescription,
  formatLeverSalary,
  isLeverPosting,
  mapLeverPosting,
  readLeverPostings,
} from "@/sources/lever/mappers";
import { createMockHttp, loadFixtureJson } from "../helpers/mockHttp";
import { buildOwnerRow } from "../helpers/ownerRow";

const POSTINGS_URL = "https://api.lever.co/v0/postings/examplesilicon";

function loadPostingsFixture(): unknown {
  return loadFixtureJson("sources/lever_postings.json");
}

const leverOwner = buildOwnerRow({
  name: "Example Silicon",
  source_type: "lever",
  target_url: "https://jobs.lever.co/examplesilicon",
  board_token: null,
});

describe("Lever mappers", () => {
  it("maps a posting with lists, additional text and salary", () => {
    const [posting] = readLeverPostings(loadPostingsFixture()).filter(isLeverPosting);

    expect(mapLeverPosting(posting)).toEqual({
      title: "Embedded Firmware Intern",
      link: "https://jobs.lever.co/examplesilicon/a1b2c3",
      postingDate: 1712000000000,
      description: [
        "Join our firmware team for the summer.",
        "",
        "Requirements:",
        "• Experience with C or C++",
        "• Pursuing a degree in EE or CS",
        "",
        "We are an equal opportunity employer.",
      ].join("\n"),
      location: "San Jose, CA",
      salaryInfo: "USD 25-35 per-hour-wage",
      sourceJobId: "a1b2c3",
      sourceLabel: "lever",
    });
  });

  it("converts an HTML description when no plain variant exists", () => {
    const postings = readLeverPostings(loadPostingsFixture()).filter(isLeverPosting);

    expect(mapLeverPosting(postings[1])).toMatchObject({
      postingDate: null,
      description: "Build data pipelines.",
      location: null,
      salaryInfo: null,
    });
  });

  it("returns a null description when every content field is empty", () => {
    expect(
      buildLeverDescription({
        id: "x",
        text: "Intern",
        hostedUrl: "https://jobs.lever.co/x/x",
        descriptionPlain: " ",
        lists: [],
      }),
    ).toBeNull();
  });

  it.each([
    [{ currency: "USD", interval: "per-year-salary", min: 50000 }, "USD 50000 per-year-salary"],
    [{ max: 40 }, "40"],
    [{ currency: "EUR" }, null],
    [undefined, null],
  ])("formats salary %j as %j", (range, expected) => {
    expect(formatLeverSalary(range)).toBe(expected);
  });

  it("skips malformed list entries and ignores non-string content fields", () => {
    const payload: unknown = JSON.parse(`[
      {
        "id": "m1",
        "text": "Firmware Intern",
        "hostedUrl": "https://jobs.lever.co/examplesilicon/m1",
        "descriptionPlain": null,
        "description": 42,
        "lists": [
          { "text": "Requirements", "content": null },
          "not a list",
          { "text": 7, "content": "<li>Ignored without a title</li>" },
          { "text": "Nice to have", "content": "<li>Soldering experience</li>" }
        ],
        "additionalPlain": { "unexpected": true },
        "categories": { "location": 7 },
        "salaryRange": { "min": "25", "max": null, "currency": "USD" }
      }
    ]`);
    const [posting] = readLeverPostings(payload).filter(isLeverPosting);

    expect(mapLeverPosting(posting)).toMatchObject({
      title: "Firmware Intern",
      description: "Nice to have:\n• Soldering experience",
      location: null,
      salaryInfo: null,
    });
  });

  it("treats a non-array lists field as absent", () => {
    const payload: unknown = JSON.parse(
      `[{ "id": "m2", "text": "Intern", "hostedUrl": "https://jobs.lever.co/x/m2", "lists": "Requirements" }]`,
    );
    const [posting] = readLeverPostings(payload).filter(isLeverPosting);

    expect(buildLeverDescription(posting)).toBeNull();
  });

  it("rejects a non-array payload", () => {
    expect(() => readLeverPostings({ postings: [] })).toThrow(
      "Unexpected Lever response: expected an array of postings",
    );
  });
});

describe("LeverSource", () => {
  const mockHttp = createMockHttp();
  const source = new LeverSource({
    httpRequest: mockHttp.request,
    sleep: async () => {},
  });

  beforeEach(() => {
    mockHttp.reset();
  });

  it("fetches the site in JSON mode and skips malformed postings", async () => {
    mockHttp.json(POSTINGS_URL, loadPostingsFixture());

    const candidates = await source.fetchCandidates(leverOwner);

    expect(candidates.map((c) => c.title)).toEqual([
      "Embedded Firmware Intern",
      "Data Platform Intern",
    ]);
    expect(mockHttp.requests()[0].query).toEqual({ mode: "json" });
  });

  it("fails the fetch on a malformed payload", async () => {
    mockHttp.json(POSTINGS_URL, { error: "not found" });

    await expect(source.fetchCandidates(leverOwner)).rejects.toThrow(
      "Unexpected Lever response",
    );
  });
});
