/**
 * Unit tests for keyword matching
 */

import { describe, it, expect } from "vitest";
import {
  compileTerms,
  containsAnyTerm,
  countTerms,
  findTerms,
  firstTerm,
} from "@/utils";

describe("keyword matching", () => {
  describe("short terms", () => {
    const terms = compileTerms(["ai", "rf", "ios"], "substring");

    it("match as standalone tokens", () => {
      expect(findTerms("AI research, RF lab and iOS apps", terms)).toEqual([
        "ai",
        "rf",
        "ios",
      ]);
    });

    it("do not match inside longer words", () => {
      expect(containsAnyTerm("Send an email about the interface BIOS", terms)).toBe(
        false,
      );
    });

    it("match next to punctuation", () => {
      expect(findTerms("(AI/ML)", terms)).toEqual(["ai"]);
    });
  });

  describe("long terms", () => {
    it("match anywhere in substring mode", () => {
      const terms = compileTerms(["circuit"], "substring");
      expect(containsAnyTerm("Microcircuits team", terms)).toBe(true);
    });

    it("match only at word start in wordStart mode", () => {
      const terms = compileTerms(["skill"], "wordStart");
      expect(containsAnyTerm("Strong skills required", terms)).toBe(true);
      expect(containsAnyTerm("We upskill our interns", terms)).toBe(false);
    });

    it("escape regex characters", () => {
      const terms = compileTerms(["c++"], "substring");
      expect(containsAnyTerm("Modern C++ experience", terms)).toBe(true);
      expect(containsAnyTerm("C programming", terms)).toBe(false);
    });
  });

  it("counts distinct terms, not occurrences", () => {
    const terms = compileTerms(["python", "sql"], "substring");
    expect(countTerms("Python, Python and more Python", terms)).toBe(1);
    expect(countTerms("Python and SQL", terms)).toBe(2);
  });

  it("returns the first term in list order", () => {
    const terms = compileTerms(["fpga", "pcb"], "substring");
    expect(firstTerm("PCB and FPGA work", terms)).toBe("fpga");
    expect(firstTerm("Nothing here", terms)).toBeUndefined();
  });
});
