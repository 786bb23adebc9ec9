/**
 * Unit tests for the TF-IDF naive Bayes title model
 */

import { describe, it, expect } from "vitest";
import {
  NaiveBayesTitleModel,
  extractFeatures,
  loadTrainingSet,
} from "@/classification";

describe("extractFeatures", () => {
  it("emits lowercase unigrams then bigrams", () => {
    expect(extractFeatures("QA Engineer (Software)")).toEqual([
      "qa",
      "engineer",
      "software",
      "qa engineer",
      "engineer software",
    ]);
  });

  it("drops single-character tokens", () => {
    expect(extractFeatures("C Developer")).toEqual(["developer"]);
  });

  it("returns nothing for empty text", () => {
    expect(extractFeatures("")).toEqual([]);
  });
});

describe("NaiveBayesTitleModel", () => {
  const tiny = NaiveBayesTitleModel.train([
    { title: "Web Developer", label: "software" },
    { title: "Circuit Designer", label: "hardware" },
  ]);

  it("builds its vocabulary from unigrams and bigrams", () => {
    // web, developer, web developer, circuit, designer, circuit designer
    expect(tiny.vocabularySize).toBe(6);
  });

  it("predicts the class whose features the text shares", () => {
    expect(tiny.predict("web")).toBe("software");
    expect(tiny.predict("Circuit")).toBe("hardware");
  });

  it("is indecisive when no feature is known", () => {
    expect(tiny.scores("quantum biology")).toBeNull();
    expect(tiny.predict("quantum biology")).toBeNull();
  });

  it("throws when trained without examples", () => {
    expect(() => NaiveBayesTitleModel.train([])).toThrow(
      "Cannot train a model without examples",
    );
  });

  describe("trained on the curated set", () => {
    const model = NaiveBayesTitleModel.train(loadTrainingSet());

    it("has the expected vocabulary", () => {
      expect(model.vocabularySize).toBe(103);
    });

    it.each([
      ["Engineer Intern", "software"],
      ["Product Intern", "software"],
      ["Design Intern", "hardware"],
      ["Systems Intern", "hardware"],
      ["Validation Intern", "hardware"],
      ["Test Engineer", "hardware"],
    ] as const)("predicts %s as %s", (title, expected) => {
      expect(model.predict(title)).toBe(expected);
    });
  });
});
