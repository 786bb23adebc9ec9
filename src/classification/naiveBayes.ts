/**
 * Bag-of-words title model: TF-IDF features + multinomial naive Bayes
 *
 * Features are lowercase word unigrams (two or more word characters) plus
 * adjacent-pair bigrams. Weights use raw term frequency, smoothed IDF
 * `ln((1 + n) / (1 + df)) + 1` and L2 normalization. The class model uses
 * Laplace smoothing over the whole vocabulary.
 *
 * The model is indecisive (returns null) when a text shares no feature
 * with the vocabulary or both classes score exactly the same.
 */

import type { Category, ModelScores, TrainingExample } from "@/types";
import { NAIVE_BAYES_ALPHA } from "@/constants";

const TOKEN_PATTERN = /\b\w\w+\b/g;

const CATEGORIES: readonly Category[] = ["software", "hardware"];

type SparseVector = Map<string, number>;

/**
 * Unigrams followed by bigrams, in text order
 *
 * @example
 * extractFeatures("QA Engineer (Software)")
 * // ["qa", "engineer", "software", "qa engineer", "engineer software"]
 */
export function extractFeatures(text: string): string[] {
  const tokens = text.toLowerCase().match(TOKEN_PATTERN) ?? [];
  const features = [...tokens];
  for (let i = 0; i + 1 < tokens.length; i++) {
    features.push(`${tokens[i]} ${tokens[i + 1]}`);
  }
  return features;
}

export class NaiveBayesTitleModel {
  private constructor(
    private readonly idf: Map<string, number>,
    private readonly logPriors: ModelScores,
    private readonly featureLogProbs: Record<Category, Map<string, number>>,
  ) {}

  /**
   * Fit the model on labeled titles
   *
   * @throws {Error} If there are no examples
   */
  static train(
    examples: readonly TrainingExample[],
    alpha: number = NAIVE_BAYES_ALPHA,
  ): NaiveBayesTitleModel {
    if (examples.length === 0) {
      throw new Error("Cannot train a model without examples");
    }

    const documents = examples.map((ex) => extractFeatures(ex.title));
    const n = documents.length;

    const documentFrequency = new Map<string, number>();
    for (const features of documents) {
      for (const feature of new Set(features)) {
        documentFrequency.set(feature, (documentFrequency.get(feature) ?? 0) + 1);
      }
    }

    const idf = new Map<string, number>();
    for (const [feature, df] of documentFrequency) {
      idf.set(feature, Math.log((1 + n) / (1 + df)) + 1);
    }

    const classCounts: ModelScores = { software: 0, hardware: 0 };
    const featureTotals: Record<Category, Map<string, number>> = {
      software: new Map(),
      hardware: new Map(),
    };

    examples.forEach((example, index) => {
      classCounts[example.label]++;
      const totals = featureTotals[example.label];
      for (const [feature, weight] of vectorize(documents[index], idf)) {
        totals.set(feature, (totals.get(feature) ?? 0) + weight);
      }
    });

    const vocabularySize = idf.size;
    const logPriors: ModelScores = { software: -Infinity, hardware: -Infinity };
    const featureLogProbs: Record<Category, Map<string, number>> = {
      software: new Map(),
      hardware: new Map(),
    };

    for (const category of CATEGORIES) {
      if (classCounts[category] > 0) {
        logPriors[category] = Math.log(classCounts[category] / n);
      }

      let classTotal = 0;
      for (const weight of featureTotals[category].values()) {
        classTotal += weight;
      }
      const denominator = classTotal + alpha * vocabularySize;

      for (const feature of idf.keys()) {
        const count = featureTotals[category].get(feature) ?? 0;
        featureLogProbs[category].set(feature, Math.log((count + alpha) / denominator));
      }
    }

    return new NaiveBayesTitleModel(idf, logPriors, featureLogProbs);
  }

  get vocabularySize(): number {
    return this.idf.size;
  }

  /**
   * Joint log-likelihood per class, or null when no feature is known
   */
  scores(text: string): ModelScores | null {
    const vector = vectorize(extractFeatures(text), this.idf);
    if (vector.size === 0) {
      return null;
    }

    const result: ModelScores = { ...this.logPriors };
    for (const category of CATEGORIES) {
      const logProbs = this.featureLogProbs[category];
      for (const [feature, weight] of vector) {
        const logProb = logProbs.get(feature);
        if (logProb !== undefined) {
          result[category] += weight * logProb;
        }
      }
    }
    return result;
  }

  predict(text: string): Category | null {
    const scores = this.scores(text);
    if (!scores || scores.software === scores.hardware) {
      return null;
    }
    return scores.hardware > scores.software ? "hardware" : "software";
  }
}

/**
 * TF-IDF vector over known features, L2-normalized
 */
function vectorize(features: string[], idf: Map<string, number>): SparseVector {
  const counts = new Map<string, number>();
  for (const feature of features) {
    if (idf.has(feature)) {
      counts.set(feature, (counts.get(feature) ?? 0) + 1);
    }
  }

  const weighted: SparseVector = new Map();
  let sumOfSquares = 0;
  for (const [feature, count] of counts) {
    const weight = count * (idf.get(feature) ?? 0);
    weighted.set(feature, weight);
    sumOfSquares += weight * weight;
  }

  if (sumOfSquares === 0) {
    return new Map();
  }

  const norm = Math.sqrt(sumOfSquares);
  for (const [feature, weight] of weighted) {
    weighted.set(feature, weight / norm);
  }
  return weighted;
}
