/**
 * Job classifier: software vs hardware
 *
 * Strict precedence, first decisive rule wins:
 * 1. hardware keyword in the title          -> hardware
 * 2. software keyword in the title          -> software
 * 3. description keyword counts: hardware must beat software by more than
 *    DESCRIPTION_HARDWARE_MARGIN, otherwise any software hit -> software
 * 4. naive Bayes model on the title
 * 5. software
 */

import type {
  Category,
  ClassificationExplanation,
  Logger,
  TrainingExample,
} from "@/types";
import type { TextClassifier } from "@/interfaces";
import {
  DESCRIPTION_HARDWARE_MARGIN,
  HARDWARE_KEYWORDS,
  SOFTWARE_KEYWORDS,
} from "@/constants";
import {
  compileTerms,
  countTerms,
  firstTerm,
  type CompiledTerm,
} from "@/utils/text/keywordMatching";
import * as defaultLogger from "@/logger";
import { NaiveBayesTitleModel } from "./naiveBayes";
import { loadTrainingSet } from "./trainingSet";

export type JobClassifierOptions = {
  /** Fallback model; null disables rule 4 */
  model: NaiveBayesTitleModel | null;
  hardwareKeywords?: readonly string[];
  softwareKeywords?: readonly string[];
};

export class JobClassifier implements TextClassifier {
  private readonly model: NaiveBayesTitleModel | null;
  private readonly hardwareTerms: CompiledTerm[];
  private readonly softwareTerms: CompiledTerm[];

  constructor(options: JobClassifierOptions) {
    this.model = options.model;
    this.hardwareTerms = compileTerms(
      options.hardwareKeywords ?? HARDWARE_KEYWORDS,
      "substring",
    );
    this.softwareTerms = compileTerms(
      options.softwareKeywords ?? SOFTWARE_KEYWORDS,
      "substring",
    );
  }

  get hasModel(): boolean {
    return this.model !== null;
  }

  classify(title: string, description: string = ""): Category {
    return this.explain(title, description).category;
  }

  /**
   * Classify and report which rule decided
   */
  explain(title: string, description: string = ""): ClassificationExplanation {
    const hardwareInTitle = firstTerm(title, this.hardwareTerms);
    if (hardwareInTitle !== undefined) {
      return {
        category: "hardware",
        rule: "title_hardware",
        matchedKeyword: hardwareInTitle,
        hardwareHits: 0,
        softwareHits: 0,
      };
    }

    const softwareInTitle = firstTerm(title, this.softwareTerms);
    if (softwareInTitle !== undefined) {
      return {
        category: "software",
        rule: "title_software",
        matchedKeyword: softwareInTitle,
        hardwareHits: 0,
        softwareHits: 0,
      };
    }

    let hardwareHits = 0;
    let softwareHits = 0;
    if (description) {
      hardwareHits = countTerms(description, this.hardwareTerms);
      softwareHits = countTerms(description, this.softwareTerms);

      if (hardwareHits > softwareHits + DESCRIPTION_HARDWARE_MARGIN) {
        return { category: "hardware", rule: "description_hardware", hardwareHits, softwareHits };
      }
      if (softwareHits > 0) {
        return { category: "software", rule: "description_software", hardwareHits, softwareHits };
      }
    }

    const predicted = this.model?.predict(title) ?? null;
    if (predicted !== null) {
      return { category: predicted, rule: "model", hardwareHits, softwareHits };
    }

    return { category: "software", rule: "default", hardwareHits, softwareHits };
  }
}

/**
 * Build a classifier with its fallback model trained from the curated set
 *
 * A training set that cannot be loaded leaves the classifier without a
 * model (rule 4 is skipped) rather than failing start-up.
 *
 * @param options.trainingSetPath - Override the training data location
 * @param options.examples - Train from these instead of reading a file
 */
export function createJobClassifier(
  options: {
    trainingSetPath?: string;
    examples?: readonly TrainingExample[];
    logger?: Logger;
  } = {},
): JobClassifier {
  const log = options.logger ?? defaultLogger;
  let model: NaiveBayesTitleModel | null = null;

  try {
    const examples = options.examples ?? loadTrainingSet(options.trainingSetPath);
    model = NaiveBayesTitleModel.train(examples);
    log.debug("Classifier model trained", {
      examples: examples.length,
      vocabularySize: model.vocabularySize,
    });
  } catch (err) {
    log.warn("Classifier model unavailable, keyword rules only", {
      error: err instanceof Error ? err.message : String(err),
    });
  }

  return new JobClassifier({ model });
}
