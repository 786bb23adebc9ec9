/**
 * Training set loading and validation
 *
 * The curated titles live in data/classifier-training.json:
 *   { "version": 1, "examples": [{ "title": "...", "label": "software" }] }
 *
 * Validation is fail-fast: throws on the first problem.
 */

import * as fs from "fs";
import * as path from "path";
import type { Category, TrainingExample } from "@/types";
import { TRAINING_SET_PATH } from "@/constants";
import { isCategory, isRecord } from "@/utils/payloadGuards";

/**
 * Error thrown when the training set file is malformed
 */
export class TrainingSetValidationError extends Error {
  constructor(message: string) {
    super(`Training set validation failed: ${message}`);
    this.name = "TrainingSetValidationError";
  }
}

/**
 * Validate a parsed training set document
 *
 * Rules:
 * - `examples` is a non-empty array
 * - every title is a non-blank string
 * - every label is "software" or "hardware"
 * - both labels are represented
 *
 * @throws {TrainingSetValidationError}
 */
export function validateTrainingSet(raw: unknown): TrainingExample[] {
  if (!isRecord(raw)) {
    throw new TrainingSetValidationError("root must be an object");
  }

  const examples = raw.examples;
  if (!Array.isArray(examples) || examples.length === 0) {
    throw new TrainingSetValidationError("examples must be a non-empty array");
  }

  const validated: TrainingExample[] = [];
  const labels = new Set<Category>();

  examples.forEach((item: unknown, index) => {
    if (!isRecord(item)) {
      throw new TrainingSetValidationError(`examples[${index}] must be an object`);
    }
    const { title, label } = item;
    if (typeof title !== "string" || title.trim().length === 0) {
      throw new TrainingSetValidationError(
        `examples[${index}].title must be a non-empty string`,
      );
    }
    if (!isCategory(label)) {
      throw new TrainingSetValidationError(
        `examples[${index}].label must be "software" or "hardware", got ${JSON.stringify(label)}`,
      );
    }
    labels.add(label);
    validated.push({ title: title.trim(), label });
  });

  if (labels.size < 2) {
    throw new TrainingSetValidationError(
      "examples must include both software and hardware labels",
    );
  }

  return validated;
}

/**
 * Read, parse and validate the training set
 *
 * @param filePath - Path relative to cwd (defaults to TRAINING_SET_PATH)
 * @throws {Error} If the file cannot be read
 * @throws {SyntaxError} If the JSON is malformed
 * @throws {TrainingSetValidationError} If validation fails
 */
export function loadTrainingSet(
  filePath: string = TRAINING_SET_PATH,
): TrainingExample[] {
  const resolved = path.resolve(process.cwd(), filePath);
  const raw: unknown = JSON.parse(fs.readFileSync(resolved, "utf-8"));
  return validateTrainingSet(raw);
}
