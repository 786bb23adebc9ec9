/**
 * Classification public API
 */

export { JobClassifier, createJobClassifier } from "./jobClassifier";
export type { JobClassifierOptions } from "./jobClassifier";
export { NaiveBayesTitleModel, extractFeatures } from "./naiveBayes";
export {
  loadTrainingSet,
  validateTrainingSet,
  TrainingSetValidationError,
} from "./trainingSet";
