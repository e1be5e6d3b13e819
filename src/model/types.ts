export const FEATURE_NAMES = ['accuracy', 'avgRecentResponseTime', 'consecutiveCorrect', 'recentAccuracy'] as const;

export type FeatureName = typeof FEATURE_NAMES[number];

/** Ordered as FEATURE_NAMES. */
export type FeatureVector = readonly number[];

export interface TrainingExample {
  features: FeatureVector;
  label: 0 | 1;
}

export interface SuccessClassifier {
  /** Probability that the learner answers the next puzzle correctly. */
  predictProbability(features: FeatureVector): number;
}

export interface EvaluationMetrics {
  trainAccuracy: number;
  testAccuracy: number;
  precision: number;
  recall: number;
  f1: number;
  trainCount: number;
  testCount: number;
}
