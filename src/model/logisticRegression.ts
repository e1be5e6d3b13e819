import type { ClassifierArtifact } from "./artifact";
import { FEATURE_NAMES, type FeatureVector, type SuccessClassifier, type TrainingExample } from "./types";

const EPSILON = 1e-12;

export interface LogisticRegressionOptions {
  learningRate?: number;
  maxIterations?: number;
  /** Inverse of L2 regularization strength. */
  c?: number;
  tolerance?: number;
}

const DEFAULT_OPTIONS: Required<LogisticRegressionOptions> = {
  learningRate: 0.5,
  maxIterations: 1000,
  c: 1.0,
  tolerance: 1e-7
};

export const sigmoid = (x: number): number => {
  if (x > 20) return 1 - EPSILON;
  if (x < -20) return EPSILON;
  return 1 / (1 + Math.exp(-x));
};

export const assertFeatureVector = (features: FeatureVector): void => {
  if (features.length !== FEATURE_NAMES.length) {
    throw new Error(`Expected ${FEATURE_NAMES.length} features, received ${features.length}`);
  }
  features.forEach((value, i) => {
    if (!Number.isFinite(value)) {
      throw new Error(`Feature ${FEATURE_NAMES[i] ?? i} is not a finite number`);
    }
  });
};

const columnStats = (rows: FeatureVector[]): { means: number[]; scales: number[] } => {
  const columns = FEATURE_NAMES.map((_, j) => rows.map(row => row[j] ?? 0));

  const means = columns.map(col => col.reduce((a, b) => a + b, 0) / col.length);
  const scales = columns.map((col, j) => {
    const m = means[j] ?? 0;
    const std = Math.sqrt(col.reduce((acc, v) => acc + (v - m) * (v - m), 0) / col.length);
    // Constant columns keep unit scale so they contribute nothing after centering.
    return std > EPSILON ? std : 1;
  });

  return { means, scales };
};

export class LogisticRegressionClassifier implements SuccessClassifier {
  constructor(
    private readonly weights: readonly number[],
    private readonly intercept: number,
    private readonly means: readonly number[],
    private readonly scales: readonly number[]
  ) {}

  static fromArtifact(artifact: ClassifierArtifact): LogisticRegressionClassifier {
    return new LogisticRegressionClassifier(
      artifact.weights,
      artifact.intercept,
      artifact.featureMeans,
      artifact.featureScales
    );
  }

  predictProbability(features: FeatureVector): number {
    assertFeatureVector(features);

    let logit = this.intercept;
    for (let j = 0; j < this.weights.length; j++) {
      const z = ((features[j] ?? 0) - (this.means[j] ?? 0)) / (this.scales[j] ?? 1);
      logit += (this.weights[j] ?? 0) * z;
    }
    return sigmoid(logit);
  }

  predict(features: FeatureVector): 0 | 1 {
    return this.predictProbability(features) >= 0.5 ? 1 : 0;
  }

  score(examples: readonly TrainingExample[]): number {
    if (examples.length === 0) return 0;
    const hits = examples.filter(ex => this.predict(ex.features) === ex.label).length;
    return hits / examples.length;
  }

  toArtifact(meta: { trainedAt: string; sampleCount: number; trainingAccuracy: number }): ClassifierArtifact {
    return {
      format: "logistic-regression",
      featureNames: [...FEATURE_NAMES],
      weights: [...this.weights],
      intercept: this.intercept,
      featureMeans: [...this.means],
      featureScales: [...this.scales],
      trainedAt: meta.trainedAt,
      sampleCount: meta.sampleCount,
      trainingAccuracy: meta.trainingAccuracy
    };
  }
}

/**
 * Batch gradient descent on standardized features with an L2 penalty on the
 * weights (the intercept is not penalized). Starts from zero weights, so the
 * same examples always produce the same model.
 */
export const fitLogisticRegression = (
  examples: readonly TrainingExample[],
  options: LogisticRegressionOptions = {}
): LogisticRegressionClassifier => {
  if (examples.length === 0) {
    throw new Error("Cannot fit a classifier without examples");
  }

  const { learningRate, maxIterations, c, tolerance } = { ...DEFAULT_OPTIONS, ...options };
  examples.forEach(ex => assertFeatureVector(ex.features));

  const n = examples.length;
  const d = FEATURE_NAMES.length;
  const { means, scales } = columnStats(examples.map(ex => ex.features));
  const rows = examples.map(ex => ex.features.map((v, j) => (v - (means[j] ?? 0)) / (scales[j] ?? 1)));
  const regularization = 1 / (c * n);

  let weights = new Array<number>(d).fill(0);
  let intercept = 0;
  let previousLoss = Number.POSITIVE_INFINITY;

  for (let iter = 0; iter < maxIterations; iter++) {
    const gradients = new Array<number>(d).fill(0);
    let interceptGradient = 0;
    let loss = 0;

    rows.forEach((row, i) => {
      const label = examples[i]?.label ?? 0;
      const logit = row.reduce((acc, v, j) => acc + (weights[j] ?? 0) * v, intercept);
      const pred = sigmoid(logit);

      loss += -label * Math.log(pred + EPSILON) - (1 - label) * Math.log(1 - pred + EPSILON);

      const error = pred - label;
      row.forEach((v, j) => {
        gradients[j] = (gradients[j] ?? 0) + error * v;
      });
      interceptGradient += error;
    });

    loss = loss / n + (regularization / 2) * weights.reduce((acc, w) => acc + w * w, 0);
    weights = weights.map((w, j) => w - learningRate * ((gradients[j] ?? 0) / n + regularization * w));
    intercept -= learningRate * (interceptGradient / n);

    if (Math.abs(previousLoss - loss) < tolerance) break;
    previousLoss = loss;
  }

  return new LogisticRegressionClassifier(weights, intercept, means, scales);
};
