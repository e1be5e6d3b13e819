import { describe, it, expect } from 'vitest';
import { parseArtifact } from '../../../src/model/artifact';
import {
  LogisticRegressionClassifier,
  fitLogisticRegression,
  sigmoid
} from '../../../src/model/logisticRegression';
import type { TrainingExample } from '../../../src/model/types';

// Accuracy alone separates the labels; response time is constant.
const separable = (): TrainingExample[] =>
  Array.from({ length: 20 }, (_, i) => {
    const positive = i >= 10;
    return {
      features: [positive ? 80 + i : 20 + i, 5, i % 3, 50],
      label: positive ? 1 : 0
    };
  });

const META = { trainedAt: '2026-03-01T00:00:00.000Z', sampleCount: 20, trainingAccuracy: 1 };

describe('sigmoid', () => {
  it('should be 0.5 at zero and clamp extreme logits', () => {
    expect(sigmoid(0)).toBe(0.5);
    expect(sigmoid(25)).toBe(1 - 1e-12);
    expect(sigmoid(-25)).toBe(1e-12);
  });
});

describe('fitLogisticRegression', () => {
  it('should separate linearly separable examples', () => {
    const examples = separable();
    const classifier = fitLogisticRegression(examples);

    expect(classifier.score(examples)).toBe(1);
    expect(classifier.predictProbability([95, 5, 0, 50])).toBeGreaterThan(0.6);
    expect(classifier.predictProbability([15, 5, 0, 50])).toBeLessThan(0.4);
  });

  it('should produce the same model from the same examples', () => {
    const first = fitLogisticRegression(separable()).toArtifact(META);
    const second = fitLogisticRegression(separable()).toArtifact(META);

    expect(second).toEqual(first);
  });

  it('should give constant columns unit scale', () => {
    const artifact = fitLogisticRegression(separable()).toArtifact(META);

    expect(artifact.featureMeans[1]).toBe(5);
    expect(artifact.featureScales[1]).toBe(1);
    expect(artifact.featureScales[3]).toBe(1);
  });

  it('should refuse an empty training set', () => {
    expect(() => fitLogisticRegression([])).toThrow('Cannot fit a classifier without examples');
  });

  it('should refuse examples with the wrong number of features', () => {
    expect(() => fitLogisticRegression([{ features: [1, 2, 3], label: 1 }])).toThrow('Expected 4 features, received 3');
  });
});

describe('LogisticRegressionClassifier', () => {
  it('should predict identically after an artifact round trip', () => {
    const classifier = fitLogisticRegression(separable());
    const restored = LogisticRegressionClassifier.fromArtifact(
      parseArtifact(JSON.stringify(classifier.toArtifact(META)))
    );

    for (const features of [[10, 5, 0, 50], [55, 5, 1, 50], [99, 5, 2, 50]]) {
      expect(restored.predictProbability(features)).toBe(classifier.predictProbability(features));
    }
  });

  it('should apply weights to standardized features', () => {
    const classifier = new LogisticRegressionClassifier([1, 0, 0, 0], 0, [50, 0, 0, 0], [10, 1, 1, 1]);

    expect(classifier.predictProbability([50, 3, 3, 3])).toBe(0.5);
    expect(classifier.predictProbability([60, 0, 0, 0])).toBeCloseTo(1 / (1 + Math.exp(-1)), 12);
    expect(classifier.predict([49, 0, 0, 0])).toBe(0);
    expect(classifier.predict([50, 0, 0, 0])).toBe(1);
  });

  it('should reject non-finite features', () => {
    const classifier = new LogisticRegressionClassifier([1, 0, 0, 0], 0, [0, 0, 0, 0], [1, 1, 1, 1]);

    expect(() => classifier.predictProbability([Number.NaN, 0, 0, 0])).toThrow('Feature accuracy is not a finite number');
  });

  it('should score an empty set as 0', () => {
    const classifier = new LogisticRegressionClassifier([0, 0, 0, 0], 0, [0, 0, 0, 0], [1, 1, 1, 1]);
    expect(classifier.score([])).toBe(0);
  });
});
