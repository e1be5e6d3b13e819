import { describe, it, expect, beforeEach, vi } from 'vitest';

vi.mock('../../../src/utils/logger', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn()
  }
}));

import { ProbabilisticPolicy, toFeatureVector } from '../../../src/adaptive/probabilisticPolicy';
import { decideByThreshold } from '../../../src/adaptive/thresholdPolicy';
import { ClassifierHandle } from '../../../src/model/classifierHandle';
import { logger } from '../../../src/utils/logger';
import { makeSnapshot, StubClassifier, ThrowingClassifier } from '../../helpers/factories';

describe('ProbabilisticPolicy', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('safety override', () => {
    it('should decrease below 50% accuracy even when the model is confident', () => {
      const stub = new StubClassifier(0.95);
      const policy = new ProbabilisticPolicy(ClassifierHandle.ready(stub));

      const result = policy.decide(makeSnapshot({ accuracyPercent: 45, currentStreak: 4 }), 'Medium');

      expect(result).toEqual({ action: 'decrease', source: 'safety_override' });
      expect(stub.calls).toHaveLength(0);
    });

    it('should fire before the untrained fallback', () => {
      const policy = new ProbabilisticPolicy(ClassifierHandle.untrained());

      expect(policy.decide(makeSnapshot({ accuracyPercent: 10 }), 'Hard')).toEqual({
        action: 'decrease',
        source: 'safety_override'
      });
    });

    it('should not apply at Easy', () => {
      const stub = new StubClassifier(0.95);
      const policy = new ProbabilisticPolicy(ClassifierHandle.ready(stub));

      const result = policy.decide(makeSnapshot({ accuracyPercent: 45 }), 'Easy');

      expect(result).toEqual({ action: 'increase', source: 'model', probability: 0.95 });
    });

    it('should not apply at exactly 50% accuracy', () => {
      const policy = new ProbabilisticPolicy(ClassifierHandle.ready(new StubClassifier(0.5)));

      expect(policy.decide(makeSnapshot({ accuracyPercent: 50 }), 'Medium').source).toBe('model');
    });
  });

  describe('untrained classifier', () => {
    it('should delegate to the threshold policy and say why', () => {
      const policy = new ProbabilisticPolicy(ClassifierHandle.untrained());
      const snapshot = makeSnapshot({ accuracyPercent: 85, avgResponseTimeSeconds: 3, currentStreak: 3 });

      expect(policy.isReady()).toBe(false);
      expect(policy.decide(snapshot, 'Easy')).toEqual({
        action: decideByThreshold(snapshot, 'Easy'),
        source: 'fallback',
        fallbackReason: 'model_unavailable'
      });
    });

    it('should treat a handle that never attempted a load as unavailable', () => {
      const policy = new ProbabilisticPolicy(new ClassifierHandle());
      const result = policy.decide(makeSnapshot({ accuracyPercent: 70 }), 'Medium');

      expect(result.fallbackReason).toBe('model_unavailable');
    });
  });

  describe('probability cut points', () => {
    const cases: Array<[number, 'Easy' | 'Medium' | 'Hard', string]> = [
      [0.61, 'Medium', 'increase'],
      [0.6, 'Medium', 'maintain'],
      [0.4, 'Medium', 'maintain'],
      [0.39, 'Medium', 'decrease'],
      [0.9, 'Hard', 'maintain'],
      [0.1, 'Easy', 'maintain']
    ];

    it.each(cases)('p=%s at %s should %s', (probability, level, expected) => {
      const policy = new ProbabilisticPolicy(ClassifierHandle.ready(new StubClassifier(probability)));

      const result = policy.decide(makeSnapshot({ accuracyPercent: 75 }), level);

      expect(result.action).toBe(expected);
      expect(result.source).toBe('model');
      expect(result.probability).toBe(probability);
    });
  });

  describe('features', () => {
    it('should query the classifier with accuracy, average time, streak and recent accuracy', () => {
      const stub = new StubClassifier(0.5);
      const policy = new ProbabilisticPolicy(ClassifierHandle.ready(stub));
      const snapshot = makeSnapshot({
        accuracyPercent: 75,
        avgResponseTimeSeconds: 4.5,
        currentStreak: 2,
        recentAccuracyPercent: 100
      });

      policy.decide(snapshot, 'Medium');

      expect(stub.calls).toEqual([[75, 4.5, 2, 100]]);
      expect(toFeatureVector(snapshot)).toEqual([75, 4.5, 2, 100]);
    });
  });

  describe('inference failure', () => {
    it('should fall back for that call, log a warning and recover on the next call', () => {
      const throwing = new ThrowingClassifier();
      const policy = new ProbabilisticPolicy(ClassifierHandle.ready(throwing));
      const snapshot = makeSnapshot({ accuracyPercent: 50, avgResponseTimeSeconds: 9, currentStreak: 0 });

      const first = policy.decide(snapshot, 'Medium');
      const second = policy.decide(snapshot, 'Medium');

      expect(first).toEqual({ action: 'decrease', source: 'fallback', fallbackReason: 'inference_failed' });
      expect(second).toEqual(first);
      expect(throwing.calls).toBe(2);
      expect(logger.warn).toHaveBeenCalledWith(
        expect.objectContaining({ currentLevel: 'Medium' }),
        'model_inference_failed'
      );
    });

    it('should reject a probability outside [0, 1]', () => {
      const policy = new ProbabilisticPolicy(ClassifierHandle.ready(new StubClassifier(Number.NaN)));

      const result = policy.decide(makeSnapshot({ accuracyPercent: 70 }), 'Medium');

      expect(result.source).toBe('fallback');
      expect(result.fallbackReason).toBe('inference_failed');
    });

    it('should reject a malformed feature vector from a real classifier', () => {
      const handle = ClassifierHandle.fromArtifact({
        format: 'logistic-regression',
        featureNames: ['accuracy', 'avgRecentResponseTime', 'consecutiveCorrect', 'recentAccuracy'],
        weights: [0.1, -0.1, 0.2, 0.1],
        intercept: 0,
        featureMeans: [50, 5, 1, 50],
        featureScales: [10, 2, 1, 10],
        trainedAt: '2026-01-01T00:00:00.000Z',
        sampleCount: 20,
        trainingAccuracy: 0.7
      });
      const policy = new ProbabilisticPolicy(handle);

      const result = policy.decide(makeSnapshot({ accuracyPercent: 70, avgResponseTimeSeconds: Number.POSITIVE_INFINITY }), 'Medium');

      expect(result.fallbackReason).toBe('inference_failed');
      expect(result.action).toBe('decrease');
    });
  });
});
