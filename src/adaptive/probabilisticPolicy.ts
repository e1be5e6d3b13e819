import type { ClassifierHandle } from "../model/classifierHandle";
import type { FeatureVector } from "../model/types";
import { logger } from "../utils/logger";
import { isCeiling, isFloor } from "./difficulty";
import { decideByThreshold } from "./thresholdPolicy";
import type {
  DecisionResult,
  DifficultyLevel,
  DifficultyPolicy,
  FallbackReason,
  PerformanceSnapshot
} from "./types";

export const PROBABILITY_CUTS = {
  increaseAbove: 0.6,
  decreaseBelow: 0.4
} as const;

export const SAFETY_ACCURACY_FLOOR = 50;

export const toFeatureVector = (snapshot: PerformanceSnapshot): FeatureVector => [
  snapshot.accuracyPercent,
  snapshot.avgResponseTimeSeconds,
  snapshot.currentStreak,
  snapshot.recentAccuracyPercent
];

export class ProbabilisticPolicy implements DifficultyPolicy {
  readonly mode = 'ml_based' as const;

  constructor(private readonly handle: ClassifierHandle) {}

  isReady(): boolean {
    return this.handle.isReady();
  }

  decide(snapshot: PerformanceSnapshot, currentLevel: DifficultyLevel): DecisionResult {
    if (snapshot.accuracyPercent < SAFETY_ACCURACY_FLOOR && !isFloor(currentLevel)) {
      return { action: 'decrease', source: 'safety_override' };
    }

    if (!this.handle.isReady()) {
      return this.fallback(snapshot, currentLevel, 'model_unavailable');
    }

    let probability: number;
    try {
      probability = this.handle.predictProbability(toFeatureVector(snapshot));
    } catch (err) {
      logger.warn({ err, currentLevel, totalAnswered: snapshot.totalAnswered }, "model_inference_failed");
      return this.fallback(snapshot, currentLevel, 'inference_failed');
    }

    if (probability > PROBABILITY_CUTS.increaseAbove && !isCeiling(currentLevel)) {
      return { action: 'increase', source: 'model', probability };
    }

    if (probability < PROBABILITY_CUTS.decreaseBelow && !isFloor(currentLevel)) {
      return { action: 'decrease', source: 'model', probability };
    }

    return { action: 'maintain', source: 'model', probability };
  }

  private fallback(snapshot: PerformanceSnapshot, currentLevel: DifficultyLevel, reason: FallbackReason): DecisionResult {
    return {
      action: decideByThreshold(snapshot, currentLevel),
      source: 'fallback',
      fallbackReason: reason
    };
  }
}
