import { isCeiling, isFloor } from "./difficulty";
import type {
  AdaptationAction,
  DecisionResult,
  DifficultyLevel,
  DifficultyPolicy,
  PerformanceSnapshot
} from "./types";

export const THRESHOLDS = {
  increase: {
    minAccuracy: 80,
    maxAvgResponseTime: 5,
    minStreak: 2
  },
  decrease: {
    maxAccuracy: 60,
    minAvgResponseTime: 8
  }
} as const;

export const shouldIncrease = (snapshot: PerformanceSnapshot): boolean => {
  const { minAccuracy, maxAvgResponseTime, minStreak } = THRESHOLDS.increase;
  return (
    snapshot.accuracyPercent >= minAccuracy &&
    snapshot.avgResponseTimeSeconds <= maxAvgResponseTime &&
    snapshot.currentStreak >= minStreak
  );
};

export const shouldDecrease = (snapshot: PerformanceSnapshot): boolean => {
  const { maxAccuracy, minAvgResponseTime } = THRESHOLDS.decrease;
  return snapshot.accuracyPercent < maxAccuracy || snapshot.avgResponseTimeSeconds >= minAvgResponseTime;
};

/**
 * Increase is evaluated first. A guarded level (Hard for increase, Easy for
 * decrease) skips that branch instead of clamping it.
 */
export const decideByThreshold = (snapshot: PerformanceSnapshot, currentLevel: DifficultyLevel): AdaptationAction => {
  if (shouldIncrease(snapshot) && !isCeiling(currentLevel)) {
    return 'increase';
  }

  if (shouldDecrease(snapshot) && !isFloor(currentLevel)) {
    return 'decrease';
  }

  return 'maintain';
};

export class ThresholdPolicy implements DifficultyPolicy {
  readonly mode = 'rule_based' as const;

  decide(snapshot: PerformanceSnapshot, currentLevel: DifficultyLevel): DecisionResult {
    return {
      action: decideByThreshold(snapshot, currentLevel),
      source: 'rule'
    };
  }
}
