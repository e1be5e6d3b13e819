import { decideByThreshold } from "./thresholdPolicy";
import type { ProbabilisticPolicy } from "./probabilisticPolicy";
import type {
  DecisionResult,
  DifficultyLevel,
  DifficultyPolicy,
  PerformanceSnapshot
} from "./types";

/** Closed accuracy band in which the model may overrule a rule-based maintain. */
export const MODEL_OVERRIDE_BAND = { min: 70, max: 85 } as const;

export class HybridArbiter implements DifficultyPolicy {
  readonly mode = 'hybrid' as const;

  constructor(private readonly probabilistic: ProbabilisticPolicy) {}

  decide(snapshot: PerformanceSnapshot, currentLevel: DifficultyLevel): DecisionResult {
    const ruleAction = decideByThreshold(snapshot, currentLevel);

    if (!this.probabilistic.isReady()) {
      return { action: ruleAction, source: 'fallback', fallbackReason: 'model_unavailable', resolution: 'agreement' };
    }

    const modelDecision = this.probabilistic.decide(snapshot, currentLevel);

    if (modelDecision.action === ruleAction) {
      return { ...modelDecision, resolution: 'agreement' };
    }

    const inBand =
      snapshot.accuracyPercent >= MODEL_OVERRIDE_BAND.min &&
      snapshot.accuracyPercent <= MODEL_OVERRIDE_BAND.max;

    if (ruleAction === 'maintain' && inBand) {
      return { ...modelDecision, resolution: 'model_override' };
    }

    return {
      action: ruleAction,
      source: 'rule',
      probability: modelDecision.probability,
      resolution: 'rule_default'
    };
  }
}
