export type DifficultyLevel = 'Easy' | 'Medium' | 'Hard';
export type AdaptationAction = 'increase' | 'maintain' | 'decrease';
export type AdaptationMode = 'rule_based' | 'ml_based' | 'hybrid';
export type LatencyTrend = 'improving' | 'stable' | 'slowing';

export const DIFFICULTY_LEVELS: readonly DifficultyLevel[] = ['Easy', 'Medium', 'Hard'];

export interface AnswerEvent {
  readonly isCorrect: boolean;
  readonly responseTimeSeconds: number;
  readonly difficultyLevel: DifficultyLevel;
  readonly sequenceIndex: number;
}

export interface PerformanceSnapshot {
  totalAnswered: number;
  correctCount: number;
  incorrectCount: number;
  accuracyPercent: number;
  avgResponseTimeSeconds: number;
  currentStreak: number;
  maxStreak: number;
  recentAccuracyPercent: number;
  latencyTrend: LatencyTrend;
}

export interface LevelBreakdown {
  count: number;
  accuracyPercent: number;
  avgResponseTimeSeconds: number;
}

export type DifficultyBreakdown = Partial<Record<DifficultyLevel, LevelBreakdown>>;

/**
 * Why a policy did not use the classifier for a decision.
 */
export type FallbackReason = 'model_unavailable' | 'inference_failed';

export type DecisionSource = 'rule' | 'model' | 'safety_override' | 'fallback';

export type ArbiterResolution = 'agreement' | 'model_override' | 'rule_default';

export interface DecisionResult {
  action: AdaptationAction;
  source: DecisionSource;
  /** Success probability reported by the classifier, when it was queried. */
  probability?: number;
  fallbackReason?: FallbackReason;
  /** Set by the hybrid arbiter only. */
  resolution?: ArbiterResolution;
}

export interface DifficultyPolicy {
  readonly mode: AdaptationMode;
  decide(snapshot: PerformanceSnapshot, currentLevel: DifficultyLevel): DecisionResult;
}
