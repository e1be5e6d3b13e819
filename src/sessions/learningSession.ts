import { DifficultyHistory } from "../adaptive/difficulty";
import { MetricsAggregator } from "../adaptive/metricsAggregator";
import type {
  AdaptationMode,
  DecisionResult,
  DifficultyBreakdown,
  DifficultyLevel,
  DifficultyPolicy,
  PerformanceSnapshot
} from "../adaptive/types";
import { logger } from "../utils/logger";
import { PuzzleGenerator, type Puzzle } from "./puzzleGenerator";
import type { ResponseRecord, SessionRecord } from "./sessionRecord";

export const ANSWER_TOLERANCE = 0.01;
export const MIN_ANSWERS_BEFORE_ADAPTING = 2;

export const isAnswerCorrect = (userAnswer: number, correctAnswer: number): boolean => {
  return Math.abs(userAnswer - correctAnswer) < ANSWER_TOLERANCE;
};

export type SessionStatus = 'active' | 'completed';
export type RecommendationTier = 'excellent' | 'good' | 'keep_practicing';

export interface AnswerSubmission {
  userAnswer: number;
  responseTimeSeconds: number;
}

export interface AnswerOutcome {
  questionNumber: number;
  isCorrect: boolean;
  correctAnswer: number;
  decision: DecisionResult | null;
  previousLevel: DifficultyLevel;
  currentLevel: DifficultyLevel;
  levelChanged: boolean;
  nextPuzzle: Puzzle | null;
  completed: boolean;
}

export interface SessionSummary {
  sessionId: string;
  userName: string;
  adaptationMode: AdaptationMode;
  durationSeconds: number;
  metrics: PerformanceSnapshot;
  difficultyBreakdown: DifficultyBreakdown;
  progression: {
    started: DifficultyLevel;
    final: DifficultyLevel;
    changes: number;
    path: DifficultyLevel[];
  };
  recommendation: {
    tier: RecommendationTier;
    messages: string[];
  };
}

export interface LearningSessionOptions {
  sessionId: string;
  userName: string;
  initialDifficulty: DifficultyLevel;
  policy: DifficultyPolicy;
  maxQuestions: number;
  generator?: PuzzleGenerator;
  now?: () => Date;
}

const recommendFor = (accuracyPercent: number): SessionSummary["recommendation"] => {
  if (accuracyPercent >= 80) {
    return {
      tier: 'excellent',
      messages: [
        "Excellent! You're mastering this level.",
        "Next time, try starting at a higher difficulty."
      ]
    };
  }

  if (accuracyPercent >= 60) {
    return {
      tier: 'good',
      messages: [
        "Good job! You're making progress.",
        "Practice will help you get faster and more accurate."
      ]
    };
  }

  return {
    tier: 'keep_practicing',
    messages: [
      "Keep practicing! You'll improve with time.",
      "Don't worry about speed, focus on accuracy first."
    ]
  };
};

/**
 * One learner working through up to `maxQuestions` puzzles. Owns its event
 * log, difficulty history and policy; nothing here is shared between sessions.
 */
export class LearningSession {
  readonly id: string;
  readonly userName: string;
  readonly maxQuestions: number;
  readonly startedAt: Date;

  private readonly policy: DifficultyPolicy;
  private readonly generator: PuzzleGenerator;
  private readonly now: () => Date;
  private readonly aggregator = new MetricsAggregator();
  private readonly history: DifficultyHistory;
  private readonly responses: ResponseRecord[] = [];
  private currentPuzzle: Puzzle | null;
  private status: SessionStatus = 'active';
  private lastActivity: Date;

  constructor(opts: LearningSessionOptions) {
    this.id = opts.sessionId;
    this.userName = opts.userName;
    this.maxQuestions = opts.maxQuestions;
    this.policy = opts.policy;
    this.generator = opts.generator ?? new PuzzleGenerator();
    this.now = opts.now ?? (() => new Date());
    this.startedAt = this.now();
    this.lastActivity = this.startedAt;
    this.history = new DifficultyHistory(opts.initialDifficulty);
    this.currentPuzzle = this.generator.generatePuzzle(opts.initialDifficulty);
  }

  get adaptationMode(): AdaptationMode {
    return this.policy.mode;
  }

  get currentLevel(): DifficultyLevel {
    return this.history.current;
  }

  get questionCount(): number {
    return this.aggregator.size;
  }

  get lastActivityAt(): Date {
    return this.lastActivity;
  }

  getStatus(): SessionStatus {
    return this.status;
  }

  getCurrentPuzzle(): Puzzle | null {
    return this.currentPuzzle;
  }

  getDifficultyHistory(): DifficultyLevel[] {
    return this.history.toArray();
  }

  snapshot(): PerformanceSnapshot {
    return this.aggregator.snapshot();
  }

  submitAnswer(submission: AnswerSubmission): AnswerOutcome {
    const puzzle = this.currentPuzzle;
    if (this.status !== 'active' || !puzzle) {
      throw new Error("Session is not accepting answers");
    }

    this.lastActivity = this.now();
    const previousLevel = this.history.current;
    const isCorrect = isAnswerCorrect(submission.userAnswer, puzzle.answer);

    this.aggregator.record({
      isCorrect,
      responseTimeSeconds: submission.responseTimeSeconds,
      difficultyLevel: previousLevel,
      sequenceIndex: this.aggregator.size + 1
    });

    this.responses.push({
      puzzle,
      userAnswer: submission.userAnswer,
      isCorrect,
      responseTime: submission.responseTimeSeconds,
      difficulty: previousLevel
    });

    let decision: DecisionResult | null = null;
    if (this.aggregator.size >= MIN_ANSWERS_BEFORE_ADAPTING) {
      decision = this.policy.decide(this.aggregator.snapshot(), previousLevel);
      this.history.transition(decision.action);
    }

    const currentLevel = this.history.current;
    const levelChanged = currentLevel !== previousLevel;

    if (levelChanged) {
      logger.info({
        sessionId: this.id,
        from: previousLevel,
        to: currentLevel,
        source: decision?.source,
        probability: decision?.probability
      }, "difficulty_changed");
    }

    const completed = this.aggregator.size >= this.maxQuestions;
    if (completed) {
      this.status = 'completed';
      this.currentPuzzle = null;
    } else {
      this.currentPuzzle = this.generator.generatePuzzle(currentLevel);
    }

    return {
      questionNumber: this.aggregator.size,
      isCorrect,
      correctAnswer: puzzle.answer,
      decision,
      previousLevel,
      currentLevel,
      levelChanged,
      nextPuzzle: this.currentPuzzle,
      completed
    };
  }

  /**
   * Stops the session early (or confirms completion) and returns its summary.
   */
  complete(): SessionSummary {
    this.status = 'completed';
    this.currentPuzzle = null;
    return this.summary();
  }

  summary(): SessionSummary {
    const metrics = this.aggregator.snapshot();
    const path = this.history.toArray();

    return {
      sessionId: this.id,
      userName: this.userName,
      adaptationMode: this.adaptationMode,
      durationSeconds: Math.max(0, Math.floor((this.now().getTime() - this.startedAt.getTime()) / 1000)),
      metrics,
      difficultyBreakdown: this.aggregator.difficultyBreakdown(),
      progression: {
        started: this.history.initial,
        final: this.history.current,
        changes: this.history.changes,
        path
      },
      recommendation: recommendFor(metrics.accuracyPercent)
    };
  }

  toRecord(): SessionRecord {
    return {
      sessionId: this.id,
      timestamp: this.startedAt.toISOString(),
      userName: this.userName,
      adaptationMode: this.adaptationMode,
      initialDifficulty: this.history.initial,
      finalDifficulty: this.history.current,
      totalQuestions: this.aggregator.size,
      difficultyHistory: this.history.toArray(),
      responses: this.responses.map(r => ({ ...r, puzzle: { ...r.puzzle } }))
    };
  }
}
