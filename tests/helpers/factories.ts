import type { AnswerEvent, DifficultyLevel, PerformanceSnapshot } from '../../src/adaptive/types';
import type { FeatureVector, SuccessClassifier } from '../../src/model/types';
import type { ResponseRecord, SessionRecord } from '../../src/sessions/sessionRecord';

export function makeSnapshot(overrides: Partial<PerformanceSnapshot> = {}): PerformanceSnapshot {
  return {
    totalAnswered: 10,
    correctCount: 7,
    incorrectCount: 3,
    accuracyPercent: 70,
    avgResponseTimeSeconds: 6,
    currentStreak: 1,
    maxStreak: 3,
    recentAccuracyPercent: 66.67,
    latencyTrend: 'stable',
    ...overrides
  };
}

export function makeEvents(
  outcomes: Array<[isCorrect: boolean, responseTimeSeconds: number]>,
  level: DifficultyLevel = 'Easy'
): AnswerEvent[] {
  return outcomes.map(([isCorrect, responseTimeSeconds], i) => ({
    isCorrect,
    responseTimeSeconds,
    difficultyLevel: level,
    sequenceIndex: i + 1
  }));
}

/**
 * Classifier double returning a fixed probability and remembering its inputs.
 */
export class StubClassifier implements SuccessClassifier {
  readonly calls: FeatureVector[] = [];

  constructor(private readonly probability: number) {}

  predictProbability(features: FeatureVector): number {
    this.calls.push([...features]);
    return this.probability;
  }
}

export class ThrowingClassifier implements SuccessClassifier {
  calls = 0;

  predictProbability(): number {
    this.calls += 1;
    throw new Error('inference exploded');
  }
}

export function makeSessionRecord(
  sessionId: string,
  outcomes: Array<[isCorrect: boolean, responseTime: number]>,
  level: DifficultyLevel = 'Easy'
): SessionRecord {
  return {
    sessionId,
    timestamp: '2026-02-01T10:00:00.000Z',
    userName: 'tester',
    adaptationMode: 'rule_based',
    initialDifficulty: level,
    finalDifficulty: level,
    totalQuestions: outcomes.length,
    difficultyHistory: [level],
    responses: outcomes.map(([isCorrect, responseTime]): ResponseRecord => ({
      puzzle: { question: '2 + 3 = ?', operand1: 2, operand2: 3, operation: '+', answer: 5, difficulty: level },
      userAnswer: isCorrect ? 5 : 4,
      isCorrect,
      responseTime,
      difficulty: level
    }))
  };
}
