import { logger } from "../utils/logger";
import type {
  AnswerEvent,
  DifficultyBreakdown,
  DifficultyLevel,
  LatencyTrend,
  PerformanceSnapshot
} from "./types";

const RECENT_WINDOW = 3;
const SLOWING_RATIO = 1.2;
const IMPROVING_RATIO = 0.8;

const EMPTY_SNAPSHOT: PerformanceSnapshot = {
  totalAnswered: 0,
  correctCount: 0,
  incorrectCount: 0,
  accuracyPercent: 0,
  avgResponseTimeSeconds: 0,
  currentStreak: 0,
  maxStreak: 0,
  recentAccuracyPercent: 0,
  latencyTrend: 'stable'
};

const mean = (values: number[]): number => {
  if (values.length === 0) return 0;
  return values.reduce((a, b) => a + b, 0) / values.length;
};

export const classifyLatencyTrend = (responseTimes: number[]): LatencyTrend => {
  if (responseTimes.length < RECENT_WINDOW) return 'stable';

  const recent = responseTimes.slice(-RECENT_WINDOW);
  const older = responseTimes.slice(0, -RECENT_WINDOW);

  if (older.length === 0) return 'stable';

  const recentAvg = mean(recent);
  const olderAvg = mean(older);

  if (recentAvg > olderAvg * SLOWING_RATIO) return 'slowing';
  if (recentAvg < olderAvg * IMPROVING_RATIO) return 'improving';
  return 'stable';
};

/**
 * Running performance state for one learner's session. The snapshot is
 * always derived from the recorded log, so replaying the same events
 * produces the same snapshot.
 */
export class MetricsAggregator {
  private readonly log: AnswerEvent[] = [];
  private correctCount = 0;
  private incorrectCount = 0;
  private currentStreak = 0;
  private maxStreak = 0;
  private totalResponseTime = 0;

  static fromEvents(events: readonly AnswerEvent[]): MetricsAggregator {
    const aggregator = new MetricsAggregator();
    events.forEach(e => aggregator.record(e));
    return aggregator;
  }

  record(event: AnswerEvent): void {
    const frozen: AnswerEvent = Object.freeze({ ...event });
    this.log.push(frozen);

    if (frozen.isCorrect) {
      this.correctCount += 1;
      this.currentStreak += 1;
      this.maxStreak = Math.max(this.maxStreak, this.currentStreak);
    } else {
      this.incorrectCount += 1;
      this.currentStreak = 0;
    }

    this.totalResponseTime += frozen.responseTimeSeconds;

    logger.debug({
      sequenceIndex: frozen.sequenceIndex,
      isCorrect: frozen.isCorrect,
      difficultyLevel: frozen.difficultyLevel,
      currentStreak: this.currentStreak
    }, "answer_recorded");
  }

  snapshot(): PerformanceSnapshot {
    const total = this.log.length;
    if (total === 0) {
      return { ...EMPTY_SNAPSHOT };
    }

    const recent = this.log.slice(-Math.min(RECENT_WINDOW, total));
    const recentCorrect = recent.filter(e => e.isCorrect).length;

    return {
      totalAnswered: total,
      correctCount: this.correctCount,
      incorrectCount: this.incorrectCount,
      accuracyPercent: (this.correctCount / total) * 100,
      avgResponseTimeSeconds: this.totalResponseTime / total,
      currentStreak: this.currentStreak,
      maxStreak: this.maxStreak,
      recentAccuracyPercent: (recentCorrect / recent.length) * 100,
      latencyTrend: classifyLatencyTrend(this.log.map(e => e.responseTimeSeconds))
    };
  }

  difficultyBreakdown(): DifficultyBreakdown {
    const totals = new Map<DifficultyLevel, { correct: number; total: number; time: number }>();

    for (const event of this.log) {
      const current = totals.get(event.difficultyLevel) ?? { correct: 0, total: 0, time: 0 };
      current.total += 1;
      if (event.isCorrect) current.correct += 1;
      current.time += event.responseTimeSeconds;
      totals.set(event.difficultyLevel, current);
    }

    const breakdown: DifficultyBreakdown = {};
    totals.forEach((stats, level) => {
      breakdown[level] = {
        count: stats.total,
        accuracyPercent: (stats.correct / stats.total) * 100,
        avgResponseTimeSeconds: stats.time / stats.total
      };
    });

    return breakdown;
  }

  events(): readonly AnswerEvent[] {
    return [...this.log];
  }

  get size(): number {
    return this.log.length;
  }
}
