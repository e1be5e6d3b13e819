import crypto from "crypto";

import { createPolicy } from "../adaptive/policyFactory";
import type { AdaptationMode, DifficultyLevel } from "../adaptive/types";
import type { ClassifierHandle } from "../model/classifierHandle";
import { logger } from "../utils/logger";
import { LearningSession, type SessionSummary } from "./learningSession";
import { PuzzleGenerator } from "./puzzleGenerator";
import type { SessionLogStore } from "./sessionLogStore";

export interface StartSessionInput {
  userName: string;
  initialDifficulty: DifficultyLevel;
  adaptationMode?: AdaptationMode;
  maxQuestions?: number;
}

export interface SessionManagerOptions {
  classifier: ClassifierHandle;
  sessionLog: SessionLogStore;
  defaultMode: AdaptationMode;
  defaultMaxQuestions: number;
  /** Active sessions with no answer for longer than this are dropped. */
  idleTtlMs: number;
  /** How many finished ids are remembered for duplicate-finish detection. */
  maxFinishedIds?: number;
  generator?: PuzzleGenerator;
  now?: () => Date;
  idFactory?: () => string;
}

export class SessionManager {
  private readonly sessions = new Map<string, LearningSession>();
  private readonly finished = new Set<string>();
  private readonly generator: PuzzleGenerator;
  private readonly idFactory: () => string;
  private readonly now: () => Date;
  private readonly maxFinishedIds: number;

  constructor(private readonly opts: SessionManagerOptions) {
    this.generator = opts.generator ?? new PuzzleGenerator();
    this.idFactory = opts.idFactory ?? (() => crypto.randomUUID());
    this.now = opts.now ?? (() => new Date());
    this.maxFinishedIds = opts.maxFinishedIds ?? 10_000;
  }

  start(input: StartSessionInput): LearningSession {
    this.evictIdle();
    const mode = input.adaptationMode ?? this.opts.defaultMode;

    const session = new LearningSession({
      sessionId: this.idFactory(),
      userName: input.userName,
      initialDifficulty: input.initialDifficulty,
      policy: createPolicy(mode, this.opts.classifier),
      maxQuestions: input.maxQuestions ?? this.opts.defaultMaxQuestions,
      generator: this.generator,
      now: this.now
    });

    this.sessions.set(session.id, session);

    logger.info({
      sessionId: session.id,
      adaptationMode: mode,
      initialDifficulty: input.initialDifficulty,
      classifierState: this.opts.classifier.getState()
    }, "session_started");

    return session;
  }

  get(sessionId: string): LearningSession | null {
    this.evictIdle();
    return this.sessions.get(sessionId) ?? null;
  }

  isFinished(sessionId: string): boolean {
    return this.finished.has(sessionId);
  }

  /**
   * Completes the session, appends it to the session log and forgets it.
   * Returns null for unknown ids. When the append fails the session stays
   * active so the finish can be retried.
   */
  async finish(sessionId: string): Promise<SessionSummary | null> {
    const session = this.get(sessionId);
    if (!session) return null;

    const summary = session.complete();
    this.sessions.delete(sessionId);
    this.markFinished(sessionId);

    try {
      await this.opts.sessionLog.append(session.toRecord());
    } catch (err: unknown) {
      this.sessions.set(sessionId, session);
      this.finished.delete(sessionId);
      logger.error({ err, sessionId }, "session_finish_failed");
      throw err;
    }

    logger.info({
      sessionId,
      totalAnswered: summary.metrics.totalAnswered,
      accuracy: summary.metrics.accuracyPercent,
      finalDifficulty: summary.progression.final
    }, "session_finished");

    return summary;
  }

  activeCount(): number {
    this.evictIdle();
    return this.sessions.size;
  }

  private markFinished(sessionId: string): void {
    this.finished.add(sessionId);
    // Sets iterate in insertion order, so the first ids are the oldest.
    for (const id of this.finished) {
      if (this.finished.size <= this.maxFinishedIds) break;
      this.finished.delete(id);
    }
  }

  private evictIdle(): void {
    const cutoff = this.now().getTime() - this.opts.idleTtlMs;

    this.sessions.forEach((session, id) => {
      if (session.lastActivityAt.getTime() < cutoff) {
        this.sessions.delete(id);
        logger.info({ sessionId: id, questionCount: session.questionCount }, "session_evicted_idle");
      }
    });
  }
}
