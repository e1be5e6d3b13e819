import type { Request, Response } from "express";
import { z } from "zod";

import type { ClassifierHandle } from "../model/classifierHandle";
import { HttpError } from "../utils/httpError";
import type { LearningSession } from "./learningSession";
import type { Puzzle } from "./puzzleGenerator";
import { adaptationModeSchema, difficultyLevelSchema } from "./sessionRecord";
import type { SessionManager } from "./sessionManager";

const startSessionSchema = z.object({
  userName: z.string().trim().min(1).max(100),
  initialDifficulty: difficultyLevelSchema,
  adaptationMode: adaptationModeSchema.optional(),
  maxQuestions: z.number().int().min(1).max(100).optional()
});

const answerSchema = z.object({
  userAnswer: z.number().finite(),
  responseTimeSeconds: z.number().finite().min(0).max(3600)
});

const sessionIdParamSchema = z.object({
  sessionId: z.string().min(1).max(100)
});

// The answer stays server-side until the learner has responded.
const presentPuzzle = (puzzle: Puzzle | null) => {
  if (!puzzle) return null;
  return {
    question: puzzle.question,
    operand1: puzzle.operand1,
    operand2: puzzle.operand2,
    operation: puzzle.operation,
    difficulty: puzzle.difficulty
  };
};

const presentSession = (session: LearningSession) => ({
  sessionId: session.id,
  userName: session.userName,
  adaptationMode: session.adaptationMode,
  status: session.getStatus(),
  currentLevel: session.currentLevel,
  questionCount: session.questionCount,
  maxQuestions: session.maxQuestions,
  difficultyHistory: session.getDifficultyHistory(),
  currentPuzzle: presentPuzzle(session.getCurrentPuzzle())
});

export class SessionController {
  constructor(
    private readonly sessions: SessionManager,
    private readonly classifier: ClassifierHandle
  ) {}

  async startSession(req: Request, res: Response): Promise<void> {
    const parsedBody = startSessionSchema.safeParse(req.body);
    if (!parsedBody.success) {
      throw new HttpError(400, "Invalid session request", parsedBody.error.flatten());
    }

    const session = this.sessions.start(parsedBody.data);

    res.status(201).json({
      ok: true,
      data: presentSession(session)
    });
  }

  async getSession(req: Request, res: Response): Promise<void> {
    const session = this.requireSession(req);

    res.status(200).json({
      ok: true,
      data: {
        ...presentSession(session),
        snapshot: session.snapshot()
      }
    });
  }

  async submitAnswer(req: Request, res: Response): Promise<void> {
    const session = this.requireSession(req);

    const parsedBody = answerSchema.safeParse(req.body);
    if (!parsedBody.success) {
      throw new HttpError(400, "Invalid answer", parsedBody.error.flatten());
    }

    if (session.getStatus() !== 'active') {
      throw new HttpError(409, "Session is already complete");
    }

    const outcome = session.submitAnswer(parsedBody.data);

    res.status(200).json({
      ok: true,
      data: {
        ...outcome,
        nextPuzzle: presentPuzzle(outcome.nextPuzzle),
        snapshot: session.snapshot()
      }
    });
  }

  async getSnapshot(req: Request, res: Response): Promise<void> {
    const session = this.requireSession(req);

    res.status(200).json({
      ok: true,
      data: session.snapshot()
    });
  }

  async finishSession(req: Request, res: Response): Promise<void> {
    const { sessionId } = this.parseSessionId(req);

    if (this.sessions.isFinished(sessionId)) {
      throw new HttpError(409, "Session already finished");
    }

    const summary = await this.sessions.finish(sessionId);
    if (!summary) {
      throw new HttpError(404, "Session not found");
    }

    res.status(200).json({
      ok: true,
      data: summary
    });
  }

  async getModelStatus(_req: Request, res: Response): Promise<void> {
    res.status(200).json({
      ok: true,
      data: this.classifier.getStatus()
    });
  }

  private parseSessionId(req: Request): { sessionId: string } {
    const parsedParams = sessionIdParamSchema.safeParse(req.params);
    if (!parsedParams.success) {
      throw new HttpError(400, "Invalid session ID", parsedParams.error.flatten());
    }
    return parsedParams.data;
  }

  private requireSession(req: Request): LearningSession {
    const { sessionId } = this.parseSessionId(req);
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new HttpError(404, "Session not found");
    }
    return session;
  }
}
