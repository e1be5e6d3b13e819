import { z } from "zod";

export const difficultyLevelSchema = z.enum(['Easy', 'Medium', 'Hard']);
export const adaptationModeSchema = z.enum(['rule_based', 'ml_based', 'hybrid']);
export const operationSchema = z.enum(['+', '-', '×', '÷']);

export const puzzleSchema = z.object({
  question: z.string(),
  operand1: z.number(),
  operand2: z.number(),
  operation: operationSchema,
  answer: z.number(),
  difficulty: difficultyLevelSchema
});

export const responseRecordSchema = z.object({
  puzzle: puzzleSchema,
  userAnswer: z.number(),
  isCorrect: z.boolean(),
  responseTime: z.number().min(0),
  difficulty: difficultyLevelSchema
});

export const sessionRecordSchema = z.object({
  sessionId: z.string().min(1),
  timestamp: z.string().datetime(),
  userName: z.string().min(1),
  adaptationMode: adaptationModeSchema,
  initialDifficulty: difficultyLevelSchema,
  finalDifficulty: difficultyLevelSchema,
  totalQuestions: z.number().int().min(0),
  difficultyHistory: z.array(difficultyLevelSchema).min(1),
  responses: z.array(responseRecordSchema)
});

export type ResponseRecord = z.infer<typeof responseRecordSchema>;
export type SessionRecord = z.infer<typeof sessionRecordSchema>;
