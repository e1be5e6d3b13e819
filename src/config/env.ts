import path from "path";
import { z } from "zod";

const adaptationModeSchema = z.enum(["rule_based", "ml_based", "hybrid"]);

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().int().min(1).max(65535).default(8080),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).optional(),
  CORS_ORIGIN: z.string().optional(),
  MODEL_ARTIFACT_PATH: z.string().min(1).default(path.join("data", "models", "difficulty-classifier.json")),
  SESSION_LOG_PATH: z.string().min(1).default(path.join("data", "performance_logs.json")),
  DEFAULT_ADAPTATION_MODE: adaptationModeSchema.default("rule_based"),
  MIN_TRAINING_SAMPLES: z.coerce.number().int().min(1).default(10),
  MAX_QUESTIONS_PER_SESSION: z.coerce.number().int().min(1).max(100).default(10),
  SESSION_IDLE_TTL_MINUTES: z.coerce.number().int().min(1).default(30)
});

export type Env = z.infer<typeof envSchema>;

export const parseEnv = (source: NodeJS.ProcessEnv): Env => {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  return parsed.data;
};

export const env = parseEnv(process.env);
