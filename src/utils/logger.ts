import pino from "pino";

import { env } from "../config/env";

const level = env.LOG_LEVEL ?? (env.NODE_ENV === "production" ? "info" : env.NODE_ENV === "test" ? "silent" : "debug");

export const logger = pino({
  level,
  base: { service: "adaptive-quiz-backend" },
  redact: {
    paths: [
      "req.headers.authorization",
      "req.headers.cookie"
    ],
    remove: true
  }
});
