import "dotenv/config";

import { createApp } from "./app";
import { env } from "./config/env";
import { ClassifierHandle } from "./model/classifierHandle";
import { SessionLogStore } from "./sessions/sessionLogStore";
import { SessionManager } from "./sessions/sessionManager";
import { logger } from "./utils/logger";

const main = async () => {
  const classifier = await ClassifierHandle.load(env.MODEL_ARTIFACT_PATH);

  if (env.DEFAULT_ADAPTATION_MODE !== "rule_based" && !classifier.isReady()) {
    logger.warn({ mode: env.DEFAULT_ADAPTATION_MODE }, "classifier_unavailable_using_threshold_fallback");
  }

  const sessions = new SessionManager({
    classifier,
    sessionLog: new SessionLogStore(env.SESSION_LOG_PATH),
    defaultMode: env.DEFAULT_ADAPTATION_MODE,
    defaultMaxQuestions: env.MAX_QUESTIONS_PER_SESSION,
    idleTtlMs: env.SESSION_IDLE_TTL_MINUTES * 60_000
  });

  const app = createApp({ sessions, classifier, corsOrigin: env.CORS_ORIGIN });

  const server = app.listen(env.PORT, () => {
    logger.info({ port: env.PORT, env: env.NODE_ENV, classifier: classifier.getState() }, "server_listening");
  });

  const shutdown = (signal: string) => {
    logger.info({ signal }, "server_shutdown_start");
    server.close((err) => {
      if (err) {
        logger.error({ err }, "server_shutdown_error");
        process.exitCode = 1;
        return process.exit();
      }
      logger.info("server_shutdown_complete");
      process.exit();
    });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
};

main().catch((err: unknown) => {
  logger.fatal({ err }, "server_start_failed");
  process.exit(1);
});
