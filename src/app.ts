import compression from "compression";
import cors from "cors";
import express, { type NextFunction, type Request, type Response } from "express";
import rateLimit from "express-rate-limit";
import helmet from "helmet";
import pinoHttp from "pino-http";

import type { ClassifierHandle } from "./model/classifierHandle";
import { moduleForUrl, SystemMonitor } from "./monitoring/systemMonitor";
import { createModelRouter } from "./routes/model.route";
import { createSessionRouter } from "./routes/session.route";
import { SessionController } from "./sessions/session.controller";
import type { SessionManager } from "./sessions/sessionManager";
import { HttpError } from "./utils/httpError";
import { logger } from "./utils/logger";

export interface AppDependencies {
  sessions: SessionManager;
  classifier: ClassifierHandle;
  monitor?: SystemMonitor;
  corsOrigin?: string;
  rateLimitPerMinute?: number;
}

export const createApp = (deps: AppDependencies) => {
  const app = express();
  const monitor = deps.monitor ?? new SystemMonitor();
  const controller = new SessionController(deps.sessions, deps.classifier);

  app.disable("x-powered-by");

  app.use(
    pinoHttp({
      logger,
      autoLogging: {
        ignore: (req) => req.url === "/health"
      }
    })
  );

  app.use(helmet());

  app.use(
    cors({
      origin: (origin, cb) => {
        const allowed = deps.corsOrigin;
        if (!allowed) return cb(null, true);
        if (!origin) return cb(null, true);
        const allowedList = allowed.split(",").map((s) => s.trim());
        return cb(null, allowedList.includes(origin));
      },
      credentials: true
    })
  );

  app.use(compression());
  app.use(express.json({ limit: "100kb" }));

  app.use(
    rateLimit({
      windowMs: 60_000,
      limit: deps.rateLimitPerMinute ?? 120,
      standardHeaders: true,
      legacyHeaders: false
    })
  );

  app.use((req, res, next) => {
    const start = process.hrtime.bigint();

    res.on("finish", () => {
      monitor.recordRequest({
        timestamp: Date.now(),
        durationMs: Number(process.hrtime.bigint() - start) / 1e6,
        status: res.statusCode,
        module: moduleForUrl(req.originalUrl)
      });
    });

    next();
  });

  app.get("/health", (_req, res) =>
    res.status(200).json({
      ok: true,
      uptimeSeconds: monitor.getUptimeSeconds(),
      activeSessions: deps.sessions.activeCount(),
      classifier: deps.classifier.getState(),
      requests: monitor.getStats(5 * 60_000)
    })
  );

  app.use("/api/sessions", createSessionRouter(controller));
  app.use("/api/model", createModelRouter(controller));

  app.use((_req, _res, next) => {
    next(new HttpError(404, "Not found"));
  });

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const requestId = req.id ?? req.header("x-request-id") ?? undefined;

    if (err instanceof HttpError) {
      req.log.warn({ err, requestId }, "request_error");

      return res.status(err.status).json({
        ok: false,
        error: {
          message: err.message,
          status: err.status,
          details: err.details,
          request_id: requestId
        }
      });
    }

    // Malformed JSON bodies surface from express.json() as a 400 SyntaxError.
    if (err instanceof SyntaxError && "status" in err && err.status === 400) {
      req.log.warn({ err, requestId }, "request_body_invalid");

      return res.status(400).json({
        ok: false,
        error: {
          message: "Malformed JSON body",
          status: 400,
          request_id: requestId
        }
      });
    }

    req.log.error({ err, requestId }, "unhandled_error");

    return res.status(500).json({
      ok: false,
      error: {
        message: "Internal server error",
        status: 500,
        request_id: requestId
      }
    });
  });

  return app;
};
