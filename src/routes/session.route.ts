import { Router } from "express";

import type { SessionController } from "../sessions/session.controller";

export const createSessionRouter = (controller: SessionController): Router => {
  const sessionRouter = Router();

  sessionRouter.post("/", (req, res, next) => {
    controller.startSession(req, res).catch(next);
  });

  sessionRouter.get("/:sessionId", (req, res, next) => {
    controller.getSession(req, res).catch(next);
  });

  sessionRouter.post("/:sessionId/answers", (req, res, next) => {
    controller.submitAnswer(req, res).catch(next);
  });

  sessionRouter.get("/:sessionId/snapshot", (req, res, next) => {
    controller.getSnapshot(req, res).catch(next);
  });

  sessionRouter.post("/:sessionId/finish", (req, res, next) => {
    controller.finishSession(req, res).catch(next);
  });

  return sessionRouter;
};
