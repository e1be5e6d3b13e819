import { Router } from "express";

import type { SessionController } from "../sessions/session.controller";

export const createModelRouter = (controller: SessionController): Router => {
  const modelRouter = Router();

  modelRouter.get("/status", (req, res, next) => {
    controller.getModelStatus(req, res).catch(next);
  });

  return modelRouter;
};
