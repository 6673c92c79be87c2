// functions/src/entry/answersHandler.ts

import type { Request, Response } from "express";
import { logger } from "../core/logging/logger";
import { routeAnswersRequest, type AnswersRouterDeps } from "./answersRouter";

export function createAnswersHandler(deps: AnswersRouterDeps) {
  return async function answersHandler(req: Request, res: Response): Promise<void> {
    const out = await routeAnswersRequest(deps, {
      method: req.method,
      path: req.path,
      authorization: req.header("authorization"),
      body: req.body,
      query: req.query,
    });

    // caller went away; whatever the store did stays done, but nobody is told
    if (res.destroyed || res.headersSent) {
      logger.info("ai_answers_response_dropped", { path: req.path, status: out.status });
      return;
    }

    res.status(out.status).json(out.body);
  };
}
