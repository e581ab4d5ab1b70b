import { Router, type Request, type Response } from "express";
import { asyncHandler } from "../errors";
import type { SubmissionService } from "../services/certificates/submission-service";
import { isDeadlinePassed } from "../services/certificates/submission-state";

export function createDeadlineRouter(submissions: SubmissionService): Router {
  const router = Router();

  router.get("/", asyncHandler(async (_req: Request, res: Response) => {
    const { now, deadline } = await submissions.transitionContext();
    res.json({
      deadline: deadline ? deadline.toISOString() : null,
      passed: isDeadlinePassed(now, deadline),
    });
  }));

  return router;
}
