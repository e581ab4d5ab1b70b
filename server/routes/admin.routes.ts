import { Router, type Request, type Response } from "express";
import { setDeadlineRequestSchema } from "@shared/schema";
import { asyncHandler, ValidationError } from "../errors";
import { currentIdentity, requireRole } from "../middleware/identity";
import type { SubmissionService } from "../services/certificates/submission-service";

export function createAdminRouter(submissions: SubmissionService): Router {
  const router = Router();
  router.use(requireRole("admin"));

  router.put("/deadline", asyncHandler(async (req: Request, res: Response) => {
    const parsed = setDeadlineRequestSchema.safeParse(req.body);
    if (!parsed.success) throw ValidationError.fromZodError(parsed.error);

    const deadline = parsed.data.deadline ? new Date(parsed.data.deadline) : null;
    const stored = await submissions.setDeadline(currentIdentity(req), deadline);
    res.json({ deadline: stored ? stored.toISOString() : null });
  }));

  router.delete("/certificates/:id", asyncHandler(async (req: Request, res: Response) => {
    await submissions.adminDelete(currentIdentity(req), req.params.id);
    res.status(204).end();
  }));

  return router;
}
