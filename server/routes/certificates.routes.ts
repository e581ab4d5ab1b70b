import { Router, type Request, type Response } from "express";
import {
  ingestRequestSchema,
  listCertificatesQuerySchema,
  saveDraftRequestSchema,
  submitRequestSchema,
} from "@shared/schema";
import { asyncHandler, BadRequestError, ValidationError } from "../errors";
import { currentIdentity } from "../middleware/identity";
import type { IngestionService } from "../services/certificates/ingestion";
import type { SubmissionService } from "../services/certificates/submission-service";

const DATA_URL_PREFIX = /^data:[^;,]+;base64,/;

export function decodeUpload(fileBase64: string): Buffer {
  const payload = fileBase64.replace(DATA_URL_PREFIX, "").replace(/\s+/g, "");
  if (!/^[A-Za-z0-9+/]*={0,2}$/.test(payload)) {
    throw new BadRequestError("fileBase64 is not valid base64");
  }
  return Buffer.from(payload, "base64");
}

export interface CertificatesRouterDeps {
  ingestion: IngestionService;
  submissions: SubmissionService;
}

export function createCertificatesRouter({ ingestion, submissions }: CertificatesRouterDeps): Router {
  const router = Router();

  router.post("/ingest", asyncHandler(async (req: Request, res: Response) => {
    const parsed = ingestRequestSchema.safeParse(req.body);
    if (!parsed.success) throw ValidationError.fromZodError(parsed.error);
    const identity = currentIdentity(req);

    // Abandon recognition if the client goes away.
    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableFinished) controller.abort();
    });

    const result = await ingestion.ingest(
      decodeUpload(parsed.data.fileBase64),
      parsed.data.declaredType,
      identity.accountId,
      { originalName: parsed.data.originalName, signal: controller.signal }
    );

    res.status(201).json({
      certificate: result.record,
      missingRequired: result.missingRequired,
      suggestions: result.suggestions,
      notes: result.notes,
      extraction: result.extraction,
    });
  }));

  router.get("/", asyncHandler(async (req: Request, res: Response) => {
    const parsed = listCertificatesQuerySchema.safeParse(req.query);
    if (!parsed.success) throw ValidationError.fromZodError(parsed.error);

    const certificates = await submissions.listCertificates(currentIdentity(req), parsed.data);
    res.json({ data: certificates, total: certificates.length });
  }));

  router.get("/:id", asyncHandler(async (req: Request, res: Response) => {
    const certificate = await submissions.getCertificate(currentIdentity(req), req.params.id);
    res.json(certificate);
  }));

  router.patch("/:id", asyncHandler(async (req: Request, res: Response) => {
    const parsed = saveDraftRequestSchema.safeParse(req.body ?? {});
    if (!parsed.success) throw ValidationError.fromZodError(parsed.error);

    const result = await submissions.saveDraft(currentIdentity(req), req.params.id, parsed.data.edits);
    res.json({
      certificate: result.record,
      missingRequired: result.missingRequired,
      suggestions: result.suggestions,
      notes: result.notes,
    });
  }));

  router.post("/:id/submit", asyncHandler(async (req: Request, res: Response) => {
    const parsed = submitRequestSchema.safeParse(req.body ?? {});
    if (!parsed.success) throw ValidationError.fromZodError(parsed.error);

    const result = await submissions.submit(currentIdentity(req), req.params.id, parsed.data.edits);
    res.json({ certificate: result.record, notes: result.notes });
  }));

  router.delete("/:id", asyncHandler(async (req: Request, res: Response) => {
    await submissions.discard(currentIdentity(req), req.params.id);
    res.status(204).end();
  }));

  return router;
}
