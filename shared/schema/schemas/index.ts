import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";
import { certificates } from "../certificates";

// Fields a submitter may send when editing a draft. `null` clears a field.
export const certificateEditsSchema = createInsertSchema(certificates)
  .pick({
    studentId: true,
    studentName: true,
    department: true,
    competitionName: true,
    awardCategory: true,
    awardLevel: true,
    competitionType: true,
    organizer: true,
    awardDate: true,
    advisor: true,
    advisorAccountId: true,
  })
  .partial()
  .strict();

export const ingestRequestSchema = z.object({
  fileBase64: z.string().min(1, "fileBase64 is required"),
  declaredType: z.string().min(1, "declaredType is required"),
  originalName: z.string().min(1).max(255).optional(),
});

export const saveDraftRequestSchema = z.object({
  edits: certificateEditsSchema.default({}),
});

export const submitRequestSchema = z.object({
  edits: certificateEditsSchema.optional(),
});

export const setDeadlineRequestSchema = z.object({
  deadline: z.string().datetime({ offset: true }).nullable(),
});

export const listCertificatesQuerySchema = z.object({
  status: z.enum(['draft', 'submitted']).optional(),
});
