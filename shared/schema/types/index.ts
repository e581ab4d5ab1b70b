import type { z } from "zod";
import type { certificates, uploadedFiles } from "../certificates";
import type { ACCOUNT_ROLES, CERTIFICATE_STATUSES, EXTRACTION_STATUSES } from "../base";
import type { certificateEditsSchema } from "../schemas";

export type AccountRole = typeof ACCOUNT_ROLES[number];
export type CertificateStatus = typeof CERTIFICATE_STATUSES[number];
export type ExtractionStatus = typeof EXTRACTION_STATUSES[number];

export type UploadedFile = typeof uploadedFiles.$inferSelect;
export type InsertUploadedFile = typeof uploadedFiles.$inferInsert;
export type CertificateRecord = typeof certificates.$inferSelect;

export type CertificateEdits = z.infer<typeof certificateEditsSchema>;

/** The submitter as seen by the intake core. */
export interface Identity {
  accountId: string;
  displayName: string;
  role: AccountRole;
  department: string;
}
