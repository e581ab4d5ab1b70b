import { pgTable, text, varchar, timestamp, integer, json, real } from "drizzle-orm/pg-core";
import type { CertificateFieldName } from "../certificate-fields";
import { accountRoleEnum, baseIdColumn, certificateStatusEnum, extractionStatusEnum, timestampColumns } from "./base";

export const uploadedFiles = pgTable("uploaded_files", {
  fileId: baseIdColumn("file_id"),
  ownerAccountId: varchar("owner_account_id", { length: 32 }).notNull(),
  originalName: text("original_name").notNull(),
  storedPath: text("stored_path").notNull(),
  mimeOrExtension: varchar("mime_or_extension", { length: 100 }).notNull(),
  byteSize: integer("byte_size").notNull(),
  uploadTimestamp: timestamp("upload_timestamp").defaultNow().notNull(),
});

export const certificates = pgTable("certificates", {
  certId: baseIdColumn("cert_id"),
  submitterAccountId: varchar("submitter_account_id", { length: 32 }).notNull(),
  submitterRole: accountRoleEnum("submitter_role").notNull(),
  studentId: varchar("student_id", { length: 13 }),
  studentName: text("student_name"),
  department: text("department"),
  competitionName: text("competition_name"),
  awardCategory: text("award_category"),
  awardLevel: text("award_level"),
  competitionType: text("competition_type"),
  organizer: text("organizer"),
  awardDate: varchar("award_date", { length: 32 }),
  advisor: text("advisor"),
  advisorAccountId: varchar("advisor_account_id", { length: 8 }),
  fileId: varchar("file_id").references(() => uploadedFiles.fileId).notNull(),
  filePath: text("file_path").notNull(),
  status: certificateStatusEnum("status").notNull().default('draft'),
  confirmedFields: json("confirmed_fields").$type<CertificateFieldName[]>().notNull().default([]),
  extractionStatus: extractionStatusEnum("extraction_status"),
  extractionMethod: text("extraction_method"),
  extractionConfidence: real("extraction_confidence"),
  ...timestampColumns,
  submittedAt: timestamp("submitted_at"),
});
