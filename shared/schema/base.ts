import { pgEnum, varchar, timestamp } from "drizzle-orm/pg-core";

export const ACCOUNT_ROLES = ['student', 'teacher', 'admin'] as const;
export const CERTIFICATE_STATUSES = ['draft', 'submitted'] as const;
export const EXTRACTION_STATUSES = ['ok', 'partial', 'failed'] as const;

export const accountRoleEnum = pgEnum('account_role', ACCOUNT_ROLES);
export const certificateStatusEnum = pgEnum('certificate_status', CERTIFICATE_STATUSES);
export const extractionStatusEnum = pgEnum('extraction_status', EXTRACTION_STATUSES);

export const baseIdColumn = (name: string = "id") => varchar(name).primaryKey().$defaultFn(() => crypto.randomUUID());
export const timestampColumns = {
  createdAt: timestamp("created_at").defaultNow().notNull(),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
};
