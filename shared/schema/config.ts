import { pgTable, text, varchar, timestamp } from "drizzle-orm/pg-core";
import { baseIdColumn } from "./base";

export const SUBMISSION_DEADLINE_KEY = 'submission_deadline';

export const systemConfig = pgTable("system_config", {
  id: baseIdColumn(),
  key: varchar("key", { length: 100 }).notNull().unique(),
  value: text("value").notNull(),
  description: text("description"),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
  updatedBy: varchar("updated_by", { length: 32 }),
});
