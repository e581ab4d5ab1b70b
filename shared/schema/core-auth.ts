import { pgTable, text, varchar, timestamp, boolean } from "drizzle-orm/pg-core";
import { accountRoleEnum, baseIdColumn } from "./base";

// Owned by account management; the intake core only reads it.
export const users = pgTable("users", {
  id: baseIdColumn(),
  accountId: varchar("account_id", { length: 32 }).notNull().unique(),
  displayName: text("display_name").notNull(),
  role: accountRoleEnum("role").notNull(),
  department: text("department").notNull(),
  email: text("email").notNull().unique(),
  passwordHash: text("password_hash").notNull(),
  isActive: boolean("is_active").notNull().default(true),
  createdBy: text("created_by").notNull().default('self_register'),
  createdAt: timestamp("created_at").defaultNow().notNull(),
});
