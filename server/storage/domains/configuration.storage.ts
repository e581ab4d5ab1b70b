import { isValid, parseISO } from "date-fns";
import { systemConfig, SUBMISSION_DEADLINE_KEY } from "@shared/schema";
import { getDb, eq } from "../base";

export function parseStoredDeadline(value: string): Date {
  const parsed = parseISO(value.trim());
  if (!isValid(parsed)) {
    throw new Error(`Stored submission deadline "${value}" is not a valid timestamp`);
  }
  return parsed;
}

export class ConfigurationStorage {
  async getDeadline(): Promise<Date | null> {
    const [entry] = await getDb()
      .select({ value: systemConfig.value })
      .from(systemConfig)
      .where(eq(systemConfig.key, SUBMISSION_DEADLINE_KEY));
    return entry ? parseStoredDeadline(entry.value) : null;
  }

  async setDeadline(deadline: Date | null, updatedBy: string): Promise<void> {
    const db = getDb();
    if (!deadline) {
      await db.delete(systemConfig).where(eq(systemConfig.key, SUBMISSION_DEADLINE_KEY));
      return;
    }

    const value = deadline.toISOString();
    await db
      .insert(systemConfig)
      .values({
        key: SUBMISSION_DEADLINE_KEY,
        value,
        description: "Submission deadline",
        updatedBy,
      })
      .onConflictDoUpdate({
        target: systemConfig.key,
        set: { value, updatedBy, updatedAt: new Date() },
      });
  }
}
