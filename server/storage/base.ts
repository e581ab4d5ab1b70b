import { getDb, type Database } from "../db";
import { eq, and, desc } from "drizzle-orm";
import type { SQL } from "drizzle-orm";

export { getDb, eq, and, desc };
export type { Database, SQL };

export type SQLCondition = SQL<unknown> | undefined;
