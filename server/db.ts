import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import pg from "pg";
import * as schema from "@shared/schema";
import { config } from "./config";
import { logger } from "./logger";

const { Pool } = pg;

export type Database = NodePgDatabase<typeof schema>;

const MAX_POOL_SIZE = 100;

function createDatabase(): { pool: pg.Pool; db: Database } | null {
  if (!config.DATABASE_URL) {
    logger.warn('DATABASE_URL not set - using in-memory storage');
    return null;
  }

  const poolSize = Math.min(config.DB_POOL_SIZE, MAX_POOL_SIZE);
  const pool = new Pool({
    connectionString: config.DATABASE_URL,
    max: poolSize,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 10000,
  });

  logger.info({ poolSize }, 'Database pool configured');
  return { pool, db: drizzle(pool, { schema }) };
}

const connection = createDatabase();

export const pool: pg.Pool | null = connection?.pool ?? null;

export function isDatabaseAvailable(): boolean {
  return connection !== null;
}

export function getDb(): Database {
  if (!connection) {
    throw new Error('DATABASE_URL is not configured');
  }
  return connection.db;
}
