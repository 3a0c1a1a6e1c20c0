import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import pg from "pg";
import * as schema from "@shared/schema";
import { env } from "./config/env";
import logger from "./logger";

const { Pool } = pg;

type DatabaseSchema = typeof schema;
type Database = NodePgDatabase<DatabaseSchema>;

// Database instance - null when DATABASE_URL is not configured
let db: Database | null = null;
let pool: pg.Pool | null = null;

try {
  if (env.DATABASE_URL) {
    pool = new Pool({
      connectionString: env.DATABASE_URL,
      max: env.DB_POOL_MAX,
      idleTimeoutMillis: env.DB_POOL_IDLE_TIMEOUT_MS,
      connectionTimeoutMillis: env.DB_POOL_CONNECTION_TIMEOUT_MS,
    });

    // Prevent unhandled rejections from idle clients disconnecting
    pool.on("error", (err) => {
      logger.error("Unexpected error on idle database client", {
        error: err instanceof Error ? err.message : String(err),
      });
    });

    db = drizzle(pool, { schema });
    logger.info("Database connection pool created", {
      max: env.DB_POOL_MAX,
      idleTimeoutMillis: env.DB_POOL_IDLE_TIMEOUT_MS,
    });
  }
} catch (error) {
  logger.warn("Database connection setup failed", {
    error: error instanceof Error ? error.message : String(error),
  });
  db = null;
  pool = null;
}

/**
 * Error thrown when the database is not configured or unavailable.
 * Route handlers map this to a 503 response.
 */
export class DatabaseUnavailableError extends Error {
  constructor() {
    super("Database not configured");
    this.name = "DatabaseUnavailableError";
  }
}

/**
 * Get database instance with null check.
 * Throws {@link DatabaseUnavailableError} if database is not configured.
 */
export function getDb(): Database {
  if (!db) {
    throw new DatabaseUnavailableError();
  }
  return db;
}

export function isDatabaseAvailable(): boolean {
  return db !== null;
}

/**
 * Round-trip to the database. Resolves false instead of throwing so the
 * health route can report it.
 */
export async function pingDatabase(): Promise<boolean> {
  if (!pool) return false;
  try {
    await pool.query("SELECT 1");
    return true;
  } catch (error) {
    logger.warn("Database ping failed", {
      error: error instanceof Error ? error.message : String(error),
    });
    return false;
  }
}

export async function closeDatabase(): Promise<void> {
  if (!pool) return;
  await pool.end();
  logger.info("Database pool closed");
  pool = null;
  db = null;
}

export type { Database };
