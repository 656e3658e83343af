/**
 * @module server/db
 * @description PostgreSQL connection through Drizzle ORM.
 * The pool is created on demand from DATABASE_URL; the server falls back to
 * in-memory storage when no URL is configured.
 */

import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import pg from "pg";
import type { Pool as PgPool } from "pg";
import * as schema from "@shared/schema";
import { errorMessage } from "./errors";

const { Pool } = pg;

const MAX_RECONNECT_ATTEMPTS = 10;
const RECONNECT_DELAY_MS = 3000;

export type Database = NodePgDatabase<typeof schema>;

export interface DatabaseConnection {
  pool: PgPool;
  db: Database;
}

/**
 * Creates the connection pool with resilience settings.
 * Pool-level errors are logged instead of crashing the process.
 */
export function connectDatabase(connectionString: string): DatabaseConnection {
  const pool = new Pool({
    connectionString,
    max: 20,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000,
  });

  pool.on("error", (err) => {
    console.error("Unexpected error on idle database client:", err.message);
  });

  pool.on("connect", () => {
    console.log("New database client connected");
  });

  return { pool, db: drizzle(pool, { schema }) };
}

/**
 * Checks if the database connection is healthy.
 */
export async function checkDatabaseHealth(pool: PgPool): Promise<boolean> {
  try {
    const client = await pool.connect();
    try {
      await client.query("SELECT 1");
      return true;
    } finally {
      client.release();
    }
  } catch (error) {
    console.error("Database health check failed:", errorMessage(error));
    return false;
  }
}

/**
 * Waits for the database to become available, backing off linearly.
 * @throws Error if max attempts exceeded
 */
export async function waitForDatabase(pool: PgPool): Promise<void> {
  console.log("Waiting for database connection...");

  for (let attempt = 1; attempt <= MAX_RECONNECT_ATTEMPTS; attempt++) {
    if (await checkDatabaseHealth(pool)) {
      console.log("Database connection established");
      return;
    }

    if (attempt < MAX_RECONNECT_ATTEMPTS) {
      const delay = Math.min(RECONNECT_DELAY_MS * attempt, 30000);
      console.log(`Retrying in ${delay}ms...`);
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }

  throw new Error(`Failed to connect to database after ${MAX_RECONNECT_ATTEMPTS} attempts`);
}

/**
 * Gracefully closes all database connections.
 */
export async function closeDatabaseConnection(pool: PgPool): Promise<void> {
  console.log("Closing database connections...");
  try {
    await pool.end();
    console.log("Database connections closed successfully");
  } catch (error) {
    console.error("Error closing database connections:", errorMessage(error));
    throw error;
  }
}
