/**
 * Database Connection
 *
 * Establishes and manages the PostgreSQL connection via Drizzle ORM.
 * Provides the raw postgres.js client for DDL and the Drizzle instance
 * for row access.
 */

import { drizzle, type PostgresJsDatabase } from "drizzle-orm/postgres-js";
import postgres from "postgres";
import type { AppConfig } from "../config/index.js";

export interface DatabaseHandles {
  sql: postgres.Sql;
  db: PostgresJsDatabase;
}

/** The raw postgres.js client instance */
let sqlClient: postgres.Sql | null = null;

/** The Drizzle ORM instance */
let drizzleInstance: PostgresJsDatabase | null = null;

/**
 * Initializes the database connection.
 * Call once at application startup. postgres.js connects lazily, on the
 * first query.
 */
export function initDatabase(config: AppConfig): DatabaseHandles {
  if (!config.database.url) {
    throw new Error("DATABASE_URL is not set. Configure it to use PostgreSQL storage.");
  }
  sqlClient = postgres(config.database.url);
  drizzleInstance = drizzle(sqlClient);

  return { sql: sqlClient, db: drizzleInstance };
}

/**
 * Returns the active connection.
 * Throws if initDatabase() hasn't been called.
 */
export function getDatabase(): DatabaseHandles {
  if (!drizzleInstance || !sqlClient) {
    throw new Error("Database not initialized. Call initDatabase() at startup.");
  }
  return { sql: sqlClient, db: drizzleInstance };
}

/**
 * Closes the database connection gracefully.
 * Call on application shutdown.
 */
export async function closeDatabase(): Promise<void> {
  if (sqlClient) {
    await sqlClient.end();
    sqlClient = null;
    drizzleInstance = null;
  }
}
