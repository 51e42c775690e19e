/**
 * Application Configuration
 *
 * Loads configuration from environment variables with sensible defaults.
 * All config is validated at load. Fail fast if misconfigured.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface AppConfig {
  database: {
    /** Postgres connection string. Absent → in-memory storage. */
    url: string | null;
  };
  schema: {
    /** Primary-key field name used when an entity does not declare one */
    defaultPrimaryKey: string;
  };
  log: {
    level: LogLevel;
  };
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Loads configuration from process.env (or the given env map).
 * Throws immediately if a variable holds an invalid value.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const databaseUrl = env.DATABASE_URL?.trim() || null;

  const defaultPrimaryKey = env.DUALMAP_PRIMARY_KEY?.trim() || "id";
  if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(defaultPrimaryKey)) {
    throw new Error(
      `DUALMAP_PRIMARY_KEY must be a plain identifier, got "${defaultPrimaryKey}".`
    );
  }

  const level = (env.LOG_LEVEL ?? "info").toLowerCase();
  if (!isLogLevel(level)) {
    throw new Error(
      `LOG_LEVEL must be one of ${LOG_LEVELS.join(", ")}, got "${env.LOG_LEVEL}".`
    );
  }

  return {
    database: {
      url: databaseUrl,
    },
    schema: {
      defaultPrimaryKey,
    },
    log: {
      level,
    },
  };
}
