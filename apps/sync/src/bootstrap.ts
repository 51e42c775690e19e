/**
 * Bootstrap
 *
 * Wires the platform engine with the domain layer.
 * This is the SINGLE place where platform meets domain.
 *
 * Sequence:
 *   1. Pick storage: PostgreSQL when DATABASE_URL is set, memory otherwise
 *   2. Create the mapper with the configured primary-key convention
 *   3. Register the domain entities
 */

import type { Logger, StorageAdapter } from "@dualmap/contracts";
import {
  EntityMapper,
  MemoryStorageAdapter,
  DrizzleStorageAdapter,
  initDatabase,
  closeDatabase,
  type AppConfig,
} from "@dualmap/platform";
import { entities } from "@dualmap/domain";

export interface SyncContext {
  mapper: EntityMapper;
  storage: "postgres" | "memory";
  /** Releases the database connection, if one was opened */
  close(): Promise<void>;
}

export function bootstrap(config: AppConfig, logger: Logger): SyncContext {
  let storage: StorageAdapter;
  let close: () => Promise<void> = async () => {};

  if (config.database.url) {
    const { db, sql } = initDatabase(config);
    storage = new DrizzleStorageAdapter(db, sql, logger);
    close = closeDatabase;
  } else {
    logger.warn("DATABASE_URL is not set; using in-memory storage");
    storage = new MemoryStorageAdapter();
  }

  const mapper = new EntityMapper({
    storage,
    logger,
    schema: { defaultPrimaryKey: config.schema.defaultPrimaryKey },
  });
  mapper.register(...entities);

  return {
    mapper,
    storage: config.database.url ? "postgres" : "memory",
    close,
  };
}
