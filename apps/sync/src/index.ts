/**
 * Schema Sync Script
 *
 * Creates the tables and foreign keys for every domain entity.
 * Safe to run repeatedly: existing tables and constraints are left alone.
 *
 * Usage: npm run sync --workspace=@dualmap/sync
 */

import dotenv from "dotenv";
import path from "node:path";
import { fileURLToPath } from "node:url";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
dotenv.config({ path: path.resolve(__dirname, "../../../.env") });

import {
  loadConfig,
  createLogger,
  captureException,
  flushObservability,
} from "@dualmap/platform";
import { bootstrap } from "./bootstrap.js";

async function sync() {
  const config = loadConfig();
  const logger = createLogger("sync", config.log.level);

  const context = bootstrap(config, logger);
  try {
    const schemas = await context.mapper.ensureAll();
    for (const schema of schemas) {
      logger.info("Table ready", {
        entity: schema.entityName,
        table: schema.tableName,
        columns: schema.columns.length,
        foreignKeys: schema.foreignKeys.map((fk) => `${fk.column} → ${fk.targetTable}`),
      });
    }
    logger.info("Sync complete", { storage: context.storage, tables: schemas.length });
  } finally {
    await context.close();
  }
}

sync().catch(async (err: unknown) => {
  const error = err instanceof Error ? err : new Error(String(err));
  console.error("[sync] Fatal error:", error.message);
  captureException(error, { context: "sync" });
  await flushObservability();
  process.exit(1);
});
