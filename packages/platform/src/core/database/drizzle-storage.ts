/**
 * Drizzle Storage Adapter
 *
 * The PostgreSQL implementation of StorageAdapter. DDL goes through the
 * raw postgres.js client; row access goes through Drizzle.
 *
 * Errors from postgres.js and Drizzle (connectivity, constraint
 * violations) are not caught or translated.
 */

import { eq, getTableColumns } from "drizzle-orm";
import type { PostgresJsDatabase } from "drizzle-orm/postgres-js";
import type { PgTableWithColumns } from "drizzle-orm/pg-core";
import type {
  Logger,
  PersistenceSchema,
  PrimaryKeyValue,
  StorageAdapter,
  StoredRow,
} from "@dualmap/contracts";
import { buildCreateTableStatement, buildForeignKeyStatements } from "./ddl.js";
import { DrizzleTableSet } from "./drizzle-tables.js";
import { silentLogger } from "../logging/index.js";

/** The part of the postgres.js client used for DDL */
export interface SqlExecutor {
  unsafe(query: string): PromiseLike<unknown>;
}

/**
 * Keeps only the schema's storage columns, and coerces values to match
 * Drizzle column expectations.
 *
 * Drizzle's PgTimestamp.mapToDriverValue calls value.toISOString(), so
 * ISO strings for timestamp columns are converted to Date objects.
 */
function coerceValues(
  schema: PersistenceSchema,
  table: PgTableWithColumns<any>,
  values: StoredRow
): StoredRow {
  const columns = getTableColumns(table);
  const coerced: StoredRow = {};

  for (const column of schema.columns) {
    if (!(column.name in values)) continue;
    const value = values[column.name];

    if (typeof value === "string" && columns[column.name]?.dataType === "date") {
      const parsed = new Date(value);
      coerced[column.name] = isNaN(parsed.getTime()) ? value : parsed;
    } else {
      coerced[column.name] = value;
    }
  }

  return coerced;
}

function toPrimaryKeyValue(schema: PersistenceSchema, value: unknown): PrimaryKeyValue {
  if (typeof value === "string" || typeof value === "number") {
    return value;
  }
  throw new Error(
    `Storage returned no usable primary key for "${schema.tableName}.${schema.primaryKey}".`
  );
}

export class DrizzleStorageAdapter implements StorageAdapter {
  private readonly tables = new DrizzleTableSet();

  constructor(
    private readonly db: PostgresJsDatabase,
    private readonly sql: SqlExecutor,
    private readonly logger: Logger = silentLogger
  ) {}

  async ensureTable(schema: PersistenceSchema): Promise<void> {
    this.tables.table(schema);
    await this.sql.unsafe(buildCreateTableStatement(schema));
    this.logger.debug("Ensured table", { table: schema.tableName });
  }

  async ensureForeignKeys(schema: PersistenceSchema): Promise<void> {
    for (const statement of buildForeignKeyStatements(schema)) {
      await this.sql.unsafe(statement);
    }
    if (schema.foreignKeys.length > 0) {
      this.logger.debug("Ensured foreign keys", {
        table: schema.tableName,
        count: schema.foreignKeys.length,
      });
    }
  }

  /**
   * Builds the write for one row, without running it.
   * No primary key: plain insert, storage assigns the key.
   * With a primary key: insert, updating the other columns on conflict.
   */
  saveQuery(schema: PersistenceSchema, values: StoredRow) {
    const table = this.tables.table(schema);
    const row = coerceValues(schema, table, values);
    const key = row[schema.primaryKey];

    if (key === undefined || key === null) {
      const insertable: StoredRow = {};
      for (const [column, value] of Object.entries(row)) {
        if (column !== schema.primaryKey) insertable[column] = value;
      }
      return this.db.insert(table).values(insertable).returning();
    }

    const updates: StoredRow = {};
    for (const [column, value] of Object.entries(row)) {
      if (column !== schema.primaryKey) updates[column] = value;
    }

    const insert = this.db.insert(table).values(row);
    return Object.keys(updates).length > 0
      ? insert.onConflictDoUpdate({ target: table[schema.primaryKey], set: updates }).returning()
      : insert.onConflictDoNothing().returning();
  }

  async save(schema: PersistenceSchema, values: StoredRow): Promise<PrimaryKeyValue> {
    const rows = await this.saveQuery(schema, values);
    const stored: StoredRow | undefined = rows[0];
    // ON CONFLICT DO NOTHING returns no row when the key already exists
    return toPrimaryKeyValue(schema, stored ? stored[schema.primaryKey] : values[schema.primaryKey]);
  }

  selectByIdQuery(schema: PersistenceSchema, id: PrimaryKeyValue) {
    const table = this.tables.table(schema);
    return this.db.select().from(table).where(eq(table[schema.primaryKey], id)).limit(1);
  }

  async findById(schema: PersistenceSchema, id: PrimaryKeyValue): Promise<StoredRow | null> {
    const rows = await this.selectByIdQuery(schema, id);
    const row: StoredRow | undefined = rows[0];
    return row ? { ...row } : null;
  }

  async findAll(schema: PersistenceSchema): Promise<StoredRow[]> {
    const table = this.tables.table(schema);
    const rows: StoredRow[] = await this.db.select().from(table);
    return rows.map((row) => ({ ...row }));
  }

  async delete(schema: PersistenceSchema, id: PrimaryKeyValue): Promise<boolean> {
    const table = this.tables.table(schema);
    const rows = await this.db.delete(table).where(eq(table[schema.primaryKey], id)).returning();
    return rows.length > 0;
  }
}
