/**
 * In-Memory Storage Adapter
 *
 * A StorageAdapter that keeps rows in process memory. Used when no
 * DATABASE_URL is configured, and by tests.
 *
 * Rows are deep-copied on the way in and on the way out, so callers
 * never share objects (json values included) with the store. Foreign keys are recorded but not
 * enforced.
 */

import { randomUUID } from "node:crypto";
import type {
  PersistenceSchema,
  PrimaryKeyValue,
  StorageAdapter,
  StoredRow,
} from "@dualmap/contracts";

interface MemoryTable {
  rows: Map<PrimaryKeyValue, StoredRow>;
  /** Last integer key handed out */
  sequence: number;
  foreignKeysEnsured: boolean;
}

export class MemoryStorageAdapter implements StorageAdapter {
  private readonly tables = new Map<string, MemoryTable>();

  async ensureTable(schema: PersistenceSchema): Promise<void> {
    if (!this.tables.has(schema.tableName)) {
      this.tables.set(schema.tableName, {
        rows: new Map(),
        sequence: 0,
        foreignKeysEnsured: false,
      });
    }
  }

  async ensureForeignKeys(schema: PersistenceSchema): Promise<void> {
    const table = this.requireTable(schema);
    for (const fk of schema.foreignKeys) {
      if (!this.tables.has(fk.targetTable)) {
        throw new Error(
          `Cannot reference table "${fk.targetTable}" from "${schema.tableName}.${fk.column}": ` +
            `it does not exist.`
        );
      }
    }
    table.foreignKeysEnsured = true;
  }

  async save(schema: PersistenceSchema, values: StoredRow): Promise<PrimaryKeyValue> {
    const table = this.requireTable(schema);

    const row: StoredRow = {};
    for (const column of schema.columns) {
      row[column.name] = values[column.name] ?? null;
    }

    const key = this.assignKey(schema, table, row[schema.primaryKey]);
    row[schema.primaryKey] = key;
    table.rows.set(key, structuredClone(row));
    return key;
  }

  async findById(schema: PersistenceSchema, id: PrimaryKeyValue): Promise<StoredRow | null> {
    const row = this.requireTable(schema).rows.get(id);
    return row ? structuredClone(row) : null;
  }

  async findAll(schema: PersistenceSchema): Promise<StoredRow[]> {
    return Array.from(this.requireTable(schema).rows.values(), (row) => structuredClone(row));
  }

  async delete(schema: PersistenceSchema, id: PrimaryKeyValue): Promise<boolean> {
    return this.requireTable(schema).rows.delete(id);
  }

  /** Whether ensureForeignKeys has run for the table. Used by tests. */
  hasForeignKeys(tableName: string): boolean {
    return this.tables.get(tableName)?.foreignKeysEnsured ?? false;
  }

  private requireTable(schema: PersistenceSchema): MemoryTable {
    const table = this.tables.get(schema.tableName);
    if (!table) {
      throw new Error(`Table "${schema.tableName}" does not exist. Call ensureTable() first.`);
    }
    return table;
  }

  private assignKey(schema: PersistenceSchema, table: MemoryTable, value: unknown): PrimaryKeyValue {
    if (value !== null && value !== undefined) {
      if (typeof value !== "string" && typeof value !== "number") {
        throw new Error(
          `Primary key "${schema.tableName}.${schema.primaryKey}" must be a string or number.`
        );
      }
      if (typeof value === "number" && value > table.sequence) {
        table.sequence = value;
      }
      return value;
    }

    switch (schema.primaryKeyType) {
      case "integer":
        table.sequence += 1;
        return table.sequence;
      case "uuid":
        return randomUUID();
      case "text":
        throw new Error(
          `Primary key "${schema.tableName}.${schema.primaryKey}" is text and must be set before saving.`
        );
    }
  }
}
