/**
 * Drizzle Tables
 *
 * Converts persistence schemas into Drizzle table objects. This is the
 * bridge between the derived storage columns and Drizzle's query builder.
 *
 * Foreign keys are declared with `.references()` pointing at the target
 * table's key column. The reference is a thunk, so the target table only
 * has to be built by the time Drizzle reads the constraint.
 */

import {
  pgTable,
  integer,
  uuid,
  text,
  varchar,
  boolean,
  doublePrecision,
  timestamp,
  jsonb,
  type PgColumn,
  type PgColumnBuilder,
  type PgTableWithColumns,
} from "drizzle-orm/pg-core";
import { getTableColumns } from "drizzle-orm";
import type { PersistenceSchema, StorageColumn } from "@dualmap/contracts";

/**
 * Maps a storage column to a Drizzle column builder, without constraints.
 */
function buildColumn(column: StorageColumn): PgColumnBuilder {
  const name = column.name;

  switch (column.type) {
    case "text":
      return text(name);
    case "email":
    case "url":
      return varchar(name, { length: 512 });
    case "integer":
      return integer(name);
    case "number":
      return doublePrecision(name);
    case "date":
    case "datetime":
      return timestamp(name, { withTimezone: true });
    case "boolean":
      return boolean(name);
    case "uuid":
      return uuid(name);
    case "enum":
      // Stored as text; allowed values are checked by validation
      return varchar(name, { length: 255 });
    case "json":
      return jsonb(name);
  }
}

function buildPrimaryKeyColumn(column: StorageColumn): PgColumnBuilder {
  switch (column.type) {
    case "integer":
      return integer(column.name).primaryKey().generatedByDefaultAsIdentity();
    case "uuid":
      return uuid(column.name).primaryKey().defaultRandom();
    default:
      return buildColumn(column).primaryKey();
  }
}

/**
 * Builds and holds one Drizzle table per persistence schema, keyed by
 * table name so foreign keys can find their targets.
 */
export class DrizzleTableSet {
  // Column set is only known at run time
  private readonly tables = new Map<string, PgTableWithColumns<any>>();

  /** Returns the table for a schema, building it on first use */
  table(schema: PersistenceSchema): PgTableWithColumns<any> {
    const existing = this.tables.get(schema.tableName);
    if (existing) return existing;

    const columns: Record<string, PgColumnBuilder> = {};

    for (const column of schema.columns) {
      if (column.primaryKey) {
        columns[column.name] = buildPrimaryKeyColumn(column);
        continue;
      }

      let builder = buildColumn(column);
      if (!column.nullable) {
        builder = builder.notNull();
      }
      if (column.defaultValue !== undefined) {
        builder = builder.default(column.defaultValue);
      }

      const fk = schema.foreignKeys.find((key) => key.column === column.name);
      if (fk) {
        builder = builder.references(() => this.column(fk.targetTable, fk.targetColumn), {
          onDelete: fk.onDelete,
        });
      }

      columns[column.name] = builder;
    }

    const table = pgTable(schema.tableName, columns);
    this.tables.set(schema.tableName, table);
    return table;
  }

  /** Looks up a column of a previously built table */
  column(tableName: string, columnName: string): PgColumn {
    const table = this.tables.get(tableName);
    if (!table) {
      throw new Error(`Table "${tableName}" has not been built yet.`);
    }
    const column = getTableColumns(table)[columnName];
    if (!column) {
      throw new Error(`Table "${tableName}" has no column "${columnName}".`);
    }
    return column;
  }

  /** Clears every built table. Used for test isolation. */
  clear(): void {
    this.tables.clear();
  }
}
