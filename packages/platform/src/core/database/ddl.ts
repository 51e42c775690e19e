/**
 * DDL Builder
 *
 * Renders a persistence schema as PostgreSQL statements:
 *   1. CREATE TABLE IF NOT EXISTS with every storage column
 *   2. One guarded ALTER TABLE ... ADD CONSTRAINT per foreign key
 *
 * Constraints are separate so that mutually referencing tables can be
 * created in any order: all tables first, then all constraints.
 *
 * SECURITY: identifiers are validated against a safe character set and
 * quoted. Default values are type-checked and escaped, never
 * raw-interpolated.
 */

import { createHash } from "node:crypto";
import type { FieldType, PersistenceSchema, StorageColumn } from "@dualmap/contracts";

/**
 * Validates that a SQL identifier contains only safe characters.
 *
 * @throws Error if the identifier contains unsafe characters
 */
function validateIdentifier(name: string, context: string): void {
  if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(name)) {
    throw new Error(
      `Invalid ${context}: "${name}". Identifiers must start with a letter or underscore ` +
        `and contain only letters, numbers, and underscores.`
    );
  }
}

function quote(identifier: string): string {
  return `"${identifier}"`;
}

function escapeString(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/**
 * Maps a field type to a PostgreSQL column type.
 */
export function fieldTypeToSQL(type: FieldType): string {
  switch (type) {
    case "text":
      return "TEXT";
    case "email":
    case "url":
      return "VARCHAR(512)";
    case "integer":
      return "INTEGER";
    case "number":
      return "DOUBLE PRECISION";
    case "boolean":
      return "BOOLEAN";
    case "date":
    case "datetime":
      return "TIMESTAMPTZ";
    case "uuid":
      return "UUID";
    case "enum":
      return "VARCHAR(255)";
    case "json":
      return "JSONB";
  }
}

/**
 * Safely converts a column default to a SQL DEFAULT clause.
 *
 * @returns The clause with a leading space, or an empty string if no default
 */
export function buildDefaultClause(column: StorageColumn): string {
  if (column.defaultValue === undefined) {
    return "";
  }

  const value = column.defaultValue;

  switch (column.type) {
    case "boolean":
      if (typeof value !== "boolean" && value !== "true" && value !== "false") {
        throw new Error(
          `Invalid default value for boolean column "${column.name}": ${String(value)}`
        );
      }
      return ` DEFAULT ${value === true || value === "true" ? "TRUE" : "FALSE"}`;

    case "integer":
    case "number": {
      const num = Number(value);
      if (!Number.isFinite(num) || (column.type === "integer" && !Number.isInteger(num))) {
        throw new Error(
          `Invalid default value for numeric column "${column.name}": ${String(value)}`
        );
      }
      return ` DEFAULT ${num}`;
    }

    case "date":
    case "datetime":
      if (String(value).toUpperCase() === "NOW()") {
        return " DEFAULT NOW()";
      }
      if (isNaN(Date.parse(String(value)))) {
        throw new Error(
          `Invalid default value for date column "${column.name}": ${String(value)}`
        );
      }
      return ` DEFAULT ${escapeString(String(value))}`;

    case "uuid":
      if (!UUID_PATTERN.test(String(value))) {
        throw new Error(
          `Invalid default value for uuid column "${column.name}": ${String(value)}`
        );
      }
      return ` DEFAULT ${escapeString(String(value))}`;

    case "json":
      return ` DEFAULT ${escapeString(JSON.stringify(value))}::jsonb`;

    case "enum":
      if (column.options && !column.options.includes(String(value))) {
        throw new Error(
          `Default value for enum column "${column.name}" is not one of its options: ${String(value)}`
        );
      }
      return ` DEFAULT ${escapeString(String(value))}`;

    case "text":
    case "email":
    case "url":
      return ` DEFAULT ${escapeString(String(value))}`;
  }
}

function buildColumnDefinition(column: StorageColumn): string {
  validateIdentifier(column.name, "column name");
  const name = quote(column.name);

  if (column.primaryKey) {
    switch (column.type) {
      case "integer":
        return `${name} INTEGER GENERATED BY DEFAULT AS IDENTITY PRIMARY KEY`;
      case "uuid":
        return `${name} UUID PRIMARY KEY DEFAULT gen_random_uuid()`;
      default:
        return `${name} ${fieldTypeToSQL(column.type)} PRIMARY KEY`;
    }
  }

  const notNull = column.nullable ? "" : " NOT NULL";
  return `${name} ${fieldTypeToSQL(column.type)}${notNull}${buildDefaultClause(column)}`;
}

/**
 * Builds the CREATE TABLE statement for a schema. Foreign-key
 * constraints are not included; see buildForeignKeyStatements.
 */
export function buildCreateTableStatement(schema: PersistenceSchema): string {
  validateIdentifier(schema.tableName, "table name");

  const columnDefs = schema.columns.map(buildColumnDefinition);
  return `CREATE TABLE IF NOT EXISTS ${quote(schema.tableName)} (\n  ${columnDefs.join(",\n  ")}\n)`;
}

/** PostgreSQL truncates identifiers longer than this */
const MAX_IDENTIFIER_BYTES = 63;

/**
 * Constraint name for a foreign-key column, e.g. "book_author_id_fkey".
 * Names over the identifier limit are cut and suffixed with a hash of
 * the full name, so distinct columns keep distinct constraints.
 */
export function foreignKeyConstraintName(tableName: string, column: string): string {
  const name = `${tableName}_${column}_fkey`;
  if (Buffer.byteLength(name) <= MAX_IDENTIFIER_BYTES) return name;

  const hash = createHash("sha256").update(name).digest("hex").slice(0, 8);
  const prefix = name.slice(0, MAX_IDENTIFIER_BYTES - hash.length - "__fkey".length);
  return `${prefix}_${hash}_fkey`;
}

/**
 * Builds one ALTER TABLE statement per foreign key. Each is wrapped in a
 * DO block that ignores duplicate_object, so re-running is a no-op.
 */
export function buildForeignKeyStatements(schema: PersistenceSchema): string[] {
  validateIdentifier(schema.tableName, "table name");

  return schema.foreignKeys.map((fk) => {
    validateIdentifier(fk.column, "foreign key column");
    validateIdentifier(fk.targetTable, `referenced table for "${fk.column}"`);
    validateIdentifier(fk.targetColumn, `referenced column for "${fk.column}"`);

    const constraint = quote(foreignKeyConstraintName(schema.tableName, fk.column));
    const alter =
      `ALTER TABLE ${quote(schema.tableName)} ADD CONSTRAINT ${constraint} ` +
      `FOREIGN KEY (${quote(fk.column)}) REFERENCES ${quote(fk.targetTable)}(${quote(fk.targetColumn)}) ` +
      `ON DELETE ${fk.onDelete.toUpperCase()}`;

    return `DO $$ BEGIN\n ${alter};\nEXCEPTION\n WHEN duplicate_object THEN null;\nEND $$;`;
  });
}
