/**
 * DDL Builder: Test Suite
 *
 * Validates the SQL generated from persistence schemas:
 *   - Column types, NOT NULL and primary-key clauses
 *   - Default value escaping (prevents SQL injection)
 *   - Foreign-key constraint statements
 *
 * These tests do NOT require a real database. They inspect the SQL
 * strings, not their execution.
 */

import { describe, it, expect } from "vitest";
import { defineEntity, t, belongsTo, type StorageColumn } from "@dualmap/contracts";
import {
  buildCreateTableStatement,
  buildDefaultClause,
  buildForeignKeyStatements,
  fieldTypeToSQL,
  foreignKeyConstraintName,
} from "./ddl.js";
import { derivePersistenceSchema } from "./schema-builder.js";
import { EntityRegistry } from "../entity-manager/entity-registry.js";

const AuthorEntity = defineEntity({
  name: "Author",
  fields: [
    { name: "id", type: t.integer() },
    { name: "name", type: t.text() },
  ],
});

const BookEntity = defineEntity({
  name: "Book",
  fields: [
    { name: "id", type: t.integer() },
    { name: "title", type: t.text() },
    { name: "rating", type: t.nullable(t.number()) },
    { name: "author", type: belongsTo("Author", { onDelete: "cascade" }) },
  ],
});

function bookSchema() {
  const registry = new EntityRegistry();
  registry.registerAll([AuthorEntity, BookEntity]);
  return derivePersistenceSchema(BookEntity, registry);
}

function column(overrides: Partial<StorageColumn>): StorageColumn {
  return {
    name: "value",
    type: "text",
    nullable: false,
    primaryKey: false,
    origin: "declared",
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// CREATE TABLE
// ---------------------------------------------------------------------------

describe("buildCreateTableStatement", () => {
  it("renders every storage column in order", () => {
    expect(buildCreateTableStatement(bookSchema())).toBe(
      [
        'CREATE TABLE IF NOT EXISTS "book" (',
        '  "id" INTEGER GENERATED BY DEFAULT AS IDENTITY PRIMARY KEY,',
        '  "title" TEXT NOT NULL,',
        '  "rating" DOUBLE PRECISION,',
        '  "author_id" INTEGER NOT NULL',
        ")",
      ].join("\n")
    );
  });

  it("uses a random default for uuid primary keys", () => {
    const entity = defineEntity({ name: "Token", fields: [{ name: "id", type: t.uuid() }] });
    const schema = derivePersistenceSchema(entity, new EntityRegistry());
    expect(buildCreateTableStatement(schema)).toContain(
      '"id" UUID PRIMARY KEY DEFAULT gen_random_uuid()'
    );
  });

  it("leaves text primary keys without a default", () => {
    const entity = defineEntity({ name: "Country", fields: [{ name: "id", type: t.text() }] });
    const schema = derivePersistenceSchema(entity, new EntityRegistry());
    expect(buildCreateTableStatement(schema)).toContain('"id" TEXT PRIMARY KEY\n');
  });
});

// ---------------------------------------------------------------------------
// Foreign keys
// ---------------------------------------------------------------------------

describe("buildForeignKeyStatements", () => {
  it("adds one guarded constraint per foreign key", () => {
    const statements = buildForeignKeyStatements(bookSchema());

    expect(statements).toHaveLength(1);
    expect(statements[0]).toContain(
      'ALTER TABLE "book" ADD CONSTRAINT "book_author_id_fkey" FOREIGN KEY ("author_id") ' +
        'REFERENCES "author"("id") ON DELETE CASCADE'
    );
    expect(statements[0]).toContain("WHEN duplicate_object THEN null;");
  });

  it("keeps constraint names within the identifier limit and distinct", () => {
    const table = "warehouse_inventory_adjustment_line";
    const first = foreignKeyConstraintName(table, "source_location_reference_id");
    const second = foreignKeyConstraintName(table, "source_location_reference_backup_id");

    expect(first).toHaveLength(63);
    expect(second).toHaveLength(63);
    expect(first).not.toBe(second);
    expect(first.startsWith("warehouse_inventory_adjustment_line_source_locat")).toBe(true);
    expect(first).toMatch(/_[0-9a-f]{8}_fkey$/);
  });

  it("leaves short constraint names unchanged", () => {
    expect(foreignKeyConstraintName("book", "author_id")).toBe("book_author_id_fkey");
  });

  it("returns nothing for a schema without foreign keys", () => {
    const schema = derivePersistenceSchema(AuthorEntity, new EntityRegistry());
    expect(buildForeignKeyStatements(schema)).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

describe("fieldTypeToSQL", () => {
  it("maps each field type to a column type", () => {
    expect(fieldTypeToSQL("email")).toBe("VARCHAR(512)");
    expect(fieldTypeToSQL("datetime")).toBe("TIMESTAMPTZ");
    expect(fieldTypeToSQL("json")).toBe("JSONB");
    expect(fieldTypeToSQL("enum")).toBe("VARCHAR(255)");
  });
});

// ---------------------------------------------------------------------------
// Default value escaping
// ---------------------------------------------------------------------------

describe("buildDefaultClause", () => {
  it("returns an empty string without a default", () => {
    expect(buildDefaultClause(column({}))).toBe("");
  });

  it("escapes single quotes in string defaults", () => {
    expect(buildDefaultClause(column({ defaultValue: "it's" }))).toBe(" DEFAULT 'it''s'");
  });

  it("neutralizes injection attempts in string defaults", () => {
    expect(buildDefaultClause(column({ defaultValue: "x'; DROP TABLE book; --" }))).toBe(
      " DEFAULT 'x''; DROP TABLE book; --'"
    );
  });

  it("renders booleans as SQL keywords", () => {
    expect(buildDefaultClause(column({ type: "boolean", defaultValue: false }))).toBe(
      " DEFAULT FALSE"
    );
    expect(buildDefaultClause(column({ type: "boolean", defaultValue: "true" }))).toBe(
      " DEFAULT TRUE"
    );
  });

  it("rejects non-boolean defaults on boolean columns", () => {
    expect(() => buildDefaultClause(column({ type: "boolean", defaultValue: "yes" }))).toThrow(
      'Invalid default value for boolean column "value": yes'
    );
  });

  it("rejects non-integer defaults on integer columns", () => {
    expect(() => buildDefaultClause(column({ type: "integer", defaultValue: 1.5 }))).toThrow(
      'Invalid default value for numeric column "value"'
    );
    expect(buildDefaultClause(column({ type: "number", defaultValue: 1.5 }))).toBe(" DEFAULT 1.5");
  });

  it("accepts NOW() for date columns", () => {
    expect(buildDefaultClause(column({ type: "datetime", defaultValue: "now()" }))).toBe(
      " DEFAULT NOW()"
    );
  });

  it("rejects malformed dates and uuids", () => {
    expect(() => buildDefaultClause(column({ type: "date", defaultValue: "soon" }))).toThrow();
    expect(() => buildDefaultClause(column({ type: "uuid", defaultValue: "abc" }))).toThrow();
  });

  it("rejects enum defaults outside the options", () => {
    expect(() =>
      buildDefaultClause(column({ type: "enum", options: ["open"], defaultValue: "closed" }))
    ).toThrow('Default value for enum column "value" is not one of its options: closed');
  });

  it("serializes json defaults", () => {
    expect(buildDefaultClause(column({ type: "json", defaultValue: { tags: [] } }))).toBe(
      ` DEFAULT '{"tags":[]}'::jsonb`
    );
  });
});
