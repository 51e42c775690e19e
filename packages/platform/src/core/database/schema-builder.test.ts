/**
 * Schema Builder: Test Suite
 *
 * Validates the conversion of EntityDefinitions to persistence schemas.
 * Tests cover:
 *   - Storage columns: declared scalars plus synthesized foreign keys
 *   - Foreign-key constraints and their targets
 *   - Primary-key rules and definition errors
 *   - Memoization and immutability
 */

import { describe, it, expect, beforeEach } from "vitest";
import { defineEntity, t, belongsTo, hasMany, type EntityDefinition } from "@dualmap/contracts";
import {
  derivePersistenceSchema,
  resolvePrimaryKey,
  SchemaCache,
  toTableName,
} from "./schema-builder.js";
import { EntityRegistry } from "../entity-manager/entity-registry.js";
import { DefinitionError, UnregisteredTargetError } from "../errors/index.js";

const AuthorEntity = defineEntity({
  name: "Author",
  fields: [
    { name: "id", type: t.integer() },
    { name: "name", type: t.text() },
    { name: "books", type: hasMany("Book", { reverse: "author" }) },
  ],
});

const BookEntity = defineEntity({
  name: "Book",
  fields: [
    { name: "id", type: t.integer() },
    { name: "title", type: t.text() },
    { name: "author", type: belongsTo("Author", { reverse: "books" }) },
  ],
});

let registry: EntityRegistry;

beforeEach(() => {
  registry = new EntityRegistry();
});

// ---------------------------------------------------------------------------
// toTableName
// ---------------------------------------------------------------------------

describe("toTableName", () => {
  it("lower-cases the entity name", () => {
    expect(toTableName(AuthorEntity)).toBe("author");
    expect(toTableName(defineEntity({ name: "PurchaseOrder", fields: [] }))).toBe("purchaseorder");
  });

  it("uses the declared override", () => {
    expect(toTableName(defineEntity({ name: "Book", tableName: "books", fields: [] }))).toBe(
      "books"
    );
  });
});

// ---------------------------------------------------------------------------
// derivePersistenceSchema
// ---------------------------------------------------------------------------

describe("derivePersistenceSchema", () => {
  it("derives Book with author_id and one foreign key to Author.id", () => {
    registry.registerAll([AuthorEntity, BookEntity]);
    const schema = derivePersistenceSchema(BookEntity, registry);

    expect(schema.tableName).toBe("book");
    expect(schema.primaryKey).toBe("id");
    expect(schema.columns.map((c) => [c.name, c.type, c.nullable, c.origin])).toEqual([
      ["id", "integer", false, "declared"],
      ["title", "text", false, "declared"],
      ["author_id", "integer", false, "foreign-key"],
    ]);
    expect(schema.foreignKeys).toEqual([
      {
        column: "author_id",
        relationField: "author",
        targetEntity: "Author",
        targetTable: "author",
        targetColumn: "id",
        onDelete: "no action",
      },
    ]);
  });

  it("never stores relationship fields as columns", () => {
    registry.registerAll([AuthorEntity, BookEntity]);
    const book = derivePersistenceSchema(BookEntity, registry);
    expect(book.columns.map((c) => c.name)).not.toContain("author");
  });

  it("adds nothing for a to-many relationship", () => {
    registry.registerAll([AuthorEntity, BookEntity]);
    const schema = derivePersistenceSchema(AuthorEntity, registry);

    expect(schema.columns.map((c) => c.name)).toEqual(["id", "name"]);
    expect(schema.foreignKeys).toEqual([]);
    expect(schema.relationships.books.cardinality).toBe("many");
  });

  it("makes the key nullable for an optional relationship", () => {
    const ProductEntity = defineEntity({
      name: "Product",
      fields: [
        { name: "id", type: t.integer() },
        { name: "category", type: belongsTo("Category", { optional: true, onDelete: "set null" }) },
      ],
    });
    registry.register(
      defineEntity({ name: "Category", fields: [{ name: "id", type: t.integer() }] })
    );

    const schema = derivePersistenceSchema(ProductEntity, registry);
    expect(schema.columns[1]).toEqual({
      name: "category_id",
      type: "integer",
      nullable: true,
      primaryKey: false,
      origin: "foreign-key",
      relationField: "category",
    });
    expect(schema.foreignKeys[0].onDelete).toBe("set null");
  });

  it("types the key like the target's primary key", () => {
    registry.register(
      defineEntity({
        name: "Account",
        primaryKey: "uid",
        fields: [{ name: "uid", type: t.uuid() }],
      })
    );
    const SessionEntity = defineEntity({
      name: "Session",
      fields: [
        { name: "id", type: t.text() },
        { name: "account", type: belongsTo("Account") },
      ],
    });

    const schema = derivePersistenceSchema(SessionEntity, registry);
    expect(schema.columns[1].type).toBe("uuid");
    expect(schema.foreignKeys[0].targetColumn).toBe("uid");
  });

  it("resolves a self reference without registration", () => {
    const EmployeeEntity = defineEntity({
      name: "Employee",
      fields: [
        { name: "id", type: t.integer() },
        { name: "manager", type: belongsTo("Employee", { optional: true }) },
      ],
    });

    const schema = derivePersistenceSchema(EmployeeEntity, registry);
    expect(schema.foreignKeys[0]).toMatchObject({
      column: "manager_id",
      targetEntity: "Employee",
      targetTable: "employee",
    });
  });

  it("handles mutually referencing entities", () => {
    const Left = defineEntity({
      name: "Left",
      fields: [
        { name: "id", type: t.integer() },
        { name: "right", type: belongsTo("Right", { optional: true }) },
      ],
    });
    const Right = defineEntity({
      name: "Right",
      fields: [
        { name: "id", type: t.integer() },
        { name: "left", type: belongsTo("Left", { optional: true }) },
      ],
    });
    registry.registerAll([Left, Right]);

    expect(derivePersistenceSchema(Left, registry).foreignKeys[0].targetTable).toBe("right");
    expect(derivePersistenceSchema(Right, registry).foreignKeys[0].targetTable).toBe("left");
  });

  it("carries declared defaults, options and validations onto columns", () => {
    const entity = defineEntity({
      name: "Ticket",
      fields: [
        { name: "id", type: t.integer() },
        {
          name: "status",
          type: t.enum(),
          options: ["open", "closed"],
          defaultValue: "open",
        },
        { name: "code", type: t.text(), validations: [{ max: 8 }] },
      ],
    });

    const schema = derivePersistenceSchema(entity, registry);
    expect(schema.columns[1]).toMatchObject({ defaultValue: "open", options: ["open", "closed"] });
    expect(schema.columns[2].validations).toEqual([{ max: 8 }]);
    expect(schema.columns[0]).not.toHaveProperty("defaultValue");
  });

  it("leaves the entity definition untouched", () => {
    registry.registerAll([AuthorEntity, BookEntity]);
    const before = structuredClone(BookEntity);

    derivePersistenceSchema(BookEntity, registry);

    expect(BookEntity).toEqual(before);
    expect(BookEntity.fields.map((f) => f.name)).toEqual(["id", "title", "author"]);
  });

  it("returns a frozen schema", () => {
    registry.registerAll([AuthorEntity, BookEntity]);
    const schema = derivePersistenceSchema(BookEntity, registry);
    expect(Object.isFrozen(schema)).toBe(true);
    expect(Object.isFrozen(schema.columns)).toBe(true);
  });

  it("does not freeze values shared with an unfrozen definition", () => {
    const entity: EntityDefinition = {
      name: "Ticket",
      fields: [
        { name: "id", type: t.integer() },
        { name: "labels", type: t.json(), defaultValue: ["new"] },
        { name: "state", type: t.enum(), options: ["open", "closed"] },
      ],
    };

    derivePersistenceSchema(entity, registry);

    expect(Object.isFrozen(entity.fields[1].defaultValue)).toBe(false);
    expect(Object.isFrozen(entity.fields[2].options)).toBe(false);
  });

  it("uses the configured primary-key convention", () => {
    const entity = defineEntity({ name: "Legacy", fields: [{ name: "pk", type: t.integer() }] });
    expect(derivePersistenceSchema(entity, registry, { defaultPrimaryKey: "pk" }).primaryKey).toBe(
      "pk"
    );
  });

  // -------------------------------------------------------------------------
  // Failures
  // -------------------------------------------------------------------------

  it("fails when a to-one target is not registered", () => {
    registry.register(BookEntity);
    expect(() => derivePersistenceSchema(BookEntity, registry)).toThrow(UnregisteredTargetError);
  });

  it("does not require to-many targets to be registered", () => {
    expect(() => derivePersistenceSchema(AuthorEntity, registry)).not.toThrow();
  });

  it("rejects a declared field that collides with a synthesized key", () => {
    registry.register(AuthorEntity);
    const entity = defineEntity({
      name: "Clash",
      fields: [
        { name: "id", type: t.integer() },
        { name: "author_id", type: t.integer() },
        { name: "author", type: belongsTo("Author") },
      ],
    });

    expect(() => derivePersistenceSchema(entity, registry)).toThrow(
      'field "author_id" collides with the foreign key synthesized for relationship "author"'
    );
  });

  it("rejects a field declared twice", () => {
    const entity = defineEntity({
      name: "Twice",
      fields: [
        { name: "id", type: t.integer() },
        { name: "id", type: t.text() },
      ],
    });
    expect(() => derivePersistenceSchema(entity, registry)).toThrow('field "id" is declared twice.');
  });

  it("rejects field names inherited from Object.prototype", () => {
    const entity = defineEntity({
      name: "Widget",
      fields: [
        { name: "id", type: t.integer() },
        { name: "constructor", type: t.text() },
      ],
    });
    expect(() => derivePersistenceSchema(entity, registry)).toThrow(
      'Invalid definition for entity "Widget": field name "constructor" is reserved. Choose another name.'
    );
  });

  it("rejects an invalid table name", () => {
    const entity = defineEntity({
      name: "Spaced",
      tableName: "my table",
      fields: [{ name: "id", type: t.integer() }],
    });
    expect(() => derivePersistenceSchema(entity, registry)).toThrow(DefinitionError);
  });

  it("rejects SET NULL on a required relationship", () => {
    registry.register(AuthorEntity);
    const entity = defineEntity({
      name: "Strict",
      fields: [
        { name: "id", type: t.integer() },
        { name: "author", type: belongsTo("Author", { onDelete: "set null" }) },
      ],
    });
    expect(() => derivePersistenceSchema(entity, registry)).toThrow(
      'relationship "author" is required, so its key cannot use ON DELETE SET NULL.'
    );
  });
});

// ---------------------------------------------------------------------------
// resolvePrimaryKey
// ---------------------------------------------------------------------------

describe("resolvePrimaryKey", () => {
  function entityWithId(type: EntityDefinition["fields"][number]["type"]): EntityDefinition {
    return defineEntity({ name: "Keyed", fields: [{ name: "id", type }] });
  }

  it("returns the name and identifier type", () => {
    expect(resolvePrimaryKey(entityWithId(t.uuid()))).toEqual({ name: "id", type: "uuid" });
  });

  it("fails when the primary key is missing", () => {
    const entity = defineEntity({ name: "NoKey", fields: [{ name: "name", type: t.text() }] });
    expect(() => resolvePrimaryKey(entity)).toThrow('primary key field "id" is not declared.');
  });

  it("fails when the primary key is nullable", () => {
    expect(() => resolvePrimaryKey(entityWithId(t.nullable(t.integer())))).toThrow(
      'primary key "id" cannot be nullable.'
    );
  });

  it("fails when the primary key type is not an identifier type", () => {
    expect(() => resolvePrimaryKey(entityWithId(t.boolean()))).toThrow(
      'primary key "id" has type "boolean"; use integer, uuid or text.'
    );
  });

  it("fails when the primary key is a relationship", () => {
    expect(() => resolvePrimaryKey(entityWithId(belongsTo("Author")))).toThrow(
      'primary key "id" must be a scalar field.'
    );
  });
});

// ---------------------------------------------------------------------------
// SchemaCache
// ---------------------------------------------------------------------------

describe("SchemaCache", () => {
  it("returns the same schema on repeated calls", () => {
    registry.registerAll([AuthorEntity, BookEntity]);
    const cache = new SchemaCache(registry);

    const first = cache.derive(BookEntity);
    const second = cache.derive(BookEntity);

    expect(second).toBe(first);
    expect(second.foreignKeys).toHaveLength(1);
  });

  it("derives structurally equal schemas without the cache", () => {
    registry.registerAll([AuthorEntity, BookEntity]);
    expect(derivePersistenceSchema(BookEntity, registry)).toEqual(
      derivePersistenceSchema(BookEntity, registry)
    );
  });

  it("looks schemas up by entity name", () => {
    registry.registerAll([AuthorEntity, BookEntity]);
    const cache = new SchemaCache(registry);

    expect(cache.get("Book")).toBeUndefined();
    cache.derive(BookEntity);
    expect(cache.get("Book")?.tableName).toBe("book");
    expect(cache.getAll()).toHaveLength(1);
  });

  it("rejects a second definition under a cached name", () => {
    const cache = new SchemaCache(registry);
    cache.derive(defineEntity({ name: "Twin", fields: [{ name: "id", type: t.integer() }] }));

    expect(() =>
      cache.derive(defineEntity({ name: "Twin", fields: [{ name: "id", type: t.integer() }] }))
    ).toThrow(DefinitionError);
  });

  it("does not cache a failed derivation", () => {
    const cache = new SchemaCache(registry);
    expect(() => cache.derive(BookEntity)).toThrow(UnregisteredTargetError);

    registry.registerAll([AuthorEntity, BookEntity]);
    expect(cache.derive(BookEntity).foreignKeys).toHaveLength(1);
  });

  it("clears all cached schemas", () => {
    const cache = new SchemaCache(registry);
    cache.derive(AuthorEntity);
    cache.clear();
    expect(cache.getAll()).toEqual([]);
  });
});
