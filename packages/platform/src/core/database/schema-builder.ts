/**
 * Schema Builder
 *
 * Converts EntityDefinitions into persistence schemas: the storage
 * columns, primary key and foreign-key constraints a storage adapter
 * materializes.
 *
 *   - Declared scalar fields become columns, in declaration order
 *   - Each to-one relationship adds a synthesized `{field}_id` column,
 *     typed like the target's primary key, plus a foreign-key constraint
 *   - Relationship fields themselves never become columns
 *
 * The entity definition is only read. The schema is a separate, frozen
 * artifact, built once per entity and memoized by SchemaCache.
 */

import {
  isIdentifierType,
  type EntityDefinition,
  type ForeignKeyConstraint,
  type IdentifierType,
  type PersistenceSchema,
  type StorageColumn,
} from "@dualmap/contracts";
import { DefinitionError } from "../errors/index.js";
import type { EntityRegistry } from "../entity-manager/entity-registry.js";
import { classifyFields } from "../schema/relationship-extractor.js";
import { synthesizeForeignKeys } from "../schema/foreign-keys.js";
import { unwrapType } from "../schema/type-unwrapper.js";

export interface SchemaBuildOptions {
  /** Primary-key field name for entities that do not declare one */
  defaultPrimaryKey: string;
}

export const DEFAULT_SCHEMA_OPTIONS: SchemaBuildOptions = { defaultPrimaryKey: "id" };

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Converts an entity name to a storage table name.
 * "Author" → "author", "PurchaseOrder" → "purchaseorder"
 */
export function toTableName(entity: EntityDefinition): string {
  return entity.tableName ?? entity.name.toLowerCase();
}

function validateIdentifier(entity: string, name: string, context: string): void {
  if (!IDENTIFIER_PATTERN.test(name)) {
    throw new DefinitionError(
      entity,
      `invalid ${context} "${name}". Identifiers must start with a letter or underscore ` +
        `and contain only letters, digits and underscores.`
    );
  }
}

/**
 * Finds and checks an entity's primary-key field: it must be declared,
 * be a plain scalar, be non-nullable and have an identifier type.
 */
export function resolvePrimaryKey(
  entity: EntityDefinition,
  options: SchemaBuildOptions = DEFAULT_SCHEMA_OPTIONS
): { name: string; type: IdentifierType } {
  const name = entity.primaryKey ?? options.defaultPrimaryKey;
  const field = entity.fields.find((f) => f.name === name);

  if (!field) {
    throw new DefinitionError(entity.name, `primary key field "${name}" is not declared.`, name);
  }

  const shape = unwrapType(field.type, { entity: entity.name, field: name });
  if (shape.relation !== null || shape.bare.kind !== "scalar" || shape.isCollection) {
    throw new DefinitionError(entity.name, `primary key "${name}" must be a scalar field.`, name);
  }
  if (shape.isNullable) {
    throw new DefinitionError(entity.name, `primary key "${name}" cannot be nullable.`, name);
  }
  if (!isIdentifierType(shape.bare.type)) {
    throw new DefinitionError(
      entity.name,
      `primary key "${name}" has type "${shape.bare.type}"; use integer, uuid or text.`,
      name
    );
  }

  return { name, type: shape.bare.type };
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

/**
 * Derives the persistence schema for an entity. Pure: nothing is cached
 * and neither the entity nor the registry is modified.
 *
 * Relationship targets must be registered (self references excepted).
 *
 * @throws DefinitionError for malformed definitions
 * @throws UnregisteredTargetError when a to-one target is not registered
 */
export function derivePersistenceSchema(
  entity: EntityDefinition,
  registry: EntityRegistry,
  options: SchemaBuildOptions = DEFAULT_SCHEMA_OPTIONS
): PersistenceSchema {
  const tableName = toTableName(entity);
  validateIdentifier(entity.name, tableName, "table name");

  const declaredNames = new Set<string>();
  for (const field of entity.fields) {
    if (declaredNames.has(field.name)) {
      throw new DefinitionError(entity.name, `field "${field.name}" is declared twice.`, field.name);
    }
    validateIdentifier(entity.name, field.name, "field name");
    // Records keep values in plain objects; inherited names would shadow them
    if (field.name in Object.prototype) {
      throw new DefinitionError(
        entity.name,
        `field name "${field.name}" is reserved. Choose another name.`,
        field.name
      );
    }
    declaredNames.add(field.name);
  }

  const { scalars, relationships } = classifyFields(entity);
  const primaryKey = resolvePrimaryKey(entity, options);

  const columns: StorageColumn[] = scalars.map(({ field, type, nullable }): StorageColumn => ({
    name: field.name,
    type,
    nullable,
    primaryKey: field.name === primaryKey.name,
    origin: "declared",
    // Copied: the schema is frozen, the definition is not
    ...(field.defaultValue !== undefined ? { defaultValue: structuredClone(field.defaultValue) } : {}),
    ...(field.options !== undefined ? { options: [...field.options] } : {}),
    ...(field.validations !== undefined
      ? { validations: field.validations.map((rule) => ({ ...rule })) }
      : {}),
  }));

  const foreignKeys: ForeignKeyConstraint[] = [];

  for (const key of synthesizeForeignKeys(relationships)) {
    if (declaredNames.has(key.name)) {
      throw new DefinitionError(
        entity.name,
        `field "${key.name}" collides with the foreign key synthesized for relationship ` +
          `"${key.relationField}". Rename the field or the relationship.`,
        key.name
      );
    }

    const descriptor = relationships[key.relationField];
    const target =
      key.target === entity.name
        ? entity
        : registry.require(key.target, { entity: entity.name, field: key.relationField });
    const targetKey = target === entity ? primaryKey : resolvePrimaryKey(target, options);

    if (descriptor.onDelete === "set null" && !key.nullable) {
      throw new DefinitionError(
        entity.name,
        `relationship "${key.relationField}" is required, so its key cannot use ON DELETE SET NULL.`,
        key.relationField
      );
    }

    columns.push({
      name: key.name,
      type: targetKey.type,
      nullable: key.nullable,
      primaryKey: false,
      origin: "foreign-key",
      relationField: key.relationField,
    });

    foreignKeys.push({
      column: key.name,
      relationField: key.relationField,
      targetEntity: target.name,
      targetTable: toTableName(target),
      targetColumn: targetKey.name,
      onDelete: descriptor.onDelete,
    });
  }

  return deepFreeze({
    entityName: entity.name,
    tableName,
    primaryKey: primaryKey.name,
    primaryKeyType: primaryKey.type,
    columns,
    foreignKeys,
    relationships,
  });
}

/**
 * Memoized persistence schemas, keyed by entity identity.
 *
 * Derivation is synchronous, so two first uses of the same entity cannot
 * interleave on the event loop; the first build is stored and every later
 * call returns that same frozen object.
 */
export class SchemaCache {
  private readonly byEntity = new Map<EntityDefinition, PersistenceSchema>();
  private readonly byName = new Map<string, PersistenceSchema>();

  constructor(
    private readonly registry: EntityRegistry,
    private readonly options: SchemaBuildOptions = DEFAULT_SCHEMA_OPTIONS
  ) {}

  /** Returns the cached schema, deriving it on first use */
  derive(entity: EntityDefinition): PersistenceSchema {
    const cached = this.byEntity.get(entity);
    if (cached) return cached;

    if (this.byName.has(entity.name)) {
      throw new DefinitionError(
        entity.name,
        "a different definition with this name already has a persistence schema."
      );
    }

    const schema = derivePersistenceSchema(entity, this.registry, this.options);
    this.byEntity.set(entity, schema);
    this.byName.set(entity.name, schema);
    return schema;
  }

  /** Retrieves a previously derived schema by entity name */
  get(entityName: string): PersistenceSchema | undefined {
    return this.byName.get(entityName);
  }

  /** All derived schemas, in derivation order */
  getAll(): PersistenceSchema[] {
    return Array.from(this.byName.values());
  }

  /** Clears every cached schema. Used for test isolation. */
  clear(): void {
    this.byEntity.clear();
    this.byName.clear();
  }
}
