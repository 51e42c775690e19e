/**
 * Entity Model
 *
 * Runtime access to one entity: builds records, persists them and
 * resolves their relationships. Obtained from EntityMapper.model().
 *
 * Preparation happens on first use, not at registration, because
 * relationship targets may be registered after the entity itself.
 * Preparing derives the persistence schema and installs one
 * ReferenceResolver per lazy to-one relationship.
 *
 * fromJSON() runs the same column validation on a JSON payload and
 * builds the record through create().
 *
 * Write path (save):
 *   1. Validate column values (Zod)
 *   2. Check required relationships
 *   3. Ensure storage (tables, then foreign keys), once per entity
 *   4. Save through the storage adapter and write back the primary key
 * Steps 1 and 2 throw before any storage call is made.
 */

import type {
  EntityDefinition,
  Logger,
  PersistenceSchema,
  PrimaryKeyValue,
  RelationshipDescriptor,
  StorageAdapter,
  StoredRow,
} from "@dualmap/contracts";
import {
  DefinitionError,
  RecordNotSavedError,
  ReferenceAssignmentError,
  FieldAccessError,
} from "../errors/index.js";
import { ValidationError, validateValues, type FieldError } from "../validation/index.js";
import { validateRequiredRelationships } from "../validation/required-relationships.js";
import type { EntityRegistry } from "./entity-registry.js";
import { EntityRecord } from "./entity-record.js";
import { ReferenceResolver } from "./reference-resolver.js";

/** What a model needs from the mapper that owns it */
export interface ModelContext {
  readonly registry: EntityRegistry;
  readonly storage: StorageAdapter;
  readonly logger: Logger;
  model(entityName: string): EntityModel;
  deriveSchema(entity: EntityDefinition): PersistenceSchema;
  ensureStorage(entity: EntityDefinition): Promise<void>;
}

interface PreparedModel {
  schema: PersistenceSchema;
  resolvers: Map<string, ReferenceResolver>;
  /** Synthesized key column → relationship field */
  keyColumns: Map<string, string>;
  columns: Set<string>;
}

export class EntityModel {
  private prepared: PreparedModel | null = null;

  constructor(
    readonly entity: EntityDefinition,
    private readonly context: ModelContext
  ) {}

  get name(): string {
    return this.entity.name;
  }

  get schema(): PersistenceSchema {
    return this.prepare();
  }

  /**
   * Derives the persistence schema and installs the resolvers.
   * Runs once; later calls return the same schema.
   *
   * @throws DefinitionError, UnregisteredTargetError
   */
  prepare(): PersistenceSchema {
    return this.state().schema;
  }

  // -------------------------------------------------------------------------
  // Records
  // -------------------------------------------------------------------------

  /**
   * Builds an unsaved record. Declared defaults are filled in first, then
   * each input entry is applied with record.set(), so relationship
   * fields accept records.
   */
  create(input: Record<string, unknown> = {}): EntityRecord {
    const { schema } = this.state();
    const defaults: StoredRow = {};
    for (const column of schema.columns) {
      if (column.defaultValue !== undefined) {
        defaults[column.name] = structuredClone(column.defaultValue);
      }
    }

    const record = new EntityRecord(this, defaults, false);
    for (const [field, value] of Object.entries(input)) {
      record.set(field, value);
    }
    return record;
  }

  /**
   * Builds a validated, unsaved record from a JSON object of column values.
   * Relationships travel as their key columns, e.g. "author_id".
   *
   * @throws ValidationError for malformed JSON, invalid values or relationship fields
   */
  fromJSON(json: string): EntityRecord {
    const { schema } = this.state();

    let payload: unknown;
    try {
      payload = JSON.parse(json);
    } catch (err) {
      throw new ValidationError(`Invalid JSON for entity "${this.name}"`, [
        { field: "", message: err instanceof Error ? err.message : String(err), code: "invalid_json" },
      ]);
    }

    const values = validateValues(schema, payload);

    if (typeof payload === "object" && payload !== null) {
      const relationErrors: FieldError[] = Object.keys(payload)
        .filter((key) => Object.hasOwn(schema.relationships, key))
        .map((key) => {
          const column = schema.foreignKeys.find((fk) => fk.relationField === key)?.column;
          return {
            field: key,
            message:
              column !== undefined
                ? `Relationship "${key}" is set through "${column}".`
                : `Relationship "${key}" cannot be set from JSON.`,
            code: "relationship_field",
          };
        });
      if (relationErrors.length > 0) {
        throw new ValidationError(`Validation failed for entity "${this.name}"`, relationErrors);
      }
    }

    return this.create(values);
  }

  /** Wraps a stored row as a persisted record. Unknown keys are dropped. */
  hydrate(row: StoredRow): EntityRecord {
    const { columns } = this.state();
    const values: StoredRow = {};
    for (const [key, value] of Object.entries(row)) {
      if (columns.has(key)) values[key] = value;
    }
    return new EntityRecord(this, values, true);
  }

  async findById(id: PrimaryKeyValue): Promise<EntityRecord | null> {
    const { schema } = this.state();
    await this.context.ensureStorage(this.entity);
    const row = await this.context.storage.findById(schema, id);
    return row ? this.hydrate(row) : null;
  }

  async findAll(): Promise<EntityRecord[]> {
    const { schema } = this.state();
    await this.context.ensureStorage(this.entity);
    const rows = await this.context.storage.findAll(schema);
    return rows.map((row) => this.hydrate(row));
  }

  // -------------------------------------------------------------------------
  // Writes
  // -------------------------------------------------------------------------

  /**
   * Checks the record's required relationships without saving.
   * @throws RequiredRelationshipError
   */
  validateRequired(record: EntityRecord): void {
    this.assertOwn(record);
    validateRequiredRelationships(this.state().schema, record.toJSON());
  }

  /**
   * Validates and persists a record, then writes the stored values
   * (defaults applied, primary key assigned) back onto it.
   *
   * @throws ValidationError, RequiredRelationshipError before any storage call
   */
  async save(record: EntityRecord): Promise<EntityRecord> {
    this.assertOwn(record);
    const { schema } = this.state();

    const values = validateValues(schema, record.toJSON());
    validateRequiredRelationships(schema, values);

    await this.context.ensureStorage(this.entity);
    const key = await this.context.storage.save(schema, values);

    record.markPersisted({ ...values, [schema.primaryKey]: key });
    this.context.logger.debug("Saved record", { entity: this.name, key });
    return record;
  }

  /**
   * Deletes a saved record.
   * @throws RecordNotSavedError for records never saved (or already deleted)
   */
  async delete(record: EntityRecord): Promise<boolean> {
    this.assertOwn(record);
    const key = record.primaryKey;
    if (!record.isPersisted || key === null) {
      throw new RecordNotSavedError(this.name);
    }

    const deleted = await this.context.storage.delete(this.state().schema, key);
    record.markDeleted();
    this.context.logger.debug("Deleted record", { entity: this.name, key, deleted });
    return deleted;
  }

  // -------------------------------------------------------------------------
  // Field access (called by EntityRecord)
  // -------------------------------------------------------------------------

  assertColumn(field: string): void {
    const { columns, schema } = this.state();
    if (columns.has(field)) return;
    throw new FieldAccessError(
      this.name,
      field,
      schema.relationships[field]
        ? `it is a relationship. Use related("${field}") to read it.`
        : `${this.name} has no such field.`
    );
  }

  assignField(record: EntityRecord, field: string, value: unknown): void {
    const { schema, columns, keyColumns } = this.state();

    if (schema.relationships[field]) {
      if (value !== null && !(value instanceof EntityRecord)) {
        throw new ReferenceAssignmentError(
          this.name,
          field,
          `expected a ${schema.relationships[field].target} record or null.`
        );
      }
      this.writeRelation(record, field, value);
      return;
    }

    if (!columns.has(field)) {
      throw new FieldAccessError(this.name, field, `${this.name} has no such field.`);
    }

    const relationField = keyColumns.get(field);
    if (relationField !== undefined && record.get(field) !== value) {
      this.state().resolvers.get(relationField)?.invalidate(record);
    }
    record.writeColumn(field, value);
  }

  async readRelation(record: EntityRecord, field: string): Promise<EntityRecord | null> {
    this.toOneRelation(field);
    const resolver = this.state().resolvers.get(field);
    if (!resolver) {
      throw new DefinitionError(
        this.name,
        `relationship "${field}" is not lazy. Read its key column instead.`,
        field
      );
    }
    return resolver.read(record);
  }

  writeRelation(record: EntityRecord, field: string, value: EntityRecord | null): void {
    const descriptor = this.toOneRelation(field);
    const { schema, resolvers } = this.state();
    const column = schema.foreignKeys.find((fk) => fk.relationField === field)?.column;
    if (column === undefined) {
      throw new DefinitionError(this.name, `relationship "${field}" has no key column.`, field);
    }

    let key: PrimaryKeyValue | null = null;
    if (value !== null) {
      if (value.entityName !== descriptor.target) {
        throw new ReferenceAssignmentError(
          this.name,
          field,
          `expected a ${descriptor.target} record, got a ${value.entityName} record.`
        );
      }
      key = value.primaryKey;
      if (key === null) {
        throw new ReferenceAssignmentError(
          this.name,
          field,
          `the ${descriptor.target} record has no primary key. Save it before assigning it.`
        );
      }
    }

    record.writeColumn(column, key);
    resolvers.get(field)?.write(record, value);
  }

  isResolved(record: EntityRecord, field: string): boolean {
    this.toOneRelation(field);
    return this.state().resolvers.get(field)?.isResolved(record) ?? false;
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private state(): PreparedModel {
    if (this.prepared) return this.prepared;

    const schema = this.context.deriveSchema(this.entity);
    const resolvers = new Map<string, ReferenceResolver>();
    const keyColumns = new Map<string, string>();

    for (const fk of schema.foreignKeys) {
      keyColumns.set(fk.column, fk.relationField);
      const descriptor = schema.relationships[fk.relationField];
      if (!descriptor.lazy) continue;

      resolvers.set(
        fk.relationField,
        new ReferenceResolver(
          descriptor,
          fk.column,
          () => this.targetModel(descriptor),
          this.context.logger
        )
      );
    }

    this.prepared = {
      schema,
      resolvers,
      keyColumns,
      columns: new Set(schema.columns.map((c) => c.name)),
    };
    this.context.logger.debug("Prepared model", {
      entity: this.name,
      table: schema.tableName,
      resolvers: Array.from(resolvers.keys()),
    });
    return this.prepared;
  }

  private targetModel(descriptor: RelationshipDescriptor): EntityModel {
    const target = this.context.registry.require(descriptor.target, {
      entity: this.name,
      field: descriptor.fieldName,
    });
    return this.context.model(target.name);
  }

  private toOneRelation(field: string): RelationshipDescriptor {
    const descriptor = this.state().schema.relationships[field];
    if (!descriptor) {
      throw new FieldAccessError(this.name, field, "it is not a relationship.");
    }
    if (descriptor.cardinality === "many") {
      throw new DefinitionError(
        this.name,
        `relationship "${field}" is to-many. Its key lives on ${descriptor.target}; ` +
          `load it from that side.`,
        field
      );
    }
    return descriptor;
  }

  private assertOwn(record: EntityRecord): void {
    if (record.entityName !== this.name) {
      throw new TypeError(`Expected a ${this.name} record, got a ${record.entityName} record.`);
    }
  }
}
