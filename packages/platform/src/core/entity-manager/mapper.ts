/**
 * Entity Mapper
 *
 * The top-level context. Owns everything the mapper keeps between calls:
 * the entity registry, the schema cache, the storage adapter, the
 * runtime models, and which tables have been ensured.
 *
 * @example
 * const mapper = new EntityMapper({ storage: new MemoryStorageAdapter() });
 * mapper.register(AuthorEntity, BookEntity);
 *
 * const author = await mapper.model("Author").create({ name: "Le Guin" }).save();
 * const book = await mapper.model("Book").create({ title: "Lathe", author }).save();
 * await book.related("author"); // author, from the cache
 */

import type {
  EntityDefinition,
  Logger,
  PersistenceSchema,
  RelationshipDescriptor,
  StorageAdapter,
  TransferSchema,
  TransferStrategy,
} from "@dualmap/contracts";
import { EntityRegistry } from "./entity-registry.js";
import { EntityModel, type ModelContext } from "./entity-model.js";
import {
  DEFAULT_SCHEMA_OPTIONS,
  SchemaCache,
  type SchemaBuildOptions,
} from "../database/schema-builder.js";
import { MemoryStorageAdapter } from "../database/memory-storage.js";
import { extractRelationships } from "../schema/relationship-extractor.js";
import { projectTransferSchema } from "../transfer/projector.js";
import { silentLogger } from "../logging/index.js";

export interface EntityMapperOptions {
  /** Defaults to a MemoryStorageAdapter */
  storage?: StorageAdapter;
  logger?: Logger;
  schema?: Partial<SchemaBuildOptions>;
}

export class EntityMapper implements ModelContext {
  readonly registry = new EntityRegistry();
  readonly schemas: SchemaCache;
  readonly storage: StorageAdapter;
  readonly logger: Logger;

  private readonly models = new Map<string, EntityModel>();
  private readonly tableTasks = new Map<string, Promise<void>>();
  private readonly keyTasks = new Map<string, Promise<void>>();

  constructor(options: EntityMapperOptions = {}) {
    this.storage = options.storage ?? new MemoryStorageAdapter();
    this.logger = options.logger ?? silentLogger;
    this.schemas = new SchemaCache(this.registry, { ...DEFAULT_SCHEMA_OPTIONS, ...options.schema });
  }

  /**
   * Registers entity definitions. Targets may be registered in any order,
   * as long as all are registered before first use.
   */
  register(...entities: EntityDefinition[]): this {
    this.registry.registerAll(entities);
    return this;
  }

  /** Returns the runtime model for a registered entity */
  model(entityName: string): EntityModel {
    const existing = this.models.get(entityName);
    if (existing) return existing;

    const model = new EntityModel(this.requireEntity(entityName), this);
    this.models.set(entityName, model);
    return model;
  }

  /** Memoized: repeated calls return the same frozen schema */
  deriveSchema(entity: EntityDefinition): PersistenceSchema {
    const known = this.schemas.get(entity.name) !== undefined;
    const schema = this.schemas.derive(entity);
    if (!known) {
      this.logger.debug("Derived persistence schema", {
        entity: entity.name,
        table: schema.tableName,
        columns: schema.columns.map((c) => c.name),
        foreignKeys: schema.foreignKeys.length,
      });
    }
    return schema;
  }

  extractRelationships(entity: EntityDefinition): Record<string, RelationshipDescriptor> {
    return extractRelationships(entity);
  }

  project(entityName: string, strategy: TransferStrategy): TransferSchema {
    return projectTransferSchema(this.deriveSchema(this.requireEntity(entityName)), strategy);
  }

  /**
   * Ensures the entity's table and every table it references through
   * to-one relationships, then their foreign keys. Each table and each
   * set of keys is ensured once per mapper; a failed attempt is retried
   * on the next call.
   */
  async ensureStorage(entity: EntityDefinition): Promise<void> {
    const schemas = this.referenceClosure(entity);

    for (const schema of schemas) {
      await this.once(this.tableTasks, schema.entityName, async () => {
        await this.storage.ensureTable(schema);
        this.logger.debug("Ensured table", { entity: schema.entityName, table: schema.tableName });
      });
    }
    for (const schema of schemas) {
      await this.once(this.keyTasks, schema.entityName, () =>
        this.storage.ensureForeignKeys(schema)
      );
    }
  }

  /** Ensures storage for every registered entity */
  async ensureAll(): Promise<PersistenceSchema[]> {
    const entities = this.registry.getAll();
    for (const entity of entities) {
      await this.ensureStorage(entity);
    }
    return entities.map((entity) => this.deriveSchema(entity));
  }

  private requireEntity(entityName: string): EntityDefinition {
    const entity = this.registry.get(entityName);
    if (!entity) {
      throw new Error(`Entity "${entityName}" is not registered.`);
    }
    return entity;
  }

  /** Schemas of the entity and its to-one targets, targets first */
  private referenceClosure(entity: EntityDefinition): PersistenceSchema[] {
    const ordered: PersistenceSchema[] = [];
    const visited = new Set<string>();

    const visit = (current: EntityDefinition) => {
      if (visited.has(current.name)) return;
      visited.add(current.name);

      const schema = this.deriveSchema(current);
      for (const fk of schema.foreignKeys) {
        visit(
          this.registry.require(fk.targetEntity, { entity: current.name, field: fk.relationField })
        );
      }
      ordered.push(schema);
    };

    visit(entity);
    return ordered;
  }

  private async once(
    tasks: Map<string, Promise<void>>,
    key: string,
    run: () => Promise<void>
  ): Promise<void> {
    let task = tasks.get(key);
    if (!task) {
      task = run();
      tasks.set(key, task);
    }

    try {
      await task;
    } catch (err) {
      if (tasks.get(key) === task) tasks.delete(key);
      throw err;
    }
  }
}
