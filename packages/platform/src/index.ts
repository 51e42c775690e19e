/**
 * @dualmap/platform
 *
 * The mapping engine. Derives persistence schemas from entity
 * definitions, validates writes, resolves relationships lazily and
 * projects transfer schemas.
 */

// Config
export { loadConfig, LOG_LEVELS, type AppConfig, type LogLevel } from "./core/config/index.js";

// Logging
export { createLogger, silentLogger } from "./core/logging/index.js";

// Errors
export {
  DefinitionError,
  UnregisteredTargetError,
  RequiredRelationshipError,
  ReferenceAssignmentError,
  RecordNotSavedError,
  FieldAccessError,
} from "./core/errors/index.js";

// Schema derivation
export { unwrapType, type UnwrappedType, type FieldLocation } from "./core/schema/type-unwrapper.js";
export { classifyFields, extractRelationships, type ClassifiedFields } from "./core/schema/relationship-extractor.js";
export { synthesizeForeignKeys, foreignKeyName, type SynthesizedForeignKey } from "./core/schema/foreign-keys.js";
export {
  derivePersistenceSchema,
  resolvePrimaryKey,
  toTableName,
  SchemaCache,
  DEFAULT_SCHEMA_OPTIONS,
  type SchemaBuildOptions,
} from "./core/database/schema-builder.js";

// Validation
export { buildValidationSchema, validateValues, ValidationError, type FieldError } from "./core/validation/index.js";
export { validateRequiredRelationships } from "./core/validation/required-relationships.js";

// Transfer schemas
export { projectTransferSchema, toZodObject } from "./core/transfer/projector.js";

// Entity Manager
export { EntityRegistry } from "./core/entity-manager/entity-registry.js";
export { EntityMapper, type EntityMapperOptions } from "./core/entity-manager/mapper.js";
export { EntityModel, type ModelContext } from "./core/entity-manager/entity-model.js";
export { EntityRecord } from "./core/entity-manager/entity-record.js";
export { ReferenceResolver, type CacheSlot } from "./core/entity-manager/reference-resolver.js";

// Database
export { initDatabase, getDatabase, closeDatabase, type DatabaseHandles } from "./core/database/connection.js";
export {
  buildCreateTableStatement,
  buildForeignKeyStatements,
  buildDefaultClause,
  fieldTypeToSQL,
  foreignKeyConstraintName,
} from "./core/database/ddl.js";
export { DrizzleTableSet } from "./core/database/drizzle-tables.js";
export { DrizzleStorageAdapter, type SqlExecutor } from "./core/database/drizzle-storage.js";
export { MemoryStorageAdapter } from "./core/database/memory-storage.js";

// Observability
export {
  captureException,
  captureMessage,
  flushObservability,
  getObservabilityProvider,
  setObservabilityProvider,
  resetObservability,
  ConsoleObservabilityProvider,
  type ObservabilityProvider,
  type ObservabilityContext,
  type ObservabilitySeverity,
} from "./core/observability/index.js";
