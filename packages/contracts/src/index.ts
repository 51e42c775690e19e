/**
 * @dualmap/contracts
 *
 * Public API: the shared boundary between platform and domain.
 * Both sides import from this package. Neither imports from the other.
 */

// Entity definitions
export type {
  EntityDefinition,
  FieldDefinition,
  FieldValidation,
} from "./entity.js";
export { defineEntity } from "./entity.js";

// Field types
export type { FieldType, IdentifierType } from "./field-types.js";
export {
  FIELD_TYPES,
  IDENTIFIER_TYPES,
  isIdentifierType,
  zodSchemaForFieldType,
} from "./field-types.js";

// Type expressions
export type {
  TypeExpression,
  BareExpression,
  ScalarExpression,
  RefExpression,
  NullableExpression,
  ListExpression,
  AnnotatedExpression,
} from "./type-expression.js";
export { t, belongsTo, hasMany, describeTypeExpression } from "./type-expression.js";

// Relationships
export type {
  RelationMetadata,
  RelationshipDescriptor,
  RelationshipCardinality,
  OnDeleteAction,
} from "./relationship.js";
export { ON_DELETE_ACTIONS } from "./relationship.js";

// Derived schemas
export type {
  PersistenceSchema,
  StorageColumn,
  ForeignKeyConstraint,
  TransferSchema,
  TransferField,
  TransferStrategy,
} from "./schema.js";
export { TRANSFER_STRATEGIES } from "./schema.js";

// Storage collaborator
export type { StorageAdapter, StoredRow, PrimaryKeyValue } from "./storage.js";

// Context
export type { Logger } from "./context.js";
