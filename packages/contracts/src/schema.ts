/**
 * Derived Schemas
 *
 * Shapes produced by the platform from an EntityDefinition.
 * Neither is written by hand: the persistence schema describes storage,
 * the transfer schema describes the flat data carried across API boundaries.
 */

import type { FieldType, IdentifierType } from "./field-types.js";
import type { FieldValidation } from "./entity.js";
import type { OnDeleteAction, RelationshipDescriptor } from "./relationship.js";

// ---------------------------------------------------------------------------
// Persistence Schema
// ---------------------------------------------------------------------------

/** A single storage column */
export interface StorageColumn {
  name: string;
  type: FieldType;
  nullable: boolean;
  primaryKey: boolean;

  /** "declared" for scalar fields, "foreign-key" for synthesized keys */
  origin: "declared" | "foreign-key";

  /** For synthesized keys: the relationship field that produced the column */
  relationField?: string;

  defaultValue?: unknown;
  options?: readonly string[];
  validations?: readonly FieldValidation[];
}

/** A synthesized column referencing the target entity's primary key */
export interface ForeignKeyConstraint {
  column: string;
  relationField: string;
  targetEntity: string;
  targetTable: string;
  targetColumn: string;
  onDelete: OnDeleteAction;
}

/**
 * The storage definition derived from one entity.
 * Built once per entity and frozen. Never rebuilt.
 */
export interface PersistenceSchema {
  entityName: string;
  tableName: string;
  primaryKey: string;
  primaryKeyType: IdentifierType;

  /** Declared scalar columns in declaration order, then synthesized keys */
  columns: readonly StorageColumn[];

  /** One constraint per synthesized key */
  foreignKeys: readonly ForeignKeyConstraint[];

  /** Every relationship field (to-one and to-many), keyed by field name */
  relationships: Readonly<Record<string, RelationshipDescriptor>>;
}

// ---------------------------------------------------------------------------
// Transfer Schema
// ---------------------------------------------------------------------------

/**
 * How relationship fields are shaped in a transfer schema:
 *   omit             drop relationship fields and their keys
 *   opaque-optional  keep relationship fields as unconstrained optional values
 *   id-only          drop relationship fields, keep synthesized keys
 */
export const TRANSFER_STRATEGIES = ["omit", "opaque-optional", "id-only"] as const;

export type TransferStrategy = (typeof TRANSFER_STRATEGIES)[number];

export type TransferField =
  | {
      kind: "scalar";
      name: string;
      type: FieldType;
      optional: boolean;
      options?: readonly string[];
      validations?: readonly FieldValidation[];
    }
  | {
      /** Unconstrained optional value; the caller fills it in */
      kind: "opaque";
      name: string;
      optional: true;
    };

/** A flat, non-lazy data carrier for boundary exchange */
export interface TransferSchema {
  name: string;
  strategy: TransferStrategy;
  fields: readonly TransferField[];
}
