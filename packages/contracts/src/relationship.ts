/**
 * Relationship Definitions
 *
 * Relationships are declared on entity fields through type expressions
 * (see `belongsTo` / `hasMany`). The platform extracts them into
 * descriptors and uses those to:
 *   - Synthesize foreign-key columns for to-one relationships
 *   - Add foreign-key constraints to the persistence schema
 *   - Check required relationships before every write
 *   - Install lazy reference resolvers on runtime records
 */

/** Referential action applied by the database when the target row is deleted */
export type OnDeleteAction = "cascade" | "set null" | "restrict" | "no action";

export const ON_DELETE_ACTIONS: readonly OnDeleteAction[] = [
  "cascade",
  "set null",
  "restrict",
  "no action",
];

/**
 * Metadata attached to a relationship field.
 * All options are optional; `t.relation(inner)` alone marks a relationship.
 */
export interface RelationMetadata {
  /**
   * Name of the field on the target entity that points back here.
   * Informational only, not enforced as a live back-reference.
   */
  reverse?: string;

  /** Action for the foreign-key constraint. Defaults to "no action". */
  onDelete?: OnDeleteAction;

  /**
   * Whether a lazy reference resolver is installed for this field.
   * Defaults to true. When false, only the foreign key is managed.
   */
  lazy?: boolean;
}

/** to-one: this entity holds the key. to-many: the target holds the key. */
export type RelationshipCardinality = "one" | "many";

/**
 * A relationship field after extraction.
 * One descriptor per relationship field, in declaration order.
 */
export interface RelationshipDescriptor {
  /** The relationship field as declared (e.g., "author") */
  fieldName: string;

  /** Target entity name as written, resolved later through the registry */
  target: string;

  cardinality: RelationshipCardinality;

  /** Whether the relationship may be empty. Never checked for to-many. */
  nullable: boolean;

  reverse?: string;

  onDelete: OnDeleteAction;

  lazy: boolean;
}
