/**
 * Entity Definition
 *
 * An Entity is a business object the application persists.
 * Entities are the nouns of your business: Author, Book, Product.
 *
 * From one entity definition the platform derives:
 *   - A validation schema (Zod) enforced before every write
 *   - A persistence schema: storage columns, primary key, foreign keys
 *   - A transfer schema for API boundaries
 *   - Runtime records with lazily resolved relationships
 */

import type { TypeExpression } from "./type-expression.js";

// ---------------------------------------------------------------------------
// Field Definition
// ---------------------------------------------------------------------------

/** Validation rules that can be applied to a field */
export interface FieldValidation {
  /** Minimum value (for numbers) or minimum length (for strings) */
  min?: number;
  /** Maximum value (for numbers) or maximum length (for strings) */
  max?: number;
  /** Regex pattern the value must match */
  pattern?: string;
  /** Custom error message when validation fails */
  message?: string;
}

/**
 * Defines a single field on an entity.
 * Scalar fields map to storage columns; relationship fields do not:
 * they get a synthesized `{name}_id` column instead (to-one only).
 */
export interface FieldDefinition {
  /** Property name. Also used as the column name. (e.g., "title") */
  name: string;

  /**
   * The declared shape. Wrap in `t.nullable()` to allow absent values;
   * use `belongsTo()` / `hasMany()` for relationships.
   */
  type: TypeExpression;

  /** Plain English description, used in docs and error messages */
  description?: string;

  /** Default value when creating a new record */
  defaultValue?: unknown;

  /** For 'enum' type: the list of allowed values */
  options?: string[];

  /** Validation rules beyond type checking */
  validations?: FieldValidation[];
}

// ---------------------------------------------------------------------------
// Entity Definition
// ---------------------------------------------------------------------------

/**
 * The complete definition of a persisted entity.
 * Immutable once declared: `defineEntity` freezes it.
 */
export interface EntityDefinition {
  /** Singular name, PascalCase. (e.g., "Author") */
  name: string;

  /** Plain English description of what this entity represents */
  description?: string;

  /** Storage table name. Defaults to the lower-cased entity name. */
  tableName?: string;

  /** Primary-key field name. Defaults to the configured convention ("id"). */
  primaryKey?: string;

  /** The fields this entity has, in declaration order */
  fields: FieldDefinition[];
}

// ---------------------------------------------------------------------------
// Helper
// ---------------------------------------------------------------------------

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
 * Declares an entity. The definition is frozen in place (including nested
 * fields and type expressions) so no later derivation can mutate it.
 *
 * @example
 * export const BookEntity = defineEntity({
 *   name: "Book",
 *   fields: [
 *     { name: "id", type: t.integer() },
 *     { name: "title", type: t.text() },
 *     { name: "author", type: belongsTo("Author", { reverse: "books" }) },
 *   ],
 * });
 */
export function defineEntity(definition: EntityDefinition): EntityDefinition {
  return deepFreeze(definition);
}
