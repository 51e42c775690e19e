/**
 * Type Expressions
 *
 * Describes the declared shape of a field as a closed, tagged union.
 * A type expression is built from five node kinds:
 *
 *   scalar     a plain value of one FieldType ("text", "integer", ...)
 *   ref        a reference to another entity, by name (may be declared later)
 *   nullable   the inner value may be absent
 *   list       a sequence of the inner value
 *   annotated  attaches relationship metadata to the inner expression
 *
 * Relationship declarations always compose in one order, outermost first:
 * annotated → nullable → list → bare. The platform's type unwrapper relies
 * on that order and rejects any other nesting.
 *
 * @example
 * fields: [
 *   { name: "id", type: t.integer() },
 *   { name: "nickname", type: t.nullable(t.text()) },
 *   { name: "author", type: belongsTo("Author") },
 *   { name: "editor", type: belongsTo("Author", { optional: true }) },
 *   { name: "chapters", type: hasMany("Chapter", { reverse: "book" }) },
 * ]
 */

import type { FieldType } from "./field-types.js";
import type { OnDeleteAction, RelationMetadata } from "./relationship.js";

export interface ScalarExpression {
  kind: "scalar";
  type: FieldType;
}

export interface RefExpression {
  kind: "ref";
  /** Entity name, resolved through the entity registry when first needed */
  entity: string;
}

export interface NullableExpression {
  kind: "nullable";
  inner: TypeExpression;
}

export interface ListExpression {
  kind: "list";
  inner: TypeExpression;
}

export interface AnnotatedExpression {
  kind: "annotated";
  inner: TypeExpression;
  relation: RelationMetadata;
}

export type TypeExpression =
  | ScalarExpression
  | RefExpression
  | NullableExpression
  | ListExpression
  | AnnotatedExpression;

/** The two node kinds left after every wrapper has been stripped */
export type BareExpression = ScalarExpression | RefExpression;

function scalar(type: FieldType): ScalarExpression {
  return { kind: "scalar", type };
}

/**
 * Type expression builders.
 */
export const t = {
  text: () => scalar("text"),
  email: () => scalar("email"),
  url: () => scalar("url"),
  integer: () => scalar("integer"),
  number: () => scalar("number"),
  boolean: () => scalar("boolean"),
  date: () => scalar("date"),
  datetime: () => scalar("datetime"),
  uuid: () => scalar("uuid"),
  enum: () => scalar("enum"),
  json: () => scalar("json"),
  scalar,
  ref: (entity: string): RefExpression => ({ kind: "ref", entity }),
  nullable: (inner: TypeExpression): NullableExpression => ({ kind: "nullable", inner }),
  list: (inner: TypeExpression): ListExpression => ({ kind: "list", inner }),
  relation: (inner: TypeExpression, relation: RelationMetadata = {}): AnnotatedExpression => ({
    kind: "annotated",
    inner,
    relation,
  }),
} as const;

/**
 * Declares a to-one relationship. The owning entity gets a synthesized
 * `{field}_id` column. Required unless `optional` is set.
 */
export function belongsTo(
  entity: string,
  options: { optional?: boolean; reverse?: string; onDelete?: OnDeleteAction; lazy?: boolean } = {}
): AnnotatedExpression {
  const { optional, ...relation } = options;
  const target = t.ref(entity);
  return t.relation(optional ? t.nullable(target) : target, relation);
}

/**
 * Declares a to-many relationship. No column is added on this side;
 * the foreign key lives on the target entity.
 */
export function hasMany(
  entity: string,
  options: { reverse?: string } = {}
): AnnotatedExpression {
  return t.relation(t.list(t.ref(entity)), options);
}

/**
 * Renders a type expression as text for error messages.
 * e.g. Relation<Nullable<Author>>
 */
export function describeTypeExpression(expr: TypeExpression): string {
  switch (expr.kind) {
    case "scalar":
      return expr.type;
    case "ref":
      return expr.entity;
    case "nullable":
      return `Nullable<${describeTypeExpression(expr.inner)}>`;
    case "list":
      return `List<${describeTypeExpression(expr.inner)}>`;
    case "annotated":
      return `Relation<${describeTypeExpression(expr.inner)}>`;
  }
}
