/**
 * Type Unwrapper
 *
 * Normalizes a field's declared type expression into a canonical shape:
 * the bare type, whether it is a collection, whether it is nullable,
 * and the relationship metadata (if any).
 *
 * Wrappers are stripped in a fixed order: annotated, then nullable,
 * then list. Whatever remains must be a bare scalar or entity reference.
 * Any other nesting (e.g. List<Nullable<Book>>) is rejected rather than
 * guessed at.
 *
 * Entity references are NOT resolved here; a forward reference to an
 * entity that does not exist yet is a perfectly valid result.
 */

import {
  describeTypeExpression,
  type BareExpression,
  type RelationMetadata,
  type TypeExpression,
} from "@dualmap/contracts";
import { DefinitionError } from "../errors/index.js";

export interface UnwrappedType {
  bare: BareExpression;
  isCollection: boolean;
  isNullable: boolean;
  relation: RelationMetadata | null;
}

/** Where the expression was declared, for error messages */
export interface FieldLocation {
  entity: string;
  field: string;
}

export function unwrapType(expr: TypeExpression, location: FieldLocation): UnwrappedType {
  let current = expr;
  let relation: RelationMetadata | null = null;
  let isNullable = false;
  let isCollection = false;

  if (current.kind === "annotated") {
    relation = current.relation;
    current = current.inner;
  }

  if (current.kind === "nullable") {
    isNullable = true;
    current = current.inner;
  }

  if (current.kind === "list") {
    isCollection = true;
    current = current.inner;
  }

  if (current.kind !== "scalar" && current.kind !== "ref") {
    throw new DefinitionError(
      location.entity,
      `field "${location.field}" has a malformed type expression ` +
        `${describeTypeExpression(expr)}. Wrappers compose outermost first as ` +
        `Relation → Nullable → List, each at most once.`,
      location.field
    );
  }

  return { bare: current, isCollection, isNullable, relation };
}
