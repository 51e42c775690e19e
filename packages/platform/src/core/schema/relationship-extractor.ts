/**
 * Relationship Extractor
 *
 * Walks an entity's fields through the type unwrapper and classifies
 * each one as a plain scalar or a relationship. Relationships become
 * descriptors; scalars are returned alongside so callers never unwrap
 * a field twice.
 *
 * Target entities are recorded by name only. Nothing here consults the
 * entity registry; an unknown target is not an error until something
 * actually needs it.
 */

import type {
  EntityDefinition,
  FieldDefinition,
  FieldType,
  RelationshipDescriptor,
} from "@dualmap/contracts";
import { DefinitionError } from "../errors/index.js";
import { unwrapType } from "./type-unwrapper.js";

/** A non-relationship field after unwrapping */
export interface ScalarFieldShape {
  field: FieldDefinition;
  type: FieldType;
  nullable: boolean;
}

export interface ClassifiedFields {
  scalars: ScalarFieldShape[];
  relationships: Record<string, RelationshipDescriptor>;
}

/**
 * Splits an entity's fields into scalars and relationship descriptors,
 * both in declaration order.
 */
export function classifyFields(entity: EntityDefinition): ClassifiedFields {
  const scalars: ScalarFieldShape[] = [];
  const relationships: Record<string, RelationshipDescriptor> = {};

  for (const field of entity.fields) {
    const shape = unwrapType(field.type, { entity: entity.name, field: field.name });

    if (shape.relation === null) {
      if (shape.bare.kind === "ref") {
        throw new DefinitionError(
          entity.name,
          `field "${field.name}" references entity "${shape.bare.entity}" without relation ` +
            `metadata. Declare it with belongsTo() or hasMany().`,
          field.name
        );
      }
      if (shape.isCollection) {
        throw new DefinitionError(
          entity.name,
          `field "${field.name}" is a list of scalars, which has no storage mapping. ` +
            `Use a "json" field instead.`,
          field.name
        );
      }
      scalars.push({ field, type: shape.bare.type, nullable: shape.isNullable });
      continue;
    }

    if (shape.bare.kind !== "ref") {
      throw new DefinitionError(
        entity.name,
        `field "${field.name}" carries relation metadata but its type is the scalar ` +
          `"${shape.bare.type}". Relations must target an entity.`,
        field.name
      );
    }

    relationships[field.name] = {
      fieldName: field.name,
      target: shape.bare.entity,
      cardinality: shape.isCollection ? "many" : "one",
      nullable: shape.isNullable,
      ...(shape.relation.reverse !== undefined ? { reverse: shape.relation.reverse } : {}),
      onDelete: shape.relation.onDelete ?? "no action",
      lazy: shape.relation.lazy ?? true,
    };
  }

  return { scalars, relationships };
}

/**
 * Returns field name → relationship descriptor for every relationship
 * field of the entity, in declaration order.
 */
export function extractRelationships(
  entity: EntityDefinition
): Record<string, RelationshipDescriptor> {
  return classifyFields(entity).relationships;
}
