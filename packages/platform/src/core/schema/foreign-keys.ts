/**
 * Foreign-Key Synthesizer
 *
 * Produces one scalar key field per to-one relationship, named
 * `{field}_id`, nullable exactly when the relationship is. To-many
 * relationships produce nothing: the key lives on the other entity.
 *
 * Collisions with declared fields are checked by the schema builder,
 * which knows the declared field names.
 */

import type { RelationshipDescriptor } from "@dualmap/contracts";

export interface SynthesizedForeignKey {
  /** Column name: `{relationField}_id` */
  name: string;
  relationField: string;
  target: string;
  nullable: boolean;
}

export function foreignKeyName(relationField: string): string {
  return `${relationField}_id`;
}

export function synthesizeForeignKeys(
  relationships: Readonly<Record<string, RelationshipDescriptor>>
): SynthesizedForeignKey[] {
  const keys: SynthesizedForeignKey[] = [];

  for (const descriptor of Object.values(relationships)) {
    if (descriptor.cardinality === "many") continue;

    keys.push({
      name: foreignKeyName(descriptor.fieldName),
      relationField: descriptor.fieldName,
      target: descriptor.target,
      nullable: descriptor.nullable,
    });
  }

  return keys;
}
