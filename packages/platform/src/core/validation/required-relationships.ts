/**
 * Required-Relationship Validator
 *
 * Runs immediately before every write. Each non-nullable to-one
 * relationship must have its synthesized key populated; the first one
 * that is undefined or null fails the write before storage is touched.
 *
 * Only null/unset keys are caught. A key pointing at a row that no
 * longer exists passes.
 */

import type { PersistenceSchema, StoredRow } from "@dualmap/contracts";
import { RequiredRelationshipError } from "../errors/index.js";

export function validateRequiredRelationships(schema: PersistenceSchema, values: StoredRow): void {
  for (const fk of schema.foreignKeys) {
    if (schema.relationships[fk.relationField]?.nullable !== false) continue;

    const value = values[fk.column];
    if (value === undefined || value === null) {
      throw new RequiredRelationshipError(schema.entityName, fk.relationField, fk.targetEntity);
    }
  }
}
