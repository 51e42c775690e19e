/**
 * Transfer-Schema Projector
 *
 * Flattens a persistence schema into a transfer schema for API
 * boundaries. Relationship fields are shaped by the strategy:
 *
 *   omit             drop relationship fields and their synthesized keys
 *   opaque-optional  keep keys, and add each relationship field as an
 *                    unconstrained optional value the caller fills in
 *   id-only          drop relationship fields, keep synthesized keys
 *
 * A transfer schema is plain data. Nothing on it resolves lazily.
 */

import { z } from "zod";
import {
  zodSchemaForFieldType,
  type PersistenceSchema,
  type TransferField,
  type TransferSchema,
  type TransferStrategy,
} from "@dualmap/contracts";

export function projectTransferSchema(
  schema: PersistenceSchema,
  strategy: TransferStrategy
): TransferSchema {
  const fields: TransferField[] = [];

  for (const column of schema.columns) {
    if (column.origin === "foreign-key" && strategy === "omit") continue;

    fields.push({
      kind: "scalar",
      name: column.name,
      type: column.type,
      optional: column.nullable || column.primaryKey || column.defaultValue !== undefined,
      ...(column.options !== undefined ? { options: column.options } : {}),
      ...(column.validations !== undefined ? { validations: column.validations } : {}),
    });
  }

  if (strategy === "opaque-optional") {
    for (const descriptor of Object.values(schema.relationships)) {
      fields.push({ kind: "opaque", name: descriptor.fieldName, optional: true });
    }
  }

  return { name: schema.entityName, strategy, fields };
}

/**
 * Builds the Zod validator for a transfer schema.
 * Opaque fields accept anything, including nothing.
 */
export function toZodObject(transfer: TransferSchema): z.ZodObject<Record<string, z.ZodTypeAny>> {
  const shape: Record<string, z.ZodTypeAny> = {};

  for (const field of transfer.fields) {
    shape[field.name] =
      field.kind === "opaque"
        ? z.unknown().optional()
        : zodSchemaForFieldType(field.type, {
            required: !field.optional,
            enumValues: field.options,
            validations: field.validations,
          });
  }

  return z.object(shape);
}
