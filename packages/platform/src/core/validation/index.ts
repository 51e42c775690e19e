/**
 * Validation
 *
 * Builds a Zod object schema from a persistence schema's storage columns
 * and checks column values against it BEFORE any storage call. If
 * validation fails, nothing is written and a structured error is thrown.
 *
 *   - Declared non-nullable columns are required, unless they carry a
 *     default (Zod fills it in) or are the primary key (storage may assign it)
 *   - Nullable columns accept null or may be left out
 *   - Foreign-key columns are optional here; required relationships are
 *     checked separately by validateRequiredRelationships
 */

import { z } from "zod";
import { zodSchemaForFieldType, type PersistenceSchema, type StoredRow } from "@dualmap/contracts";

export interface FieldError {
  field: string;
  message: string;
  code: string;
}

/**
 * Structured validation error.
 * Contains per-field error details.
 */
export class ValidationError extends Error {
  public readonly fieldErrors: FieldError[];

  constructor(message: string, fieldErrors: FieldError[]) {
    super(message);
    this.name = "ValidationError";
    this.fieldErrors = fieldErrors;
  }
}

const validators = new WeakMap<PersistenceSchema, z.ZodObject<Record<string, z.ZodTypeAny>>>();

/**
 * Returns the Zod object schema for a persistence schema.
 * Built once per schema object.
 */
export function buildValidationSchema(
  schema: PersistenceSchema
): z.ZodObject<Record<string, z.ZodTypeAny>> {
  const cached = validators.get(schema);
  if (cached) return cached;

  const shape: Record<string, z.ZodTypeAny> = {};

  for (const column of schema.columns) {
    const required = !column.nullable && !column.primaryKey && column.origin === "declared";
    const fieldSchema = zodSchemaForFieldType(column.type, {
      required,
      enumValues: column.options,
      validations: column.validations,
    });

    if (required && column.defaultValue !== undefined) {
      shape[column.name] = fieldSchema.optional().default(column.defaultValue);
    } else {
      shape[column.name] = fieldSchema;
    }
  }

  const objectSchema = z.object(shape);
  validators.set(schema, objectSchema);
  return objectSchema;
}

/**
 * Validates column values for a write.
 * Returns the parsed values (defaults applied, unknown keys stripped).
 * Throws a ValidationError on failure.
 */
export function validateValues(schema: PersistenceSchema, values: unknown): StoredRow {
  const result = buildValidationSchema(schema).safeParse(values);

  if (!result.success) {
    const fieldErrors = result.error.issues.map((issue) => ({
      field: issue.path.join("."),
      message: issue.message,
      code: issue.code,
    }));

    throw new ValidationError(`Validation failed for entity "${schema.entityName}"`, fieldErrors);
  }

  return result.data;
}
