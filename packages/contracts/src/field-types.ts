/**
 * Field Types
 *
 * Defines the scalar types an entity field can hold and their
 * corresponding Zod validation schemas. This is the single source of truth
 * for what a storage column can contain.
 */

import { z } from "zod";
import type { FieldValidation } from "./entity.js";

/**
 * All supported scalar field types.
 * Each maps to a specific database column type and Zod validator.
 */
export const FIELD_TYPES = [
  "text",
  "email",
  "url",
  "integer",
  "number",
  "boolean",
  "date",
  "datetime",
  "uuid",
  "enum",
  "json",
] as const;

export type FieldType = (typeof FIELD_TYPES)[number];

/**
 * Field types that can serve as a primary key, and therefore as the
 * type of a synthesized foreign key.
 */
export const IDENTIFIER_TYPES = ["integer", "uuid", "text"] as const;

export type IdentifierType = (typeof IDENTIFIER_TYPES)[number];

export function isIdentifierType(type: FieldType): type is IdentifierType {
  return (IDENTIFIER_TYPES as readonly FieldType[]).includes(type);
}

/**
 * Applies min/max/pattern rules to a base schema.
 * min/max bound string length for text-like types and the value for numbers.
 */
function applyValidations(
  schema: z.ZodTypeAny,
  validations: readonly FieldValidation[]
): z.ZodTypeAny {
  if (schema instanceof z.ZodString) {
    let str = schema;
    for (const rule of validations) {
      if (rule.min !== undefined) str = str.min(rule.min, rule.message);
      if (rule.max !== undefined) str = str.max(rule.max, rule.message);
      if (rule.pattern !== undefined) str = str.regex(new RegExp(rule.pattern), rule.message);
    }
    return str;
  }

  if (schema instanceof z.ZodNumber) {
    let num = schema;
    for (const rule of validations) {
      if (rule.min !== undefined) num = num.min(rule.min, rule.message);
      if (rule.max !== undefined) num = num.max(rule.max, rule.message);
    }
    return num;
  }

  return schema;
}

/**
 * Returns the Zod schema for a given field type.
 * Used by the validation layer before every write.
 */
export function zodSchemaForFieldType(
  type: FieldType,
  options?: {
    required?: boolean;
    enumValues?: readonly string[];
    validations?: readonly FieldValidation[];
  }
): z.ZodTypeAny {
  const required = options?.required ?? false;

  let schema: z.ZodTypeAny;

  switch (type) {
    case "text":
      schema = z.string();
      break;
    case "email":
      schema = z.string().email();
      break;
    case "url":
      schema = z.string().url();
      break;
    case "integer":
      schema = z.number().int();
      break;
    case "number":
      schema = z.number();
      break;
    case "date":
      schema = z.union([z.string().date(), z.string().datetime(), z.date()]);
      break;
    case "datetime":
      schema = z.string().datetime().or(z.date());
      break;
    case "boolean":
      schema = z.boolean();
      break;
    case "uuid":
      schema = z.string().uuid();
      break;
    case "enum": {
      const [first, ...rest] = options?.enumValues ?? [];
      schema = first !== undefined ? z.enum([first, ...rest]) : z.string();
      break;
    }
    case "json":
      schema = z.unknown();
      break;
    default:
      schema = z.string();
  }

  if (options?.validations && options.validations.length > 0) {
    schema = applyValidations(schema, options.validations);
  }

  return required ? schema : schema.optional().nullable();
}
