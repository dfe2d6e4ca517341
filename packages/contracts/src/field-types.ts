/**
 * Field Types
 *
 * Defines the available field types for entity definitions and their
 * corresponding Zod validation schemas. Records validate their attributes
 * through these schemas before anything is written to storage.
 */

import { z } from "zod";
import type { FieldDefinition, FieldValidation } from "./entity.js";

/**
 * All supported field types.
 * Each maps to a specific database column type and Zod validator.
 */
export const FIELD_TYPES = [
  "text",
  "email",
  "phone",
  "url",
  "currency",
  "date",
  "datetime",
  "number",
  "percentage",
  "enum",
  "rich_text",
  "boolean",
] as const;

export type FieldType = (typeof FIELD_TYPES)[number];

/**
 * Returns the Zod schema for a given field type.
 */
export function zodSchemaForFieldType(
  type: FieldType,
  options?: { required?: boolean; enumValues?: string[] }
): z.ZodTypeAny {
  const required = options?.required ?? false;

  let schema: z.ZodTypeAny;

  switch (type) {
    case "text":
    case "rich_text":
    case "phone":
      schema = z.string();
      break;
    case "email":
      schema = z.string().email();
      break;
    case "url":
      schema = z.string().url();
      break;
    case "currency":
    case "number":
    case "percentage":
      schema = z.number();
      break;
    case "date":
    case "datetime":
      schema = z.string().datetime().or(z.date());
      break;
    case "boolean":
      schema = z.boolean();
      break;
    case "enum":
      if (options?.enumValues && options.enumValues.length > 0) {
        schema = z.enum(options.enumValues as [string, ...string[]]);
      } else {
        schema = z.string();
      }
      break;
    default:
      schema = z.string();
  }

  return required ? schema : schema.optional().nullable();
}

/**
 * Checks a single value against the declared validation rules.
 * Strings are measured by length, numbers by value. Returns the
 * message of the first rule that fails, or null.
 */
function checkValidation(value: unknown, rule: FieldValidation): string | null {
  const measured =
    typeof value === "string" ? value.length : typeof value === "number" ? value : null;

  if (measured !== null && rule.min !== undefined && measured < rule.min) {
    return rule.message ?? `Must be at least ${rule.min}`;
  }
  if (measured !== null && rule.max !== undefined && measured > rule.max) {
    return rule.message ?? `Must be at most ${rule.max}`;
  }
  if (typeof value === "string" && rule.pattern && !new RegExp(rule.pattern).test(value)) {
    return rule.message ?? `Must match pattern ${rule.pattern}`;
  }
  return null;
}

/**
 * Builds the complete schema for a field definition: the type schema plus
 * any extra validation rules. Empty values (null/undefined) skip the rules
 * and are left to the type schema's required check.
 */
export function zodSchemaForField(field: FieldDefinition): z.ZodTypeAny {
  const base = zodSchemaForFieldType(field.type, {
    required: field.required,
    enumValues: field.options,
  });

  const rules = field.validations ?? [];
  if (rules.length === 0) return base;

  return base.superRefine((value, ctx) => {
    if (value === null || value === undefined) return;
    for (const rule of rules) {
      const message = checkValidation(value, rule);
      if (message) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message });
      }
    }
  });
}

/**
 * Schema for primary and foreign key values.
 * Storage generates UUIDs, but numeric keys are accepted as well.
 */
export function identitySchema(required: boolean): z.ZodTypeAny {
  const schema = z.union([z.string().min(1), z.number().int()]);
  return required ? schema : schema.optional().nullable();
}
