/**
 * Field Types: Test Suite
 *
 * Validates the Zod schemas records use to validate their attributes:
 * per-type schemas, extra validation rules, and identity values.
 */

import { describe, it, expect } from "vitest";
import {
  zodSchemaForFieldType,
  zodSchemaForField,
  identitySchema,
  FIELD_TYPES,
  type FieldType,
} from "./field-types.js";
import type { FieldDefinition } from "./entity.js";

function field(overrides: Partial<FieldDefinition> = {}): FieldDefinition {
  return {
    name: "title",
    type: "text",
    required: true,
    description: "Title",
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// zodSchemaForFieldType
// ---------------------------------------------------------------------------

describe("zodSchemaForFieldType", () => {
  describe("text fields (text, rich_text, phone)", () => {
    const textTypes: FieldType[] = ["text", "rich_text", "phone"];

    for (const type of textTypes) {
      it(`${type}: accepts strings and rejects other values when required`, () => {
        const schema = zodSchemaForFieldType(type, { required: true });
        expect(schema.safeParse("hello world").success).toBe(true);
        expect(schema.safeParse(123).success).toBe(false);
        expect(schema.safeParse(undefined).success).toBe(false);
      });
    }
  });

  it("email: rejects malformed addresses", () => {
    const schema = zodSchemaForFieldType("email", { required: true });
    expect(schema.safeParse("user@example.com").success).toBe(true);
    expect(schema.safeParse("not-an-email").success).toBe(false);
  });

  it("number: rejects numeric strings and NaN", () => {
    const schema = zodSchemaForFieldType("number", { required: true });
    expect(schema.safeParse(42).success).toBe(true);
    expect(schema.safeParse("42").success).toBe(false);
    expect(schema.safeParse(NaN).success).toBe(false);
  });

  it("date: accepts ISO strings and Date objects", () => {
    const schema = zodSchemaForFieldType("date", { required: true });
    expect(schema.safeParse("2025-01-15T10:30:00.000Z").success).toBe(true);
    expect(schema.safeParse(new Date()).success).toBe(true);
    expect(schema.safeParse("01/15/2025").success).toBe(false);
  });

  it("enum: accepts only listed values", () => {
    const schema = zodSchemaForFieldType("enum", {
      required: true,
      enumValues: ["active", "archived"],
    });
    expect(schema.safeParse("active").success).toBe(true);
    expect(schema.safeParse("ACTIVE").success).toBe(false);
  });

  it("enum: falls back to plain string when no values are listed", () => {
    const schema = zodSchemaForFieldType("enum", { required: true, enumValues: [] });
    expect(schema.safeParse("anything").success).toBe(true);
  });

  it("accepts null and undefined for every optional type", () => {
    for (const type of FIELD_TYPES) {
      const schema = zodSchemaForFieldType(type, { required: false });
      expect(schema.safeParse(null).success).toBe(true);
      expect(schema.safeParse(undefined).success).toBe(true);
    }
  });
});

// ---------------------------------------------------------------------------
// zodSchemaForField
// ---------------------------------------------------------------------------

describe("zodSchemaForField", () => {
  it("returns the plain type schema when no validations are declared", () => {
    const schema = zodSchemaForField(field());
    expect(schema.safeParse("x").success).toBe(true);
  });

  it("applies min length to strings with the custom message", () => {
    const schema = zodSchemaForField(
      field({ validations: [{ min: 3, message: "Too short" }] })
    );
    const result = schema.safeParse("ab");
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].message).toBe("Too short");
    }
    expect(schema.safeParse("abc").success).toBe(true);
  });

  it("applies max to numbers with a default message", () => {
    const schema = zodSchemaForField(
      field({ name: "hours", type: "number", validations: [{ max: 40 }] })
    );
    const result = schema.safeParse(41);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].message).toBe("Must be at most 40");
    }
  });

  it("applies patterns to strings", () => {
    const schema = zodSchemaForField(
      field({ name: "code", validations: [{ pattern: "^[A-Z]{3}$" }] })
    );
    expect(schema.safeParse("ABC").success).toBe(true);
    expect(schema.safeParse("abc").success).toBe(false);
  });

  it("skips rules for empty optional values", () => {
    const schema = zodSchemaForField(
      field({ required: false, validations: [{ min: 3 }] })
    );
    expect(schema.safeParse(null).success).toBe(true);
  });
});

// ---------------------------------------------------------------------------
// identitySchema
// ---------------------------------------------------------------------------

describe("identitySchema", () => {
  it("accepts string and integer keys when required", () => {
    const schema = identitySchema(true);
    expect(schema.safeParse("6f1c2a9e-0000-4000-8000-000000000001").success).toBe(true);
    expect(schema.safeParse(7).success).toBe(true);
  });

  it("rejects empty keys when required", () => {
    const schema = identitySchema(true);
    expect(schema.safeParse("").success).toBe(false);
    expect(schema.safeParse(null).success).toBe(false);
    expect(schema.safeParse(undefined).success).toBe(false);
  });

  it("accepts missing keys when optional", () => {
    const schema = identitySchema(false);
    expect(schema.safeParse(null).success).toBe(true);
    expect(schema.safeParse(undefined).success).toBe(true);
  });
});
