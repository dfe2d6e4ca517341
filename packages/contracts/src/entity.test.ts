/**
 * Entity Definition: Test Suite
 *
 * Validates defineEntity and the naming defaults applied to
 * relationship foreign keys.
 */

import { describe, it, expect } from "vitest";
import { defineEntity, foreignKeyFor, lowerFirst, type EntityDefinition } from "./entity.js";
import { hasIdentity } from "./record.js";

const ProjectLike: EntityDefinition = defineEntity({
  name: "PurchaseOrder",
  pluralName: "PurchaseOrders",
  description: "An order placed with a supplier",
  fields: [
    { name: "reference", type: "text", required: true, description: "Reference" },
  ],
});

describe("defineEntity", () => {
  it("returns the same object passed in (identity function for type safety)", () => {
    const input: EntityDefinition = {
      name: "TestEntity",
      pluralName: "TestEntities",
      description: "A test entity for unit testing",
      fields: [],
    };

    expect(defineEntity(input)).toBe(input);
  });

  it("allows entities with no relationships or hooks", () => {
    expect(ProjectLike.relationships).toBeUndefined();
    expect(ProjectLike.hooks).toBeUndefined();
  });
});

describe("lowerFirst", () => {
  it("lowercases only the first character", () => {
    expect(lowerFirst("PurchaseOrder")).toBe("purchaseOrder");
    expect(lowerFirst("")).toBe("");
  });
});

describe("foreignKeyFor", () => {
  it("uses an explicit foreign key unchanged", () => {
    expect(
      foreignKeyFor(ProjectLike, { type: "hasMany", entity: "Line", foreignKey: "orderRef" })
    ).toBe("orderRef");
  });

  it("derives hasMany keys from the owning entity name", () => {
    expect(foreignKeyFor(ProjectLike, { type: "hasMany", entity: "Line" })).toBe(
      "purchaseOrderId"
    );
  });

  it("derives belongsTo keys from the related entity name", () => {
    expect(foreignKeyFor(ProjectLike, { type: "belongsTo", entity: "Supplier" })).toBe(
      "supplierId"
    );
  });

  it("prefers the alias for belongsTo keys", () => {
    expect(
      foreignKeyFor(ProjectLike, { type: "belongsTo", entity: "User", as: "Approver" })
    ).toBe("approverId");
  });
});

describe("hasIdentity", () => {
  it("treats null, undefined and empty strings as missing", () => {
    expect(hasIdentity(null)).toBe(false);
    expect(hasIdentity(undefined)).toBe(false);
    expect(hasIdentity("")).toBe(false);
  });

  it("treats zero and non-empty strings as present", () => {
    expect(hasIdentity(0)).toBe(true);
    expect(hasIdentity("a1")).toBe(true);
  });
});
