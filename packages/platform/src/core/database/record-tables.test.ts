/**
 * Record Tables: Test Suite
 *
 * Table naming, the Drizzle columns built from an entity definition and
 * the attribute → column map the Drizzle client goes through.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { defineEntity } from "@keepsync/contracts";
import {
  toTableName,
  toColumnName,
  buildRecordTable,
  getRecordTable,
  requireRecordTable,
  clearRecordTables,
} from "./record-tables.js";

const Milestone = defineEntity({
  name: "Milestone",
  pluralName: "Milestones",
  description: "A dated checkpoint of a project",
  fields: [
    { name: "title", type: "text", required: true, description: "Title" },
    { name: "dueDate", type: "date", required: false, description: "Due date" },
    { name: "budget", type: "currency", required: false, description: "Budget" },
  ],
  relationships: [
    { type: "belongsTo", entity: "Project", required: true },
    { type: "belongsTo", entity: "Person", as: "owner" },
    { type: "belongsTo", entity: "Company", foreignKey: "clientCompanyId" },
    { type: "hasMany", entity: "Task" },
  ],
});

beforeEach(() => {
  clearRecordTables();
});

describe("naming", () => {
  it("snake-cases attributes", () => {
    expect(toColumnName("projectId")).toBe("project_id");
    expect(toColumnName("title")).toBe("title");
  });

  it("names tables after the plural name", () => {
    expect(toTableName(Milestone)).toBe("milestones");
    expect(
      toTableName(defineEntity({ ...Milestone, name: "LineItem", pluralName: "LineItems" }))
    ).toBe("line_items");
  });
});

describe("buildRecordTable", () => {
  it("maps every persisted attribute to its column", () => {
    const { columns } = buildRecordTable(Milestone);

    expect(Object.fromEntries(columns)).toEqual({
      id: "id",
      createdAt: "created_at",
      updatedAt: "updated_at",
      title: "title",
      dueDate: "due_date",
      budget: "budget",
      projectId: "project_id",
      ownerId: "owner_id",
      clientCompanyId: "client_company_id",
    });
  });

  it("declares a Drizzle column for each mapped attribute", () => {
    const { table, columns } = buildRecordTable(Milestone);
    for (const column of columns.values()) {
      expect(table[column]).toBeDefined();
    }
    expect(table.task_id).toBeUndefined();
  });

  it("keeps a field that doubles as a foreign key", () => {
    const Shipment = defineEntity({
      name: "Shipment",
      pluralName: "Shipments",
      description: "Goods on their way",
      fields: [{ name: "orderId", type: "text", required: true, description: "Order" }],
      relationships: [{ type: "belongsTo", entity: "Order" }],
    });

    const { table, columns } = buildRecordTable(Shipment);
    expect(columns.get("orderId")).toBe("order_id");
    expect(table.order_id.getSQLType()).toBe("text");
  });
});

describe("table registry", () => {
  it("builds each entity once", () => {
    const first = buildRecordTable(Milestone);
    expect(buildRecordTable(Milestone)).toBe(first);
    expect(getRecordTable("Milestone")).toBe(first);
  });

  it("throws for an entity without a table", () => {
    expect(() => requireRecordTable("Milestone")).toThrow(
      'No table built for entity "Milestone". Call buildRecordTable() at startup.'
    );
  });

  it("starts empty after clearRecordTables", () => {
    buildRecordTable(Milestone);
    clearRecordTables();
    expect(getRecordTable("Milestone")).toBeUndefined();
  });
});
