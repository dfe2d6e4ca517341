/**
 * Relation Registry & Links: Test Suite
 */

import { describe, it, expect } from "vitest";
import { defineEntity } from "@keepsync/contracts";
import { RelationRegistry } from "./registry.js";
import { UnknownRelationError } from "./errors.js";
import { defineLink, linkForRelationship } from "./link.js";
import { SnapshotStore } from "./snapshot-store.js";
import { TestStore, testRecordType } from "./test-support.js";

describe("RelationRegistry", () => {
  it("resolves a registered relation", () => {
    const registry = new RelationRegistry("Project");
    const itemType = testRecordType(new TestStore());
    registry.register("items", itemType, defineLink("parentId"));

    const entry = registry.resolve("items");
    expect(entry.childType).toBe(itemType);
    expect(entry.link).toEqual({ foreignKey: "parentId", localKey: "id" });
    expect(entry.keepUpdated).toBe(false);
  });

  it("replaces an earlier registration of the same name", () => {
    const registry = new RelationRegistry("Project");
    const itemType = testRecordType(new TestStore());
    registry.register("items", itemType, defineLink("parentId"));
    registry.register("items", itemType, defineLink("ownerId", "code"), { keepUpdated: true });

    expect(registry.entries()).toHaveLength(1);
    expect(registry.resolve("items").link).toEqual({ foreignKey: "ownerId", localKey: "code" });
    expect(registry.resolve("items").keepUpdated).toBe(true);
  });

  it("throws UnknownRelationError for an unregistered name", () => {
    const registry = new RelationRegistry("Project");
    expect(() => registry.resolve("tasks")).toThrow(UnknownRelationError);
    expect(() => registry.resolve("tasks")).toThrow(
      'Relation "tasks" is not registered on Project.'
    );
  });

  it("lists kept-updated relations in registration order", () => {
    const registry = new RelationRegistry("Project");
    const itemType = testRecordType(new TestStore());
    registry.register("notes", itemType, defineLink("parentId"), { keepUpdated: true });
    registry.register("items", itemType, defineLink("parentId"));
    registry.register("tags", itemType, defineLink("parentId"), { keepUpdated: true });

    expect(registry.keptUpdated().map((entry) => entry.name)).toEqual(["notes", "tags"]);
    expect(registry.has("items")).toBe(true);
    expect(registry.has("people")).toBe(false);
  });

  it("freezes entries so the link cannot change after registration", () => {
    const registry = new RelationRegistry("Project");
    const link = defineLink("parentId");
    const entry = registry.register("items", testRecordType(new TestStore()), link);

    link.foreignKey = "changed";
    expect(entry.link.foreignKey).toBe("parentId");
    expect(Object.isFrozen(entry)).toBe(true);
  });
});

describe("linkForRelationship", () => {
  const Project = defineEntity({
    name: "Project",
    pluralName: "Projects",
    description: "A project",
    fields: [{ name: "name", type: "text", required: true, description: "Project name" }],
    relationships: [
      { type: "hasMany", entity: "Task", keepUpdated: true },
      { type: "hasMany", entity: "Milestone", foreignKey: "parentProjectId" },
      { type: "belongsTo", entity: "Company" },
    ],
  });
  const [tasks, milestones, company] = Project.relationships ?? [];

  it("derives the foreign key from the parent name", () => {
    expect(linkForRelationship(Project, tasks)).toEqual({ foreignKey: "projectId", localKey: "id" });
  });

  it("uses an explicit foreign key", () => {
    expect(linkForRelationship(Project, milestones).foreignKey).toBe("parentProjectId");
  });

  it("rejects belongsTo relationships", () => {
    expect(() => linkForRelationship(Project, company)).toThrow(
      "Only hasMany relationships can be linked"
    );
  });
});

describe("SnapshotStore", () => {
  it("returns an empty baseline before any capture", () => {
    const store = new SnapshotStore<number>();
    expect(store.get("items")).toEqual([]);
    expect(store.has("items")).toBe(false);
  });

  it("keeps a copy, not the captured array", () => {
    const store = new SnapshotStore<number>();
    const records = [1, 2];
    store.capture("items", records);
    records.push(3);

    expect(store.get("items")).toEqual([1, 2]);
  });

  it("lists names in first-capture order", () => {
    const store = new SnapshotStore<number>();
    store.capture("b", []);
    store.capture("a", []);
    store.capture("b", [1]);

    expect(store.names()).toEqual(["b", "a"]);
  });
});
