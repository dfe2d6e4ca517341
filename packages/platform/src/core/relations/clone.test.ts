/**
 * Clone & Filter: Test Suite
 */

import { describe, it, expect } from "vitest";
import { cloneCollection, copyAttributes, filterCollection } from "./clone.js";
import { RelationReconciler } from "./reconciler.js";
import { RelationRegistry } from "./registry.js";
import { defineLink } from "./link.js";
import {
  TestRecord,
  TestStore,
  recordingLogger,
  storedRecord,
  testParent,
  testRecordType,
} from "./test-support.js";

function reconcilerFor(store: TestStore, parentId: number) {
  const registry = new RelationRegistry<TestRecord>("Project");
  registry.register("items", testRecordType(store), defineLink("parentId"), {
    keepUpdated: true,
  });
  return new RelationReconciler(testParent(store, parentId), registry, recordingLogger());
}

describe("copyAttributes", () => {
  it("copies everything but the primary key", () => {
    const store = new TestStore();
    const record = storedRecord(store, { title: "one", status: "active", parentId: 10 });

    expect(copyAttributes(record, "id")).toEqual({ title: "one", status: "active", parentId: 10 });
  });
});

describe("cloneCollection", () => {
  it("returns fresh unsaved records with the same attributes", () => {
    const store = new TestStore();
    const relations = reconcilerFor(store, 10);
    const original = storedRecord(store, { title: "one", status: "active", parentId: 10 });
    relations.populate("items", [original]);

    const [clone] = cloneCollection(relations, "items");

    expect(clone).not.toBe(original);
    expect(clone.getPrimaryKey()).toBeNull();
    expect(clone.getAttribute("title")).toBe("one");
    expect(clone.getAttribute("status")).toBe("active");
  });

  it("inserts new rows when the clones are saved under another parent", async () => {
    const store = new TestStore();
    const source = reconcilerFor(store, 10);
    const original = storedRecord(store, { title: "one", parentId: 10 });
    source.populate("items", [original]);

    const target = reconcilerFor(store, 20);
    target.assign("items", cloneCollection(source, "items"));
    expect(await target.save("items")).toBe(true);

    expect(store.writes).toEqual(["save:one"]);
    expect(store.rows.get("1")).toEqual({ title: "one", parentId: 10, id: 1 });
    expect(store.rows.get("2")).toEqual({ title: "one", parentId: 20, id: 2 });
  });

  it("returns an empty list for an empty relation", () => {
    const relations = reconcilerFor(new TestStore(), 10);
    expect(cloneCollection(relations, "items")).toEqual([]);
  });
});

describe("filterCollection", () => {
  function populated() {
    const store = new TestStore();
    const relations = reconcilerFor(store, 10);
    const active = storedRecord(store, { title: "a", status: "active" });
    const inactive = storedRecord(store, { title: "b", status: "inactive" });
    const unset = storedRecord(store, { title: "c" });
    relations.populate("items", [active, inactive, unset]);
    return { relations, active };
  }

  it("keeps records whose attributes equal the condition", () => {
    const { relations, active } = populated();

    expect(filterCollection(relations, "items", { status: "active" })).toEqual([active]);
    expect(relations.get("items")).toEqual([active]);
    expect(relations.hasSnapshot("items")).toBe(false);
  });

  it("never matches an unset attribute", () => {
    const { relations } = populated();
    expect(filterCollection(relations, "items", { status: null })).toEqual([]);
  });

  it("compares strictly", () => {
    const { relations } = populated();
    expect(filterCollection(relations, "items", { title: 1 })).toEqual([]);
  });

  it("requires every condition to match", () => {
    const { relations, active } = populated();
    expect(filterCollection(relations, "items", { status: "active", title: "a" })).toEqual([active]);
    expect(filterCollection(relations, "items", { status: "active", title: "b" })).toEqual([]);
  });
});
