/**
 * Bulk Loader: Test Suite
 */

import { describe, it, expect } from "vitest";
import {
  extractPayload,
  mergeFromPayload,
  mergeIdentityOnly,
  parsePayloadRows,
} from "./bulk-loader.js";
import { TestRecord, TestStore, storedRecord, testRecordType } from "./test-support.js";

describe("extractPayload", () => {
  it("returns the data itself for an empty scope", () => {
    const data = { title: "a" };
    expect(extractPayload(data, "")).toBe(data);
  });

  it("returns the scoped value", () => {
    expect(extractPayload({ Item: [{ title: "a" }] }, "Item")).toEqual([{ title: "a" }]);
  });

  it("returns undefined when the scope key is absent or data is not an object", () => {
    expect(extractPayload({ Other: [] }, "Item")).toBeUndefined();
    expect(extractPayload("Item", "Item")).toBeUndefined();
    expect(extractPayload(null, "Item")).toBeUndefined();
  });
});

describe("parsePayloadRows", () => {
  it("accepts a list of attribute maps", () => {
    expect(parsePayloadRows([{ title: "a" }, { title: "b" }])).toEqual([
      { title: "a" },
      { title: "b" },
    ]);
  });

  it("accepts rows keyed by index", () => {
    expect(parsePayloadRows({ "0": { title: "a" }, "1": { title: "b" } })).toEqual([
      { title: "a" },
      { title: "b" },
    ]);
  });

  it("rejects anything else", () => {
    expect(parsePayloadRows("rows")).toBeNull();
    expect(parsePayloadRows([1, 2])).toBeNull();
    expect(parsePayloadRows({ "0": "a" })).toBeNull();
  });
});

describe("mergeFromPayload", () => {
  it("updates matched records in place, creates the rest and drops the unmatched", () => {
    const store = new TestStore();
    const one = storedRecord(store, { title: "one" });
    const two = storedRecord(store, { title: "two" });

    const { records, applied } = mergeFromPayload(testRecordType(store), [one, two], {
      Item: [{ id: 2, title: "two, edited" }, { title: "three" }],
    });

    expect(applied).toBe(true);
    expect(records).toHaveLength(2);
    expect(records[0]).toBe(two);
    expect(two.getAttribute("title")).toBe("two, edited");
    expect(records[1].getPrimaryKey()).toBeNull();
    expect(records[1].getAttribute("title")).toBe("three");
    expect(records).not.toContain(one);
  });

  it("matches a string identity against a numeric one", () => {
    const store = new TestStore();
    const one = storedRecord(store, { title: "one" });

    const { records } = mergeFromPayload(testRecordType(store), [one], {
      Item: [{ id: "1", title: "renamed" }],
    });

    expect(records[0]).toBe(one);
    expect(one.getAttribute("title")).toBe("renamed");
  });

  it("resolves duplicate identities to the same record, last row winning", () => {
    const store = new TestStore();
    const one = storedRecord(store, { title: "one" });

    const { records } = mergeFromPayload(testRecordType(store), [one], {
      Item: [
        { id: 1, title: "first" },
        { id: 1, title: "second" },
      ],
    });

    expect(records).toHaveLength(2);
    expect(records[0]).toBe(one);
    expect(records[1]).toBe(one);
    expect(one.getAttribute("title")).toBe("second");
  });

  it("creates a new record for an identity that matches nothing", () => {
    const store = new TestStore();
    const { records } = mergeFromPayload(testRecordType(store), [], {
      Item: [{ id: 99, title: "ghost" }],
    });

    expect(records[0].getPrimaryKey()).toBeNull();
    expect(records[0].getAttribute("title")).toBe("ghost");
  });

  it("returns existing unchanged when the scope key is absent", () => {
    const store = new TestStore();
    const existing = [storedRecord(store)];

    const result = mergeFromPayload(testRecordType(store), existing, { Other: [] });

    expect(result.applied).toBe(false);
    expect(result.records).toBe(existing);
  });

  it("returns existing unchanged for a malformed payload", () => {
    const store = new TestStore();
    const existing = [storedRecord(store)];

    const result = mergeFromPayload(testRecordType(store), existing, { Item: "nope" });

    expect(result).toEqual({ records: existing, applied: false });
  });

  it("empties the collection for an empty row list", () => {
    const store = new TestStore();
    const result = mergeFromPayload(testRecordType(store), [storedRecord(store)], { Item: [] });

    expect(result).toEqual({ records: [], applied: true });
  });

  it("reads rows under an explicit form name", () => {
    const store = new TestStore();
    const { records } = mergeFromPayload(
      testRecordType(store),
      [],
      { lines: [{ title: "a" }] },
      "lines"
    );

    expect(records).toHaveLength(1);
  });
});

describe("mergeIdentityOnly", () => {
  it("back-fills truthy identities by position", () => {
    const store = new TestStore();
    const first = new TestRecord(store, { title: "a" });
    const second = new TestRecord(store, { title: "b" });
    const current = [first, second];

    const merged = mergeIdentityOnly(current, [{ id: 41 }, { id: 0 }, { id: 43 }]);

    expect(merged).not.toBe(current);
    expect(merged).toHaveLength(2);
    expect(merged[0]).toBe(first);
    expect(first.getPrimaryKey()).toBe(41);
    expect(second.getPrimaryKey()).toBeNull();
  });

  it("uses the given primary key attribute", () => {
    const store = new TestStore();
    const record = new TestRecord(store);

    mergeIdentityOnly([record], [{ status: "s-1" }], "status");

    expect(record.getAttribute("status")).toBe("s-1");
  });
});
