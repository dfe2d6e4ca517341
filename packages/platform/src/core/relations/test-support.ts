/**
 * In-process records for the relation engine tests.
 *
 * TestRecord keeps its rows in a shared TestStore and logs every write,
 * so tests can assert exactly which saves and deletes reconciliation
 * performed and in which order.
 */

import {
  RECORD_ERROR_KEY,
  hasIdentity,
  type AttributeMap,
  type ErrorMap,
  type Identity,
  type Logger,
  type PersistentRecord,
  type RecordType,
} from "@keepsync/contracts";

const ATTRIBUTES = ["id", "parentId", "title", "status"] as const;

export class TestStore {
  readonly rows = new Map<string, AttributeMap>();
  readonly writes: string[] = [];
  /** Titles whose save is rejected by storage */
  readonly rejectTitles = new Set<string>();
  private nextId = 1;

  allocateId(): number {
    return this.nextId++;
  }
}

export class TestRecord implements PersistentRecord {
  errors: ErrorMap = {};
  private values: AttributeMap = {};

  constructor(
    private readonly store: TestStore,
    values: AttributeMap = {}
  ) {
    this.setAttributes(values);
    if (values.id !== undefined) this.values.id = values.id;
  }

  load(data: AttributeMap, formName = "Item"): boolean {
    const scoped = formName === "" ? data : data[formName];
    if (typeof scoped !== "object" || scoped === null || Array.isArray(scoped)) return false;
    this.setAttributes(Object.fromEntries(Object.entries(scoped)));
    return true;
  }

  validate(attributeNames?: string[] | null, clearErrors = true): boolean {
    if (clearErrors) this.errors = {};
    for (const name of attributeNames ?? this.attributes()) {
      if ((name === "title" || name === "parentId") && !hasIdentity(this.identityOf(name))) {
        this.errors[name] = [`${name} is required`];
      }
    }
    return !this.hasErrors();
  }

  async save(runValidation = true, attributeNames?: string[] | null): Promise<boolean> {
    if (runValidation && !this.validate(attributeNames)) return false;

    const title = String(this.values.title ?? "");
    if (this.store.rejectTitles.has(title)) {
      this.errors[RECORD_ERROR_KEY] = [`Storage rejected ${title}`];
      return false;
    }

    if (!hasIdentity(this.getPrimaryKey())) this.values.id = this.store.allocateId();
    this.store.rows.set(String(this.values.id), { ...this.values });
    this.store.writes.push(`save:${title}`);
    return true;
  }

  async delete(): Promise<boolean> {
    const id = this.getPrimaryKey();
    if (!hasIdentity(id)) return false;
    this.store.writes.push(`delete:${String(id)}`);
    return this.store.rows.delete(String(id));
  }

  getPrimaryKey(): Identity {
    return this.identityOf("id");
  }

  attributes(): string[] {
    return [...ATTRIBUTES];
  }

  getAttribute(name: string): unknown {
    return this.values[name];
  }

  setAttribute(name: string, value: unknown): void {
    this.values[name] = value;
  }

  getAttributes(): AttributeMap {
    return { ...this.values };
  }

  /** Assigns every attribute except the primary key */
  setAttributes(values: AttributeMap): void {
    for (const name of ATTRIBUTES) {
      if (name !== "id" && name in values) this.values[name] = values[name];
    }
  }

  hasErrors(): boolean {
    return Object.keys(this.errors).length > 0;
  }

  private identityOf(name: string): Identity {
    const value = this.values[name];
    return typeof value === "string" || typeof value === "number" ? value : null;
  }
}

export function testRecordType(store: TestStore, name = "Item"): RecordType<TestRecord> {
  return {
    name,
    formName: name,
    primaryKey: "id",
    create: () => new TestRecord(store),
  };
}

/** A record that already exists in the store, with the next free id */
export function storedRecord(store: TestStore, values: AttributeMap = {}): TestRecord {
  const record = new TestRecord(store, { ...values, id: store.allocateId() });
  store.rows.set(String(record.getPrimaryKey()), record.getAttributes());
  return record;
}

/** Parent record with only an identity */
export function testParent(store: TestStore, id: Identity = 10): TestRecord {
  return new TestRecord(store, { id, title: "parent" });
}

/** Logger that records every call */
export function recordingLogger(): Logger & { lines: string[] } {
  const lines: string[] = [];
  const push = (level: string) => (message: string) => {
    lines.push(`${level}:${message}`);
  };
  return { lines, info: push("info"), warn: push("warn"), error: push("error"), debug: push("debug") };
}
