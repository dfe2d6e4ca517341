/**
 * Relation Reconciler
 *
 * Owns the desired collections and snapshots of one parent record and
 * brings storage in line with them:
 *
 *   assign   → snapshot the current collection, propagate the parent key,
 *              replace the collection
 *   save     → diff snapshot vs desired, re-propagate the key, save every
 *              upsert, delete every removal
 *   delete   → delete every record in the desired collection
 *   validate → validate every record, foreign key excluded
 *
 * Writes are best effort and non-transactional: a failing record does not
 * stop the others, and nothing is rolled back. Storage calls are awaited
 * one at a time.
 */

import type { ErrorMap, Logger, PersistentRecord } from "@keepsync/contracts";
import { diffCollections } from "./differ.js";
import type { RelationEntry, RelationRegistry } from "./registry.js";
import { SnapshotStore } from "./snapshot-store.js";

export class RelationReconciler<TChild extends PersistentRecord = PersistentRecord> {
  private readonly desired = new Map<string, TChild[]>();
  private readonly snapshots = new SnapshotStore<TChild>();

  constructor(
    private readonly parent: PersistentRecord,
    readonly registry: RelationRegistry<TChild>,
    private readonly logger: Logger
  ) {}

  /** Resolves a relation entry, throwing UnknownRelationError if it is not registered */
  resolve(name: string): RelationEntry<TChild> {
    return this.registry.resolve(name);
  }

  /** The desired collection of `name` (empty until populated or assigned) */
  get(name: string): TChild[] {
    this.resolve(name);
    return this.desired.get(name) ?? [];
  }

  /** Whether `name` has been populated or assigned */
  isPopulated(name: string): boolean {
    return this.desired.has(name);
  }

  /**
   * Replaces the desired collection without touching the snapshot.
   * Used for collections read from storage, clones and filters.
   */
  populate(name: string, records: readonly TChild[]): void {
    this.resolve(name);
    this.desired.set(name, [...records]);
  }

  /**
   * Sets the desired collection of `name`. The collection current before
   * this call becomes the diff baseline for the next save.
   */
  assign(name: string, records: readonly TChild[]): void {
    const entry = this.resolve(name);
    this.snapshots.capture(name, this.desired.get(name) ?? []);
    this.propagateKey(entry, records);
    this.desired.set(name, [...records]);
  }

  /** Makes the current desired collection the baseline for the next save */
  resync(name: string): void {
    this.snapshots.capture(name, this.get(name));
  }

  /** The current diff baseline of `name` */
  snapshot(name: string): readonly TChild[] {
    this.resolve(name);
    return this.snapshots.get(name);
  }

  hasSnapshot(name: string): boolean {
    return this.snapshots.has(name);
  }

  /** Relations assigned at least once, in first-assignment order */
  snapshotNames(): string[] {
    return this.snapshots.names();
  }

  /**
   * Validates every record of the desired collection. The foreign key is
   * system managed and skipped unless `attributeNames` lists it.
   * Does not stop at the first failure.
   */
  validate(name: string, attributeNames?: string[] | null, clearErrors = true): boolean {
    const entry = this.resolve(name);
    const records = this.get(name);
    if (records.length === 0) return true;

    const names = attributeNames ?? records[0]
      .attributes()
      .filter((attribute) => attribute !== entry.link.foreignKey);

    let valid = true;
    for (const record of records) {
      if (!record.validate(names, clearErrors)) valid = false;
    }
    return valid;
  }

  /**
   * Reconciles storage with the desired collection of `name`.
   * Returns true iff every save and delete succeeded.
   */
  async save(
    name: string,
    runValidation = true,
    attributeNames?: string[] | null
  ): Promise<boolean> {
    const entry = this.resolve(name);
    const { upsert, remove } = diffCollections(this.snapshots.get(name), this.get(name));
    const localKey = this.parent.getAttribute(entry.link.localKey);

    let success = true;
    for (const record of upsert) {
      record.setAttribute(entry.link.foreignKey, localKey);
      if (!(await record.save(runValidation, attributeNames))) success = false;
    }
    for (const record of remove) {
      if (!(await record.delete())) success = false;
    }

    this.logger.debug("Relation reconciled", {
      relation: name,
      upserted: upsert.length,
      removed: remove.length,
      success,
    });
    return success;
  }

  /**
   * Deletes every record of the desired collection (not the snapshot).
   */
  async delete(name: string): Promise<boolean> {
    const records = this.get(name);

    let success = true;
    for (const record of records) {
      if (!(await record.delete())) success = false;
    }

    this.logger.debug("Relation deleted", { relation: name, deleted: records.length, success });
    return success;
  }

  /** Error maps of the desired records that currently have errors */
  errors(name: string): ErrorMap[] {
    return this.get(name)
      .filter((record) => record.hasErrors())
      .map((record) => record.errors);
  }

  private propagateKey(entry: RelationEntry<TChild>, records: readonly TChild[]): void {
    const localKey = this.parent.getAttribute(entry.link.localKey);
    for (const record of records) {
      record.setAttribute(entry.link.foreignKey, localKey);
    }
  }
}
