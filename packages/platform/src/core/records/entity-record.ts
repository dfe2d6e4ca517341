/**
 * Entity Record
 *
 * The single-record persistence primitive: a row of one entity with
 * attribute assignment, zod validation, and save/delete through the
 * DatabaseClient. Each instance carries a RelationReconciler seeded from
 * its type's relation table, so parent and child records are the same
 * class and relations nest.
 *
 * Save rules:
 *   - a record with an identity is updated; when storage has no such row
 *     it is inserted with that identity
 *   - a record without one is inserted and takes the generated identity
 *   - storage exceptions become an error under RECORD_ERROR_KEY and a
 *     false result
 */

import { z } from "zod";
import {
  RECORD_ERROR_KEY,
  hasIdentity,
  type AttributeMap,
  type ErrorMap,
  type Identity,
  type PersistentRecord,
} from "@keepsync/contracts";
import { publish } from "../event-bus/index.js";
import { captureException } from "../observability/index.js";
import {
  EmptyPreparedInputError,
  InvalidRelationRequestError,
  RelationReconciler,
  RelationRegistry,
  beforeParentDelete,
  cloneCollection,
  copyAttributes,
  deleteAll,
  errorsAll,
  filterCollection,
  loadRelations,
  loadRelationsPrimaries,
  saveAll,
  validateAll,
} from "../relations/index.js";
import type { EntityRecordType, RecordServices } from "./entity-record-type.js";

const inputSchema = z.record(z.unknown());

/** Typed access to one relation of a record */
export interface RelationHandle {
  readonly name: string;
  get(): EntityRecord[];
  set(records: readonly EntityRecord[]): Promise<void>;
  fetch(): Promise<EntityRecord[]>;
}

export class EntityRecord implements PersistentRecord {
  errors: ErrorMap = {};
  private values: AttributeMap = {};
  private readonly relations: RelationReconciler<EntityRecord>;

  constructor(
    readonly type: EntityRecordType,
    private readonly services: RecordServices
  ) {
    const registry = new RelationRegistry<EntityRecord>(type.name);
    for (const entry of type.relationTable()) {
      registry.register(entry.name, services.typeOf(entry.entity), entry.link, {
        keepUpdated: entry.keepUpdated,
      });
    }
    this.relations = new RelationReconciler(this, registry, services.logger);
  }

  // -------------------------------------------------------------------------
  // Attributes
  // -------------------------------------------------------------------------

  getPrimaryKey(): Identity {
    const id = this.values[this.type.primaryKey];
    return typeof id === "string" || typeof id === "number" ? id : null;
  }

  isNewRecord(): boolean {
    return !hasIdentity(this.getPrimaryKey());
  }

  attributes(): string[] {
    return [...this.type.attributeNames];
  }

  getAttribute(name: string): unknown {
    return this.values[name];
  }

  setAttribute(name: string, value: unknown): void {
    this.values[name] = value;
  }

  getAttributes(): AttributeMap {
    const result: AttributeMap = {};
    for (const name of this.type.attributeNames) {
      if (name in this.values) result[name] = this.values[name];
    }
    return result;
  }

  /** Mass assignment: only safe attributes are taken from `values` */
  setAttributes(values: AttributeMap): void {
    for (const name of this.type.safeAttributes) {
      if (name in values) this.values[name] = values[name];
    }
  }

  /**
   * Assigns safe attributes from raw input scoped under `formName`
   * (the type's form name by default; "" for unscoped input).
   * Returns false when no input was found.
   *
   * @throws EmptyPreparedInputError when the prepare hook returns nothing
   */
  load(data: AttributeMap, formName: string = this.type.formName): boolean {
    const scoped = formName === "" ? data : data[formName];
    const parsed = inputSchema.safeParse(scoped);
    if (!parsed.success) return false;
    if (formName === "" && Object.keys(parsed.data).length === 0) return false;

    const prepare = this.type.definition.hooks?.prepare;
    const input = prepare ? prepare(parsed.data) : parsed.data;
    if (!input || Object.keys(input).length === 0) {
      throw new EmptyPreparedInputError(this.type.name);
    }

    this.setAttributes(input);
    return true;
  }

  // -------------------------------------------------------------------------
  // Validation & errors
  // -------------------------------------------------------------------------

  validate(attributeNames?: string[] | null, clearErrors = true): boolean {
    if (clearErrors) this.errors = {};

    for (const name of attributeNames ?? this.type.attributeNames) {
      const schema = this.type.schemaFor(name);
      if (!schema) continue;
      const result = schema.safeParse(this.values[name]);
      if (!result.success) {
        for (const issue of result.error.issues) this.addError(name, issue.message);
      }
    }
    return !this.hasErrors();
  }

  addError(attribute: string, message: string): void {
    this.errors[attribute] = [...(this.errors[attribute] ?? []), message];
  }

  hasErrors(): boolean {
    return Object.keys(this.errors).length > 0;
  }

  // -------------------------------------------------------------------------
  // Persistence
  // -------------------------------------------------------------------------

  /**
   * Inserts or updates the record. `attributeNames` limits validation;
   * every attribute is written.
   */
  async save(runValidation = true, attributeNames?: string[] | null): Promise<boolean> {
    if (runValidation && !this.validate(attributeNames)) return false;

    const { db } = this.services;
    const id = this.getPrimaryKey();
    const data = this.getAttributes();
    delete data[this.type.primaryKey];

    let created = false;
    try {
      let row = hasIdentity(id) ? await db.update(this.type.name, id, data) : null;
      if (row === null) {
        row = await db.create(
          this.type.name,
          hasIdentity(id) ? { ...data, [this.type.primaryKey]: id } : data
        );
        created = true;
      }
      this.assignRow(row);
    } catch (error) {
      this.recordFailure("save", error);
      return false;
    }

    await publish({
      type: `${this.type.eventPrefix}.${created ? "created" : "updated"}`,
      payload: this.getAttributes(),
    });
    return true;
  }

  /**
   * Deletes the record after deleting its kept-updated relations.
   * With the "blocking" delete policy a failed relation delete stops the
   * record's own delete. Unsaved records cannot be deleted.
   */
  async delete(): Promise<boolean> {
    const id = this.getPrimaryKey();
    if (!hasIdentity(id)) return false;

    await this.fetchUnpopulated(this.keptUpdatedRelationNames());

    const relationsDeleted = await beforeParentDelete(this.relations);
    if (!relationsDeleted) {
      this.services.logger.warn("Relation delete failed", {
        entity: this.type.name,
        recordId: id,
        policy: this.services.deletePolicy,
      });
      if (this.services.deletePolicy === "blocking") return false;
    }

    let deleted: boolean;
    try {
      deleted = await this.services.db.delete(this.type.name, id);
    } catch (error) {
      this.recordFailure("delete", error);
      return false;
    }

    if (deleted) {
      await publish({ type: `${this.type.eventPrefix}.deleted`, payload: { id } });
    }
    return deleted;
  }

  /**
   * Validates the record and its assigned relations, saves the record,
   * then saves the relations without validating them again.
   */
  async saveWithRelations(runValidation = this.services.validateBeforeSave): Promise<boolean> {
    if (runValidation) {
      const recordValid = this.validate();
      const relationsValid = validateAll(this.relations);
      if (!recordValid || !relationsValid) return false;
    }
    if (!(await this.save(false))) return false;
    return saveAll(this.relations, false, this.services.logger);
  }

  // -------------------------------------------------------------------------
  // Relations
  // -------------------------------------------------------------------------

  /** Names of every declared relation */
  relationNames(): string[] {
    return this.relations.registry.entries().map((entry) => entry.name);
  }

  /** Names of relations kept in sync with payloads and deletes */
  keptUpdatedRelationNames(): string[] {
    return this.relations.registry.keptUpdated().map((entry) => entry.name);
  }

  /** The desired collection of `name`; empty until fetched or assigned */
  getRelated(name: string): EntityRecord[] {
    return this.relations.get(name);
  }

  /**
   * Assigns the desired collection of `name`. On a stored record the
   * relation is read from storage first, so the rows it replaces are
   * deleted on save.
   */
  async setRelated(name: string, records: readonly EntityRecord[]): Promise<void> {
    this.relations.resolve(name);
    await this.fetchUnpopulated([name]);
    this.relations.assign(name, records);
  }

  /** Reads the children of `name` from storage into the desired collection */
  async fetchRelated(name: string): Promise<EntityRecord[]> {
    const entry = this.relations.resolve(name);
    const localKey = this.getAttribute(entry.link.localKey);

    const records =
      typeof localKey === "string" || typeof localKey === "number"
        ? await this.services
            .typeOf(entry.childType.name)
            .findAll({ [entry.link.foreignKey]: localKey })
        : [];
    this.relations.populate(name, records);
    return records;
  }

  relation(name: string): RelationHandle {
    this.relations.resolve(name);
    return {
      name,
      get: () => this.getRelated(name),
      set: (records) => this.setRelated(name, records),
      fetch: () => this.fetchRelated(name),
    };
  }

  validateRelations(): boolean {
    return validateAll(this.relations);
  }

  saveRelations(runValidation = true): Promise<boolean> {
    return saveAll(this.relations, runValidation, this.services.logger);
  }

  deleteRelations(): Promise<boolean> {
    return deleteAll(this.relations);
  }

  relationsErrors(): Record<string, ErrorMap[]> {
    return errorsAll(this.relations);
  }

  /**
   * Merges payload rows into relations (every kept-updated relation by
   * default). Payload rows are matched by identity against the stored
   * children, which are read first when not fetched yet.
   *
   * @throws InvalidRelationRequestError for a relation that is not kept updated
   */
  async loadRelations(
    data: unknown,
    names: string[] = this.keptUpdatedRelationNames()
  ): Promise<boolean> {
    const kept = this.keptUpdatedRelationNames();
    for (const name of names) {
      if (!kept.includes(name)) throw new InvalidRelationRequestError(name, this.type.name);
    }
    await this.fetchUnpopulated(names);
    return loadRelations(this.relations, data, names);
  }

  async loadRelationsPrimaries(data: unknown): Promise<boolean> {
    await this.fetchUnpopulated(this.keptUpdatedRelationNames());
    return loadRelationsPrimaries(this.relations, data);
  }

  cloneRelation(name: string): EntityRecord[] {
    return cloneCollection(this.relations, name);
  }

  filterRelation(name: string, condition: AttributeMap): EntityRecord[] {
    return filterCollection(this.relations, name, condition);
  }

  /**
   * A new, unsaved copy of this record with copies of every relation
   * assigned to it. Relations not fetched yet are read from storage first.
   * Saving the copy with its relations inserts a new row for each record.
   */
  async deepClone(): Promise<EntityRecord> {
    const clone = this.type.create();
    clone.setAttributes(copyAttributes(this, this.type.primaryKey));

    await this.fetchUnpopulated(this.relationNames());
    for (const name of this.relationNames()) {
      await clone.setRelated(name, this.cloneRelation(name));
    }
    return clone;
  }

  toJSON(): AttributeMap {
    return this.getAttributes();
  }

  /** Reads relations of a stored record that were never fetched or assigned */
  private async fetchUnpopulated(names: readonly string[]): Promise<void> {
    if (this.isNewRecord()) return;
    for (const name of names) {
      if (!this.relations.isPopulated(name)) await this.fetchRelated(name);
    }
  }

  private assignRow(row: AttributeMap): void {
    for (const name of this.type.attributeNames) {
      if (name in row) this.values[name] = row[name];
    }
  }

  private recordFailure(operation: "save" | "delete", error: unknown): void {
    const err = error instanceof Error ? error : new Error(String(error));
    this.addError(RECORD_ERROR_KEY, err.message);
    captureException(err, {
      entity: this.type.name,
      recordId: this.getPrimaryKey() ?? undefined,
      operation,
    });
    this.services.logger.error(`Record ${operation} failed`, {
      entity: this.type.name,
      error: err.message,
    });
  }
}
