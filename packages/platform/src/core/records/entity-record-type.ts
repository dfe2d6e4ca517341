/**
 * Entity Record Type
 *
 * Builds everything a record needs from its EntityDefinition once per
 * entity: attribute names, validation schemas, and the static relation
 * table every instance seeds its relation registry from.
 */

import type { z } from "zod";
import {
  foreignKeyFor,
  identitySchema,
  lowerFirst,
  zodSchemaForField,
  type AttributeMap,
  type DatabaseClient,
  type EntityDefinition,
  type LinkDescriptor,
  type Logger,
  type RecordType,
} from "@keepsync/contracts";
import type { DeletePolicy } from "../config/index.js";
import { requireEntity } from "../entity-manager/entity-registry.js";
import { linkForRelationship } from "../relations/link.js";
import { EntityRecord } from "./entity-record.js";

/** Shared services every record of a catalog works with */
export interface RecordServices {
  db: DatabaseClient;
  logger: Logger;
  deletePolicy: DeletePolicy;
  validateBeforeSave: boolean;
  /** Resolves the record type of a related entity */
  typeOf(entityName: string): EntityRecordType;
}

/** One hasMany relation as declared on the entity */
export interface RelationTableEntry {
  name: string;
  /** Child entity name */
  entity: string;
  link: LinkDescriptor;
  keepUpdated: boolean;
}

export class EntityRecordType implements RecordType<EntityRecord> {
  readonly name: string;
  readonly formName: string;
  readonly primaryKey = "id";

  /** Declared attributes: id, fields, then belongsTo foreign keys */
  readonly attributeNames: readonly string[];

  /** Attributes mass assignment may set (everything but the primary key) */
  readonly safeAttributes: readonly string[];

  /** Prefix of the events this type publishes ("task" → "task.created") */
  readonly eventPrefix: string;

  private readonly schemas = new Map<string, z.ZodTypeAny>();
  private relations: RelationTableEntry[] | null = null;

  constructor(
    readonly definition: EntityDefinition,
    private readonly services: RecordServices
  ) {
    this.name = definition.name;
    this.formName = definition.formName ?? definition.name;
    this.eventPrefix = lowerFirst(definition.name);

    this.schemas.set(this.primaryKey, identitySchema(false));
    for (const field of definition.fields) {
      this.schemas.set(field.name, zodSchemaForField(field));
    }
    for (const rel of definition.relationships ?? []) {
      if (rel.type !== "belongsTo") continue;
      this.schemas.set(foreignKeyFor(definition, rel), identitySchema(rel.required ?? false));
    }

    this.attributeNames = Array.from(this.schemas.keys());
    this.safeAttributes = this.attributeNames.filter((name) => name !== this.primaryKey);
  }

  /** The validation schema of a declared attribute */
  schemaFor(attribute: string): z.ZodTypeAny | undefined {
    return this.schemas.get(attribute);
  }

  /**
   * The hasMany relations of this entity. Built on first use, when every
   * related entity is registered.
   */
  relationTable(): readonly RelationTableEntry[] {
    if (this.relations === null) {
      this.relations = (this.definition.relationships ?? [])
        .filter((rel) => rel.type === "hasMany")
        .map((rel) => ({
          name: rel.as ?? lowerFirst(requireEntity(rel.entity).pluralName),
          entity: rel.entity,
          link: linkForRelationship(this.definition, rel),
          keepUpdated: rel.keepUpdated ?? false,
        }));
    }
    return this.relations;
  }

  /** A new, unsaved record with field defaults applied */
  create(): EntityRecord {
    const record = new EntityRecord(this, this.services);
    for (const field of this.definition.fields) {
      if (field.defaultValue !== undefined) record.setAttribute(field.name, field.defaultValue);
    }
    return record;
  }

  /** A record for a row read from storage */
  instantiate(row: AttributeMap): EntityRecord {
    const record = new EntityRecord(this, this.services);
    for (const name of this.attributeNames) {
      if (name in row) record.setAttribute(name, row[name]);
    }
    return record;
  }

  async find(id: string | number): Promise<EntityRecord | null> {
    const row = await this.services.db.findById(this.name, id);
    return row ? this.instantiate(row) : null;
  }

  async findAll(where?: AttributeMap): Promise<EntityRecord[]> {
    const rows = await this.services.db.findMany(this.name, { where });
    return rows.map((row) => this.instantiate(row));
  }
}
