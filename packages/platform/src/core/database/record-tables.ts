/**
 * Record Tables
 *
 * Builds one Drizzle table per entity from the same attribute list its
 * record type validates: the primary key, one column per field and one
 * per belongsTo foreign key, plus the created_at/updated_at timestamps
 * storage maintains. Each table carries the attribute → column map the
 * Drizzle client reads and writes through; attributes outside it are
 * never persisted.
 */

import {
  pgTable,
  uuid,
  text,
  varchar,
  boolean,
  doublePrecision,
  timestamp,
  type PgTableWithColumns,
} from "drizzle-orm/pg-core";
import {
  foreignKeyFor,
  type EntityDefinition,
  type FieldDefinition,
} from "@keepsync/contracts";

export interface RecordTable {
  readonly entity: string;
  readonly table: PgTableWithColumns<any>;
  /** attribute name → column name */
  readonly columns: ReadonlyMap<string, string>;
}

/** camelCase → snake_case. "projectId" → "project_id" */
export function toColumnName(attribute: string): string {
  return attribute.replace(/([a-z])([A-Z])/g, "$1_$2").toLowerCase();
}

/** The entity's plural name in snake_case. "LineItems" → "line_items" */
export function toTableName(entity: EntityDefinition): string {
  return toColumnName(entity.pluralName);
}

function fieldColumn(field: FieldDefinition, column: string) {
  switch (field.type) {
    case "email":
    case "url":
      return varchar(column, { length: 512 });
    case "enum":
      return varchar(column, { length: 255 });
    case "currency":
    case "number":
    case "percentage":
      // Read back as numbers, so reloaded records still validate
      return doublePrecision(column);
    case "date":
    case "datetime":
      return timestamp(column, { withTimezone: true });
    case "boolean":
      return boolean(column);
    default:
      return text(column);
  }
}

const tables = new Map<string, RecordTable>();

/**
 * Builds (once) and registers the table of an entity.
 */
export function buildRecordTable(entity: EntityDefinition): RecordTable {
  const existing = tables.get(entity.name);
  if (existing) return existing;

  const attributes = new Map<string, string>([
    ["id", "id"],
    ["createdAt", "created_at"],
    ["updatedAt", "updated_at"],
  ]);

  const table = pgTable(toTableName(entity), () => {
    const columns: Record<string, any> = {
      id: uuid("id").primaryKey().defaultRandom(),
      created_at: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
      updated_at: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
    };

    for (const field of entity.fields) {
      const column = toColumnName(field.name);
      const builder = fieldColumn(field, column);
      columns[column] = field.required ? builder.notNull() : builder;
      attributes.set(field.name, column);
    }

    for (const rel of entity.relationships ?? []) {
      if (rel.type !== "belongsTo") continue;
      const foreignKey = foreignKeyFor(entity, rel);
      const column = toColumnName(foreignKey);
      // A field of the same name already declared the column
      if (!columns[column]) columns[column] = uuid(column);
      attributes.set(foreignKey, column);
    }

    return columns;
  });

  const recordTable: RecordTable = { entity: entity.name, table, columns: attributes };
  tables.set(entity.name, recordTable);
  return recordTable;
}

export function getRecordTable(entityName: string): RecordTable | undefined {
  return tables.get(entityName);
}

/**
 * @throws when no table was built for the entity
 */
export function requireRecordTable(entityName: string): RecordTable {
  const recordTable = tables.get(entityName);
  if (!recordTable) {
    throw new Error(`No table built for entity "${entityName}". Call buildRecordTable() at startup.`);
  }
  return recordTable;
}

/** Used for test isolation */
export function clearRecordTables(): void {
  tables.clear();
}
