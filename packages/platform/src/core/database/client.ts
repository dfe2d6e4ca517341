/**
 * Database Client
 *
 * Drizzle-backed implementation of the DatabaseClient interface from
 * contracts. Records read and write through it by entity name; each
 * entity's table and attribute → column map come from record-tables.
 */

import { eq, sql, and, type SQL } from "drizzle-orm";
import type { DatabaseClient } from "@keepsync/contracts";
import { getDatabase } from "./connection.js";
import { requireRecordTable, type RecordTable } from "./record-tables.js";

/** A database row keyed by attribute name */
function fromRow(
  { columns }: RecordTable,
  row: Record<string, unknown>
): Record<string, unknown> {
  const mapped: Record<string, unknown> = {};
  for (const [attribute, column] of columns) {
    if (column in row) mapped[attribute] = row[column];
  }
  return mapped;
}

/**
 * Attribute values keyed by column. Attributes without a column are
 * dropped.
 */
function toRow(
  { columns }: RecordTable,
  data: Record<string, unknown>
): Record<string, unknown> {
  const mapped: Record<string, unknown> = {};
  for (const [attribute, value] of Object.entries(data)) {
    const column = columns.get(attribute);
    if (column) mapped[column] = value;
  }
  return mapped;
}

/**
 * Coerces values to match Drizzle column expectations before insert/update.
 *
 * Drizzle's PgTimestamp.mapToDriverValue calls value.toISOString(), so
 * timestamp columns need Date objects. Payloads carry ISO strings; those
 * are converted here.
 */
function coerceValues(
  table: Record<string, any>,
  data: Record<string, unknown>
): Record<string, unknown> {
  const coerced: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    const column = table[key];
    if (
      column &&
      typeof value === "string" &&
      (column.columnType === "PgTimestamp" || column.dataType === "date")
    ) {
      const parsed = new Date(value);
      coerced[key] = isNaN(parsed.getTime()) ? value : parsed;
    } else {
      coerced[key] = value;
    }
  }
  return coerced;
}

/** Equality conditions for a `where` map keyed by attribute */
function whereConditions(
  { table, columns }: RecordTable,
  where?: Record<string, unknown>
): SQL[] {
  const conditions: SQL[] = [];
  for (const [attribute, value] of Object.entries(where ?? {})) {
    const column = columns.get(attribute);
    if (column) conditions.push(eq(table[column], value as any));
  }
  return conditions;
}

/**
 * Creates a DatabaseClient over the connection opened by initDatabase().
 */
export function createDatabaseClient(): DatabaseClient {
  return {
    async findMany(entityName, options) {
      const { db } = getDatabase();
      const recordTable = requireRecordTable(entityName);
      const { table } = recordTable;

      let query = db.select().from(table).$dynamic();

      const conditions = whereConditions(recordTable, options?.where);
      if (conditions.length > 0) {
        query = query.where(and(...conditions));
      }

      if (options?.orderBy) {
        const column = recordTable.columns.get(options.orderBy.field);
        if (column) {
          const col = table[column];
          query = query.orderBy(
            options.orderBy.direction === "desc"
              ? sql`${col} desc`
              : sql`${col} asc`
          );
        }
      }

      if (options?.limit) {
        query = query.limit(options.limit);
      }
      if (options?.offset) {
        query = query.offset(options.offset);
      }

      const rows: Record<string, unknown>[] = await query;
      return rows.map((row) => fromRow(recordTable, row));
    },

    async findById(entityName, id) {
      const { db } = getDatabase();
      const recordTable = requireRecordTable(entityName);
      const { table } = recordTable;

      const rows: Record<string, unknown>[] = await db
        .select()
        .from(table)
        .where(eq(table.id, id))
        .limit(1);

      return rows[0] ? fromRow(recordTable, rows[0]) : null;
    },

    async create(entityName, data) {
      const { db } = getDatabase();
      const recordTable = requireRecordTable(entityName);
      const { table } = recordTable;

      const coerced = coerceValues(table, toRow(recordTable, data));
      const rows: Record<string, unknown>[] = await db
        .insert(table)
        .values(coerced)
        .returning();
      return fromRow(recordTable, rows[0]);
    },

    async update(entityName, id, data) {
      const { db } = getDatabase();
      const recordTable = requireRecordTable(entityName);
      const { table } = recordTable;

      const mapped = { ...toRow(recordTable, data), updated_at: new Date() };
      const coerced = coerceValues(table, mapped);
      const rows: Record<string, unknown>[] = await db
        .update(table)
        .set(coerced)
        .where(eq(table.id, id))
        .returning();

      return rows[0] ? fromRow(recordTable, rows[0]) : null;
    },

    async delete(entityName, id) {
      const { db } = getDatabase();
      const { table } = requireRecordTable(entityName);

      const rows = await db.delete(table).where(eq(table.id, id)).returning();
      return rows.length > 0;
    },

    async count(entityName, where) {
      const { db } = getDatabase();
      const recordTable = requireRecordTable(entityName);
      const { table } = recordTable;

      let query = db
        .select({ count: sql<number>`count(*)::int` })
        .from(table)
        .$dynamic();

      const conditions = whereConditions(recordTable, where);
      if (conditions.length > 0) {
        query = query.where(and(...conditions));
      }

      const rows = await query;
      return rows[0]?.count ?? 0;
    },
  };
}
