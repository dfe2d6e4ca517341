/**
 * In-Memory Database Client
 *
 * DatabaseClient backed by per-entity Maps. Used by tests and by the API
 * when no DATABASE_URL is configured. Rows are copied on the way in and
 * out, so callers never share state with the store.
 */

import { randomUUID } from "node:crypto";
import type { DatabaseClient, FindManyOptions } from "@keepsync/contracts";

type Row = Record<string, unknown>;

function matches(row: Row, where?: Record<string, unknown>): boolean {
  if (!where) return true;
  return Object.entries(where).every(([key, value]) => {
    const actual = row[key];
    if (value === null || value === undefined) return actual === null || actual === undefined;
    return actual !== null && actual !== undefined && String(actual) === String(value);
  });
}

function compare(a: unknown, b: unknown): number {
  if (a === b) return 0;
  if (a === null || a === undefined) return -1;
  if (b === null || b === undefined) return 1;
  return String(a) < String(b) ? -1 : 1;
}

export class MemoryDatabaseClient implements DatabaseClient {
  private readonly tables = new Map<string, Map<string, Row>>();

  private table(entity: string): Map<string, Row> {
    let table = this.tables.get(entity);
    if (!table) {
      table = new Map();
      this.tables.set(entity, table);
    }
    return table;
  }

  async findMany(entity: string, options: FindManyOptions = {}): Promise<Row[]> {
    let rows = Array.from(this.table(entity).values()).filter((row) =>
      matches(row, options.where)
    );

    if (options.orderBy) {
      const { field, direction } = options.orderBy;
      const sign = direction === "desc" ? -1 : 1;
      rows = rows.sort((a, b) => sign * compare(a[field], b[field]));
    }

    const offset = options.offset ?? 0;
    rows = rows.slice(offset, options.limit === undefined ? undefined : offset + options.limit);
    return rows.map((row) => ({ ...row }));
  }

  async findById(entity: string, id: string | number): Promise<Row | null> {
    const row = this.table(entity).get(String(id));
    return row ? { ...row } : null;
  }

  async create(entity: string, data: Row): Promise<Row> {
    const supplied = data.id;
    const id = typeof supplied === "string" || typeof supplied === "number" ? supplied : randomUUID();
    const now = new Date();
    const row: Row = { ...data, id, createdAt: now, updatedAt: now };
    this.table(entity).set(String(id), row);
    return { ...row };
  }

  async update(entity: string, id: string | number, data: Row): Promise<Row | null> {
    const table = this.table(entity);
    const existing = table.get(String(id));
    if (!existing) return null;

    const row: Row = { ...existing, ...data, id: existing.id, updatedAt: new Date() };
    table.set(String(id), row);
    return { ...row };
  }

  async delete(entity: string, id: string | number): Promise<boolean> {
    return this.table(entity).delete(String(id));
  }

  async count(entity: string, where?: Record<string, unknown>): Promise<number> {
    return Array.from(this.table(entity).values()).filter((row) => matches(row, where)).length;
  }

  /** Drops every row of every entity */
  clear(): void {
    this.tables.clear();
  }
}
