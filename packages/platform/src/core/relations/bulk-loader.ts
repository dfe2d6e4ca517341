/**
 * Bulk Loader
 *
 * Merges untyped form/API payloads into a relation's desired collection.
 * Payload rows that carry the identity of an existing record update that
 * record in place; all other rows become new, unsaved records. Existing
 * records no row refers to are dropped from the result, which turns them
 * into removals once the result is assigned and saved.
 */

import { z } from "zod";
import type { AttributeMap, PersistentRecord, RecordType } from "@keepsync/contracts";
import { indexByIdentity } from "./differ.js";

const attributeMapSchema = z.record(z.unknown());

/**
 * Rows arrive either as a list, or as an object keyed by row index or
 * identity (tabular form posts). Object values are taken in key order.
 */
const payloadRowsSchema = z.union([
  z.array(attributeMapSchema),
  z.record(attributeMapSchema).transform((rows) => Object.values(rows)),
]);

export interface MergeResult<TRecord> {
  /** The merged collection, in payload order */
  records: TRecord[];
  /** False when the payload had no usable input; `records` is then `existing` */
  applied: boolean;
}

/**
 * Returns the part of `data` scoped under `scope`, or `data` itself when
 * the scope is "". Undefined when the scope key is absent.
 */
export function extractPayload(data: unknown, scope: string): unknown {
  if (scope === "") return data;
  const scoped = attributeMapSchema.safeParse(data);
  if (!scoped.success) return undefined;
  return Object.prototype.hasOwnProperty.call(scoped.data, scope)
    ? scoped.data[scope]
    : undefined;
}

/**
 * Parses payload rows. Returns null when the value is not a list of
 * attribute maps.
 */
export function parsePayloadRows(payload: unknown): AttributeMap[] | null {
  const result = payloadRowsSchema.safeParse(payload);
  return result.success ? result.data : null;
}

function rowIdentity(row: AttributeMap, primaryKey: string): string | null {
  const value = row[primaryKey];
  if (typeof value === "number") return String(value);
  if (typeof value === "string" && value !== "") return value;
  return null;
}

/**
 * Merges payload rows found in `data` into `existing`.
 *
 * @param formName - Scope key of the rows; defaults to the child type's form name
 */
export function mergeFromPayload<TRecord extends PersistentRecord>(
  childType: RecordType<TRecord>,
  existing: TRecord[],
  data: unknown,
  formName?: string
): MergeResult<TRecord> {
  const payload = extractPayload(data, formName ?? childType.formName);
  const rows = payload === undefined ? null : parsePayloadRows(payload);
  if (rows === null) {
    return { records: existing, applied: false };
  }

  const index = indexByIdentity(existing);
  const records: TRecord[] = [];
  for (const row of rows) {
    const key = rowIdentity(row, childType.primaryKey);
    const record = (key !== null ? index.get(key) : undefined) ?? childType.create();
    record.load(row, "");
    records.push(record);
  }

  return { records, applied: true };
}

/**
 * Back-fills identities onto `current` by position. Only truthy identity
 * values are applied; rows past the end of `current` are ignored.
 * Returns a new array holding the same record instances.
 */
export function mergeIdentityOnly<TRecord extends PersistentRecord>(
  current: TRecord[],
  rows: AttributeMap[],
  primaryKey = "id"
): TRecord[] {
  rows.forEach((row, position) => {
    const id = row[primaryKey];
    const record = current[position];
    if (record && (typeof id === "string" || typeof id === "number") && id) {
      record.setAttribute(primaryKey, id);
    }
  });
  return [...current];
}
