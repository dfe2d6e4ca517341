/**
 * Collection Differ
 *
 * Partitions an old and a new collection of records by identity:
 *   - upsert: every member of `next`, unmodified and in order
 *   - remove: members of `old` whose identity is absent from `next`
 *
 * Records without an identity are never indexed, so they can only land in
 * `upsert`. Duplicate identities are not deduplicated: the last occurrence
 * wins in the index. `remove` follows `old`'s order only while identities
 * are unique; with duplicates it follows the order in which each identity
 * was first seen, holding that identity's last record.
 */

import { hasIdentity, type PersistentRecord } from "@keepsync/contracts";

export interface CollectionDiff<TRecord> {
  upsert: TRecord[];
  remove: TRecord[];
}

/**
 * Identity key used for matching. Keys are compared by string form so a
 * numeric key and its form-posted string match.
 */
export function identityKey(record: PersistentRecord): string | null {
  const key = record.getPrimaryKey();
  return hasIdentity(key) ? String(key) : null;
}

/**
 * Indexes records by identity key. Later duplicates overwrite earlier ones.
 */
export function indexByIdentity<TRecord extends PersistentRecord>(
  records: readonly TRecord[]
): Map<string, TRecord> {
  const index = new Map<string, TRecord>();
  for (const record of records) {
    const key = identityKey(record);
    if (key !== null) index.set(key, record);
  }
  return index;
}

export function diffCollections<TRecord extends PersistentRecord>(
  old: readonly TRecord[],
  next: readonly TRecord[]
): CollectionDiff<TRecord> {
  const oldIndex = indexByIdentity(old);
  const nextIndex = indexByIdentity(next);

  const remove: TRecord[] = [];
  for (const [key, record] of oldIndex) {
    if (!nextIndex.has(key)) remove.push(record);
  }

  return { upsert: [...next], remove };
}
