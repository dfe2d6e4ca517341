/**
 * Clone & Filter
 *
 * Copies and narrows relation collections without touching storage.
 */

import type { AttributeMap, PersistentRecord } from "@keepsync/contracts";
import type { RelationReconciler } from "./reconciler.js";

/**
 * Copies every attribute except the primary key.
 */
export function copyAttributes(source: PersistentRecord, primaryKey: string): AttributeMap {
  const values = source.getAttributes();
  delete values[primaryKey];
  return values;
}

/**
 * Fresh, unsaved copies of the records in relation `name`.
 * Identities are not copied, so saving the copies inserts new rows.
 */
export function cloneCollection<TChild extends PersistentRecord>(
  relations: RelationReconciler<TChild>,
  name: string
): TChild[] {
  const { childType } = relations.resolve(name);
  return relations.get(name).map((record) => {
    const clone = childType.create();
    clone.setAttributes(copyAttributes(record, childType.primaryKey));
    return clone;
  });
}

/**
 * Keeps only the records whose attributes are set and strictly equal to
 * every value in `condition`. The result replaces the desired collection;
 * the snapshot is left as it was.
 */
export function filterCollection<TChild extends PersistentRecord>(
  relations: RelationReconciler<TChild>,
  name: string,
  condition: AttributeMap
): TChild[] {
  const matches = relations.get(name).filter((record) =>
    Object.entries(condition).every(([attribute, expected]) => {
      const actual = record.getAttribute(attribute);
      return actual !== null && actual !== undefined && actual === expected;
    })
  );
  relations.populate(name, matches);
  return matches;
}
