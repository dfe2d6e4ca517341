/**
 * Cascade Controller
 *
 * Applies reconciler operations across every relation of a parent:
 * the relations that have been assigned at least once for validate,
 * save and delete, and the kept-updated relations for bulk loading and
 * parent deletion.
 */

import type { ErrorMap, Logger, PersistentRecord } from "@keepsync/contracts";
import { extractPayload, mergeFromPayload, mergeIdentityOnly, parsePayloadRows } from "./bulk-loader.js";
import { InvalidRelationRequestError } from "./errors.js";
import type { RelationEntry } from "./registry.js";
import type { RelationReconciler } from "./reconciler.js";

/**
 * Deletes every kept-updated relation of the parent.
 * The result is informational: whether it stops the parent's own delete
 * is decided by the caller.
 */
export async function beforeParentDelete<TChild extends PersistentRecord>(
  relations: RelationReconciler<TChild>
): Promise<boolean> {
  let success = true;
  for (const entry of relations.registry.keptUpdated()) {
    if (!(await relations.delete(entry.name))) success = false;
  }
  return success;
}

/** Validates every assigned relation without short-circuiting */
export function validateAll<TChild extends PersistentRecord>(
  relations: RelationReconciler<TChild>
): boolean {
  let valid = true;
  for (const name of relations.snapshotNames()) {
    if (!relations.validate(name, null, true)) valid = false;
  }
  return valid;
}

/**
 * Saves every assigned relation. With validation gating on (the default)
 * nothing is saved unless every relation validates.
 */
export async function saveAll<TChild extends PersistentRecord>(
  relations: RelationReconciler<TChild>,
  runValidation = true,
  logger?: Logger
): Promise<boolean> {
  if (runValidation && !validateAll(relations)) {
    logger?.info("Relations not saved due to validation error.", {
      relations: relations.snapshotNames(),
    });
    return false;
  }

  let success = true;
  for (const name of relations.snapshotNames()) {
    if (!(await relations.save(name, false, null))) success = false;
  }
  return success;
}

/** Deletes the desired collection of every assigned relation */
export async function deleteAll<TChild extends PersistentRecord>(
  relations: RelationReconciler<TChild>
): Promise<boolean> {
  let success = true;
  for (const name of relations.snapshotNames()) {
    if (!(await relations.delete(name))) success = false;
  }
  return success;
}

/** Error maps per assigned relation; relations without errors are left out */
export function errorsAll<TChild extends PersistentRecord>(
  relations: RelationReconciler<TChild>
): Record<string, ErrorMap[]> {
  const errors: Record<string, ErrorMap[]> = {};
  for (const name of relations.snapshotNames()) {
    const relationErrors = relations.errors(name);
    if (relationErrors.length > 0) errors[name] = relationErrors;
  }
  return errors;
}

/**
 * Merges payload rows into each named relation and assigns the result.
 * Every name is checked before anything is merged.
 *
 * @throws InvalidRelationRequestError for a relation that is not kept updated
 */
export function loadRelations<TChild extends PersistentRecord>(
  relations: RelationReconciler<TChild>,
  data: unknown,
  names: string[]
): boolean {
  const kept = new Map(relations.registry.keptUpdated().map((entry) => [entry.name, entry]));
  const selected: RelationEntry<TChild>[] = names.map((name) => {
    const entry = kept.get(name);
    if (!entry) throw new InvalidRelationRequestError(name, relations.registry.owner);
    return entry;
  });

  for (const entry of selected) {
    const { records, applied } = mergeFromPayload(
      entry.childType,
      relations.get(entry.name),
      data
    );
    if (applied) relations.assign(entry.name, records);
  }
  return true;
}

/**
 * Back-fills identities positionally into every kept-updated relation
 * whose rows are present in the payload.
 */
export function loadRelationsPrimaries<TChild extends PersistentRecord>(
  relations: RelationReconciler<TChild>,
  data: unknown
): boolean {
  for (const entry of relations.registry.keptUpdated()) {
    const payload = extractPayload(data, entry.childType.formName);
    const rows = payload === undefined ? null : parsePayloadRows(payload);
    if (rows === null) continue;

    relations.assign(
      entry.name,
      mergeIdentityOnly(relations.get(entry.name), rows, entry.childType.primaryKey)
    );
  }
  return true;
}
