/**
 * Relation engine
 *
 * Keeps one-to-many relations of a parent record in sync with storage.
 */

export {
  RelationError,
  UnknownRelationError,
  InvalidRelationRequestError,
  EmptyPreparedInputError,
} from "./errors.js";
export { defineLink, linkForRelationship } from "./link.js";
export { RelationRegistry, type RelationEntry } from "./registry.js";
export { SnapshotStore } from "./snapshot-store.js";
export {
  diffCollections,
  identityKey,
  indexByIdentity,
  type CollectionDiff,
} from "./differ.js";
export { RelationReconciler } from "./reconciler.js";
export {
  extractPayload,
  parsePayloadRows,
  mergeFromPayload,
  mergeIdentityOnly,
  type MergeResult,
} from "./bulk-loader.js";
export {
  beforeParentDelete,
  validateAll,
  saveAll,
  deleteAll,
  errorsAll,
  loadRelations,
  loadRelationsPrimaries,
} from "./cascade.js";
export { copyAttributes, cloneCollection, filterCollection } from "./clone.js";
