/**
 * @keepsync/contracts
 *
 * Public API: the shared boundary between platform and domain.
 * Both sides import from this package. Neither imports from the other.
 */

// Entity definitions
export type {
  EntityDefinition,
  EntityHooks,
  FieldDefinition,
  FieldValidation,
} from "./entity.js";
export { defineEntity, foreignKeyFor, lowerFirst } from "./entity.js";

// Field types
export type { FieldType } from "./field-types.js";
export {
  FIELD_TYPES,
  zodSchemaForFieldType,
  zodSchemaForField,
  identitySchema,
} from "./field-types.js";

// Relationships
export type {
  RelationshipDefinition,
  RelationshipType,
  LinkDescriptor,
} from "./relationship.js";

// Records
export type {
  PersistentRecord,
  RecordType,
  Identity,
  AttributeMap,
  ErrorMap,
} from "./record.js";
export { RECORD_ERROR_KEY, hasIdentity } from "./record.js";

// Platform context
export type {
  Logger,
  DomainEvent,
  EventSubscriber,
  DatabaseClient,
  FindManyOptions,
} from "./context.js";
