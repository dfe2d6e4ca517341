/**
 * Entity Definition
 *
 * An Entity is a business object that the application manages.
 * Entities are the nouns of your business: Project, Task, Company, Contact.
 *
 * The platform uses entity definitions to:
 *   - Build record types with validation and persistence
 *   - Generate database table schemas
 *   - Register the one-to-many relations a record reconciles on save
 */

import type { FieldType } from "./field-types.js";
import type { RelationshipDefinition } from "./relationship.js";
import type { AttributeMap } from "./record.js";

// ---------------------------------------------------------------------------
// Field Definition
// ---------------------------------------------------------------------------

/** Validation rules that can be applied to a field */
export interface FieldValidation {
  /** Minimum value (for numbers) or minimum length (for strings) */
  min?: number;
  /** Maximum value (for numbers) or maximum length (for strings) */
  max?: number;
  /** Regex pattern the value must match */
  pattern?: string;
  /** Custom error message when validation fails */
  message?: string;
}

/**
 * Defines a single field on an entity.
 * Fields map to record attributes and database columns.
 */
export interface FieldDefinition {
  /** Attribute name. Use camelCase. (e.g., "firstName") */
  name: string;

  /** The data type of this field. Determines DB column and validation. */
  type: FieldType;

  /** Whether this field must have a value. */
  required: boolean;

  /** Plain English description */
  description: string;

  /** Default value when creating a new record */
  defaultValue?: unknown;

  /** For 'enum' type: the list of allowed values */
  options?: string[];

  /** Validation rules beyond type checking */
  validations?: FieldValidation[];
}

// ---------------------------------------------------------------------------
// Entity Definition
// ---------------------------------------------------------------------------

/**
 * The complete definition of a business entity.
 */
export interface EntityDefinition {
  /** Singular name, PascalCase. (e.g., "Contact") */
  name: string;

  /** Plural name. (e.g., "Contacts") */
  pluralName: string;

  /** Plain English description of what this entity represents. */
  description: string;

  /**
   * Scope key under which this entity's attributes arrive in form/API
   * payloads. Defaults to the entity name. Use "" for unscoped input.
   */
  formName?: string;

  /** The fields this entity has */
  fields: FieldDefinition[];

  /** How this entity relates to other entities */
  relationships?: RelationshipDefinition[];

  /** Custom logic hooks for record loading */
  hooks?: EntityHooks;
}

/**
 * Record-level hooks.
 */
export interface EntityHooks {
  /**
   * Reformats raw scoped input before it is assigned to the record.
   * Returning null, undefined or an empty object is a bad-input condition.
   */
  prepare?: (input: AttributeMap) => AttributeMap | null | undefined;
}

// ---------------------------------------------------------------------------
// Helper
// ---------------------------------------------------------------------------

/**
 * Helper function to define an entity with type checking.
 *
 * @example
 * export const TaskEntity = defineEntity({
 *   name: 'Task',
 *   pluralName: 'Tasks',
 *   description: 'A unit of work within a project.',
 *   fields: [...],
 *   relationships: [{ type: 'belongsTo', entity: 'Project', required: true }],
 * });
 */
export function defineEntity(definition: EntityDefinition): EntityDefinition {
  return definition;
}

/**
 * Lowercases the first character. "PurchaseOrder" → "purchaseOrder"
 */
export function lowerFirst(value: string): string {
  return value.charAt(0).toLowerCase() + value.slice(1);
}

/**
 * Returns the foreign key attribute of a relationship, applying the
 * naming defaults documented on RelationshipDefinition.
 */
export function foreignKeyFor(
  owner: EntityDefinition,
  relationship: RelationshipDefinition
): string {
  if (relationship.foreignKey) return relationship.foreignKey;
  const base = relationship.type === "belongsTo"
    ? relationship.as ?? relationship.entity
    : owner.name;
  return lowerFirst(base) + "Id";
}
