/**
 * Relationship Definitions
 *
 * Defines how entities relate to each other. Relationships are declared in
 * entity definitions and used by the platform to:
 *   - Set up foreign key columns in the database
 *   - Build the static relation table of each record type
 *   - Decide which child collections are reconciled on save and delete
 */

/** Supported relationship cardinalities */
export type RelationshipType = "belongsTo" | "hasMany";

/**
 * Declares a relationship between two entities.
 *
 * Examples:
 *   { type: 'belongsTo', entity: 'Project', required: true }
 *     → This entity has a projectId foreign key that must be set
 *
 *   { type: 'hasMany', entity: 'Task', foreignKey: 'projectId', keepUpdated: true }
 *     → The Task entity has a projectId pointing back here, and the
 *       parent reconciles its tasks collection on save and delete
 */
export interface RelationshipDefinition {
  /** The cardinality of the relationship */
  type: RelationshipType;

  /** The name of the related entity (PascalCase, e.g., "Company") */
  entity: string;

  /**
   * The foreign key attribute name (camelCase).
   * Defaults to `{relatedEntityName}Id` for belongsTo,
   * or `{thisEntityName}Id` for hasMany.
   */
  foreignKey?: string;

  /**
   * Relation name. For hasMany this names the collection accessor and
   * defaults to the camelCased plural name of the related entity
   * ("Task" → "tasks"). For belongsTo it names the foreign key prefix.
   */
  as?: string;

  /** For belongsTo: whether the foreign key must be set for the record to validate */
  required?: boolean;

  /**
   * For hasMany: the parent keeps this collection in sync with storage.
   * Kept-updated collections accept bulk payloads and are deleted along
   * with the parent.
   */
  keepUpdated?: boolean;
}

/**
 * Ties a child's foreign key attribute to the parent's local key attribute.
 * For one-to-many relations the local key is the parent's primary key.
 */
export interface LinkDescriptor {
  foreignKey: string;
  localKey: string;
}
