/**
 * Link Descriptors
 *
 * A link ties a child's foreign key attribute to the parent's local key.
 */

import {
  foreignKeyFor,
  type EntityDefinition,
  type LinkDescriptor,
  type RelationshipDefinition,
} from "@keepsync/contracts";

/**
 * Builds a link descriptor. The local key defaults to the parent's
 * primary key attribute.
 */
export function defineLink(foreignKey: string, localKey = "id"): LinkDescriptor {
  return { foreignKey, localKey };
}

/**
 * Derives the link of a hasMany relationship declared on `parent`.
 */
export function linkForRelationship(
  parent: EntityDefinition,
  relationship: RelationshipDefinition,
  localKey = "id"
): LinkDescriptor {
  if (relationship.type !== "hasMany") {
    throw new Error(
      `Only hasMany relationships can be linked, got ${relationship.type} ${parent.name} → ${relationship.entity}.`
    );
  }
  return defineLink(foreignKeyFor(parent, relationship), localKey);
}
