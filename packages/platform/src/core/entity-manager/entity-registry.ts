/**
 * Entity Registry
 *
 * Central registry of all entity definitions.
 * The domain registers entities here at startup.
 * The record catalog reads it to build record types and their relation
 * tables; the REST adapter reads it to route by plural name.
 */

import type { EntityDefinition } from "@keepsync/contracts";

/** Thrown when an entity is looked up that was never registered. */
export class UnknownEntityError extends Error {
  public readonly entity: string;

  constructor(entity: string) {
    super(`Entity "${entity}" is not registered.`);
    this.name = "UnknownEntityError";
    this.entity = entity;
  }
}

/** All registered entities, keyed by entity name */
const entities = new Map<string, EntityDefinition>();

/**
 * Registers an entity definition.
 */
export function registerEntity(entity: EntityDefinition) {
  if (entities.has(entity.name)) {
    throw new Error(
      `Entity "${entity.name}" is already registered. Entity names must be unique.`
    );
  }
  entities.set(entity.name, entity);
}

/**
 * Registers multiple entities at once.
 */
export function registerEntities(entityList: EntityDefinition[]) {
  for (const entity of entityList) {
    registerEntity(entity);
  }
}

/**
 * Retrieves an entity definition by name.
 */
export function getEntity(name: string): EntityDefinition | undefined {
  return entities.get(name);
}

/**
 * Retrieves an entity definition by name, throwing if it is unknown.
 */
export function requireEntity(name: string): EntityDefinition {
  const entity = entities.get(name);
  if (!entity) throw new UnknownEntityError(name);
  return entity;
}

/**
 * Retrieves an entity by its plural name (URL-friendly lowercase).
 * Used for routing: "/projects" → Project entity.
 */
export function getEntityByPlural(
  pluralName: string
): EntityDefinition | undefined {
  const normalized = pluralName.toLowerCase();
  return Array.from(entities.values()).find(
    (e) => e.pluralName.toLowerCase() === normalized
  );
}

/**
 * Returns all registered entities.
 */
export function getAllEntities(): EntityDefinition[] {
  return Array.from(entities.values());
}

/**
 * Clears all registered entities. Used for testing.
 */
export function clearEntityRegistry() {
  entities.clear();
}
