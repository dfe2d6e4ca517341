/**
 * @keepsync/domain
 *
 * Exports all domain entities and event subscribers.
 * The API server imports this to register everything with the platform.
 */

import type { EntityDefinition } from "@keepsync/contracts";
import { CompanyEntity } from "./entities/company/company.entity.js";
import { ContactEntity } from "./entities/contact/contact.entity.js";
import { ProjectEntity } from "./entities/project/project.entity.js";
import { TaskEntity } from "./entities/task/task.entity.js";
export { eventSubscribers } from "./subscribers/index.js";
export { CompanyEntity, ContactEntity, ProjectEntity, TaskEntity };

/**
 * All entity definitions in this domain.
 * Parents come before the children that reference them via FK.
 */
export const entities: EntityDefinition[] = [
  CompanyEntity,
  ContactEntity,
  ProjectEntity,
  TaskEntity,
];
