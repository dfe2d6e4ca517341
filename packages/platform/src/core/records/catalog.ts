/**
 * Record Catalog
 *
 * Hands out one EntityRecordType per registered entity, all sharing the
 * same storage, logger and relation settings.
 *
 * Usage:
 *   const catalog = new RecordCatalog({ db: new MemoryDatabaseClient() });
 *   const project = catalog.type("Project").create();
 *   project.load(body);
 *   await project.loadRelations(body);
 *   await project.saveWithRelations();
 */

import type { DatabaseClient, Logger } from "@keepsync/contracts";
import type { DeletePolicy } from "../config/index.js";
import { getEntityByPlural, requireEntity } from "../entity-manager/entity-registry.js";
import { createLogger } from "../logging/index.js";
import { EntityRecordType, type RecordServices } from "./entity-record-type.js";

export interface RecordCatalogOptions {
  db: DatabaseClient;
  logger?: Logger;
  /** Defaults to "advisory" */
  deletePolicy?: DeletePolicy;
  /** Default of saveWithRelations' runValidation; true unless set */
  validateBeforeSave?: boolean;
}

export class RecordCatalog {
  private readonly types = new Map<string, EntityRecordType>();
  private readonly services: RecordServices;

  constructor(options: RecordCatalogOptions) {
    this.services = {
      db: options.db,
      logger: options.logger ?? createLogger("records"),
      deletePolicy: options.deletePolicy ?? "advisory",
      validateBeforeSave: options.validateBeforeSave ?? true,
      typeOf: (entityName) => this.type(entityName),
    };
  }

  /**
   * The record type of a registered entity.
   * @throws UnknownEntityError if the entity was never registered
   */
  type(entityName: string): EntityRecordType {
    let recordType = this.types.get(entityName);
    if (!recordType) {
      recordType = new EntityRecordType(requireEntity(entityName), this.services);
      this.types.set(entityName, recordType);
    }
    return recordType;
  }

  /** The record type routed to by a plural name ("projects"), if any */
  typeForPlural(pluralName: string): EntityRecordType | undefined {
    const entity = getEntityByPlural(pluralName);
    return entity ? this.type(entity.name) : undefined;
  }
}
