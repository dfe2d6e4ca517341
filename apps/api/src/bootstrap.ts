/**
 * Bootstrap
 *
 * Wires the platform engine with the domain layer.
 * This is the SINGLE place where platform meets domain.
 *
 * Sequence:
 *   1. Load config
 *   2. Pick storage: Postgres when DATABASE_URL is set, memory otherwise
 *   3. Register domain entities with the platform
 *   4. Build one table per entity (Postgres only)
 *   5. Register event subscribers
 *   6. Return the config and a record catalog over the chosen storage
 */

import {
  loadConfig,
  initDatabase,
  initObservability,
  registerEntities,
  buildRecordTable,
  createDatabaseClient,
  subscribeAll,
  createLogger,
  MemoryDatabaseClient,
  RecordCatalog,
  type AppConfig,
} from "@keepsync/platform";
import type { DatabaseClient } from "@keepsync/contracts";
import { entities, eventSubscribers } from "@keepsync/domain";

const log = createLogger("bootstrap");

export interface BootstrapResult {
  config: AppConfig;
  catalog: RecordCatalog;
}

/**
 * Initializes the entire application.
 * Call once at server startup.
 */
export function bootstrap(env: NodeJS.ProcessEnv = process.env): BootstrapResult {
  // 0. Observability first so failures in later steps are captured
  initObservability();

  const config = loadConfig(env);

  let db: DatabaseClient;
  if (config.database.url) {
    initDatabase(config);
    for (const entity of entities) {
      buildRecordTable(entity);
    }
    db = createDatabaseClient();
    log.info("Using Postgres storage");
  } else {
    db = new MemoryDatabaseClient();
    log.warn("DATABASE_URL not set, using in-memory storage");
  }

  registerEntities(entities);
  subscribeAll(eventSubscribers);

  const catalog = new RecordCatalog({
    db,
    deletePolicy: config.relations.deletePolicy,
    validateBeforeSave: config.relations.validateBeforeSave,
  });

  log.info(`Registered ${entities.length} entities`, {
    deletePolicy: config.relations.deletePolicy,
  });
  return { config, catalog };
}
