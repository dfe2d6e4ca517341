/**
 * @keepsync/platform
 *
 * The platform engine. Provides the relation engine, entity records,
 * storage adapters, entity management and the REST adapter.
 */

// Config
export { loadConfig, type AppConfig, type DeletePolicy } from "./core/config/index.js";

// Logging & observability
export { createLogger, silentLogger } from "./core/logging/index.js";
export {
  initObservability,
  captureException,
  captureMessage,
  setObservabilityContext,
  flushObservability,
  getObservabilityProvider,
  setObservabilityProvider,
  resetObservability,
  ConsoleObservabilityProvider,
  NullObservabilityProvider,
  type ObservabilityProvider,
  type ObservabilityContext,
  type ObservabilitySeverity,
} from "./core/observability/index.js";

// Database
export { initDatabase, getDatabase, closeDatabase } from "./core/database/connection.js";
export {
  buildRecordTable,
  getRecordTable,
  requireRecordTable,
  clearRecordTables,
  toTableName,
  toColumnName,
  type RecordTable,
} from "./core/database/record-tables.js";
export { createDatabaseClient } from "./core/database/client.js";
export { MemoryDatabaseClient } from "./core/database/memory-client.js";

// Event Bus
export {
  subscribe,
  subscribeAll,
  publish,
  getSubscriberCount,
  clearSubscribers,
} from "./core/event-bus/index.js";

// Entity Manager
export {
  registerEntity,
  registerEntities,
  getEntity,
  requireEntity,
  getEntityByPlural,
  getAllEntities,
  clearEntityRegistry,
  UnknownEntityError,
} from "./core/entity-manager/entity-registry.js";

// Relation engine
export * from "./core/relations/index.js";

// Entity records
export * from "./core/records/index.js";

// REST adapter
export { registerRelationRoutes, serializeRecord } from "./adapters/rest/adapter.js";
