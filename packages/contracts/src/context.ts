/**
 * Platform Context
 *
 * Interfaces the platform provides to records and adapters:
 * a structured logger, domain events, and storage access.
 *
 * The domain NEVER constructs these; the platform does.
 */

/**
 * Structured logger.
 * Platform code uses this instead of console.log.
 */
export interface Logger {
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
}

/**
 * A domain event emitted after a record is written.
 * Platform routes these to subscribers.
 */
export interface DomainEvent {
  /** Event name. Convention: "entity.verb_past_tense" (e.g., "task.created") */
  type: string;

  /** The data associated with this event */
  payload: Record<string, unknown>;

  /** When the event occurred */
  timestamp?: Date;
}

/**
 * An event subscriber: a function that reacts to domain events.
 *
 * @example
 * const onTaskCreated: EventSubscriber = {
 *   eventType: "task.created",
 *   name: "LogNewTask",
 *   handler: async (event) => {
 *     console.log("New task:", event.payload.title);
 *   },
 * };
 */
export interface EventSubscriber {
  /** The event type to listen for. Supports exact match or wildcard "*" for all events. */
  eventType: string;

  /** Human-readable name for logging and debugging */
  name: string;

  /** The function called when a matching event is emitted */
  handler: (event: DomainEvent) => Promise<void>;
}

/** Options accepted by DatabaseClient.findMany */
export interface FindManyOptions {
  where?: Record<string, unknown>;
  orderBy?: { field: string; direction: "asc" | "desc" };
  limit?: number;
  offset?: number;
}

/**
 * Entity-aware storage interface.
 * The platform provides concrete implementations (Drizzle-based and
 * in-memory). Records read and write through it without knowing about
 * the underlying database engine.
 *
 * Field names are always camelCase on this side of the interface.
 */
export interface DatabaseClient {
  /** Returns rows of an entity matching every `where` equality. */
  findMany(entity: string, options?: FindManyOptions): Promise<Record<string, unknown>[]>;

  /** Find a single record by ID */
  findById(entity: string, id: string | number): Promise<Record<string, unknown> | null>;

  /** Insert a new record. Returns the created row with its generated ID. */
  create(entity: string, data: Record<string, unknown>): Promise<Record<string, unknown>>;

  /** Update a record by ID. Returns the updated row, or null if none matched. */
  update(
    entity: string,
    id: string | number,
    data: Record<string, unknown>
  ): Promise<Record<string, unknown> | null>;

  /** Delete a record by ID. Returns true if deleted. */
  delete(entity: string, id: string | number): Promise<boolean>;

  /** Count records matching optional filter */
  count(entity: string, where?: Record<string, unknown>): Promise<number>;
}
