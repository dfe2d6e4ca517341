/**
 * Record Contracts
 *
 * The single-record persistence primitive the relation engine works on.
 * A record knows how to load attributes from raw input, validate itself,
 * save, delete, and expose its identity. Parent and child records share
 * the same capability set; only their role in a relation differs.
 */

/** A primary key value. null/undefined mean "not persisted yet". */
export type Identity = string | number | null | undefined;

/** Untyped attribute values keyed by attribute name */
export type AttributeMap = Record<string, unknown>;

/** Validation and persistence messages keyed by attribute name */
export type ErrorMap = Record<string, string[]>;

/**
 * Error map key used for failures that do not belong to a single
 * attribute (e.g., the storage layer rejected the write).
 */
export const RECORD_ERROR_KEY = "_record";

export interface PersistentRecord {
  /** Current errors from the last validation or write */
  readonly errors: ErrorMap;

  /**
   * Assigns attributes from raw input.
   * `formName` selects the scope key inside `data`; "" means `data` is
   * the attribute map itself. Returns false when no input was found.
   */
  load(data: AttributeMap, formName?: string): boolean;

  /** Validates the given attributes (all by default). Collects every failure. */
  validate(attributeNames?: string[] | null, clearErrors?: boolean): boolean;

  /** Inserts or updates the record. Resolves false on failure, never rejects for bad data. */
  save(runValidation?: boolean, attributeNames?: string[] | null): Promise<boolean>;

  /** Deletes the record. Resolves false when nothing was deleted. */
  delete(): Promise<boolean>;

  getPrimaryKey(): Identity;

  /** Declared attribute names, primary key included */
  attributes(): string[];

  getAttribute(name: string): unknown;
  setAttribute(name: string, value: unknown): void;

  /** Snapshot of all declared attribute values */
  getAttributes(): AttributeMap;

  /** Assigns every known attribute present in `values` */
  setAttributes(values: AttributeMap): void;

  hasErrors(): boolean;
}

/**
 * A record type: constructs fresh, unsaved records and describes the
 * conventions shared by all of them.
 */
export interface RecordType<TRecord extends PersistentRecord = PersistentRecord> {
  /** Type name (the entity name, e.g., "Task") */
  readonly name: string;

  /** Scope key under which this type's input is nested in payloads */
  readonly formName: string;

  /** Name of the primary key attribute */
  readonly primaryKey: string;

  create(): TRecord;
}

/**
 * Returns true if the value counts as a persisted identity.
 */
export function hasIdentity(value: Identity): value is string | number {
  return value !== null && value !== undefined && value !== "";
}
