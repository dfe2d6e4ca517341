/**
 * Relation Errors
 *
 * Structural misuse of the relation engine is fatal and surfaces as one
 * of these errors. Per-record validation and storage failures never throw:
 * they are reported through boolean results and each record's errors.
 */

/** Base class for every fatal relation error */
export class RelationError extends Error {
  /** The record type the failing call was made on */
  public readonly recordType: string;

  constructor(message: string, recordType: string) {
    super(message);
    this.name = "RelationError";
    this.recordType = recordType;
  }
}

/** A relation name was resolved before it was registered. */
export class UnknownRelationError extends RelationError {
  public readonly relation: string;

  constructor(relation: string, recordType: string) {
    super(`Relation "${relation}" is not registered on ${recordType}.`, recordType);
    this.name = "UnknownRelationError";
    this.relation = relation;
  }
}

/** A caller asked to load a relation that is not declared as kept updated. */
export class InvalidRelationRequestError extends RelationError {
  public readonly relation: string;

  constructor(relation: string, recordType: string) {
    super(
      `Invalid relation name: ${relation}. ${recordType} does not keep this relation updated.`,
      recordType
    );
    this.name = "InvalidRelationRequestError";
    this.relation = relation;
  }
}

/** The input-preparation hook returned nothing usable. */
export class EmptyPreparedInputError extends RelationError {
  constructor(recordType: string) {
    super(`Input preparation for ${recordType} returned an empty result.`, recordType);
    this.name = "EmptyPreparedInputError";
  }
}
