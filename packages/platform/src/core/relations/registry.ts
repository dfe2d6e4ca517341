/**
 * Relation Registry
 *
 * Per-record table of relation name → (child record type, link).
 * Record types seed it from their static relation table when an
 * instance is constructed.
 */

import type { LinkDescriptor, PersistentRecord, RecordType } from "@keepsync/contracts";
import { UnknownRelationError } from "./errors.js";

export interface RelationEntry<TChild extends PersistentRecord = PersistentRecord> {
  readonly name: string;
  readonly childType: RecordType<TChild>;
  readonly link: LinkDescriptor;
  /** Collection is reconciled on bulk load and deleted with the parent */
  readonly keepUpdated: boolean;
}

export class RelationRegistry<TChild extends PersistentRecord = PersistentRecord> {
  private readonly relations = new Map<string, RelationEntry<TChild>>();

  /**
   * @param owner - Name of the parent record type, used in error messages
   */
  constructor(readonly owner: string) {}

  /**
   * Stores the entry for `name`, replacing any earlier registration.
   */
  register(
    name: string,
    childType: RecordType<TChild>,
    link: LinkDescriptor,
    options: { keepUpdated?: boolean } = {}
  ): RelationEntry<TChild> {
    const entry: RelationEntry<TChild> = Object.freeze({
      name,
      childType,
      link: Object.freeze({ ...link }),
      keepUpdated: options.keepUpdated ?? false,
    });
    this.relations.set(name, entry);
    return entry;
  }

  /**
   * Returns the entry for `name`.
   * @throws UnknownRelationError if `name` was never registered
   */
  resolve(name: string): RelationEntry<TChild> {
    const entry = this.relations.get(name);
    if (!entry) throw new UnknownRelationError(name, this.owner);
    return entry;
  }

  has(name: string): boolean {
    return this.relations.has(name);
  }

  /** All entries in registration order */
  entries(): RelationEntry<TChild>[] {
    return Array.from(this.relations.values());
  }

  /** Entries declared as kept updated, in registration order */
  keptUpdated(): RelationEntry<TChild>[] {
    return this.entries().filter((entry) => entry.keepUpdated);
  }
}
