/**
 * Snapshot Store
 *
 * Remembers, per relation, the desired collection as it was the instant
 * before the most recent assignment. Reconciliation diffs against it.
 * Last write wins; nothing here is refreshed by a save.
 */

export class SnapshotStore<TRecord> {
  private readonly snapshots = new Map<string, readonly TRecord[]>();

  capture(name: string, records: readonly TRecord[]): void {
    this.snapshots.set(name, [...records]);
  }

  /** The snapshot for `name`, or an empty baseline if none was captured */
  get(name: string): readonly TRecord[] {
    return this.snapshots.get(name) ?? [];
  }

  has(name: string): boolean {
    return this.snapshots.has(name);
  }

  /** Relations with a snapshot, in first-capture order */
  names(): string[] {
    return Array.from(this.snapshots.keys());
  }
}
