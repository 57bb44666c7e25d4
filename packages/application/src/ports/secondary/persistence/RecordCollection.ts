/**
 * @fileoverview Secondary Port - RecordCollection
 *
 * A named, ordered collection of persisted records. Adapters keep the whole
 * collection in memory and decide how (and whether) it reaches disk.
 *
 * @module application/ports/secondary/persistence/RecordCollection
 */

/**
 * Any persisted record
 */
export interface Identified {
  readonly id: string;
}

/**
 * SECONDARY PORT: record storage
 *
 * Records are returned in insertion order.
 */
export interface RecordCollection<T extends Identified> {
  /** Collection name used in logs and errors */
  readonly name: string;

  list(): Promise<readonly T[]>;

  findById(id: string): Promise<T | undefined>;

  append(record: T): Promise<void>;

  /**
   * Merge changes into an existing record and persist it
   *
   * @throws NotFoundError when no record has the id
   */
  update(id: string, changes: Partial<T>): Promise<T>;

  count(): Promise<number>;
}
