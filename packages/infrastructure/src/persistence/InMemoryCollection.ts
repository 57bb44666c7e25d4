/**
 * @fileoverview In-Memory Collection (Infrastructure Layer)
 *
 * RecordCollection adapter with no persistence. Used for development runs
 * without a data directory and for tests.
 *
 * @module @medisync/infrastructure/persistence/in-memory-collection
 */

import { NotFoundError } from '@medisync/core';
import type { Identified, RecordCollection } from '@medisync/application';

export class InMemoryCollection<T extends Identified> implements RecordCollection<T> {
  private records: readonly T[];

  constructor(
    readonly name: string,
    seed: readonly T[] = []
  ) {
    this.records = [...seed];
  }

  async list(): Promise<readonly T[]> {
    return this.records;
  }

  async findById(id: string): Promise<T | undefined> {
    return this.records.find((record) => record.id === id);
  }

  async append(record: T): Promise<void> {
    this.records = [...this.records, record];
  }

  async update(id: string, changes: Partial<T>): Promise<T> {
    const index = this.records.findIndex((record) => record.id === id);
    const existing = this.records[index];
    if (!existing) {
      throw new NotFoundError(this.name);
    }

    const updated: T = { ...existing, ...changes };
    this.records = this.records.map((record, i) => (i === index ? updated : record));
    return updated;
  }

  async count(): Promise<number> {
    return this.records.length;
  }
}
