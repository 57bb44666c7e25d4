/**
 * @fileoverview JSON File Collection (Infrastructure Layer)
 *
 * File-backed adapter for the RecordCollection port. The whole collection is
 * read once, kept in memory and rewritten on every mutation.
 *
 * @module @medisync/infrastructure/persistence/json-file-collection
 */

import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { z } from 'zod';
import { createLogger, NotFoundError, StoreOperationError, toError } from '@medisync/core';
import type { Identified, RecordCollection } from '@medisync/application';

const logger = createLogger({ name: 'json-file-collection' });

// ============================================================================
// CONFIGURATION
// ============================================================================

export interface JsonFileCollectionOptions<T extends Identified> {
  /** Collection name used in logs and errors */
  readonly name: string;
  readonly filePath: string;
  /** Validates every record read from disk or about to be written */
  readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  /** Records to start from when the file does not exist yet */
  readonly seed?: readonly T[] | undefined;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

// ============================================================================
// ADAPTER
// ============================================================================

export class JsonFileCollection<T extends Identified> implements RecordCollection<T> {
  readonly name: string;
  private readonly filePath: string;
  private readonly recordSchema: z.ZodType<T, z.ZodTypeDef, unknown>;
  private readonly fileSchema: z.ZodType<T[], z.ZodTypeDef, unknown>;
  private readonly seed: readonly T[];

  private records: readonly T[] | undefined;
  private loading: Promise<readonly T[]> | undefined;
  private pending: Promise<unknown> = Promise.resolve();

  constructor(options: JsonFileCollectionOptions<T>) {
    this.name = options.name;
    this.filePath = options.filePath;
    this.recordSchema = options.schema;
    this.fileSchema = z.array(options.schema);
    this.seed = options.seed ?? [];
  }

  async list(): Promise<readonly T[]> {
    return this.load();
  }

  async findById(id: string): Promise<T | undefined> {
    const records = await this.load();
    return records.find((record) => record.id === id);
  }

  async append(record: T): Promise<void> {
    await this.exclusive(async () => {
      const records = await this.load();
      await this.persist([...records, this.validated(record)]);
    });
  }

  async update(id: string, changes: Partial<T>): Promise<T> {
    return this.exclusive(async () => {
      const records = await this.load();
      const index = records.findIndex((record) => record.id === id);
      const existing = records[index];
      if (!existing) {
        throw new NotFoundError(this.name);
      }

      const updated = this.validated({ ...existing, ...changes });
      const next = [...records];
      next[index] = updated;
      await this.persist(next);
      return updated;
    });
  }

  async count(): Promise<number> {
    const records = await this.load();
    return records.length;
  }

  // ============================================================================
  // PRIVATE METHODS
  // ============================================================================

  /**
   * Mutations run one at a time so each rewrite sees the previous one
   */
  private exclusive<R>(operation: () => Promise<R>): Promise<R> {
    const run = this.pending.then(operation);
    this.pending = run.catch((error: unknown) => {
      logger.debug({ err: error, store: this.name }, 'Store mutation failed');
    });
    return run;
  }

  /**
   * Reject a record the next load would refuse
   */
  private validated(record: T): T {
    const result = this.recordSchema.safeParse(record);
    if (!result.success) {
      throw new StoreOperationError(
        this.name,
        'save',
        `record failed validation: ${result.error.issues[0]?.message ?? 'unknown issue'}`
      );
    }
    return result.data;
  }

  private load(): Promise<readonly T[]> {
    if (this.records) {
      return Promise.resolve(this.records);
    }
    this.loading ??= this.readFromDisk().then(
      (records) => {
        this.records = records;
        return records;
      },
      (error: unknown) => {
        this.loading = undefined;
        throw error;
      }
    );
    return this.loading;
  }

  private async readFromDisk(): Promise<readonly T[]> {
    let text: string;
    try {
      text = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        logger.info({ store: this.name, seeded: this.seed.length }, 'Store file missing, using seed');
        return [...this.seed];
      }
      throw new StoreOperationError(this.name, 'load', 'file could not be read', toError(error));
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new StoreOperationError(this.name, 'load', 'file is not valid JSON', toError(error));
    }

    const result = this.fileSchema.safeParse(raw);
    if (!result.success) {
      throw new StoreOperationError(
        this.name,
        'load',
        `file failed validation: ${result.error.issues[0]?.message ?? 'unknown issue'}`
      );
    }

    logger.debug({ store: this.name, count: result.data.length }, 'Store loaded');
    return result.data;
  }

  /**
   * Write the full collection through a temporary file, then publish it in memory
   */
  private async persist(records: readonly T[]): Promise<void> {
    const tempPath = `${this.filePath}.tmp`;
    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      await writeFile(tempPath, `${JSON.stringify(records, null, 2)}\n`, 'utf-8');
      await rename(tempPath, this.filePath);
    } catch (error) {
      logger.error({ err: error, store: this.name }, 'Store write failed');
      throw new StoreOperationError(this.name, 'save', 'file could not be written', toError(error));
    }
    this.records = records;
  }
}
