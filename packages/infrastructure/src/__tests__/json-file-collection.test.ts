import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import { NotFoundError, StoreOperationError } from '@medisync/core';
import { JsonFileCollection } from '../persistence/JsonFileCollection.js';

const WidgetSchema = z.object({
  id: z.string(),
  label: z.string().min(1),
  tags: z.array(z.string()).default([]),
});
type Widget = z.infer<typeof WidgetSchema>;

const widget = (id: string, label = `Widget ${id}`): Widget => ({ id, label, tags: [] });

describe('JsonFileCollection', () => {
  let dir: string;
  let filePath: string;

  const collection = (seed?: readonly Widget[], path = filePath) =>
    new JsonFileCollection({ name: 'widgets', filePath: path, schema: WidgetSchema, seed });

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'json-collection-'));
    filePath = join(dir, 'widgets.json');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('loading', () => {
    it('should start from the seed when the file is missing', async () => {
      const store = collection([widget('w-1')]);

      expect(await store.list()).toEqual([widget('w-1')]);
      expect(await store.count()).toBe(1);
      await expect(readFile(filePath, 'utf-8')).rejects.toThrow();
    });

    it('should start empty without a seed', async () => {
      expect(await collection().list()).toEqual([]);
    });

    it('should read and validate an existing file', async () => {
      await writeFile(filePath, JSON.stringify([{ id: 'w-1', label: 'Stored' }]));

      const store = collection([widget('seed')]);

      expect(await store.list()).toEqual([{ id: 'w-1', label: 'Stored', tags: [] }]);
      expect(await store.findById('w-1')).toEqual({ id: 'w-1', label: 'Stored', tags: [] });
      expect(await store.findById('seed')).toBeUndefined();
    });

    it('should fail on a file that is not JSON', async () => {
      await writeFile(filePath, '{ not json');

      const error = await collection().list().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(StoreOperationError);
      expect(error).toMatchObject({
        operation: 'load',
        store: 'widgets',
        message: 'Store widgets load failed: file is not valid JSON',
      });
    });

    it('should fail on records that do not match the schema', async () => {
      await writeFile(filePath, JSON.stringify([{ id: 'w-1' }]));

      await expect(collection().list()).rejects.toThrow(
        /^Store widgets load failed: file failed validation/
      );
    });
  });

  describe('writing', () => {
    it('should rewrite the whole file on append', async () => {
      const store = collection([widget('w-1')]);

      await store.append(widget('w-2'));

      const onDisk: unknown = JSON.parse(await readFile(filePath, 'utf-8'));
      expect(onDisk).toEqual([widget('w-1'), widget('w-2')]);
      expect(await collection().list()).toEqual([widget('w-1'), widget('w-2')]);
    });

    it('should merge and persist updates', async () => {
      const store = collection([widget('w-1')]);

      const updated = await store.update('w-1', { label: 'Renamed' });

      expect(updated).toEqual({ id: 'w-1', label: 'Renamed', tags: [] });
      expect(await collection().findById('w-1')).toEqual(updated);
    });

    it('should reject updates to unknown ids', async () => {
      await expect(collection().update('w-9', { label: 'x' })).rejects.toBeInstanceOf(
        NotFoundError
      );
    });

    it('should apply concurrent appends in call order', async () => {
      const store = collection();
      const ids = Array.from({ length: 10 }, (_, i) => `w-${i}`);

      await Promise.all(ids.map((id) => store.append(widget(id))));

      expect((await store.list()).map((w) => w.id)).toEqual(ids);
      const onDisk = z.array(WidgetSchema).parse(JSON.parse(await readFile(filePath, 'utf-8')));
      expect(onDisk.map((w) => w.id)).toEqual(ids);
    });

    it('should refuse records the schema would reject on the next load', async () => {
      const store = collection([widget('w-1')]);

      const error = await store.append(widget('w-2', '')).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(StoreOperationError);
      expect(error).toMatchObject({
        operation: 'save',
        message:
          'Store widgets save failed: record failed validation: String must contain at least 1 character(s)',
      });
      await expect(store.update('w-1', { label: '' })).rejects.toBeInstanceOf(StoreOperationError);
      expect(await store.list()).toEqual([widget('w-1')]);
      await expect(readFile(filePath, 'utf-8')).rejects.toThrow();
    });

    it('should keep memory unchanged when the write fails', async () => {
      const blockedPath = join(dir, 'blocked', 'widgets.json');
      const store = collection([widget('w-1')], blockedPath);
      await store.list();
      await writeFile(join(dir, 'blocked'), 'not a directory');

      const error = await store.append(widget('w-2')).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(StoreOperationError);
      expect(error).toMatchObject({ operation: 'save' });
      expect(await store.list()).toEqual([widget('w-1')]);

      await expect(store.update('w-1', { label: 'x' })).rejects.toBeInstanceOf(
        StoreOperationError
      );
    });
  });
});
