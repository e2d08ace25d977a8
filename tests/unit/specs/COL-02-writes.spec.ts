/**
 * COL-02: Document Collection Writes
 *
 * Inserts, replacements and deletions keep documents and their unique
 * constraint items in step, one transaction per write.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  DocumentCollection,
  DuplicateKeyError,
  EntityTypes,
  ImmutableKeyError,
  InvalidDocumentError,
  InvalidFilterError,
  MAX_WRITE_ATTEMPTS,
  PRIMARY_KEY_INDEX_NAME,
  WriteConflictError,
  storage,
} from '@user-store/shared';
import { captureLogger, silentLogger, type CapturedLogger } from '../fixtures';
import { InMemoryTableGateway } from '../support/in-memory-table';

describe('COL-02: Document Collection Writes', () => {
  let table: InMemoryTableGateway;
  let collection: DocumentCollection;

  beforeEach(async () => {
    table = new InMemoryTableGateway();
    collection = new DocumentCollection(table, 'people', { logger: silentLogger() });
    await collection.createIndex(['email'], { unique: true });
  });

  const constraintOwners = (): string[] =>
    table
      .itemsOfType(EntityTypes.UNIQUE_CONSTRAINT)
      .map((item) => `${String(item.indexName)}=${JSON.stringify(item.keyValues)}->${String(item.documentKey)}`)
      .sort();

  describe('insertOne', () => {
    it('should store the document with version 1 and its constraint items', async () => {
      const result = await collection.insertOne({ id: 'p1', email: 'zoe@example.com' });

      expect(result).toEqual({ insertedKey: 'p1' });
      const [item] = table.itemsOfType(EntityTypes.DOCUMENT);
      expect(item).toMatchObject({
        PK: 'people#DOC#p1',
        SK: 'DOCUMENT',
        collection: 'people',
        documentKey: 'p1',
        version: 1,
        document: { id: 'p1', email: 'zoe@example.com' },
      });
      expect(constraintOwners()).toEqual(['email_1=["zoe@example.com"]->p1']);
    });

    it('should report a duplicate key under the reserved primary key name', async () => {
      await collection.insertOne({ id: 'p1', email: 'zoe@example.com' });

      const error = await collection.insertOne({ id: 'p1', email: 'other@example.com' }).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(DuplicateKeyError);
      expect(error).toMatchObject({ indexName: PRIMARY_KEY_INDEX_NAME, keyValues: ['p1'] });
    });

    it('should serialize dates and drop undefined fields', async () => {
      await collection.insertOne({ id: 'p1', joined: new Date('2024-03-01T12:00:00.000Z'), nickname: undefined });

      expect(await collection.findOne({ id: 'p1' })).toEqual({ id: 'p1', joined: '2024-03-01T12:00:00.000Z' });
    });

    it('should not index a document missing the indexed field', async () => {
      await collection.insertOne({ id: 'p1' });
      await collection.insertOne({ id: 'p2' });

      expect(constraintOwners()).toEqual([]);
    });

    it('should reject a document without a string key', async () => {
      await expect(collection.insertOne({ email: 'zoe@example.com' })).rejects.toBeInstanceOf(InvalidDocumentError);
      await expect(collection.insertOne({ id: 7 })).rejects.toThrow('Document cannot be stored: id key field must be a non-empty string');
    });

    it('should log a duplicate key at WARN', async () => {
      const captured: CapturedLogger = captureLogger('WARN');
      const logged = new DocumentCollection(table, 'people', { logger: captured.logger });
      await logged.insertOne({ id: 'p1', email: 'zoe@example.com' });

      await logged.insertOne({ id: 'p2', email: 'zoe@example.com' }).catch((err: unknown) => err);

      expect(captured.lines).toHaveLength(1);
      expect(captured.lines[0]).toMatchObject({
        level: 'WARN',
        component: 'test.collection.people',
        message: 'Duplicate key on insert',
        data: { index: 'email_1' },
      });
    });
  });

  describe('replaceOne', () => {
    beforeEach(async () => {
      await collection.insertOne({ id: 'p1', email: 'zoe@example.com', city: 'Zürich' });
    });

    it('should replace the document and bump its version', async () => {
      const result = await collection.replaceOne({ id: 'p1' }, { id: 'p1', email: 'zoe@example.org' });

      expect(result).toEqual({ matchedCount: 1, modifiedCount: 1 });
      expect(await collection.findOne({ id: 'p1' })).toEqual({ id: 'p1', email: 'zoe@example.org' });
      expect(table.itemsOfType(EntityTypes.DOCUMENT)[0]).toMatchObject({ version: 2 });
      expect(constraintOwners()).toEqual(['email_1=["zoe@example.org"]->p1']);
    });

    it('should report an unchanged document as matched but not modified', async () => {
      const result = await collection.replaceOne({ id: 'p1' }, { city: 'Zürich', email: 'zoe@example.com', id: 'p1' });

      expect(result).toEqual({ matchedCount: 1, modifiedCount: 0 });
      expect(table.itemsOfType(EntityTypes.DOCUMENT)[0]).toMatchObject({ version: 1 });
    });

    it('should match nothing for an unknown key', async () => {
      const result = await collection.replaceOne({ id: 'p9' }, { id: 'p9', email: 'nine@example.com' });

      expect(result).toEqual({ matchedCount: 0, modifiedCount: 0 });
      expect(table.itemsOfType(EntityTypes.DOCUMENT)).toHaveLength(1);
    });

    it('should refuse to change the key', async () => {
      await expect(collection.replaceOne({ id: 'p1' }, { id: 'p2', email: 'zoe@example.com' })).rejects.toBeInstanceOf(
        ImmutableKeyError
      );
    });

    it('should only accept a key equality filter', async () => {
      await expect(collection.replaceOne({ email: 'zoe@example.com' }, { id: 'p1' })).rejects.toBeInstanceOf(
        InvalidFilterError
      );
      await expect(collection.replaceOne({ id: 'p1', city: 'Zürich' }, { id: 'p1' })).rejects.toBeInstanceOf(
        InvalidFilterError
      );
    });

    it('should replace again against the new version when the document changed after it was read', async () => {
      const stale = await table.getItem(storage.documentItemKey('people', 'p1'));
      await collection.replaceOne({ id: 'p1' }, { id: 'p1', email: 'zoe@example.com', city: 'Basel' });
      vi.spyOn(table, 'getItem').mockResolvedValueOnce(stale);

      const result = await collection.replaceOne({ id: 'p1' }, { id: 'p1', email: 'zoe@example.com', city: 'Bern' });

      expect(result).toEqual({ matchedCount: 1, modifiedCount: 1 });
      expect(await collection.findOne({ id: 'p1' })).toEqual({ id: 'p1', email: 'zoe@example.com', city: 'Bern' });
      expect(table.itemsOfType(EntityTypes.DOCUMENT)[0]).toMatchObject({ version: 3 });
    });

    it('should match nothing when the document was deleted after it was read', async () => {
      const stale = await table.getItem(storage.documentItemKey('people', 'p1'));
      await collection.deleteOne({ id: 'p1' });
      vi.spyOn(table, 'getItem').mockResolvedValueOnce(stale);

      const result = await collection.replaceOne({ id: 'p1' }, { id: 'p1', email: 'zoe@example.com', city: 'Bern' });

      expect(result).toEqual({ matchedCount: 0, modifiedCount: 0 });
      expect(table.itemsOfType(EntityTypes.DOCUMENT)).toHaveLength(0);
      expect(constraintOwners()).toEqual([]);
    });

    it('should raise a write conflict when every read is outdated', async () => {
      const stale = await table.getItem(storage.documentItemKey('people', 'p1'));
      await collection.replaceOne({ id: 'p1' }, { id: 'p1', email: 'zoe@example.com', city: 'Basel' });
      const getItem = vi.spyOn(table, 'getItem').mockResolvedValue(stale);
      const transactWrite = vi.spyOn(table, 'transactWrite');

      const error = await collection
        .replaceOne({ id: 'p1' }, { id: 'p1', email: 'zoe@example.com', city: 'Bern' })
        .catch((err: unknown) => err);
      getItem.mockRestore();

      expect(error).toBeInstanceOf(WriteConflictError);
      expect(error).toMatchObject({ code: 'WRITE_CONFLICT', documentKey: 'p1' });
      expect(transactWrite).toHaveBeenCalledTimes(MAX_WRITE_ATTEMPTS);
      expect(await collection.findOne({ id: 'p1' })).toEqual({ id: 'p1', email: 'zoe@example.com', city: 'Basel' });
    });

    it('should report a duplicate held by another document', async () => {
      await collection.insertOne({ id: 'p2', email: 'max@example.com' });

      const error = await collection
        .replaceOne({ id: 'p1' }, { id: 'p1', email: 'max@example.com' })
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(DuplicateKeyError);
      expect(error).toMatchObject({ indexName: 'email_1', keyValues: ['max@example.com'] });
      expect(constraintOwners()).toEqual([
        'email_1=["max@example.com"]->p2',
        'email_1=["zoe@example.com"]->p1',
      ]);
    });
  });

  describe('deleteOne', () => {
    it('should remove the document and its constraint items', async () => {
      await collection.insertOne({ id: 'p1', email: 'zoe@example.com' });

      expect(await collection.deleteOne({ id: 'p1' })).toEqual({ deletedCount: 1 });
      expect(table.itemsOfType(EntityTypes.DOCUMENT)).toHaveLength(0);
      expect(constraintOwners()).toEqual([]);
    });

    it('should delete nothing for an unknown key', async () => {
      expect(await collection.deleteOne({ id: 'p9' })).toEqual({ deletedCount: 0 });
    });

    it('should only accept a key equality filter', async () => {
      await expect(collection.deleteOne({ email: 'zoe@example.com' })).rejects.toBeInstanceOf(InvalidFilterError);
    });

    it('should delete the new version when the document changed after it was read', async () => {
      await collection.insertOne({ id: 'p1', email: 'zoe@example.com' });
      const stale = await table.getItem(storage.documentItemKey('people', 'p1'));
      await collection.replaceOne({ id: 'p1' }, { id: 'p1', email: 'zoe@example.org' });
      vi.spyOn(table, 'getItem').mockResolvedValueOnce(stale);

      expect(await collection.deleteOne({ id: 'p1' })).toEqual({ deletedCount: 1 });
      expect(table.itemsOfType(EntityTypes.DOCUMENT)).toHaveLength(0);
      expect(constraintOwners()).toEqual([]);
    });

    it('should delete nothing when a concurrent delete came first', async () => {
      await collection.insertOne({ id: 'p1', email: 'zoe@example.com' });
      const stale = await table.getItem(storage.documentItemKey('people', 'p1'));
      await collection.deleteOne({ id: 'p1' });
      vi.spyOn(table, 'getItem').mockResolvedValueOnce(stale);

      expect(await collection.deleteOne({ id: 'p1' })).toEqual({ deletedCount: 0 });
    });

    it('should raise a write conflict when every read is outdated', async () => {
      await collection.insertOne({ id: 'p1', email: 'zoe@example.com' });
      const stale = await table.getItem(storage.documentItemKey('people', 'p1'));
      await collection.replaceOne({ id: 'p1' }, { id: 'p1', email: 'zoe@example.org' });
      vi.spyOn(table, 'getItem').mockResolvedValue(stale);

      await expect(collection.deleteOne({ id: 'p1' })).rejects.toBeInstanceOf(WriteConflictError);
      expect(table.itemsOfType(EntityTypes.DOCUMENT)).toHaveLength(1);
    });
  });

  describe('constraint items held by another document', () => {
    const caseInsensitive = { unique: true, name: 'ci_email', collation: { locale: 'en', strength: 2 } } as const;

    beforeEach(async () => {
      await collection.insertOne({ id: 'p1', email: 'ada@example.com' });
      await collection.insertOne({ id: 'p2', email: 'Ada@example.com' });
      await expect(collection.createIndex(['email'], caseInsensitive)).rejects.toBeInstanceOf(DuplicateKeyError);
    });

    it('should leave them in place when deleting', async () => {
      expect(await collection.deleteOne({ id: 'p2' })).toEqual({ deletedCount: 1 });

      expect(constraintOwners()).toEqual([
        'ci_email=["ada@example.com"]->p1',
        'email_1=["ada@example.com"]->p1',
      ]);
      await expect(collection.insertOne({ id: 'p3', email: 'ADA@example.com' })).rejects.toMatchObject({
        indexName: 'ci_email',
        keyValues: ['ada@example.com'],
      });
    });

    it('should leave them in place when replacing', async () => {
      await collection.replaceOne({ id: 'p2' }, { id: 'p2', email: 'bob@example.com' });

      expect(constraintOwners()).toEqual([
        'ci_email=["ada@example.com"]->p1',
        'ci_email=["bob@example.com"]->p2',
        'email_1=["ada@example.com"]->p1',
        'email_1=["bob@example.com"]->p2',
      ]);
    });
  });
});
