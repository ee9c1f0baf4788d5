import { describe, it, expect, beforeEach, vi } from 'vitest';
import { mockDeep, mockReset } from 'vitest-mock-extended';
import { ObjectId, type Collection, type Document, type FindCursor } from 'mongodb';
import { MongoDocumentStore } from './mongo-store.js';
import { logger } from '@shared/utils/logger.js';
import { VenueSchema } from '@modules/venues/index.js';
import { MediaDocumentSchema } from '@modules/media/index.js';

describe('MongoDocumentStore', () => {
  const collection = mockDeep<Collection<Document>>();
  const store = new MongoDocumentStore(collection, VenueSchema);

  const warn = vi.spyOn(logger, 'warn');

  const hexId = '65f1a2b3c4d5e6f7a8b9c0d1';
  const objectId = new ObjectId(hexId);

  beforeEach(() => {
    mockReset(collection);
    warn.mockClear();
  });

  describe('list', () => {
    const cursor = mockDeep<FindCursor<Document>>();

    beforeEach(() => {
      mockReset(cursor);
      collection.find.mockReturnValue(cursor);
    });

    it('should pass the cap to find and render ids as text', async () => {
      cursor.toArray.mockResolvedValue([
        { _id: objectId, name: 'Hall A', address: '1 Main St', capacity: 200 },
      ]);

      const venues = await store.list(100);

      expect(venues).toEqual([{ _id: hexId, name: 'Hall A', address: '1 Main St', capacity: 200 }]);
      expect(collection.find).toHaveBeenCalledWith({}, { limit: 100 });
    });

    it('should skip and log documents that do not match the schema', async () => {
      const brokenId = new ObjectId('65f1a2b3c4d5e6f7a8b9c0d2');
      cursor.toArray.mockResolvedValue([
        { _id: brokenId, name: 'Hall X', capacity: 'many' },
        { _id: objectId, name: 'Hall A', address: '1 Main St', capacity: 200 },
      ]);

      const venues = await store.list(100);

      expect(venues).toEqual([{ _id: hexId, name: 'Hall A', address: '1 Main St', capacity: 200 }]);
      expect(warn).toHaveBeenCalledWith(
        expect.objectContaining({ id: '65f1a2b3c4d5e6f7a8b9c0d2' }),
        'Skipping document that does not match its schema'
      );
    });
  });

  describe('insert', () => {
    it('should return the assigned id as hex text', async () => {
      collection.insertOne.mockResolvedValue({ acknowledged: true, insertedId: objectId });

      const id = await store.insert({ name: 'Hall A', address: '1 Main St', capacity: 200 });

      expect(id).toBe(hexId);
      expect(collection.insertOne).toHaveBeenCalledWith({
        name: 'Hall A',
        address: '1 Main St',
        capacity: 200,
      });
    });
  });

  describe('findById', () => {
    it('should render the ObjectId as text', async () => {
      collection.findOne.mockResolvedValue({
        _id: objectId,
        name: 'Hall A',
        address: '1 Main St',
        capacity: 200,
      });

      const venue = await store.findById(hexId);

      expect(venue).toEqual({ _id: hexId, name: 'Hall A', address: '1 Main St', capacity: 200 });
      expect(collection.findOne).toHaveBeenCalledWith({ _id: objectId });
    });

    it('should return null without querying for a malformed id', async () => {
      await expect(store.findById('not-an-id')).resolves.toBeNull();
      expect(collection.findOne).not.toHaveBeenCalled();
    });

    it('should treat a document that does not match the schema as absent', async () => {
      collection.findOne.mockResolvedValue({ _id: objectId, name: 'Hall A' });

      await expect(store.findById(hexId)).resolves.toBeNull();
      expect(warn).toHaveBeenCalledWith(
        expect.objectContaining({ id: hexId }),
        'Skipping document that does not match its schema'
      );
    });
  });

  describe('replace', () => {
    it('should report whether a document matched', async () => {
      collection.replaceOne.mockResolvedValue({
        acknowledged: true,
        matchedCount: 0,
        modifiedCount: 0,
        upsertedCount: 0,
        upsertedId: null,
      });

      const matched = await store.replace(hexId, { name: 'Hall B', address: '2 Side St', capacity: 90 });

      expect(matched).toBe(false);
      expect(collection.replaceOne).toHaveBeenCalledWith(
        { _id: objectId },
        { name: 'Hall B', address: '2 Side St', capacity: 90 }
      );
    });
  });

  describe('remove', () => {
    it('should report whether a document was deleted', async () => {
      collection.deleteOne.mockResolvedValue({ acknowledged: true, deletedCount: 1 });

      await expect(store.remove(hexId)).resolves.toBe(true);
      expect(collection.deleteOne).toHaveBeenCalledWith({ _id: objectId });
    });

    it('should not query for a malformed id', async () => {
      await expect(store.remove('nope')).resolves.toBe(false);
      expect(collection.deleteOne).not.toHaveBeenCalled();
    });
  });

  describe('findLatest', () => {
    const mediaStore = new MongoDocumentStore(collection, MediaDocumentSchema);

    it('should sort newest first and break ties by _id', async () => {
      const uploadedAt = new Date('2030-04-01T09:30:00.000Z');
      const content = Buffer.from([0x01, 0x02]);
      collection.findOne.mockResolvedValue({
        _id: objectId,
        event_id: 'event-1',
        filename: 'poster.png',
        content_type: 'image/png',
        content,
        uploaded_at: uploadedAt,
      });

      const poster = await mediaStore.findLatest('event_id', 'event-1', 'uploaded_at');

      expect(poster).toEqual({
        _id: hexId,
        event_id: 'event-1',
        filename: 'poster.png',
        content_type: 'image/png',
        content,
        uploaded_at: uploadedAt,
      });
      expect(collection.findOne).toHaveBeenCalledWith(
        { event_id: 'event-1' },
        { sort: { uploaded_at: -1, _id: -1 } }
      );
    });

    it('should return null when nothing matches', async () => {
      collection.findOne.mockResolvedValue(null);

      await expect(mediaStore.findLatest('event_id', 'event-2', 'uploaded_at')).resolves.toBeNull();
    });

    it('should return null when the newest attachment is unreadable', async () => {
      collection.findOne.mockResolvedValue({ _id: objectId, event_id: 'event-3', filename: 'x.bin' });

      await expect(mediaStore.findLatest('event_id', 'event-3', 'uploaded_at')).resolves.toBeNull();
    });
  });
});
