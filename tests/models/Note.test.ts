import { MongoNetworkError, MongoServerError, ObjectId } from 'mongodb';
import {
  MongoNoteStore,
  toListQuery,
  toUpdatePipeline,
  type NewNoteDocument,
  type NoteDatabase,
} from '../../src/server/models/Note';
import { ConflictError, InternalError, ServiceUnavailableError } from '../../src/server/types/errors';

const NOW = new Date('2024-03-01T10:00:00.000Z');

const PREVIOUS_UPDATED_AT = { $convert: { input: '$updatedAt', to: 'date', onError: null, onNull: null } };

function createFakeDatabase() {
  const cursor = {
    sort: jest.fn().mockReturnThis(),
    skip: jest.fn().mockReturnThis(),
    limit: jest.fn().mockReturnThis(),
    toArray: jest.fn().mockResolvedValue([]),
  };
  const collection = {
    collectionName: 'notes',
    createIndex: jest.fn().mockResolvedValue('index'),
    find: jest.fn().mockReturnValue(cursor),
    findOne: jest.fn().mockResolvedValue(null),
    insertOne: jest.fn(),
    findOneAndUpdate: jest.fn().mockResolvedValue(null),
    deleteOne: jest.fn().mockResolvedValue({ acknowledged: true, deletedCount: 0 }),
  };
  const collectionFactory = jest.fn().mockReturnValue(collection);
  const db: NoteDatabase = { collection: collectionFactory };
  return { db, collectionFactory, collection, cursor };
}

function newDocument(): NewNoteDocument {
  return { title: 'Buy milk', content: null, category: null, published: false, createdAt: NOW, updatedAt: NOW };
}

describe('toListQuery', () => {
  it('matches everything without filters', () => {
    expect(toListQuery({})).toEqual({});
  });

  it('matches published notes exactly', () => {
    expect(toListQuery({ category: 'work', published: true })).toEqual({ category: 'work', published: true });
  });

  it('counts a missing published field as unpublished', () => {
    expect(toListQuery({ published: false })).toEqual({ published: { $ne: true } });
  });
});

describe('toUpdatePipeline', () => {
  it('sets literal values and keeps updatedAt moving forward', () => {
    expect(toUpdatePipeline({ updatedAt: NOW, title: '$where', content: null })).toEqual([
      {
        $set: {
          title: { $literal: '$where' },
          content: { $literal: null },
          updatedAt: { $max: [NOW, { $add: [PREVIOUS_UPDATED_AT, 1] }] },
        },
      },
    ]);
  });
});

describe('MongoNoteStore', () => {
  it('uses the configured collection', () => {
    const { db, collectionFactory } = createFakeDatabase();

    new MongoNoteStore(db, 'journal');

    expect(collectionFactory).toHaveBeenCalledWith('journal');
  });

  it('creates the title and listing indexes', async () => {
    const { db, collection } = createFakeDatabase();

    await new MongoNoteStore(db).ensureIndexes();

    expect(collection.createIndex).toHaveBeenNthCalledWith(1, { title: 1 }, { unique: true, name: 'title_unique' });
    expect(collection.createIndex).toHaveBeenNthCalledWith(2, { createdAt: 1, _id: 1 }, { name: 'createdAt_id' });
  });

  describe('findMany', () => {
    it('filters, sorts and pages the cursor', async () => {
      const { db, collection, cursor } = createFakeDatabase();
      const stored = [{ _id: new ObjectId(), title: 'A' }];
      cursor.toArray.mockResolvedValue(stored);

      const result = await new MongoNoteStore(db).findMany(
        { category: 'work', published: false },
        { limit: 5, offset: 10, sortOrder: 'desc' }
      );

      expect(result).toBe(stored);
      expect(collection.find).toHaveBeenCalledWith({ category: 'work', published: { $ne: true } });
      expect(cursor.sort).toHaveBeenCalledWith({ createdAt: -1, _id: -1 });
      expect(cursor.skip).toHaveBeenCalledWith(10);
      expect(cursor.limit).toHaveBeenCalledWith(5);
    });

    it('sorts ascending by default order', async () => {
      const { db, cursor } = createFakeDatabase();

      await new MongoNoteStore(db).findMany({}, { limit: 10, offset: 0, sortOrder: 'asc' });

      expect(cursor.sort).toHaveBeenCalledWith({ createdAt: 1, _id: 1 });
    });
  });

  describe('findOne', () => {
    it('looks the note up by _id', async () => {
      const { db, collection } = createFakeDatabase();
      const id = new ObjectId();
      const stored = { _id: id, title: 'A' };
      collection.findOne.mockResolvedValue(stored);

      await expect(new MongoNoteStore(db).findOne(id)).resolves.toBe(stored);
      expect(collection.findOne).toHaveBeenCalledWith({ _id: id });
    });

    it('retries a read after a transient failure', async () => {
      const { db, collection } = createFakeDatabase();
      collection.findOne.mockRejectedValueOnce(new MongoNetworkError('connection reset'));

      await expect(new MongoNoteStore(db).findOne(new ObjectId())).resolves.toBeNull();
      expect(collection.findOne).toHaveBeenCalledTimes(2);
    });
  });

  describe('insertOne', () => {
    it('returns the inserted id', async () => {
      const { db, collection } = createFakeDatabase();
      const id = new ObjectId();
      collection.insertOne.mockResolvedValue({ acknowledged: true, insertedId: id });

      await expect(new MongoNoteStore(db).insertOne(newDocument())).resolves.toBe(id);
      expect(collection.insertOne).toHaveBeenCalledWith(newDocument());
    });

    it('rejects an inserted id that is not an ObjectId', async () => {
      const { db, collection } = createFakeDatabase();
      collection.insertOne.mockResolvedValue({ acknowledged: true, insertedId: 'custom-id' });

      await expect(new MongoNoteStore(db).insertOne(newDocument())).rejects.toBeInstanceOf(InternalError);
    });

    it('reports a duplicate title as a conflict', async () => {
      const { db, collection } = createFakeDatabase();
      collection.insertOne.mockRejectedValue(
        new MongoServerError({ message: 'E11000 duplicate key error', code: 11000, keyValue: { title: 'Buy milk' } })
      );

      const attempt = new MongoNoteStore(db).insertOne(newDocument());

      await expect(attempt).rejects.toBeInstanceOf(ConflictError);
      await expect(attempt).rejects.toThrow('A record with this title already exists');
    });

    it('does not retry a failed write', async () => {
      const { db, collection } = createFakeDatabase();
      collection.insertOne.mockRejectedValue(new MongoNetworkError('connection reset'));

      await expect(new MongoNoteStore(db).insertOne(newDocument())).rejects.toBeInstanceOf(ServiceUnavailableError);
      expect(collection.insertOne).toHaveBeenCalledTimes(1);
    });
  });

  describe('updateOne', () => {
    it('applies the update pipeline and returns the updated document', async () => {
      const { db, collection } = createFakeDatabase();
      const id = new ObjectId();
      const stored = { _id: id, title: 'X' };
      collection.findOneAndUpdate.mockResolvedValue(stored);

      const result = await new MongoNoteStore(db).updateOne(id, { updatedAt: NOW, title: 'X' });

      expect(result).toBe(stored);
      expect(collection.findOneAndUpdate).toHaveBeenCalledWith(
        { _id: id },
        [{ $set: { title: { $literal: 'X' }, updatedAt: { $max: [NOW, { $add: [PREVIOUS_UPDATED_AT, 1] }] } } }],
        { returnDocument: 'after' }
      );
    });

    it('does not retry a failed write', async () => {
      const { db, collection } = createFakeDatabase();
      collection.findOneAndUpdate.mockRejectedValue(new MongoNetworkError('connection reset'));

      await expect(new MongoNoteStore(db).updateOne(new ObjectId(), { updatedAt: NOW })).rejects.toBeInstanceOf(
        ServiceUnavailableError
      );
      expect(collection.findOneAndUpdate).toHaveBeenCalledTimes(1);
    });
  });

  describe('deleteOne', () => {
    it('returns the deleted count', async () => {
      const { db, collection } = createFakeDatabase();
      const id = new ObjectId();
      collection.deleteOne.mockResolvedValue({ acknowledged: true, deletedCount: 1 });

      await expect(new MongoNoteStore(db).deleteOne(id)).resolves.toBe(1);
      expect(collection.deleteOne).toHaveBeenCalledWith({ _id: id });
    });

    it('does not retry a failed write', async () => {
      const { db, collection } = createFakeDatabase();
      collection.deleteOne.mockRejectedValue(new MongoNetworkError('connection reset'));

      await expect(new MongoNoteStore(db).deleteOne(new ObjectId())).rejects.toBeInstanceOf(ServiceUnavailableError);
      expect(collection.deleteOne).toHaveBeenCalledTimes(1);
    });
  });
});
