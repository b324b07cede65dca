import { ObjectId, type Collection, type Db, type Document, type Filter, type Sort } from 'mongodb';
import { handleDatabaseOperation } from '../utils/databaseErrorHandler.js';
import { logger } from '../utils/logger.js';
import type { SortOrder } from '../config/env.js';

export const DEFAULT_COLLECTION_NAME = 'notes';

/**
 * Application-level note record
 */
export interface Note {
  id: string;
  title: string;
  content: string | null;
  category: string | null;
  published: boolean;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Note as serialized in API responses
 */
export interface NoteResponse {
  id: string;
  title: string;
  content: string | null;
  category: string | null;
  published: boolean;
  createdAt: string;
  updatedAt: string;
}

export interface CreateNoteInput {
  title: string;
  content?: string | null;
  category?: string | null;
  published?: boolean;
}

export type UpdateNoteInput = Partial<CreateNoteInput>;

/**
 * Document written on insert. `_id` is assigned by MongoDB
 */
export type NewNoteDocument = {
  title: string;
  content: string | null;
  category: string | null;
  published: boolean;
  createdAt: Date;
  updatedAt: Date;
};

/**
 * `$set` payload for a partial update; always carries `updatedAt`
 */
export type NoteUpdateSet = Partial<Omit<NewNoteDocument, 'createdAt' | 'updatedAt'>> & {
  updatedAt: Date;
};

/**
 * A document as read back from the collection. Its shape is not trusted
 * until it passes through the mapper.
 */
export type StoredNoteDocument = Readonly<Record<string, unknown>>;

export interface NoteListFilter {
  category?: string;
  published?: boolean;
}

export interface FindManyOptions {
  limit: number;
  offset: number;
  sortOrder: SortOrder;
}

/**
 * Query interface the note service needs from the persistence backend.
 * Implementations throw classified AppErrors.
 */
export interface NoteStore {
  findMany(filter: NoteListFilter, options: FindManyOptions): Promise<StoredNoteDocument[]>;
  findOne(id: ObjectId): Promise<StoredNoteDocument | null>;
  insertOne(document: NewNoteDocument): Promise<ObjectId>;
  /** Returns the document after the update, or null when no document matched */
  updateOne(id: ObjectId, set: NoteUpdateSet): Promise<StoredNoteDocument | null>;
  /** Returns the number of deleted documents */
  deleteOne(id: ObjectId): Promise<number>;
  ensureIndexes(): Promise<void>;
}

/**
 * The part of a `Db` the store uses
 */
export type NoteDatabase = Pick<Db, 'collection'>;

/**
 * Filter for a list query. Documents without a `published` field decode as
 * unpublished, so `published: false` matches them too.
 */
export function toListQuery(filter: NoteListFilter): Filter<Document> {
  const query: Filter<Document> = {};
  if (filter.category !== undefined) {
    query.category = filter.category;
  }
  if (filter.published === true) {
    query.published = true;
  } else if (filter.published === false) {
    query.published = { $ne: true };
  }
  return query;
}

/**
 * Aggregation-pipeline update for a `$set` payload. Values are wrapped in
 * `$literal` so strings starting with `$` are stored as text. `updatedAt`
 * never moves backwards: it is the later of `now` and one millisecond after
 * the stored value.
 */
export function toUpdatePipeline(set: NoteUpdateSet): Document[] {
  const stage: Document = {};
  for (const [field, value] of Object.entries(set)) {
    if (field !== 'updatedAt' && value !== undefined) {
      stage[field] = { $literal: value };
    }
  }
  const previous = { $convert: { input: '$updatedAt', to: 'date', onError: null, onNull: null } };
  stage.updatedAt = { $max: [set.updatedAt, { $add: [previous, 1] }] };
  return [{ $set: stage }];
}

/**
 * MongoDB-backed note store
 */
export class MongoNoteStore implements NoteStore {
  private readonly collection: Collection<Document>;

  constructor(db: NoteDatabase, collectionName: string = DEFAULT_COLLECTION_NAME) {
    this.collection = db.collection<Document>(collectionName);
  }

  /**
   * Ensure database indexes exist
   */
  async ensureIndexes(): Promise<void> {
    await handleDatabaseOperation(async () => {
      // Unique index on title
      await this.collection.createIndex({ title: 1 }, { unique: true, name: 'title_unique' });

      // Index for listing in creation order
      await this.collection.createIndex({ createdAt: 1, _id: 1 }, { name: 'createdAt_id' });
    }, 'Note.ensureIndexes');
    logger.debug({ collection: this.collection.collectionName }, 'Note indexes ensured');
  }

  async findMany(filter: NoteListFilter, options: FindManyOptions): Promise<StoredNoteDocument[]> {
    return handleDatabaseOperation(async () => {
      const query = toListQuery(filter);
      const direction = options.sortOrder === 'desc' ? -1 : 1;
      const sort: Sort = { createdAt: direction, _id: direction };

      return await this.collection
        .find(query)
        .sort(sort)
        .skip(options.offset)
        .limit(options.limit)
        .toArray();
    }, 'Note.findMany');
  }

  async findOne(id: ObjectId): Promise<StoredNoteDocument | null> {
    return handleDatabaseOperation(async () => {
      return await this.collection.findOne({ _id: id });
    }, 'Note.findOne');
  }

  async insertOne(document: NewNoteDocument): Promise<ObjectId> {
    return handleDatabaseOperation(async () => {
      const result = await this.collection.insertOne({ ...document });
      if (!(result.insertedId instanceof ObjectId)) {
        throw new Error('Inserted note did not receive an ObjectId');
      }
      return result.insertedId;
    }, 'Note.insertOne', { maxRetries: 0 });
  }

  async updateOne(id: ObjectId, set: NoteUpdateSet): Promise<StoredNoteDocument | null> {
    return handleDatabaseOperation(async () => {
      return await this.collection.findOneAndUpdate(
        { _id: id },
        toUpdatePipeline(set),
        { returnDocument: 'after' }
      );
    }, 'Note.updateOne', { maxRetries: 0 });
  }

  async deleteOne(id: ObjectId): Promise<number> {
    return handleDatabaseOperation(async () => {
      const result = await this.collection.deleteOne({ _id: id });
      return result.deletedCount;
    }, 'Note.deleteOne', { maxRetries: 0 });
  }
}
