import type { SortOrder } from '../../config/env.js';
import type {
  CreateNoteInput,
  Note,
  NoteListFilter,
  NoteStore,
  UpdateNoteInput,
} from '../../models/Note.js';
import { NotFoundError } from '../../types/errors.js';
import { toAppError } from '../../utils/databaseErrorHandler.js';
import { createChildLogger } from '../../utils/logger.js';
import { decodeOrThrow, toNewDocument, toObjectId, toUpdateSet } from '../../utils/noteMapper.js';
import { resolvePagination, type PaginationParams } from '../../utils/pagination.js';

export type Clock = () => Date;

export interface NoteServiceOptions {
  defaultLimit: number;
  maxLimit: number;
  sortOrder: SortOrder;
  clock?: Clock;
}

export interface ListNotesQuery extends PaginationParams, NoteListFilter {}

export interface NoteList {
  notes: Note[];
  limit: number;
  offset: number;
  page: number;
}

const RESOURCE = 'Note';

/**
 * CRUD orchestration over the note store.
 *
 * Identifiers and inputs are validated before the store is called; every
 * failure leaves as a classified AppError.
 */
export class NoteService {
  private readonly clock: Clock;

  constructor(
    private readonly store: NoteStore,
    private readonly options: NoteServiceOptions
  ) {
    this.clock = options.clock ?? (() => new Date());
  }

  async list(query: ListNotesQuery = {}): Promise<NoteList> {
    const { limit, offset, page } = resolvePagination(query, {
      defaultLimit: this.options.defaultLimit,
      maxLimit: this.options.maxLimit,
    });

    const filter: NoteListFilter = {};
    if (query.category !== undefined) filter.category = query.category;
    if (query.published !== undefined) filter.published = query.published;

    const documents = await this.run('list', () =>
      this.store.findMany(filter, { limit, offset, sortOrder: this.options.sortOrder })
    );

    return {
      notes: documents.map((document) => decodeOrThrow(document)),
      limit,
      offset,
      page,
    };
  }

  async create(input: CreateNoteInput): Promise<Note> {
    const document = toNewDocument(input, this.clock());
    const insertedId = await this.run('create', () => this.store.insertOne(document));

    const note = decodeOrThrow({ ...document, _id: insertedId });
    createChildLogger({ noteId: note.id }).info('Created note');
    return note;
  }

  async get(id: string): Promise<Note> {
    const objectId = toObjectId(id);
    const document = await this.run('get', () => this.store.findOne(objectId));
    if (!document) {
      throw new NotFoundError(RESOURCE, id);
    }
    return decodeOrThrow(document);
  }

  async update(id: string, input: UpdateNoteInput): Promise<Note> {
    const objectId = toObjectId(id);
    const set = toUpdateSet(input, this.clock());

    const document = await this.run('update', () => this.store.updateOne(objectId, set));
    if (!document) {
      throw new NotFoundError(RESOURCE, id);
    }

    const note = decodeOrThrow(document);
    createChildLogger({ noteId: note.id, fields: Object.keys(set) }).info('Updated note');
    return note;
  }

  async delete(id: string): Promise<void> {
    const objectId = toObjectId(id);
    const deletedCount = await this.run('delete', () => this.store.deleteOne(objectId));
    if (deletedCount === 0) {
      throw new NotFoundError(RESOURCE, id);
    }
    createChildLogger({ noteId: id }).info('Deleted note');
  }

  /**
   * Invoke the store, reclassifying anything a store implementation let
   * through unclassified
   */
  private async run<T>(operation: string, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (error) {
      throw toAppError(error, `NoteService.${operation}`);
    }
  }
}
