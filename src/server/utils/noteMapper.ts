/**
 * Mapping between stored note documents and note records
 *
 * Reads are decoded into a tagged result so a malformed document becomes a
 * DecodeError instead of a runtime crash. Writes always produce the same
 * document shape for the same input.
 */

import { ObjectId } from 'mongodb';
import { BadRequestError, DecodeError, InvalidIdentifierError } from '../types/errors.js';
import type {
  CreateNoteInput,
  NewNoteDocument,
  Note,
  NoteResponse,
  NoteUpdateSet,
  StoredNoteDocument,
  UpdateNoteInput,
} from '../models/Note.js';

export type DecodeResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: DecodeError };

export const TITLE_MAX_LENGTH = 255;

const OBJECT_ID_PATTERN = /^[0-9a-fA-F]{24}$/;

const UPDATABLE_FIELDS = ['title', 'content', 'category', 'published'] as const;

/**
 * Only 24 hex characters are accepted; ObjectId.isValid() would also take
 * any 12 byte string.
 */
export function isValidNoteId(id: string): boolean {
  return OBJECT_ID_PATTERN.test(id);
}

/**
 * Convert an API identifier into an ObjectId
 */
export function toObjectId(id: string): ObjectId {
  if (!isValidNoteId(id)) {
    throw new InvalidIdentifierError(id);
  }
  return ObjectId.createFromHexString(id);
}

function normalizeTitle(title: unknown): string {
  if (typeof title !== 'string') {
    throw new BadRequestError('title must be a string', { field: 'title' });
  }
  const trimmed = title.trim();
  if (trimmed.length === 0) {
    throw new BadRequestError('title is required', { field: 'title' });
  }
  if (trimmed.length > TITLE_MAX_LENGTH) {
    throw new BadRequestError(`title must be at most ${TITLE_MAX_LENGTH} characters`, { field: 'title' });
  }
  return trimmed;
}

function normalizeOptionalText(value: string | null | undefined, field: string): string | null {
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value !== 'string') {
    throw new BadRequestError(`${field} must be a string or null`, { field });
  }
  return value;
}

/**
 * Build the document inserted for a new note. Both timestamps are `now`.
 */
export function toNewDocument(input: CreateNoteInput, now: Date): NewNoteDocument {
  const published = input.published ?? false;
  if (typeof published !== 'boolean') {
    throw new BadRequestError('published must be a boolean', { field: 'published' });
  }

  return {
    title: normalizeTitle(input.title),
    content: normalizeOptionalText(input.content, 'content'),
    category: normalizeOptionalText(input.category, 'category'),
    published,
    createdAt: now,
    updatedAt: now,
  };
}

/**
 * Build the `$set` payload for a partial update.
 * Only fields present in the input are written; `updatedAt` is always set.
 *
 * @throws BadRequestError when the input names no updatable field
 */
export function toUpdateSet(input: UpdateNoteInput, now: Date): NoteUpdateSet {
  const present = UPDATABLE_FIELDS.filter((field) => input[field] !== undefined);
  if (present.length === 0) {
    throw new BadRequestError('No updatable fields provided', {
      allowedFields: [...UPDATABLE_FIELDS],
    });
  }

  const set: NoteUpdateSet = { updatedAt: now };

  if (input.title !== undefined) {
    set.title = normalizeTitle(input.title);
  }
  if (input.content !== undefined) {
    set.content = normalizeOptionalText(input.content, 'content');
  }
  if (input.category !== undefined) {
    set.category = normalizeOptionalText(input.category, 'category');
  }
  if (input.published !== undefined) {
    if (typeof input.published !== 'boolean') {
      throw new BadRequestError('published must be a boolean', { field: 'published' });
    }
    set.published = input.published;
  }

  return set;
}

function decodeDate(document: StoredNoteDocument, field: 'createdAt' | 'updatedAt'): Date | DecodeError {
  const value = document[field];
  if (value === undefined || value === null) {
    return new DecodeError(field, 'missing');
  }
  const date = value instanceof Date ? value : typeof value === 'string' ? new Date(value) : null;
  if (!date || isNaN(date.getTime())) {
    return new DecodeError(field, 'expected a date');
  }
  return date;
}

function decodeNullableString(document: StoredNoteDocument, field: 'content' | 'category'): string | null | DecodeError {
  const value = document[field];
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value !== 'string') {
    return new DecodeError(field, 'expected a string or null');
  }
  return value;
}

/**
 * Decode a stored document into a note.
 * Missing or mistyped required fields fail, as does `updatedAt` before
 * `createdAt`. Absent optional fields become null (`published` becomes
 * false). Unknown fields are ignored.
 */
export function toRecord(document: StoredNoteDocument): DecodeResult<Note> {
  const rawId = document._id;
  if (rawId === undefined || rawId === null) {
    return { ok: false, error: new DecodeError('_id', 'missing') };
  }
  if (!(rawId instanceof ObjectId)) {
    return { ok: false, error: new DecodeError('_id', 'expected an ObjectId') };
  }

  const title = document.title;
  if (title === undefined || title === null) {
    return { ok: false, error: new DecodeError('title', 'missing') };
  }
  if (typeof title !== 'string' || title.length === 0) {
    return { ok: false, error: new DecodeError('title', 'expected a non-empty string') };
  }

  const content = decodeNullableString(document, 'content');
  if (content instanceof DecodeError) {
    return { ok: false, error: content };
  }

  const category = decodeNullableString(document, 'category');
  if (category instanceof DecodeError) {
    return { ok: false, error: category };
  }

  const published = document.published ?? false;
  if (typeof published !== 'boolean') {
    return { ok: false, error: new DecodeError('published', 'expected a boolean') };
  }

  const createdAt = decodeDate(document, 'createdAt');
  if (createdAt instanceof DecodeError) {
    return { ok: false, error: createdAt };
  }

  const updatedAt = decodeDate(document, 'updatedAt');
  if (updatedAt instanceof DecodeError) {
    return { ok: false, error: updatedAt };
  }
  if (updatedAt.getTime() < createdAt.getTime()) {
    return { ok: false, error: new DecodeError('updatedAt', 'earlier than createdAt') };
  }

  return {
    ok: true,
    value: {
      id: rawId.toHexString(),
      title,
      content,
      category,
      published,
      createdAt,
      updatedAt,
    },
  };
}

/**
 * Decode a stored document, throwing its DecodeError on failure
 */
export function decodeOrThrow(document: StoredNoteDocument): Note {
  const result = toRecord(document);
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

/**
 * Map a note to its API response shape
 */
export function toNoteResponse(note: Note): NoteResponse {
  return {
    id: note.id,
    title: note.title,
    content: note.content,
    category: note.category,
    published: note.published,
    createdAt: note.createdAt.toISOString(),
    updatedAt: note.updatedAt.toISOString(),
  };
}
