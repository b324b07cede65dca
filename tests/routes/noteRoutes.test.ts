import { MongoNetworkError } from 'mongodb';
import { z } from 'zod';
import { createApp } from '../../src/server/app';
import { NoteService } from '../../src/server/services/notes/NoteService';
import type { DatabaseHealth } from '../../src/server/routes/healthRoutes';
import { InMemoryNoteStore, steppingClock } from '../helpers/InMemoryNoteStore';
import { startServer, type RunningServer } from '../helpers/http';
import { logger } from '../../src/server/utils/logger';

const noteSchema = z.object({
  id: z.string(),
  title: z.string(),
  content: z.string().nullable(),
  category: z.string().nullable(),
  published: z.boolean(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

const noteEnvelope = z.object({ status: z.literal('success'), data: noteSchema });
const listEnvelope = z.object({ status: z.literal('success'), results: z.number(), data: z.array(noteSchema) });

let store: InMemoryNoteStore;
let health: DatabaseHealth;
let server: RunningServer;

function url(path: string): string {
  return `${server.baseUrl}${path}`;
}

function sendJson(method: string, path: string, body: unknown): Promise<Response> {
  return fetch(url(path), {
    method,
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  });
}

async function createNote(title: string): Promise<z.infer<typeof noteSchema>> {
  const response = await sendJson('POST', '/api/notes', { title });
  return noteEnvelope.parse(await response.json()).data;
}

beforeEach(async () => {
  store = new InMemoryNoteStore();
  health = { healthy: true, latency: 1 };
  const noteService = new NoteService(store, {
    defaultLimit: 10,
    maxLimit: 100,
    sortOrder: 'asc',
    clock: steppingClock(),
  });
  const app = createApp({
    noteService,
    checkDatabase: async () => health,
    env: { NODE_ENV: 'test', ALLOWED_ORIGINS: undefined, JSON_BODY_LIMIT: '1kb' },
  });
  server = await startServer(app);
});

afterEach(async () => {
  await server.close();
});

describe('GET /api/healthchecker', () => {
  it('reports a healthy database', async () => {
    const response = await fetch(url('/api/healthchecker'));

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      status: 'success',
      message: 'Notes API with TypeScript and MongoDB',
      database: 'ok',
      latency: 1,
    });
  });

  it('returns 503 when the database is unreachable', async () => {
    health = { healthy: false, error: 'Database not initialized' };

    const response = await fetch(url('/api/healthchecker'));

    expect(response.status).toBe(503);
    expect(await response.json()).toEqual({ status: 'fail', message: 'Database unavailable', database: 'error' });
  });
});

describe('notes API', () => {
  it('creates a note', async () => {
    const response = await sendJson('POST', '/api/notes', { title: 'Buy milk' });

    expect(response.status).toBe(201);
    const { data } = noteEnvelope.parse(await response.json());
    expect(data).toEqual({
      id: expect.stringMatching(/^[0-9a-f]{24}$/),
      title: 'Buy milk',
      content: null,
      category: null,
      published: false,
      createdAt: '2024-01-01T00:00:01.000Z',
      updatedAt: '2024-01-01T00:00:01.000Z',
    });
  });

  it('fetches a note by id', async () => {
    const created = await createNote('Buy milk');

    const response = await fetch(url(`/api/notes/${created.id}`));

    expect(response.status).toBe(200);
    expect(noteEnvelope.parse(await response.json()).data).toEqual(created);
  });

  it('applies a partial update', async () => {
    const created = await createNote('Buy milk');

    const response = await sendJson('PATCH', `/api/notes/${created.id}`, { content: '2%' });

    expect(response.status).toBe(200);
    expect(noteEnvelope.parse(await response.json()).data).toEqual({
      ...created,
      content: '2%',
      updatedAt: '2024-01-01T00:00:02.000Z',
    });
  });

  it('deletes a note', async () => {
    const created = await createNote('Buy milk');

    const first = await fetch(url(`/api/notes/${created.id}`), { method: 'DELETE' });
    const second = await fetch(url(`/api/notes/${created.id}`), { method: 'DELETE' });

    expect(first.status).toBe(204);
    expect(await first.text()).toBe('');
    expect(second.status).toBe(404);
    expect(await second.json()).toEqual({ status: 'fail', message: `Note with ID: ${created.id} not found` });
  });

  it('lists notes with a limit', async () => {
    await createNote('Note 1');
    await createNote('Note 2');
    await createNote('Note 3');

    const response = await fetch(url('/api/notes?limit=2'));

    expect(response.status).toBe(200);
    const body = listEnvelope.parse(await response.json());
    expect(body.results).toBe(2);
    expect(body.data.map((note) => note.title)).toEqual(['Note 1', 'Note 2']);
  });

  it('filters the list by published flag', async () => {
    await sendJson('POST', '/api/notes', { title: 'Draft' });
    await sendJson('POST', '/api/notes', { title: 'Live', published: true });

    const response = await fetch(url('/api/notes?published=true'));

    expect(listEnvelope.parse(await response.json()).data.map((note) => note.title)).toEqual(['Live']);
  });

  it('echoes a supplied request id', async () => {
    const response = await fetch(url('/api/notes'), { headers: { 'X-Request-ID': 'req-123' } });

    expect(response.headers.get('x-request-id')).toBe('req-123');
  });
});

describe('error responses', () => {
  it('rejects a malformed id with 400', async () => {
    const response = await fetch(url('/api/notes/not-a-valid-id'));

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ status: 'fail', message: 'Invalid ID: not-a-valid-id' });
    expect(store.totalCalls()).toBe(0);
  });

  it('returns 404 for an unknown note', async () => {
    const response = await fetch(url('/api/notes/507f1f77bcf86cd799439011'));

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({
      status: 'fail',
      message: 'Note with ID: 507f1f77bcf86cd799439011 not found',
    });
  });

  it('rejects a create without a title', async () => {
    const response = await sendJson('POST', '/api/notes', {});

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      status: 'fail',
      message: 'Validation failed: title: Required',
      details: [{ path: 'title', message: 'Required' }],
    });
  });

  it('rejects unknown fields', async () => {
    const created = await createNote('Buy milk');

    const response = await sendJson('PATCH', `/api/notes/${created.id}`, { colour: 'red' });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      status: 'fail',
      message: "Validation failed: Unrecognized key(s) in object: 'colour'",
      details: [{ path: '', message: "Unrecognized key(s) in object: 'colour'" }],
    });
  });

  it('rejects an empty update', async () => {
    const created = await createNote('Buy milk');

    const response = await sendJson('PATCH', `/api/notes/${created.id}`, {});

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ status: 'fail', message: 'No updatable fields provided' });
  });

  it('rejects an invalid list limit', async () => {
    const response = await fetch(url('/api/notes?limit=0'));

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      status: 'fail',
      message: 'Validation failed: limit: Number must be greater than 0',
      details: [{ path: 'limit', message: 'Number must be greater than 0' }],
    });
  });

  it('rejects malformed JSON', async () => {
    const response = await fetch(url('/api/notes'), {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"title":',
    });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ status: 'fail', message: 'Invalid Body' });
  });

  it('rejects a body over the size limit', async () => {
    const response = await sendJson('POST', '/api/notes', { title: 'Big', content: 'x'.repeat(2048) });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ status: 'fail', message: 'Request body too large' });
  });

  it('returns 409 for a duplicate title', async () => {
    await createNote('Buy milk');

    const response = await sendJson('POST', '/api/notes', { title: 'Buy milk' });

    expect(response.status).toBe(409);
    expect(await response.json()).toEqual({ status: 'fail', message: 'A record with this title already exists' });
  });

  it('returns 503 when the database connection fails', async () => {
    store.failNextWith(new MongoNetworkError('connection reset'));

    const response = await fetch(url('/api/notes'));

    expect(response.status).toBe(503);
    expect(await response.json()).toEqual({ status: 'fail', message: 'Database connection error occurred' });
  });

  it('hides the details of internal failures', async () => {
    store.failNextWith(new Error('disk on fire'));

    const response = await fetch(url('/api/notes'));

    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({ status: 'fail', message: 'Internal Server Error' });
  });

  it('logs an internal failure once', async () => {
    const errorLog = jest.spyOn(logger, 'error');
    store.failNextWith(new Error('disk on fire'));

    await fetch(url('/api/notes'));

    expect(errorLog).toHaveBeenCalledTimes(1);
    errorLog.mockRestore();
  });

  it('returns 404 for unknown routes', async () => {
    const response = await fetch(url('/api/unknown'));

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ status: 'fail', message: 'Route does not exist on the server' });
  });
});
