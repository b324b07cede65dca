/**
 * Notes API Routes
 *
 * Provides CRUD operations for notes.
 */
import { Router, Request, Response } from 'express';
import { validateBody, parseWithSchema } from '../middleware/validation.js';
import { asyncHandler } from '../utils/errorHandling.js';
import { toNoteResponse } from '../utils/noteMapper.js';
import { noteSchemas, type CreateNoteBody, type UpdateNoteBody } from '../validation/noteSchemas.js';
import type { NoteService } from '../services/notes/NoteService.js';
import type { NoteResponse } from '../models/Note.js';
import type { ResponseEnvelope } from '../types/errors.js';

export interface NoteListEnvelope extends ResponseEnvelope<NoteResponse[]> {
    results: number;
}

/**
 * Creates routes for managing notes, mounted at /api/notes
 */
export function createNoteRouter(noteService: NoteService): Router {
    const router = Router();

    /**
     * GET /api/notes
     * List notes ordered by creation time
     * Query params: limit, offset, page, category, published
     */
    router.get('/', asyncHandler(async (req: Request, res: Response) => {
        const query = parseWithSchema(noteSchemas.list.query, req.query, 'query');
        const { notes } = await noteService.list(query);

        const body: NoteListEnvelope = {
            status: 'success',
            results: notes.length,
            data: notes.map(toNoteResponse),
        };
        res.json(body);
    }));

    /**
     * POST /api/notes
     * Create a new note
     */
    router.post('/', validateBody(noteSchemas.create.body), asyncHandler(async (req: Request, res: Response) => {
        const input: CreateNoteBody = req.body;
        const note = await noteService.create(input);

        const body: ResponseEnvelope<NoteResponse> = { status: 'success', data: toNoteResponse(note) };
        res.status(201).json(body);
    }));

    /**
     * GET /api/notes/:id
     * Get a specific note by ID
     */
    router.get('/:id', asyncHandler(async (req: Request, res: Response) => {
        const note = await noteService.get(req.params.id);

        const body: ResponseEnvelope<NoteResponse> = { status: 'success', data: toNoteResponse(note) };
        res.json(body);
    }));

    /**
     * PATCH /api/notes/:id
     * Update the provided fields of a note
     */
    router.patch('/:id', validateBody(noteSchemas.update.body), asyncHandler(async (req: Request, res: Response) => {
        const input: UpdateNoteBody = req.body;
        const note = await noteService.update(req.params.id, input);

        const body: ResponseEnvelope<NoteResponse> = { status: 'success', data: toNoteResponse(note) };
        res.json(body);
    }));

    /**
     * DELETE /api/notes/:id
     * Delete a note
     */
    router.delete('/:id', asyncHandler(async (req: Request, res: Response) => {
        await noteService.delete(req.params.id);
        res.status(204).send();
    }));

    return router;
}
