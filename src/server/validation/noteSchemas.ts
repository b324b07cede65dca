import { z } from 'zod';
import { TITLE_MAX_LENGTH } from '../utils/noteMapper.js';

const title = z.string().trim().min(1, 'title is required').max(TITLE_MAX_LENGTH);
const nullableText = z.string().nullable().optional();

const queryInteger = z.coerce.number().int();

export const noteSchemas = {
    create: {
        body: z.object({
            title,
            content: nullableText,
            category: nullableText,
            published: z.boolean().optional(),
        }).strict(),
    },

    // Every field optional; an empty body is rejected by the service
    update: {
        body: z.object({
            title: title.optional(),
            content: nullableText,
            category: nullableText,
            published: z.boolean().optional(),
        }).strict(),
    },

    list: {
        query: z.object({
            limit: queryInteger.positive().optional(),
            offset: queryInteger.min(0).optional(),
            page: queryInteger.positive().optional(),
            category: z.string().min(1).optional(),
            published: z.enum(['true', 'false']).transform((v) => v === 'true').optional(),
        }),
    },
};

export type CreateNoteBody = z.infer<typeof noteSchemas.create.body>;
export type UpdateNoteBody = z.infer<typeof noteSchemas.update.body>;
