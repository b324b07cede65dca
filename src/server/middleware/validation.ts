import { Request, Response, NextFunction } from 'express';
import { ZodError, type ZodType, type ZodTypeDef } from 'zod';
import { BadRequestError } from '../types/errors.js';
import { logger } from '../utils/logger.js';

function toBadRequest(error: ZodError, target: string): BadRequestError {
    const details = error.issues.map((e) => ({
        path: e.path.join('.'),
        message: e.message,
    }));
    const first = details[0];
    const message = first
        ? `Validation failed: ${first.path ? `${first.path}: ` : ''}${first.message}`
        : 'Validation failed';
    return new BadRequestError(message, { target, details });
}

/**
 * Parse a value with a Zod schema, throwing BadRequestError on failure
 */
export function parseWithSchema<Output, Input = Output>(
    schema: ZodType<Output, ZodTypeDef, Input>,
    value: unknown,
    target: string = 'request'
): Output {
    const result = schema.safeParse(value);
    if (!result.success) {
        throw toBadRequest(result.error, target);
    }
    return result.data;
}

/**
 * Validation middleware factory
 * Validates and replaces the request body.
 * Failures are passed to the error handler as BadRequestError.
 */
export function validateBody<Output, Input = Output>(schema: ZodType<Output, ZodTypeDef, Input>) {
    return (req: Request, _res: Response, next: NextFunction): void => {
        const result = schema.safeParse(req.body);
        if (result.success) {
            req.body = result.data;
            next();
            return;
        }

        logger.warn(
            {
                path: req.path,
                method: req.method,
                issues: result.error.issues.map((e) => ({
                    path: e.path.join('.'),
                    message: e.message,
                })),
            },
            'Request validation failed'
        );
        next(toBadRequest(result.error, 'body'));
    };
}
