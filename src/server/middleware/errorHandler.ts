import { Request, Response, NextFunction } from 'express';
import { logger } from '../utils/logger.js';
import { toAppError } from '../utils/databaseErrorHandler.js';
import { BadRequestError, NotFoundError, type AppError, type ResponseEnvelope } from '../types/errors.js';

export interface ErrorEnvelope extends ResponseEnvelope<never> {
    status: 'fail';
    message: string;
    details?: unknown;
}

/**
 * Body parser failures carry a `type` such as 'entity.parse.failed'
 */
function bodyParserErrorType(err: unknown): string | undefined {
    if (err instanceof Error && 'type' in err && typeof err.type === 'string' && err.type.startsWith('entity.')) {
        return err.type;
    }
    return undefined;
}

function toEnvelope(error: AppError): ErrorEnvelope {
    // Internal failures never expose their message or cause
    if (error.kind === 'Internal') {
        return { status: 'fail', message: 'Internal Server Error' };
    }
    const envelope: ErrorEnvelope = { status: 'fail', message: error.message };
    if (error.context && error.context.details !== undefined) {
        envelope.details = error.context.details;
    }
    return envelope;
}

/**
 * Handler for requests that matched no route
 */
export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
    next(new NotFoundError('Route', req.originalUrl.split('?')[0]));
}

/**
 * Centralized error handling middleware
 * Must be registered LAST in Express app
 *
 * Renders every error as `{ status: 'fail', message }` with the status code
 * of its error kind.
 */
export function errorHandler(
    err: unknown,
    req: Request,
    res: Response,
    _next: NextFunction
): void {
    const parserErrorType = bodyParserErrorType(err);
    const appError = parserErrorType
        ? new BadRequestError(parserErrorType === 'entity.too.large' ? 'Request body too large' : 'Invalid Body', {
            type: parserErrorType,
        })
        : toAppError(err, `${req.method} ${req.path}`);

    const logContext = {
        kind: appError.kind,
        code: appError.code,
        message: appError.message,
        path: req.path,
        method: req.method,
    };

    if (appError.kind === 'Internal') {
        logger.error({ ...logContext, err: appError.cause ?? appError }, 'Request failed');
    } else if (appError.kind === 'Unavailable') {
        // The database layer already logged the outage at error level
        logger.warn(logContext, 'Request failed, backend unavailable');
    } else {
        logger.info(logContext, 'Request rejected');
    }

    if (res.headersSent) {
        logger.warn({ path: req.path }, 'Error after response headers were sent');
        res.end();
        return;
    }

    const envelope = appError instanceof NotFoundError && appError.context?.resource === 'Route'
        ? { status: 'fail' as const, message: 'Route does not exist on the server' }
        : toEnvelope(appError);

    res.status(appError.statusCode).json(envelope);
}
