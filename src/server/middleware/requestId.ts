import type { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';
import { requestContext, logger, type RequestContext } from '../utils/logger.js';

export const REQUEST_ID_HEADER = 'X-Request-ID';

const REQUEST_ID_PATTERN = /^[\w.-]{1,128}$/;

/**
 * Tag each request with an id, echo it in the response header and run the
 * rest of the chain inside a logging context carrying it
 */
export function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const supplied = req.get(REQUEST_ID_HEADER);
  const requestId = supplied !== undefined && REQUEST_ID_PATTERN.test(supplied) ? supplied : randomUUID();
  res.setHeader(REQUEST_ID_HEADER, requestId);

  const context: RequestContext = { requestId, method: req.method, path: req.path };
  const startedAt = Date.now();

  res.on('finish', () => {
    logger.info(
      { ...context, statusCode: res.statusCode, duration: Date.now() - startedAt },
      'Request completed'
    );
  });

  requestContext.run(context, () => {
    logger.debug({ ...context, query: req.query }, 'Incoming request');
    next();
  });
}
