import type { Request, Response, NextFunction, RequestHandler } from 'express';

type AsyncRoute = (req: Request, res: Response, next: NextFunction) => Promise<unknown>;

/**
 * Forward rejections of an async route to the Express error middleware.
 *
 * ```typescript
 * router.get('/:id', asyncHandler(async (req, res) => {
 *   const note = await noteService.get(req.params.id);
 *   res.json({ status: 'success', data: toNoteResponse(note) });
 * }));
 * ```
 */
export function asyncHandler(route: AsyncRoute): RequestHandler {
  return (req, res, next) => {
    route(req, res, next).catch(next);
  };
}
