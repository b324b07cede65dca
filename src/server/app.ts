import express, { type Express } from 'express';
import { setupMiddleware, type MiddlewareEnv } from './config/middlewareConfig.js';
import { createNoteRouter } from './routes/noteRoutes.js';
import { createHealthRouter, type HealthCheck } from './routes/healthRoutes.js';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import type { NoteService } from './services/notes/NoteService.js';

export interface AppDependencies {
  noteService: NoteService;
  checkDatabase: HealthCheck;
  env: MiddlewareEnv;
}

/**
 * Build the Express application. Does not listen.
 */
export function createApp({ noteService, checkDatabase, env }: AppDependencies): Express {
  const app = express();
  app.disable('x-powered-by');

  setupMiddleware(app, env);

  app.use('/api', createHealthRouter(checkDatabase));
  app.use('/api/notes', createNoteRouter(noteService));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
