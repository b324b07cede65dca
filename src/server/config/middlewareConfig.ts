import express, { type Express } from 'express';
import cors from 'cors';
import compression from 'compression';
import helmet from 'helmet';
import { requestIdMiddleware } from '../middleware/requestId.js';
import { getCorsOptions } from './corsConfig.js';
import type { Env } from './env.js';

export type MiddlewareEnv = Pick<Env, 'ALLOWED_ORIGINS' | 'NODE_ENV' | 'JSON_BODY_LIMIT'>;

/**
 * Install the shared middleware stack, ahead of any route
 */
export function setupMiddleware(app: Express, env: MiddlewareEnv): void {
  // Request id first so every later log line carries it
  app.use(requestIdMiddleware);
  app.use(helmet());
  app.use(cors(getCorsOptions(env)));
  // Skip compressing small JSON payloads
  app.use(compression({ threshold: 1024 }));
  app.use(express.json({ limit: env.JSON_BODY_LIMIT }));
}
