import type { CorsOptions } from 'cors';
import { logger } from '../utils/logger.js';
import { isDevelopment, type Env } from './env.js';

const DEFAULT_ORIGINS = ['http://localhost:3000'];

type OriginCallback = (err: Error | null, allow?: boolean) => void;

/**
 * Requests without an Origin header (curl, server-to-server) are always allowed
 */
export function isOriginAllowed(origin: string | undefined, allowedOrigins: readonly string[]): boolean {
  return origin === undefined || allowedOrigins.includes(origin);
}

/**
 * Parse the comma separated ALLOWED_ORIGINS value
 */
export function parseAllowedOrigins(value: string | undefined): string[] {
  const origins = (value ?? '')
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
  return origins.length > 0 ? origins : DEFAULT_ORIGINS;
}

export function getCorsOptions(env: Pick<Env, 'ALLOWED_ORIGINS' | 'NODE_ENV'>): CorsOptions {
  const allowedOrigins = parseAllowedOrigins(env.ALLOWED_ORIGINS);
  logger.debug({ allowedOrigins }, 'CORS origins configured');

  return {
    origin: (origin: string | undefined, callback: OriginCallback) => {
      if (isOriginAllowed(origin, allowedOrigins)) {
        callback(null, true);
        return;
      }
      if (isDevelopment(env)) {
        logger.warn({ origin }, 'CORS request from unlisted origin');
      }
      // Unlisted origins get no CORS headers; the browser blocks the response
      callback(null, false);
    },
    credentials: true,
    methods: ['GET', 'POST', 'PATCH', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'X-Request-ID'],
    exposedHeaders: ['X-Request-ID'],
  };
}
