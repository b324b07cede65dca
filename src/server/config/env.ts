/**
 * Typed service configuration read from environment variables (and `.env`
 * through dotenv). Parsed once, validated, then cached.
 */

import * as dotenv from 'dotenv';
dotenv.config();

/** Integer value of `raw`, or `fallback` when unset or not numeric */
function parseNumericEnv(raw: string | undefined, fallback: number): number {
  if (!raw) return fallback;
  const parsed = parseInt(raw, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

export type SortOrder = 'asc' | 'desc';

export interface Env {
  // Server Configuration
  NODE_ENV: 'development' | 'production' | 'test';
  PORT: number;
  HOST: string;
  LOG_LEVEL?: string;
  JSON_BODY_LIMIT: string;
  ALLOWED_ORIGINS?: string;
  SHUTDOWN_TIMEOUT_MS: number;

  // Database Configuration
  MONGODB_URI: string;
  DB_NAME: string;
  MONGODB_NOTE_COLLECTION: string;
  DB_MAX_POOL_SIZE: number;
  DB_MIN_POOL_SIZE: number;
  DB_CONNECT_TIMEOUT_MS: number;
  DB_SERVER_SELECTION_TIMEOUT_MS: number;
  DB_SOCKET_TIMEOUT_MS: number;
  DB_MAX_RETRIES: number;
  DB_INITIAL_RETRY_DELAY: number;
  DB_OPERATION_MAX_RETRIES: number;
  DB_OPERATION_RETRY_DELAY_MS: number;
  SLOW_QUERY_THRESHOLD_MS: number;

  // Notes listing
  NOTES_DEFAULT_LIMIT: number;
  NOTES_MAX_LIMIT: number;
  NOTES_SORT_ORDER: SortOrder;
}

let validatedEnv: Env | null = null;

function isNodeEnv(value: string): value is Env['NODE_ENV'] {
  return value === 'development' || value === 'production' || value === 'test';
}

function isSortOrder(value: string): value is SortOrder {
  return value === 'asc' || value === 'desc';
}

/**
 * Validate and cache environment variables
 * Collects every problem and throws a single error listing all of them
 */
export function validateEnv(): Env {
  if (validatedEnv) {
    return validatedEnv;
  }

  const errors: string[] = [];

  const rawNodeEnv = process.env.NODE_ENV || 'development';
  let nodeEnv: Env['NODE_ENV'] = 'development';
  if (isNodeEnv(rawNodeEnv)) {
    nodeEnv = rawNodeEnv;
  } else {
    errors.push(`NODE_ENV: Invalid value "${rawNodeEnv}". Must be development, production, or test.`);
  }

  // Validate PORT
  const port = parseNumericEnv(process.env.PORT, 8000);
  if (port < 1 || port > 65535) {
    errors.push(`PORT: Invalid value "${process.env.PORT}". Must be between 1 and 65535.`);
  }

  const mongoUri = process.env.MONGODB_URI || 'mongodb://localhost:27017';
  if (!/^mongodb(\+srv)?:\/\//.test(mongoUri)) {
    errors.push('MONGODB_URI: Must start with mongodb:// or mongodb+srv://');
  }

  const minPoolSize = parseNumericEnv(process.env.DB_MIN_POOL_SIZE, 2);
  const maxPoolSize = parseNumericEnv(process.env.DB_MAX_POOL_SIZE, 20);
  if (minPoolSize < 0 || maxPoolSize < 1 || minPoolSize > maxPoolSize) {
    errors.push(`DB_MIN_POOL_SIZE/DB_MAX_POOL_SIZE: Invalid pool bounds (min ${minPoolSize}, max ${maxPoolSize}).`);
  }

  const defaultLimit = parseNumericEnv(process.env.NOTES_DEFAULT_LIMIT, 10);
  const maxLimit = parseNumericEnv(process.env.NOTES_MAX_LIMIT, 100);
  if (defaultLimit < 1) {
    errors.push(`NOTES_DEFAULT_LIMIT: Invalid value "${process.env.NOTES_DEFAULT_LIMIT}". Must be at least 1.`);
  }
  if (maxLimit < defaultLimit) {
    errors.push(`NOTES_MAX_LIMIT: Must be greater than or equal to NOTES_DEFAULT_LIMIT (${defaultLimit}).`);
  }

  const rawSortOrder = (process.env.NOTES_SORT_ORDER || 'asc').toLowerCase();
  let sortOrder: SortOrder = 'asc';
  if (isSortOrder(rawSortOrder)) {
    sortOrder = rawSortOrder;
  } else {
    errors.push(`NOTES_SORT_ORDER: Invalid value "${process.env.NOTES_SORT_ORDER}". Must be asc or desc.`);
  }

  if (errors.length > 0) {
    throw new Error(`Environment validation failed:\n${errors.map((e) => `  - ${e}`).join('\n')}`);
  }

  validatedEnv = {
    NODE_ENV: nodeEnv,
    PORT: port,
    HOST: process.env.HOST || '0.0.0.0',
    LOG_LEVEL: process.env.LOG_LEVEL,
    JSON_BODY_LIMIT: process.env.JSON_BODY_LIMIT || '1mb',
    ALLOWED_ORIGINS: process.env.ALLOWED_ORIGINS,
    SHUTDOWN_TIMEOUT_MS: parseNumericEnv(process.env.SHUTDOWN_TIMEOUT_MS, 30000),

    MONGODB_URI: mongoUri,
    DB_NAME: process.env.DB_NAME || process.env.MONGO_INITDB_DATABASE || 'notes',
    MONGODB_NOTE_COLLECTION: process.env.MONGODB_NOTE_COLLECTION || 'notes',
    DB_MAX_POOL_SIZE: maxPoolSize,
    DB_MIN_POOL_SIZE: minPoolSize,
    DB_CONNECT_TIMEOUT_MS: parseNumericEnv(process.env.DB_CONNECT_TIMEOUT_MS, 10000),
    DB_SERVER_SELECTION_TIMEOUT_MS: parseNumericEnv(process.env.DB_SERVER_SELECTION_TIMEOUT_MS, 5000),
    DB_SOCKET_TIMEOUT_MS: parseNumericEnv(process.env.DB_SOCKET_TIMEOUT_MS, 30000),
    DB_MAX_RETRIES: parseNumericEnv(process.env.DB_MAX_RETRIES, 5),
    DB_INITIAL_RETRY_DELAY: parseNumericEnv(process.env.DB_INITIAL_RETRY_DELAY, 1000),
    DB_OPERATION_MAX_RETRIES: parseNumericEnv(process.env.DB_OPERATION_MAX_RETRIES, 2),
    DB_OPERATION_RETRY_DELAY_MS: parseNumericEnv(process.env.DB_OPERATION_RETRY_DELAY_MS, 200),
    SLOW_QUERY_THRESHOLD_MS: parseNumericEnv(process.env.SLOW_QUERY_THRESHOLD_MS, 1000),

    NOTES_DEFAULT_LIMIT: defaultLimit,
    NOTES_MAX_LIMIT: maxLimit,
    NOTES_SORT_ORDER: sortOrder,
  };

  return validatedEnv;
}

/**
 * Validated configuration; parsed on the first call
 */
export function getEnv(): Env {
  return validateEnv();
}

/** Drop the cached configuration so the next getEnv() re-reads process.env */
export function resetEnv(): void {
  validatedEnv = null;
}

export function isDevelopment(env: Pick<Env, 'NODE_ENV'> = getEnv()): boolean {
  return env.NODE_ENV === 'development';
}
