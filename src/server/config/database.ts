import { MongoClient, ServerApiVersion, type Db, type MongoClientOptions } from 'mongodb';
import { logger } from '../utils/logger.js';
import { classifyDatabaseError, sanitizeErrorMessage } from '../utils/databaseErrorHandler.js';
import { getEnv, type Env } from './env.js';

let client: MongoClient | null = null;
let db: Db | null = null;
let isConnected = false;

/**
 * Build driver options from the validated environment.
 * The timeouts bound every backend call made through the shared client.
 */
export function buildClientOptions(env: Env): MongoClientOptions {
  const options: MongoClientOptions = {
    // Connection pool settings
    maxPoolSize: env.DB_MAX_POOL_SIZE,
    minPoolSize: env.DB_MIN_POOL_SIZE,
    // Connection timeouts
    connectTimeoutMS: env.DB_CONNECT_TIMEOUT_MS,
    serverSelectionTimeoutMS: env.DB_SERVER_SELECTION_TIMEOUT_MS,
    socketTimeoutMS: env.DB_SOCKET_TIMEOUT_MS,
    appName: env.DB_NAME,
    retryWrites: true,
    retryReads: true,
  };

  // ServerApiVersion is only for MongoDB Atlas, not local MongoDB
  if (env.MONGODB_URI.includes('mongodb.net') || env.MONGODB_URI.startsWith('mongodb+srv://')) {
    options.serverApi = {
      version: ServerApiVersion.v1,
      strict: true,
      deprecationErrors: true,
    };
  }

  return options;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Connect to database with retry logic
 * Transient failures are retried with exponential backoff; permanent ones fail immediately
 */
export async function connectDB(): Promise<Db> {
  if (db && isConnected) {
    return db;
  }

  const env = getEnv();
  const maxRetries = env.DB_MAX_RETRIES;
  let lastError: unknown = null;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    if (attempt > 0) {
      const delay = Math.min(env.DB_INITIAL_RETRY_DELAY * Math.pow(2, attempt - 1), 30000);
      logger.warn({ attempt, maxRetries, delay }, 'Retrying database connection...');
      await sleep(delay);
    }

    const candidate = new MongoClient(env.MONGODB_URI, buildClientOptions(env));
    try {
      await candidate.connect();
      const database = candidate.db(env.DB_NAME);

      // Test the connection
      await database.command({ ping: 1 });

      client = candidate;
      db = database;
      isConnected = true;

      client.on('topologyClosed', () => {
        isConnected = false;
      });

      logger.info(
        { attempt: attempt + 1, database: env.DB_NAME, poolSize: env.DB_MAX_POOL_SIZE },
        'Successfully connected to MongoDB'
      );
      return db;
    } catch (error) {
      lastError = error;
      await candidate.close().catch((closeError: unknown) => {
        logger.debug({ error: sanitizeErrorMessage(closeError) }, 'Failed to close client after connection failure');
      });

      const classification = classifyDatabaseError(error);
      if (!classification.isTransient) {
        logger.error({ error: sanitizeErrorMessage(error) }, 'MongoDB connection failed with permanent error');
        throw error;
      }

      logger.warn(
        { attempt: attempt + 1, maxRetries, error: sanitizeErrorMessage(error) },
        'Database connection attempt failed'
      );
    }
  }

  logger.error({ attempts: maxRetries + 1, error: sanitizeErrorMessage(lastError) }, 'MongoDB connection failed after all retry attempts');
  throw lastError instanceof Error ? lastError : new Error('Database connection failed after all retry attempts');
}

export async function closeDB(): Promise<void> {
  const current = client;
  client = null;
  db = null;
  isConnected = false;

  if (!current) {
    return;
  }

  try {
    await current.close();
    logger.info('MongoDB connection closed');
  } catch (error) {
    logger.error({ error: sanitizeErrorMessage(error) }, 'Error closing MongoDB connection');
    throw error;
  }
}

/**
 * Check database health by performing a ping
 * Uses a timeout so a stalled pool cannot hang the health endpoint
 */
export async function checkDatabaseHealth(timeoutMs: number = 5000): Promise<{ healthy: boolean; latency?: number; error?: string }> {
  if (!db) {
    return { healthy: false, error: 'Database not initialized' };
  }

  const startTime = Date.now();
  let timer: NodeJS.Timeout | undefined;

  try {
    const timeoutPromise = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new Error(`Health check timeout after ${timeoutMs}ms`)), timeoutMs);
    });

    await Promise.race([db.command({ ping: 1 }), timeoutPromise]);
    return { healthy: true, latency: Date.now() - startTime };
  } catch (error) {
    const errorMessage = sanitizeErrorMessage(error);
    logger.warn({ error: errorMessage }, 'Database health check failed');
    return { healthy: false, error: errorMessage };
  } finally {
    if (timer) {
      clearTimeout(timer);
    }
  }
}
