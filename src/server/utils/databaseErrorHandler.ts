import {
  BSON,
  MongoError,
  MongoServerError,
  MongoNetworkError,
  MongoServerSelectionError,
  MongoTopologyClosedError,
  MongoNotConnectedError,
} from 'mongodb';
import { logger } from './logger.js';
import { getEnv } from '../config/env.js';
import {
  AppError,
  BadRequestError,
  ConflictError,
  InternalError,
  ServiceUnavailableError,
  isAppError,
  type ErrorKind,
} from '../types/errors.js';

/**
 * Result of classifying a failure raised by the persistence backend
 */
export interface DatabaseErrorClassification {
  kind: ErrorKind;
  message: string;
  code?: number;
  isTransient: boolean;
}

// Duplicate key
const DUPLICATE_KEY_CODES = new Set([11000, 11001]);

// HostUnreachable, HostNotFound, NetworkTimeout, ShutdownInProgress, NotWritablePrimary,
// ExceededTimeLimit, SocketException, InterruptedAtShutdown, InterruptedDueToReplStateChange,
// NotPrimaryNoSecondaryOk, NotPrimaryOrSecondary
const TRANSIENT_SERVER_CODES = new Set([6, 7, 89, 91, 189, 262, 9001, 11600, 11602, 13435, 13436]);

// BadValue, DocumentValidationFailure
const VALIDATION_SERVER_CODES = new Set([2, 121]);

const CONNECTION_MESSAGE_PATTERNS = ['timeout', 'timed out', 'econnrefused', 'econnreset', 'enotfound', 'socket hang up'];

function numericCode(error: MongoError): number | undefined {
  return typeof error.code === 'number' ? error.code : undefined;
}

/**
 * Classify a failure into the closed error taxonomy.
 * Total: every input maps to exactly one kind, defaulting to Internal.
 */
export function classifyDatabaseError(error: unknown): DatabaseErrorClassification {
  if (isAppError(error)) {
    return {
      kind: error.kind,
      message: error.message,
      isTransient: error.kind === 'Unavailable',
    };
  }

  if (!(error instanceof Error)) {
    return {
      kind: 'Internal',
      message: 'An unknown error occurred',
      isTransient: false,
    };
  }

  // MongoDB duplicate key error (E11000)
  if (error instanceof MongoServerError && typeof error.code === 'number' && DUPLICATE_KEY_CODES.has(error.code)) {
    const fields = error.keyValue ? Object.keys(error.keyValue) : [];
    return {
      kind: 'Conflict',
      message: fields.length > 0
        ? `A record with this ${fields.join(', ')} already exists`
        : 'A record with this value already exists',
      code: error.code,
      isTransient: false,
    };
  }

  if (
    error instanceof MongoNetworkError ||
    error instanceof MongoServerSelectionError ||
    error instanceof MongoTopologyClosedError ||
    error instanceof MongoNotConnectedError
  ) {
    return {
      kind: 'Unavailable',
      message: 'Database connection error occurred',
      code: numericCode(error),
      isTransient: true,
    };
  }

  if (error instanceof MongoServerError) {
    const code = numericCode(error);
    if (code !== undefined && TRANSIENT_SERVER_CODES.has(code)) {
      return {
        kind: 'Unavailable',
        message: 'Database temporarily unavailable',
        code,
        isTransient: true,
      };
    }
    if (code !== undefined && VALIDATION_SERVER_CODES.has(code)) {
      return {
        kind: 'InvalidInput',
        message: 'Invalid data provided',
        code,
        isTransient: false,
      };
    }
    return {
      kind: 'Internal',
      message: 'Database query error occurred',
      code,
      isTransient: false,
    };
  }

  // Serialization failures raised by the bson library before a command is sent
  if (BSON.BSONError.isBSONError(error)) {
    return {
      kind: 'InvalidInput',
      message: 'Invalid data provided',
      isTransient: false,
    };
  }

  const errorMessage = error.message.toLowerCase();
  if (CONNECTION_MESSAGE_PATTERNS.some((pattern) => errorMessage.includes(pattern))) {
    return {
      kind: 'Unavailable',
      message: 'Database connection error occurred',
      isTransient: true,
    };
  }

  if (error instanceof MongoError) {
    return {
      kind: 'Internal',
      message: 'Database operation failed',
      code: numericCode(error),
      isTransient: false,
    };
  }

  return {
    kind: 'Internal',
    message: 'An unexpected error occurred',
    isTransient: false,
  };
}

/**
 * Sanitize error message for logging
 * Removes connection strings and credentials
 */
export function sanitizeErrorMessage(error: unknown, context?: string): string {
  if (!(error instanceof Error)) {
    return 'An unknown error occurred';
  }

  let message = error.message;

  // Remove connection strings
  message = message.replace(/mongodb(\+srv)?:\/\/[^\s]+/gi, 'mongodb://***');

  // Remove credentials
  message = message.replace(/:\/\/[^:\s]+:[^@\s]+@/g, '://***:***@');

  if (context) {
    return `${context}: ${message}`;
  }

  return message;
}

/**
 * Convert any failure into the matching AppError. Does not log; Internal
 * failures keep the original error as `cause` for whoever reports them.
 */
export function toAppError(error: unknown, context?: string): AppError {
  if (isAppError(error)) {
    return error;
  }

  const classification = classifyDatabaseError(error);
  const errorContext = { operation: context, code: classification.code };

  switch (classification.kind) {
    case 'Conflict':
      return new ConflictError(classification.message, errorContext);

    case 'InvalidInput':
      return new BadRequestError(classification.message, errorContext);

    case 'Unavailable':
      return new ServiceUnavailableError(classification.message, errorContext, error);

    case 'NotFound':
    case 'Internal':
    default:
      return new InternalError(classification.message, errorContext, error);
  }
}

export interface DatabaseOperationOptions {
  /** Retries for transient failures; writes pass 0 and rely on the driver's retryable writes */
  maxRetries?: number;
  retryDelay?: number;
  slowQueryThresholdMs?: number;
}

/**
 * Wrap a database operation with classification, slow query logging and
 * retries for transient failures
 *
 * @param context - operation name used in logs, e.g. 'Note.findOne'
 * @throws AppError for every failure
 */
export async function handleDatabaseOperation<T>(
  operation: () => Promise<T>,
  context?: string,
  options: DatabaseOperationOptions = {}
): Promise<T> {
  const env = getEnv();
  const maxRetries = options.maxRetries ?? env.DB_OPERATION_MAX_RETRIES;
  const retryDelay = options.retryDelay ?? env.DB_OPERATION_RETRY_DELAY_MS;
  const slowQueryThreshold = options.slowQueryThresholdMs ?? env.SLOW_QUERY_THRESHOLD_MS;

  for (let attempt = 0; ; attempt++) {
    try {
      const startTime = Date.now();
      const result = await operation();
      const duration = Date.now() - startTime;

      if (duration > slowQueryThreshold) {
        logger.warn(
          { duration, threshold: slowQueryThreshold, context, attempt: attempt + 1 },
          `Slow database query detected: ${duration}ms - ${context || 'operation'}`
        );
      }

      return result;
    } catch (error) {
      const classification = classifyDatabaseError(error);

      if (classification.isTransient && attempt < maxRetries) {
        logger.warn(
          {
            error: sanitizeErrorMessage(error),
            classification,
            context,
            attempt: attempt + 1,
            maxAttempts: maxRetries + 1,
          },
          `Database operation failed with retryable error, retrying... (${context || 'operation'})`
        );

        const delay = retryDelay * Math.pow(2, attempt);
        await new Promise((resolve) => setTimeout(resolve, delay));
        continue;
      }

      if (classification.kind === 'Unavailable') {
        logger.error(
          { error: sanitizeErrorMessage(error), classification, context, attempts: attempt + 1 },
          `Database unavailable after ${attempt + 1} attempt(s)`
        );
      }

      throw toAppError(error, context);
    }
  }
}
