/**
 * Centralized error type definitions for the notes API
 * Every failure that leaves the service layer is one of these
 */

/**
 * Closed set of application error kinds
 */
export type ErrorKind = 'InvalidInput' | 'NotFound' | 'Conflict' | 'Unavailable' | 'Internal';

export const ERROR_KIND_STATUS: Readonly<Record<ErrorKind, number>> = {
  InvalidInput: 400,
  NotFound: 404,
  Conflict: 409,
  Unavailable: 503,
  Internal: 500,
};

/**
 * Machine-readable codes; several codes can share one kind
 */
export enum ErrorCode {
  BAD_REQUEST = 'BAD_REQUEST',
  INVALID_IDENTIFIER = 'INVALID_IDENTIFIER',
  DECODE_ERROR = 'DECODE_ERROR',
  NOT_FOUND = 'NOT_FOUND',
  CONFLICT = 'CONFLICT',
  SERVICE_UNAVAILABLE = 'SERVICE_UNAVAILABLE',
  INTERNAL_SERVER_ERROR = 'INTERNAL_SERVER_ERROR',
}

/**
 * Every failure leaving the service layer. `statusCode` follows from `kind`.
 */
export class AppError extends Error {
  public readonly kind: ErrorKind;
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    kind: ErrorKind,
    code: string,
    isOperational: boolean = true,
    context?: Record<string, unknown>,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = this.constructor.name;
    this.kind = kind;
    this.code = code;
    this.statusCode = ERROR_KIND_STATUS[kind];
    this.isOperational = isOperational;
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }
}

export class BadRequestError extends AppError {
  constructor(message: string, context?: Record<string, unknown>, code: string = ErrorCode.BAD_REQUEST) {
    super(message, 'InvalidInput', code, true, context);
  }
}

/**
 * Identifier that is not a well-formed MongoDB ObjectId
 */
export class InvalidIdentifierError extends BadRequestError {
  constructor(public readonly identifier: string) {
    super(`Invalid ID: ${identifier}`, { identifier }, ErrorCode.INVALID_IDENTIFIER);
  }
}

/**
 * Stored document that does not decode into a record
 */
export class DecodeError extends BadRequestError {
  constructor(public readonly field: string, public readonly reason: string) {
    super(`Invalid document field '${field}': ${reason}`, { field, reason }, ErrorCode.DECODE_ERROR);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, identifier?: string) {
    const message = identifier
      ? `${resource} with ID: ${identifier} not found`
      : `${resource} not found`;
    super(message, 'NotFound', ErrorCode.NOT_FOUND, true, { resource, identifier });
  }
}

export class ConflictError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'Conflict', ErrorCode.CONFLICT, true, context);
  }
}

export class ServiceUnavailableError extends AppError {
  constructor(message: string = 'Service temporarily unavailable', context?: Record<string, unknown>, cause?: unknown) {
    super(message, 'Unavailable', ErrorCode.SERVICE_UNAVAILABLE, true, context, cause);
  }
}

/**
 * Unexpected failure. The message is never shown to clients
 */
export class InternalError extends AppError {
  constructor(message: string = 'An unexpected error occurred', context?: Record<string, unknown>, cause?: unknown) {
    super(message, 'Internal', ErrorCode.INTERNAL_SERVER_ERROR, false, context, cause);
  }
}

/**
 * Uniform response envelope returned by every route
 */
export interface ResponseEnvelope<T> {
  status: 'success' | 'fail';
  data?: T;
  message?: string;
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}
