import pino, { type Logger, type LoggerOptions } from 'pino';
import { AsyncLocalStorage } from 'async_hooks';

export type RequestContext = Record<string, unknown>;

/**
 * Per-request fields (request id, method, path) for log lines emitted
 * while a request is being handled
 */
export const requestContext = new AsyncLocalStorage<RequestContext>();

export function getRequestContext(): RequestContext {
  return requestContext.getStore() ?? {};
}

function resolveLogLevel(nodeEnv: string): string {
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }
  if (nodeEnv === 'test') {
    return 'silent';
  }
  return nodeEnv === 'production' ? 'info' : 'debug';
}

// Built from process.env at import time, before the validated config exists
function buildLoggerOptions(): LoggerOptions {
  const nodeEnv = process.env.NODE_ENV || 'development';
  const options: LoggerOptions = {
    level: resolveLogLevel(nodeEnv),
    base: { env: nodeEnv, service: 'notes-api' },
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (nodeEnv === 'development') {
    options.transport = {
      target: 'pino-pretty',
      options: { colorize: true, translateTime: 'SYS:standard', ignore: 'pid,hostname' },
    };
  }

  return options;
}

export const logger: Logger = pino(buildLoggerOptions());

/**
 * Child logger carrying the active request context plus `fields`
 */
export function createChildLogger(fields: Record<string, unknown> = {}): Logger {
  return logger.child({ ...getRequestContext(), ...fields });
}
