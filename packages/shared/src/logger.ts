/**
 * Structured Logging with Correlation IDs
 *
 * All logs automatically include correlation IDs from AsyncLocalStorage context.
 * The CLI sends every line to stderr so stdout carries only its result.
 */

import { getCorrelationId, getContext } from './context';

export interface LogContext {
  [key: string]: unknown;
}

export interface LoggerOptions {
  stream?: 'stdout' | 'stderr';
}

let routeAllToStderr = false;

export function configureLogger(options: LoggerOptions): void {
  routeAllToStderr = options.stream === 'stderr';
}

function formatLog(level: string, message: string, context?: LogContext): string {
  const correlationId = getCorrelationId();
  const timestamp = new Date().toISOString();
  const reqContext = getContext();

  const logEntry = {
    timestamp,
    level,
    correlationId,
    documentRef: reqContext?.documentRef,
    source: reqContext?.source,
    message,
    ...context,
  };

  return JSON.stringify(logEntry);
}

export const logger = {
  info: (message: string, context?: LogContext) => {
    const line = formatLog('INFO', message, context);
    if (routeAllToStderr) console.error(line);
    else console.log(line);
  },

  warn: (message: string, context?: LogContext) => {
    console.warn(formatLog('WARN', message, context));
  },

  error: (message: string, error?: Error | unknown, context?: LogContext) => {
    const errorContext = {
      ...context,
      error:
        error instanceof Error
          ? {
              message: error.message,
              stack: error.stack,
              name: error.name,
            }
          : String(error),
    };
    console.error(formatLog('ERROR', message, errorContext));
  },

  debug: (message: string, context?: LogContext) => {
    if (process.env.LOG_LEVEL === 'debug' || process.env.NODE_ENV !== 'production') {
      const line = formatLog('DEBUG', message, context);
      if (routeAllToStderr) console.error(line);
      else console.debug(line);
    }
  },
};
