import { pino, stdSerializers, type DestinationStream, type Logger, type LoggerOptions } from 'pino';

import { createCensor, REDACTION_PATHS, redactRecord } from './logger/redaction.js';

export {
  REDACTION_PATHS,
  REDACTED_FIELDS,
  redactObject,
  redactRecord,
  redactString,
  shouldRedactField,
} from './logger/redaction.js';

/**
 * Structured logger for the control-plane client
 *
 * API keys, passwords and session cookies never reach log output: pino redacts
 * the known paths, and the log formatter scrubs whatever else is nested.
 */

export interface CreateLoggerOptions {
  name: string;
  level?: string;
  correlationId?: string;
  /** Where log lines are written; stdout when omitted */
  destination?: DestinationStream;
}

/**
 * Default level: LOG_LEVEL, else silent under test, else info
 */
function getDefaultLevel(): string {
  const envLevel = process.env.LOG_LEVEL;
  if (envLevel) {
    return envLevel;
  }
  return process.env.NODE_ENV === 'test' ? 'silent' : 'info';
}

/**
 * Create a logger instance with credential redaction
 */
export function createLogger(options: CreateLoggerOptions): Logger {
  const { name, level = getDefaultLevel(), correlationId, destination } = options;

  const loggerOptions: LoggerOptions = {
    name,
    level,
    redact: {
      paths: REDACTION_PATHS,
      censor: createCensor,
    },
    formatters: {
      level: (label) => ({ level: label }),
      log: (object) => redactRecord(object),
    },
    base: correlationId ? { correlationId } : null,
    serializers: {
      err: stdSerializers.err,
    },
  };

  return destination ? pino(loggerOptions, destination) : pino(loggerOptions);
}

/**
 * Create a child logger with correlation ID
 */
export function withCorrelationId(logger: Logger, correlationId: string): Logger {
  return logger.child({ correlationId });
}

/**
 * Generate a correlation ID
 */
export function generateCorrelationId(): string {
  return `${Date.now()}-${Math.random().toString(36).substring(2, 11)}`;
}

export type { Logger };
