/**
 * Centralized logging utilities with structured logging support
 *
 * Uses pino for structured JSON logging; pretty output in development.
 * Components log through child loggers so every line carries its origin.
 */

import pino from 'pino';
import type { Logger as PinoLogger } from 'pino';
import { logLevel, isDevelopment } from './config.js';

/**
 * Log levels supported by the logger
 */
export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

interface LoggerConfig {
  level: LogLevel;
  pretty: boolean;
  name: string;
}

function getConfig(): LoggerConfig {
  return {
    level: logLevel,
    pretty: isDevelopment,
    name: 'nuclos-rest-client',
  };
}

function createLogger(): PinoLogger {
  const config = getConfig();

  const pinoConfig: pino.LoggerOptions = {
    name: config.name,
    level: config.level,
    timestamp: pino.stdTimeFunctions.isoTime,
    messageKey: 'msg',
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
    // Never let credentials reach a log sink
    redact: {
      paths: ['password', '*.password', 'data.password', 'headers.sessionid'],
      censor: '[redacted]',
    },
  };

  if (config.pretty) {
    return pino({
      ...pinoConfig,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname',
          singleLine: false,
        },
      },
    });
  }

  return pino(pinoConfig);
}

/**
 * Global logger instance
 */
export const logger = createLogger();

/**
 * Create a child logger with additional context
 *
 * @param context - Additional fields to include in all log messages
 *
 * @example
 * ```typescript
 * const log = createChildLogger({ component: 'MetadataCache' });
 * log.info({ boMetaId: 'example_Customer' }, 'Fetching metadata');
 * ```
 */
export function createChildLogger(context: Record<string, unknown>): PinoLogger {
  return logger.child(context);
}

/**
 * Create a logger for record operations
 *
 * @param boMetaId - Business object type of the record
 * @param boId - Record id, absent for records that were never saved
 */
export function createRecordLogger(boMetaId: string, boId?: string): PinoLogger {
  const context: Record<string, unknown> = { component: 'BusinessObjectRecord', boMetaId };
  if (boId) {
    context.boId = boId;
  }
  return createChildLogger(context);
}

/**
 * Log level utilities
 */
export const LogLevels = {
  isDebugEnabled(): boolean {
    return logger.level === 'debug' || logger.level === 'trace';
  },

  setLevel(level: LogLevel): void {
    logger.level = level;
  },

  getLevel(): string {
    return logger.level;
  },
};

export type { Logger } from 'pino';

export default logger;
