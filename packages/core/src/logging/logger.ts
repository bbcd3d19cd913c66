import { pino, type Logger } from 'pino';
import {
  getRuntimeConfig,
  type HttpDefsConfig,
} from '../config/http-defs-config.js';

/**
 * The slice of a logger the parsers write diagnostics to. Any pino logger
 * (or child logger) satisfies it.
 */
export interface DiagnosticLogger {
  debug(obj: object, msg: string): void;
}

export interface CreateLoggerOptions {
  level?: HttpDefsConfig['logLevel'];
}

export function createLogger({ level = 'info' }: CreateLoggerOptions = {}): Logger {
  return pino({ name: 'http-defs', level });
}

let defaultLogger: Logger | undefined;

/**
 * Process-wide logger, created on first use with the level from
 * `HTTP_DEFS_LOG_LEVEL`.
 */
export function getDefaultLogger(): Logger {
  if (!defaultLogger) {
    defaultLogger = createLogger({ level: getRuntimeConfig().logLevel });
  }
  return defaultLogger;
}
