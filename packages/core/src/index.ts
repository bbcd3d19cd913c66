export {
  CacheDirective,
  STANDARD_DIRECTIVE_KINDS,
  isDirectiveToken,
  isDurationDirectiveKind,
  toStandardDirectiveKind,
} from './cache/cache-directive.js';
export type {
  CacheDirectiveKind,
  DurationDirectiveKind,
  FlagDirectiveKind,
  StandardDirectiveKind,
} from './cache/cache-directive.js';
export { parseCacheControl, formatCacheControl } from './cache/cache-control-parser.js';

export {
  DEFAULT_CONFIG,
  HttpDefsConfigSchema,
  LOG_LEVELS,
  getRuntimeConfig,
  loadConfig,
  loadConfigFromEnv,
  resolveConfigFromEnv,
} from './config/http-defs-config.js';
export type {
  HttpDefsConfig,
  HttpDefsConfigInput,
} from './config/http-defs-config.js';

export { FixedClock, SystemClock, systemClock } from './date/clock.js';
export type { Clock } from './date/clock.js';
export { DateFormat } from './date/date-format.js';
export { FullDate } from './date/full-date.js';
export type { ParseDateOptions } from './date/full-date.js';
export {
  DATE_RECOGNIZERS,
  recognizeAscTime,
  recognizeDate,
  recognizeEpoch,
  recognizeRfc1123,
  recognizeRfc850,
} from './date/recognizers.js';
export type { DateRecognizer } from './date/recognizers.js';
export { TimePoint } from './date/time-point.js';

export { HttpError, InvalidDateFormatError, InvalidOperationError } from './errors/index.js';

export { createLogger, getDefaultLogger } from './logging/logger.js';
export type { CreateLoggerOptions, DiagnosticLogger } from './logging/logger.js';

export { Code, codeString, Method, methodString, Version, versionString } from './protocol/index.js';

export { fail, succeed } from './result.js';
export type { Failure, Result, Success } from './result.js';
