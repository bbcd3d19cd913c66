import { InvalidDateFormatError } from '../errors/invalid-date-format-error.js';
import { getDefaultLogger, type DiagnosticLogger } from '../logging/logger.js';
import { fail, succeed, type Result } from '../result.js';
import { assertNever } from '../utils/assert-never.js';
import { systemClock, type Clock } from './clock.js';
import {
  ASCTIME_PATTERN,
  DateFormat,
  RFC1123_GMT_PATTERN,
  RFC1123_PATTERN,
  RFC850_PATTERN,
} from './date-format.js';
import { formatWithPattern } from './date-pattern.js';
import { recognizeDate } from './recognizers.js';
import type { TimePoint } from './time-point.js';

export interface ParseDateOptions {
  /** Receives a debug entry when the value matches no grammar. */
  logger?: DiagnosticLogger;
}

/**
 * An HTTP-date: one instant, parsed from or rendered into the header
 * grammars of RFC 1123, RFC 850 and asctime (plus bare epoch seconds on
 * input).
 */
export class FullDate {
  constructor(private readonly timePoint: TimePoint) {}

  static now(clock: Clock = systemClock): FullDate {
    return new FullDate(clock.now());
  }

  /**
   * Try each date grammar in priority order (RFC 1123, RFC 850, asctime,
   * epoch seconds) and return the first match.
   */
  static parse(
    text: string,
    options: ParseDateOptions = {},
  ): Result<FullDate, InvalidDateFormatError> {
    const timePoint = recognizeDate(text);
    if (timePoint) {
      return succeed(new FullDate(timePoint));
    }

    const logger: DiagnosticLogger = options.logger ?? getDefaultLogger();
    logger.debug({ input: text }, 'Failed parsing date');
    return fail(new InvalidDateFormatError(text));
  }

  /** Like `parse`, but throws `InvalidDateFormatError` on failure. */
  static fromString(text: string, options: ParseDateOptions = {}): FullDate {
    const result = FullDate.parse(text, options);
    if (!result.ok) {
      throw result.error;
    }
    return result.value;
  }

  get date(): TimePoint {
    return this.timePoint;
  }

  /**
   * Render in the selected grammar. Calendar fields are always UTC, so the
   * zone-bearing forms write `UTC` (or `GMT`) to name the instant exactly.
   */
  format(type: DateFormat): string {
    switch (type) {
      case DateFormat.RFC1123:
        return formatWithPattern(RFC1123_PATTERN, this.timePoint, 'UTC');
      case DateFormat.RFC1123GMT:
        return formatWithPattern(RFC1123_GMT_PATTERN, this.timePoint, 'GMT');
      case DateFormat.RFC850:
        return formatWithPattern(RFC850_PATTERN, this.timePoint, 'UTC');
      case DateFormat.AscTime:
        return formatWithPattern(ASCTIME_PATTERN, this.timePoint, '');
    }
    return assertNever(type, 'date format');
  }

  equals(other: FullDate): boolean {
    return this.timePoint.equals(other.timePoint);
  }

  toString(): string {
    return this.format(DateFormat.RFC1123GMT);
  }
}
