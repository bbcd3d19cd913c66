import {
  ASCTIME_PATTERN,
  RFC1123_DASHED_PATTERN,
  RFC1123_DASHED_SHORT_YEAR_PATTERN,
  RFC1123_PATTERN,
  RFC850_PATTERN,
} from './date-format.js';
import { parseWithPattern } from './date-pattern.js';
import { TimePoint } from './time-point.js';

/** Attempts one date grammar against the whole input. */
export type DateRecognizer = (text: string) => TimePoint | undefined;

const MAX_EPOCH_SECONDS = 18_446_744_073_709_551_615n;
const DECIMAL_DIGITS = /^[0-9]+$/;

/**
 * RFC 1123, falling back to the dash-separated form some servers emit
 * (with either a four- or a two-digit year).
 */
export const recognizeRfc1123: DateRecognizer = (text) =>
  parseWithPattern(RFC1123_PATTERN, text) ??
  parseWithPattern(RFC1123_DASHED_PATTERN, text) ??
  parseWithPattern(RFC1123_DASHED_SHORT_YEAR_PATTERN, text);

export const recognizeRfc850: DateRecognizer = (text) =>
  parseWithPattern(RFC850_PATTERN, text);

export const recognizeAscTime: DateRecognizer = (text) =>
  parseWithPattern(ASCTIME_PATTERN, text);

/**
 * Unsigned decimal seconds since the epoch. Values that do not fit in an
 * unsigned 64-bit integer are rejected.
 */
export const recognizeEpoch: DateRecognizer = (text) => {
  if (!DECIMAL_DIGITS.test(text)) return undefined;
  const seconds = BigInt(text);
  return seconds > MAX_EPOCH_SECONDS ? undefined : TimePoint.fromSeconds(seconds);
};

/** Tried in order; the first match wins. */
export const DATE_RECOGNIZERS: ReadonlyArray<DateRecognizer> = [
  recognizeRfc1123,
  recognizeRfc850,
  recognizeAscTime,
  recognizeEpoch,
];

export function recognizeDate(text: string): TimePoint | undefined {
  for (const recognize of DATE_RECOGNIZERS) {
    const timePoint = recognize(text);
    if (timePoint) return timePoint;
  }
  return undefined;
}
