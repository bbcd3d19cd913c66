import { compilePattern } from './date-pattern.js';

/** Output grammar selector for `FullDate.format`. */
export enum DateFormat {
  /** `Mon, 02 Jan 2006 15:04:05 UTC` */
  RFC1123,
  /** `Mon, 02 Jan 2006 15:04:05 GMT` */
  RFC1123GMT,
  /** `Monday, 02-Jan-06 15:04:05 UTC` */
  RFC850,
  /** `Mon Jan 02 15:04:05 2006` */
  AscTime,
}

export const RFC1123_PATTERN = compilePattern('%a, %d %b %Y %T %Z');
// Seen in the wild in cookie expiry values, e.g. "Mon, 26-May-2025 18:38:48 GMT".
export const RFC1123_DASHED_PATTERN = compilePattern('%a, %d-%b-%Y %T %Z');
export const RFC1123_DASHED_SHORT_YEAR_PATTERN = compilePattern(
  '%a, %d-%b-%y %T %Z',
);
export const RFC1123_GMT_PATTERN = compilePattern('%a, %d %b %Y %T GMT');
export const RFC850_PATTERN = compilePattern('%A, %d-%b-%y %T %Z');
export const ASCTIME_PATTERN = compilePattern('%a %b %d %T %Y');
