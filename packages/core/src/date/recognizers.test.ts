import { describe, it, expect } from 'vitest';
import {
  DATE_RECOGNIZERS,
  recognizeAscTime,
  recognizeDate,
  recognizeEpoch,
  recognizeRfc1123,
  recognizeRfc850,
} from './recognizers.js';

// Mon, 02 Jan 2006 15:04:05 UTC
const REFERENCE = 1_136_214_245n;
// Sun, 06 Nov 1994 08:49:37 UTC
const SUNDAY = 784_111_777n;

describe('recognizeRfc1123', () => {
  it('parses the canonical form', () => {
    expect(recognizeRfc1123('Mon, 02 Jan 2006 15:04:05 GMT')?.toSeconds()).toBe(
      REFERENCE,
    );
    expect(recognizeRfc1123('Sun, 06 Nov 1994 08:49:37 GMT')?.toSeconds()).toBe(
      SUNDAY,
    );
  });

  it('ignores the zone token', () => {
    expect(recognizeRfc1123('Mon, 02 Jan 2006 15:04:05 UTC')?.toSeconds()).toBe(
      REFERENCE,
    );
    expect(recognizeRfc1123('Mon, 02 Jan 2006 15:04:05 PST')?.toSeconds()).toBe(
      REFERENCE,
    );
  });

  it('accepts the dash-separated variant with either year width', () => {
    expect(recognizeRfc1123('Mon, 02-Jan-06 15:04:05 GMT')?.toSeconds()).toBe(
      REFERENCE,
    );
    expect(recognizeRfc1123('Mon, 02-Jan-2006 15:04:05 GMT')?.toSeconds()).toBe(
      REFERENCE,
    );
  });

  it('is case-insensitive for names', () => {
    expect(recognizeRfc1123('MON, 02 JAN 2006 15:04:05 GMT')?.toSeconds()).toBe(
      REFERENCE,
    );
  });

  it('tolerates surrounding whitespace', () => {
    expect(
      recognizeRfc1123('  Mon, 02 Jan 2006 15:04:05 GMT \t')?.toSeconds(),
    ).toBe(REFERENCE);
  });

  it('rejects trailing garbage', () => {
    expect(recognizeRfc1123('Mon, 02 Jan 2006 15:04:05 GMT; path=/')).toBeUndefined();
  });

  it('rejects a weekday that does not match the date', () => {
    expect(recognizeRfc1123('Tue, 02 Jan 2006 15:04:05 GMT')).toBeUndefined();
  });

  it('rejects impossible calendar values', () => {
    expect(recognizeRfc1123('Wed, 30 Feb 2022 00:00:00 GMT')).toBeUndefined();
    expect(recognizeRfc1123('Mon, 02 Jan 2006 24:00:00 GMT')).toBeUndefined();
    expect(recognizeRfc1123('Mon, 02 Jan 2006 15:60:00 GMT')).toBeUndefined();
  });

  it('requires a zone token', () => {
    expect(recognizeRfc1123('Mon, 02 Jan 2006 15:04:05')).toBeUndefined();
  });
});

describe('recognizeRfc850', () => {
  it('parses a full weekday with a two-digit year', () => {
    expect(recognizeRfc850('Sunday, 06-Nov-94 08:49:37 GMT')?.toSeconds()).toBe(
      SUNDAY,
    );
    expect(recognizeRfc850('Monday, 02-Jan-06 15:04:05 GMT')?.toSeconds()).toBe(
      REFERENCE,
    );
  });

  it('requires the full weekday name', () => {
    expect(recognizeRfc850('Sun, 06-Nov-94 08:49:37 GMT')).toBeUndefined();
  });
});

describe('recognizeAscTime', () => {
  it('parses space-padded days', () => {
    expect(recognizeAscTime('Sun Nov  6 08:49:37 1994')?.toSeconds()).toBe(SUNDAY);
  });

  it('parses zero-padded days', () => {
    expect(recognizeAscTime('Mon Jan 02 15:04:05 2006')?.toSeconds()).toBe(
      REFERENCE,
    );
  });

  it('rejects a trailing zone', () => {
    expect(recognizeAscTime('Sun Nov  6 08:49:37 1994 GMT')).toBeUndefined();
  });
});

describe('recognizeEpoch', () => {
  it('parses decimal seconds', () => {
    expect(recognizeEpoch('0')?.toSeconds()).toBe(0n);
    expect(recognizeEpoch('1136214245')?.toSeconds()).toBe(REFERENCE);
  });

  it('accepts the largest unsigned 64-bit value', () => {
    expect(recognizeEpoch('18446744073709551615')?.toSeconds()).toBe(
      18_446_744_073_709_551_615n,
    );
  });

  it('fails instead of wrapping past the unsigned 64-bit range', () => {
    expect(recognizeEpoch('18446744073709551616')).toBeUndefined();
    expect(recognizeEpoch('99999999999999999999999')).toBeUndefined();
  });

  it('rejects anything but digits', () => {
    expect(recognizeEpoch('')).toBeUndefined();
    expect(recognizeEpoch(' 42')).toBeUndefined();
    expect(recognizeEpoch('-1')).toBeUndefined();
    expect(recognizeEpoch('4.2')).toBeUndefined();
  });
});

describe('recognizeDate', () => {
  it('tries the grammars in priority order', () => {
    expect(DATE_RECOGNIZERS).toEqual([
      recognizeRfc1123,
      recognizeRfc850,
      recognizeAscTime,
      recognizeEpoch,
    ]);
  });

  it('returns the first grammar that matches', () => {
    expect(recognizeDate('Sunday, 06-Nov-94 08:49:37 GMT')?.toSeconds()).toBe(
      SUNDAY,
    );
    expect(recognizeDate('1994')?.toSeconds()).toBe(1994n);
  });

  it('returns undefined when nothing matches', () => {
    expect(recognizeDate('not a date')).toBeUndefined();
  });
});
