import { describe, it, expect } from 'vitest';
import { TimePoint } from './time-point.js';

describe('TimePoint', () => {
  it('converts to and from second counts', () => {
    expect(TimePoint.fromSeconds(1_136_214_245).toSeconds()).toBe(1_136_214_245n);
    expect(TimePoint.fromSeconds(18_446_744_073_709_551_615n).toSeconds()).toBe(
      18_446_744_073_709_551_615n,
    );
    expect(TimePoint.EPOCH.toSeconds()).toBe(0n);
  });

  it('rejects fractional and unsafe numbers', () => {
    expect(() => TimePoint.fromSeconds(1.5)).toThrow(RangeError);
    expect(() => TimePoint.fromSeconds(Number.MAX_SAFE_INTEGER + 2)).toThrow(
      RangeError,
    );
  });

  it('floors Date milliseconds to whole seconds', () => {
    const date = new Date('2006-01-02T15:04:05.999Z');
    expect(TimePoint.fromDate(date).toSeconds()).toBe(1_136_214_245n);
    expect(TimePoint.fromDate(new Date(-500)).toSeconds()).toBe(-1n);
  });

  it('rejects invalid Dates', () => {
    expect(() => TimePoint.fromDate(new Date('garbage'))).toThrow(RangeError);
  });

  it('converts back to a Date inside the Date range', () => {
    expect(TimePoint.fromSeconds(784_111_777).toDate().toISOString()).toBe(
      '1994-11-06T08:49:37.000Z',
    );
    expect(() => TimePoint.fromSeconds(10n ** 16n).toDate()).toThrow(RangeError);
  });

  it('orders instants', () => {
    const earlier = TimePoint.fromSeconds(10);
    const later = TimePoint.fromSeconds(20);
    expect(earlier.compare(later)).toBe(-1);
    expect(later.compare(earlier)).toBe(1);
    expect(earlier.compare(TimePoint.fromSeconds(10n))).toBe(0);
    expect(earlier.equals(TimePoint.fromSeconds(10n))).toBe(true);
    expect(earlier.equals(later)).toBe(false);
  });
});
