import { describe, it, expect } from 'vitest';
import {
  civilFromDays,
  daysFromCivil,
  daysInMonth,
  floorDiv,
  floorMod,
  isLeapYear,
  weekdayFromDays,
} from './calendar.js';

describe('floorDiv / floorMod', () => {
  it('round toward negative infinity', () => {
    expect(floorDiv(7n, 2n)).toBe(3n);
    expect(floorDiv(-7n, 2n)).toBe(-4n);
    expect(floorDiv(-8n, 2n)).toBe(-4n);
    expect(floorMod(-1n, 7n)).toBe(6n);
    expect(floorMod(15n, 7n)).toBe(1n);
  });
});

describe('daysFromCivil', () => {
  it('maps the epoch to day zero', () => {
    expect(daysFromCivil(1970n, 1, 1)).toBe(0n);
  });

  it('handles dates after the epoch', () => {
    expect(daysFromCivil(2000n, 3, 1)).toBe(11_017n);
    expect(daysFromCivil(2006n, 1, 2)).toBe(13_150n);
  });

  it('handles dates before the epoch', () => {
    expect(daysFromCivil(1969n, 12, 31)).toBe(-1n);
  });
});

describe('civilFromDays', () => {
  it('inverts daysFromCivil', () => {
    expect(civilFromDays(0n)).toEqual({ year: 1970n, month: 1, day: 1 });
    expect(civilFromDays(-1n)).toEqual({ year: 1969n, month: 12, day: 31 });
    expect(civilFromDays(11_016n)).toEqual({ year: 2000n, month: 2, day: 29 });
  });
});

describe('weekdayFromDays', () => {
  it('numbers weekdays from Sunday', () => {
    expect(weekdayFromDays(0n)).toBe(4); // Thursday
    expect(weekdayFromDays(-1n)).toBe(3); // Wednesday
    expect(weekdayFromDays(13_150n)).toBe(1); // Monday 2006-01-02
  });
});

describe('leap years', () => {
  it('follows the Gregorian rules', () => {
    expect(isLeapYear(2024n)).toBe(true);
    expect(isLeapYear(1900n)).toBe(false);
    expect(isLeapYear(2000n)).toBe(true);
    expect(daysInMonth(2023n, 2)).toBe(28);
    expect(daysInMonth(2024n, 2)).toBe(29);
    expect(daysInMonth(2024n, 4)).toBe(30);
    expect(daysInMonth(2024n, 12)).toBe(31);
  });
});
