const MIN_DATE_MS = -8_640_000_000_000_000n;
const MAX_DATE_MS = 8_640_000_000_000_000n;

/**
 * An instant with whole-second precision, counted from the Unix epoch.
 *
 * Seconds are held as a `bigint` so that every value a client can send as a
 * decimal epoch (up to 2^64 - 1) is represented exactly; conversion to a
 * `Date` is only possible inside the `Date` range.
 */
export class TimePoint {
  static readonly EPOCH = new TimePoint(0n);

  private constructor(private readonly seconds: bigint) {}

  static fromSeconds(seconds: bigint | number): TimePoint {
    if (typeof seconds === 'number') {
      if (!Number.isSafeInteger(seconds)) {
        throw new RangeError(`Expected a whole number of seconds, got ${seconds}`);
      }
      return new TimePoint(BigInt(seconds));
    }
    return new TimePoint(seconds);
  }

  static fromDate(date: Date): TimePoint {
    const ms = date.getTime();
    if (Number.isNaN(ms)) {
      throw new RangeError('Cannot convert an invalid Date to a TimePoint');
    }
    return new TimePoint(BigInt(Math.floor(ms / 1000)));
  }

  toSeconds(): bigint {
    return this.seconds;
  }

  toDate(): Date {
    const ms = this.seconds * 1000n;
    if (ms < MIN_DATE_MS || ms > MAX_DATE_MS) {
      throw new RangeError(`${this.seconds}s is outside the range of Date`);
    }
    return new Date(Number(ms));
  }

  compare(other: TimePoint): -1 | 0 | 1 {
    if (this.seconds < other.seconds) return -1;
    if (this.seconds > other.seconds) return 1;
    return 0;
  }

  equals(other: TimePoint): boolean {
    return this.seconds === other.seconds;
  }
}
