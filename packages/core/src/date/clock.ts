import { TimePoint } from './time-point.js';

export interface Clock {
  now(): TimePoint;
}

/** Wall clock backed by `Date.now()`. */
export class SystemClock implements Clock {
  now(): TimePoint {
    return TimePoint.fromDate(new Date());
  }
}

/** Clock frozen at one instant. Useful for deterministic tests. */
export class FixedClock implements Clock {
  constructor(private readonly instant: TimePoint) {}

  now(): TimePoint {
    return this.instant;
  }
}

export const systemClock: Clock = new SystemClock();
