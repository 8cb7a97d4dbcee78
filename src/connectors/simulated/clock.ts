import { IClock } from '../../common/interfaces';

/** Wall-clock time. */
export class SystemClock implements IClock {
  now(): Date {
    return new Date();
  }
}

/**
 * Clock that only moves when told to. Drives simulations step by step
 * and pins time in tests.
 */
export class ManualClock implements IClock {
  private current: number;

  constructor(start: Date) {
    this.current = start.getTime();
  }

  now(): Date {
    return new Date(this.current);
  }

  advance(ms: number): void {
    this.current += ms;
  }

  set(date: Date): void {
    this.current = date.getTime();
  }
}

/**
 * Replays history: maps wall time elapsed since construction onto
 * `startTime`, scaled by `speed` (2 = twice as fast as real time).
 */
export class ReplayClock implements IClock {
  private readonly startedAt: number;

  constructor(
    private readonly startTime: Date,
    private readonly speed = 1,
    private readonly wallNow: () => number = Date.now,
  ) {
    if (!(speed > 0)) {
      throw new RangeError(`Replay speed must be positive, got ${speed}`);
    }
    this.startedAt = wallNow();
  }

  now(): Date {
    const elapsed = this.wallNow() - this.startedAt;
    return new Date(this.startTime.getTime() + elapsed * this.speed);
  }
}
