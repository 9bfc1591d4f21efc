import { performance } from 'perf_hooks';

/**
 * Monotonic time source in milliseconds
 */
export interface Clock {
  now(): number;
}

export class SystemClock implements Clock {
  now(): number {
    return performance.now();
  }
}

/**
 * Clock that only moves when told to (tests, simulations)
 */
export class ManualClock implements Clock {
  constructor(private current = 0) {}

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    if (ms < 0) {
      throw new RangeError('ManualClock cannot move backwards');
    }
    this.current += ms;
  }

  advanceSeconds(seconds: number): void {
    this.advance(seconds * 1000);
  }
}
