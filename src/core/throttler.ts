import { recordReleaseUnderflow, recordThrottleState } from '../metrics/metrics';
import { ConfigurationError, ThrottleDecision, ThrottleState } from '../types';
import logger from '../utils/logger';

export interface ThrottlerOptions {
  enabled: boolean;
  maxConcurrent: number;
  // Advisory only: nothing knows when an in-flight request will finish
  retryAfterSeconds: number;
}

export type ThrottledRun<T> =
  | { admitted: false; decision: ThrottleDecision }
  | { admitted: true; decision: ThrottleDecision; value: T };

/**
 * Non-blocking concurrency gate. A request either gets a slot immediately
 * or is turned away; nothing queues.
 */
export class Throttler {
  readonly enabled: boolean;
  private readonly retryAfterSeconds: number;
  private readonly state: ThrottleState;

  constructor(options: ThrottlerOptions) {
    if (!Number.isInteger(options.maxConcurrent) || options.maxConcurrent < 1) {
      throw new ConfigurationError(
        `concurrent_requests must be an integer of at least 1, got: ${options.maxConcurrent}`
      );
    }

    this.enabled = options.enabled;
    this.retryAfterSeconds = options.retryAfterSeconds;
    this.state = { maxConcurrent: options.maxConcurrent, active: 0 };
  }

  acquire(): ThrottleDecision {
    if (!this.enabled) {
      return { enforced: false, allowed: true };
    }

    const { maxConcurrent } = this.state;

    if (this.state.active >= maxConcurrent) {
      return {
        enforced: true,
        allowed: false,
        limit: maxConcurrent,
        usage: this.state.active,
        remaining: 0,
        retryAfterSeconds: this.retryAfterSeconds,
      };
    }

    this.state.active += 1;
    recordThrottleState(this.state);

    return {
      enforced: true,
      allowed: true,
      limit: maxConcurrent,
      usage: this.state.active,
      remaining: maxConcurrent - this.state.active,
    };
  }

  /**
   * Current occupancy as a decision, without taking a slot
   */
  peek(): ThrottleDecision {
    if (!this.enabled) {
      return { enforced: false, allowed: true };
    }

    const { maxConcurrent, active } = this.state;
    const fields = {
      enforced: true as const,
      limit: maxConcurrent,
      usage: active,
      remaining: maxConcurrent - active,
    };

    if (active >= maxConcurrent) {
      return { ...fields, allowed: false, retryAfterSeconds: this.retryAfterSeconds };
    }
    return { ...fields, allowed: true };
  }

  /**
   * Give back a slot taken by a successful acquire().
   * Prefer run(), which pairs the two on every exit path.
   */
  release(): void {
    if (!this.enabled) {
      return;
    }

    if (this.state.active === 0) {
      logger.error('Throttle slot released with no request active', {
        max_concurrent: this.state.maxConcurrent,
      });
      recordReleaseUnderflow();
      return;
    }

    this.state.active -= 1;
    recordThrottleState(this.state);
  }

  /**
   * Run a task inside a throttle slot. The task is skipped when no slot is
   * free; otherwise the slot is released once the task settles, whether it
   * resolves or rejects.
   */
  async run<T>(task: (decision: ThrottleDecision) => Promise<T>): Promise<ThrottledRun<T>> {
    const decision = this.acquire();
    if (!decision.allowed) {
      return { admitted: false, decision };
    }

    try {
      const value = await task(decision);
      return { admitted: true, decision, value };
    } finally {
      this.release();
    }
  }

  snapshot(): Readonly<ThrottleState> {
    return { ...this.state };
  }
}
