import { recordBucketState } from '../metrics/metrics';
import { BucketState, ConfigurationError, RateLimitDecision } from '../types';
import { Clock, SystemClock } from './clock';

const MS_PER_MINUTE = 60000;

// Refill sums drift by a few ulps (ten 100 ms refills at 60 rpm give 0.9999999999999999)
const TOKEN_EPSILON = 1e-9;

/**
 * Snap a token level that sits within rounding error of a whole token
 */
function snapToWhole(tokens: number): number {
  const whole = Math.round(tokens);
  return Math.abs(tokens - whole) < TOKEN_EPSILON ? whole : tokens;
}

export interface RateLimiterOptions {
  enabled: boolean;
  requestsPerMinute: number;
  burst: number;
  clock?: Clock;
}

/**
 * Token bucket over a single process-wide quota.
 *
 * check() is synchronous, so on the event loop each call runs to completion
 * before another can observe the bucket: the read-refill-consume sequence
 * is never interleaved.
 */
export class RateLimiter {
  readonly enabled: boolean;
  readonly requestsPerMinute: number;
  private readonly clock: Clock;
  private readonly state: BucketState;

  constructor(options: RateLimiterOptions) {
    if (!(options.requestsPerMinute > 0)) {
      throw new ConfigurationError(
        `requests_per_minute must be greater than 0, got: ${options.requestsPerMinute}`
      );
    }
    if (!Number.isInteger(options.burst) || options.burst < 1) {
      throw new ConfigurationError(`burst must be an integer of at least 1, got: ${options.burst}`);
    }

    this.enabled = options.enabled;
    this.requestsPerMinute = options.requestsPerMinute;
    this.clock = options.clock ?? new SystemClock();
    this.state = {
      capacity: options.burst,
      refillRatePerSecond: options.requestsPerMinute / 60,
      tokens: options.burst,
      lastRefillTime: this.clock.now(),
    };
  }

  /**
   * Refill, then try to take one token. Never waits.
   */
  check(): RateLimitDecision {
    if (!this.enabled) {
      return { enforced: false, allowed: true };
    }

    const now = this.clock.now();
    this.state.tokens = this.refilledTokens(now);
    this.state.lastRefillTime = now;

    let decision: RateLimitDecision;
    if (this.state.tokens >= 1) {
      this.state.tokens -= 1;
      decision = { enforced: true, allowed: true, ...this.quotaFields(this.state.tokens) };
    } else {
      const fields = this.quotaFields(this.state.tokens);
      decision = {
        enforced: true,
        allowed: false,
        ...fields,
        retryAfterSeconds: fields.resetSeconds,
      };
    }

    recordBucketState(this.state);
    return decision;
  }

  /**
   * Decision the next check() would report, without refilling the stored
   * bucket or spending a token
   */
  peek(): RateLimitDecision {
    if (!this.enabled) {
      return { enforced: false, allowed: true };
    }

    const fields = this.quotaFields(this.refilledTokens(this.clock.now()));
    if (fields.remaining >= 1) {
      return { enforced: true, allowed: true, ...fields };
    }
    return { enforced: true, allowed: false, ...fields, retryAfterSeconds: fields.resetSeconds };
  }

  snapshot(): Readonly<BucketState> {
    return { ...this.state };
  }

  private refilledTokens(now: number): number {
    const elapsedMs = Math.max(0, now - this.state.lastRefillTime);

    // rpm / 60000 per ms, multiplied first to keep whole-token refills exact
    return snapToWhole(
      Math.min(
        this.state.capacity,
        this.state.tokens + (elapsedMs * this.requestsPerMinute) / MS_PER_MINUTE
      )
    );
  }

  private quotaFields(tokens: number): { limit: number; remaining: number; resetSeconds: number } {
    const { refillRatePerSecond } = this.state;

    return {
      limit: this.requestsPerMinute,
      remaining: Math.floor(tokens),
      // Seconds until a full token is back; 0 while one is already available
      resetSeconds: Math.max(0, Math.ceil((1 - tokens) / refillRatePerSecond)),
    };
  }
}
