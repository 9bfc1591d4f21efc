/**
 * Unit tests for the token bucket rate limiter
 */

import { ManualClock } from '../../../src/core/clock';
import { RateLimiter } from '../../../src/core/rate-limiter';
import { ConfigurationError } from '../../../src/types';

describe('RateLimiter', () => {
  let clock: ManualClock;

  beforeEach(() => {
    clock = new ManualClock();
  });

  function createLimiter(requestsPerMinute: number, burst: number, enabled = true): RateLimiter {
    return new RateLimiter({ enabled, requestsPerMinute, burst, clock });
  }

  describe('constructor', () => {
    it('should start with a full bucket', () => {
      const limiter = createLimiter(60, 10);

      expect(limiter.snapshot()).toEqual({
        capacity: 10,
        refillRatePerSecond: 1,
        tokens: 10,
        lastRefillTime: 0,
      });
    });

    it('should reject a non-positive rate', () => {
      expect(() => createLimiter(0, 10)).toThrow(ConfigurationError);
      expect(() => createLimiter(-5, 10)).toThrow('requests_per_minute must be greater than 0');
    });

    it('should reject a burst below one or a fractional burst', () => {
      expect(() => createLimiter(60, 0)).toThrow('burst must be an integer of at least 1, got: 0');
      expect(() => createLimiter(60, 1.5)).toThrow(ConfigurationError);
    });
  });

  describe('bucket saturation', () => {
    it('should allow exactly burst immediate requests', () => {
      const limiter = createLimiter(60, 10);

      for (let i = 0; i < 10; i++) {
        expect(limiter.check().allowed).toBe(true);
      }

      expect(limiter.check().allowed).toBe(false);
    });

    it('should report headers for the first and last admitted requests', () => {
      const limiter = createLimiter(60, 10);

      expect(limiter.check()).toEqual({
        enforced: true,
        allowed: true,
        limit: 60,
        remaining: 9,
        resetSeconds: 0,
      });

      for (let i = 0; i < 8; i++) {
        limiter.check();
      }

      expect(limiter.check()).toEqual({
        enforced: true,
        allowed: true,
        limit: 60,
        remaining: 0,
        resetSeconds: 1,
      });
    });

    it('should deny the 11th request with Retry-After of one second at 60 rpm', () => {
      const limiter = createLimiter(60, 10);
      for (let i = 0; i < 10; i++) {
        limiter.check();
      }

      expect(limiter.check()).toEqual({
        enforced: true,
        allowed: false,
        limit: 60,
        remaining: 0,
        resetSeconds: 1,
        retryAfterSeconds: 1,
      });
    });

    it('should not consume a token on denial', () => {
      const limiter = createLimiter(60, 1);
      limiter.check();
      limiter.check();
      limiter.check();

      expect(limiter.snapshot().tokens).toBe(0);
    });
  });

  describe('refill', () => {
    it('should admit again after 60/rpm seconds', () => {
      const limiter = createLimiter(60, 1);
      limiter.check();
      expect(limiter.check().allowed).toBe(false);

      clock.advanceSeconds(1);

      expect(limiter.check().allowed).toBe(true);
    });

    it('should scale retry and recovery with a slower rate', () => {
      const limiter = createLimiter(30, 1);
      limiter.check();

      const denied = limiter.check();
      expect(denied).toMatchObject({ allowed: false, retryAfterSeconds: 2 });

      clock.advanceSeconds(2);

      expect(limiter.check().allowed).toBe(true);
    });

    it('should refill continuously rather than in whole seconds', () => {
      const limiter = createLimiter(60, 2);
      limiter.check();
      limiter.check();

      clock.advance(500);
      const denied = limiter.check();

      expect(denied).toEqual({
        enforced: true,
        allowed: false,
        limit: 60,
        remaining: 0,
        resetSeconds: 1,
        retryAfterSeconds: 1,
      });
      expect(limiter.snapshot().tokens).toBe(0.5);

      clock.advance(500);

      expect(limiter.check().allowed).toBe(true);
      expect(limiter.snapshot().tokens).toBe(0);
    });

    it('should cap the bucket at its capacity after a long idle period', () => {
      const limiter = createLimiter(60, 3);
      limiter.check();

      clock.advanceSeconds(3600);
      limiter.check();

      expect(limiter.snapshot().tokens).toBe(2);
    });

    it('should move lastRefillTime to the time of each check', () => {
      const limiter = createLimiter(60, 3);

      clock.advance(1234);
      limiter.check();

      expect(limiter.snapshot().lastRefillTime).toBe(1234);
    });

    it('should keep tokens within bounds for any idle interval', () => {
      const rpm = 120;
      const capacity = 5;
      const ratePerSecond = rpm / 60;
      const limiter = createLimiter(rpm, capacity);

      // Drain first so refill has room to show
      for (let i = 0; i < capacity; i++) {
        limiter.check();
      }

      for (const idleMs of [0, 100, 250, 499, 1000, 2750, 60000]) {
        const before = limiter.snapshot().tokens;

        clock.advance(idleMs);
        limiter.check();

        const after = limiter.snapshot().tokens;
        const expectedFloor = Math.min(capacity, before + (idleMs / 1000) * ratePerSecond) - 1;

        expect(after).toBeLessThanOrEqual(capacity);
        expect(after).toBeGreaterThanOrEqual(expectedFloor - 1e-9);
        expect(after).toBeGreaterThanOrEqual(0);
      }
    });
  });

  describe('refill recovery with uneven rates', () => {
    it.each([7, 11, 33, 110])(
      'should admit again exactly 60/rpm seconds after a denial at %i rpm',
      (rpm) => {
        const limiter = createLimiter(rpm, 1);
        limiter.check();
        expect(limiter.check().allowed).toBe(false);

        clock.advanceSeconds(60 / rpm);

        expect(limiter.check().allowed).toBe(true);
      }
    );

    it('should admit after one second of 100 ms polls at 60 rpm', () => {
      const limiter = createLimiter(60, 1);
      limiter.check();

      for (let i = 0; i < 9; i++) {
        clock.advance(100);
        expect(limiter.check().allowed).toBe(false);
      }
      clock.advance(100);

      expect(limiter.check()).toEqual({
        enforced: true,
        allowed: true,
        limit: 60,
        remaining: 0,
        resetSeconds: 1,
      });
    });
  });

  describe('peek', () => {
    it('should report the refilled level without changing the bucket', () => {
      const limiter = createLimiter(60, 2);
      limiter.check();
      limiter.check();
      clock.advance(1500);

      expect(limiter.peek()).toEqual({
        enforced: true,
        allowed: true,
        limit: 60,
        remaining: 1,
        resetSeconds: 0,
      });
      expect(limiter.snapshot()).toEqual({
        capacity: 2,
        refillRatePerSecond: 1,
        tokens: 0,
        lastRefillTime: 0,
      });
    });

    it('should report an empty bucket as denied', () => {
      const limiter = createLimiter(30, 1);
      limiter.check();

      expect(limiter.peek()).toEqual({
        enforced: true,
        allowed: false,
        limit: 30,
        remaining: 0,
        resetSeconds: 2,
        retryAfterSeconds: 2,
      });
    });

    it('should bypass when disabled', () => {
      expect(createLimiter(60, 1, false).peek()).toEqual({ enforced: false, allowed: true });
    });
  });

  describe('disabled', () => {
    it('should pass every request through without headers', () => {
      const limiter = createLimiter(60, 1, false);

      for (let i = 0; i < 500; i++) {
        expect(limiter.check()).toEqual({ enforced: false, allowed: true });
      }
    });

    it('should leave the bucket untouched', () => {
      const limiter = createLimiter(60, 2, false);
      limiter.check();
      limiter.check();
      limiter.check();

      expect(limiter.snapshot().tokens).toBe(2);
    });
  });
});
