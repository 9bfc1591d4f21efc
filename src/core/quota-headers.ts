import { AdmissionDecision, RateLimitDecision, ResponseHeaders, ThrottleDecision } from '../types';

/**
 * Rate limit headers; none when the gate is disabled
 */
export function rateLimitHeaders(decision: RateLimitDecision): ResponseHeaders {
  if (!decision.enforced) {
    return {};
  }

  return {
    'X-RateLimit-Limit': String(decision.limit),
    'X-RateLimit-Remaining': String(decision.remaining),
    'X-RateLimit-Reset': String(decision.resetSeconds),
  };
}

/**
 * Throttle headers; none when the gate is disabled
 */
export function throttleHeaders(decision: ThrottleDecision): ResponseHeaders {
  if (!decision.enforced) {
    return {};
  }

  return {
    'X-Throttle-Limit': String(decision.limit),
    'X-Throttle-Usage': String(decision.usage),
    'X-Throttle-Remaining': String(decision.remaining),
  };
}

export function retryAfterHeader(decision: AdmissionDecision): ResponseHeaders {
  if (decision.allowed) {
    return {};
  }

  return { 'Retry-After': String(decision.retryAfterSeconds) };
}
