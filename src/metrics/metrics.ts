import promClient from 'prom-client';
import { AdmissionDecision, BucketState, Gate, ThrottleState } from '../types';

// Initialize default metrics (CPU, memory, etc.)
promClient.collectDefaultMetrics({ prefix: 'translation_gateway_' });

// ==================== Custom Metrics ====================

/**
 * Counter: Gate decisions
 * Labels: gate (rate_limit/throttle), result (allowed/denied)
 */
export const admissionDecisions = new promClient.Counter({
  name: 'translation_gateway_admission_decisions_total',
  help: 'Total number of admission gate decisions',
  labelNames: ['gate', 'result'],
});

/**
 * Gauge: Tokens left in the shared bucket after the last check
 */
export const bucketTokens = new promClient.Gauge({
  name: 'translation_gateway_bucket_tokens',
  help: 'Tokens currently in the rate limit bucket',
});

/**
 * Gauge: Requests currently holding a throttle slot
 */
export const throttleActive = new promClient.Gauge({
  name: 'translation_gateway_throttle_active',
  help: 'Requests currently being processed',
});

/**
 * Counter: release() calls with no slot held
 */
export const throttleReleaseUnderflow = new promClient.Counter({
  name: 'translation_gateway_throttle_release_underflow_total',
  help: 'Throttle releases that found no active request',
});

/**
 * Histogram: Translation backend latency in milliseconds
 * Labels: outcome (ok/bad_request/internal_error)
 */
export const translationDuration = new promClient.Histogram({
  name: 'translation_gateway_translation_duration_ms',
  help: 'Duration of translation backend calls in milliseconds',
  labelNames: ['outcome'],
  buckets: [10, 50, 100, 250, 500, 1000, 2500, 5000, 10000],
});

// ==================== Helper Functions ====================

/**
 * Record a gate decision. Bypassed gates are not counted.
 */
export function recordAdmissionDecision(gate: Gate, decision: AdmissionDecision) {
  if (!decision.enforced) {
    return;
  }

  admissionDecisions.inc({ gate, result: decision.allowed ? 'allowed' : 'denied' });
}

export function recordBucketState(state: Readonly<BucketState>) {
  bucketTokens.set(state.tokens);
}

export function recordThrottleState(state: Readonly<ThrottleState>) {
  throttleActive.set(state.active);
}

export function recordReleaseUnderflow() {
  throttleReleaseUnderflow.inc();
}

export function recordTranslation(outcome: 'ok' | 'bad_request' | 'internal_error', durationMs: number) {
  translationDuration.observe({ outcome }, durationMs);
}

/**
 * Get all metrics in Prometheus format
 */
export async function getMetrics(): Promise<string> {
  return promClient.register.metrics();
}

/**
 * Content type of the Prometheus exposition format
 */
export function getMetricsContentType(): string {
  return promClient.register.contentType;
}
