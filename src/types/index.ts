/**
 * Type definitions for the translation gateway
 */

// ==================== Admission Decisions ====================

export type Gate = 'rate_limit' | 'throttle';

/**
 * Decision returned by a gate that is disabled by configuration.
 * Carries no quota fields, so no headers are rendered for it.
 */
export interface GateBypass {
  enforced: false;
  allowed: true;
}

interface RateLimitFields {
  enforced: true;
  limit: number; // requests per minute
  remaining: number; // whole tokens left in the bucket
  resetSeconds: number; // seconds until at least one full token is available
}

export type RateLimitDecision =
  | GateBypass
  | (RateLimitFields & { allowed: true })
  | (RateLimitFields & { allowed: false; retryAfterSeconds: number });

interface ThrottleFields {
  enforced: true;
  limit: number;
  usage: number;
  remaining: number;
}

export type ThrottleDecision =
  | GateBypass
  | (ThrottleFields & { allowed: true })
  | (ThrottleFields & { allowed: false; retryAfterSeconds: number });

export type AdmissionDecision = RateLimitDecision | ThrottleDecision;

// ==================== Gate State ====================

export interface BucketState {
  capacity: number;
  refillRatePerSecond: number;
  tokens: number;
  lastRefillTime: number; // clock milliseconds
}

export interface ThrottleState {
  maxConcurrent: number;
  active: number;
}

// ==================== Outcomes ====================

export type ResponseHeaders = Record<string, string>;

export type OutcomeStatus =
  | 'ok'
  | 'bad_request'
  | 'rate_limited'
  | 'overloaded'
  | 'internal_error';

export interface ErrorBody {
  error: string;
  message: string;
}

export type AdmissionOutcome<T> =
  | { status: 'ok'; headers: ResponseHeaders; body: T }
  | { status: Exclude<OutcomeStatus, 'ok'>; headers: ResponseHeaders; body: ErrorBody };

/**
 * What a protected operation hands back to the pipeline on success
 */
export interface OperationResult<T> {
  body: T;
  headers?: ResponseHeaders;
}

export type ProtectedOperation<T> = () => Promise<OperationResult<T>>;

// ==================== Translation ====================

export type OutputFormat = 'json' | 'text';

/**
 * Raw translation request as read from the HTTP layer, before validation
 */
export interface TranslationRequestInput {
  text?: unknown;
  source?: unknown;
  target?: unknown;
  outputFormat: string;
}

export interface TranslationRequest {
  text: string;
  source: string;
  target: string;
  outputFormat: OutputFormat;
}

export interface TranslationPayload {
  translated: string;
  source: string;
  target: string;
  original: string;
}

export interface TranslationResult {
  payload: TranslationPayload;
  outputFormat: OutputFormat;
}

export interface TranslationService {
  translate(text: string, source: string, target: string): Promise<string>;
  installedPackages(): string[];
}

// ==================== Errors ====================

export class GatewayError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'GatewayError';
  }
}

export class ConfigurationError extends GatewayError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

export class ValidationError extends GatewayError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

export class UnsupportedPairError extends GatewayError {
  constructor(source: string, target: string) {
    super(`Unsupported language pair: ${source}-${target}`, 'UNSUPPORTED_PAIR', {
      source,
      target,
    });
    this.name = 'UnsupportedPairError';
  }
}

export class BackendError extends GatewayError {
  constructor(message: string, details?: unknown) {
    super(message, 'BACKEND_ERROR', details);
    this.name = 'BackendError';
  }
}
