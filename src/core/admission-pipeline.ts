import { recordAdmissionDecision, recordTranslation } from '../metrics/metrics';
import {
  AdmissionDecision,
  AdmissionOutcome,
  ErrorBody,
  Gate,
  OperationResult,
  ProtectedOperation,
  ResponseHeaders,
  TranslationRequest,
  TranslationRequestInput,
  TranslationResult,
  TranslationService,
  UnsupportedPairError,
  ValidationError,
} from '../types';
import logger, { logAdmissionDecision, logTranslation } from '../utils/logger';
import { rateLimitHeaders, retryAfterHeader, throttleHeaders } from './quota-headers';
import { RateLimiter } from './rate-limiter';
import { countCharacters, TranslationRules, validateTranslationRequest } from './request-validator';
import { Throttler } from './throttler';

export interface AdmissionPipelineOptions {
  rateLimiter: RateLimiter;
  throttler: Throttler;
  translator: TranslationService;
  rules: TranslationRules;
  fallbackResponse: string;
}

function errorBody(error: string, message: string): ErrorBody {
  return { error, message };
}

function isDomainError(error: unknown): error is ValidationError | UnsupportedPairError {
  return error instanceof ValidationError || error instanceof UnsupportedPairError;
}

/**
 * Rate limiter first, throttler second, then the protected operation.
 *
 * A request turned away by the rate limiter never takes a throttle slot, and
 * a request that got a slot gives it back however the operation ends.
 */
export class AdmissionPipeline {
  readonly rateLimiter: RateLimiter;
  readonly throttler: Throttler;
  private readonly translator: TranslationService;
  private readonly rules: TranslationRules;
  private readonly fallbackResponse: string;

  constructor(options: AdmissionPipelineOptions) {
    this.rateLimiter = options.rateLimiter;
    this.throttler = options.throttler;
    this.translator = options.translator;
    this.rules = options.rules;
    this.fallbackResponse = options.fallbackResponse;
  }

  /**
   * Admit and run an arbitrary operation
   */
  async handle<T>(operation: ProtectedOperation<T>): Promise<AdmissionOutcome<T>> {
    const rateDecision = this.rateLimiter.check();
    this.observe('rate_limit', rateDecision);
    const rateQuota = rateLimitHeaders(rateDecision);

    if (!rateDecision.allowed) {
      return {
        status: 'rate_limited',
        headers: { ...rateQuota, ...retryAfterHeader(rateDecision) },
        body: errorBody('Too Many Requests', 'Rate limit exceeded'),
      };
    }

    const run = await this.throttler.run(
      async (throttleDecision): Promise<AdmissionOutcome<T>> => {
        this.observe('throttle', throttleDecision);
        const headers = { ...rateQuota, ...throttleHeaders(throttleDecision) };

        try {
          const result = await operation();
          return { status: 'ok', headers: { ...headers, ...result.headers }, body: result.body };
        } catch (error) {
          return this.failure(error, headers);
        }
      }
    );

    if (!run.admitted) {
      this.observe('throttle', run.decision);
      return {
        status: 'overloaded',
        headers: {
          ...rateQuota,
          ...throttleHeaders(run.decision),
          ...retryAfterHeader(run.decision),
        },
        body: errorBody('Service Unavailable', 'Service overloaded, try again later'),
      };
    }

    return run.value;
  }

  /**
   * Validate, admit and translate. Invalid requests are answered before
   * admission: they carry the current quota headers but cost no quota.
   */
  async translate(input: TranslationRequestInput): Promise<AdmissionOutcome<TranslationResult>> {
    let request: TranslationRequest;
    try {
      request = validateTranslationRequest(input, this.rules);
    } catch (error) {
      if (error instanceof ValidationError) {
        return {
          status: 'bad_request',
          headers: this.currentQuotaHeaders(),
          body: errorBody('Bad Request', error.message),
        };
      }
      throw error;
    }

    return this.handle(() => this.runTranslation(request));
  }

  private async runTranslation(
    request: TranslationRequest
  ): Promise<OperationResult<TranslationResult>> {
    const { text, source, target, outputFormat } = request;
    const characters = countCharacters(text);
    const startTime = Date.now();

    try {
      const translated = await this.translator.translate(text, source, target);
      this.recordTranslation(request, characters, startTime, 'ok');

      return {
        body: { payload: { translated, source, target, original: text }, outputFormat },
        headers: { 'X-Translation-Characters': String(characters) },
      };
    } catch (error) {
      this.recordTranslation(
        request,
        characters,
        startTime,
        isDomainError(error) ? 'bad_request' : 'internal_error'
      );
      throw error;
    }
  }

  private currentQuotaHeaders(): ResponseHeaders {
    return {
      ...rateLimitHeaders(this.rateLimiter.peek()),
      ...throttleHeaders(this.throttler.peek()),
    };
  }

  private failure<T>(error: unknown, headers: ResponseHeaders): AdmissionOutcome<T> {
    if (isDomainError(error)) {
      return { status: 'bad_request', headers, body: errorBody('Bad Request', error.message) };
    }

    logger.error('Protected operation failed', {
      error: error instanceof Error ? error.message : error,
      stack: error instanceof Error ? error.stack : undefined,
    });

    return {
      status: 'internal_error',
      headers,
      body: errorBody('Internal Server Error', this.fallbackResponse),
    };
  }

  private observe(gate: Gate, decision: AdmissionDecision): void {
    logAdmissionDecision(gate, decision);
    recordAdmissionDecision(gate, decision);
  }

  private recordTranslation(
    request: TranslationRequest,
    characters: number,
    startTime: number,
    outcome: 'ok' | 'bad_request' | 'internal_error'
  ): void {
    const latencyMs = Date.now() - startTime;
    recordTranslation(outcome, latencyMs);
    logTranslation({
      source: request.source,
      target: request.target,
      characters,
      latency_ms: latencyMs,
      outcome,
    });
  }
}
