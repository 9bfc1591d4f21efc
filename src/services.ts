import { AppConfig } from './config';
import { AdmissionPipeline } from './core/admission-pipeline';
import { Clock } from './core/clock';
import { RateLimiter } from './core/rate-limiter';
import { Throttler } from './core/throttler';
import { TranslationEngine } from './translation/translation-engine';
import { TranslationService } from './types';

/**
 * Everything the HTTP layer needs. One instance per process: the pipeline
 * owns the only bucket and the only throttle counter.
 */
export interface AppServices {
  config: AppConfig;
  pipeline: AdmissionPipeline;
  translator: TranslationService;
}

export interface ServiceOverrides {
  clock?: Clock;
  translator?: TranslationService;
}

export function createPipeline(
  config: AppConfig,
  translator: TranslationService,
  clock?: Clock
): AdmissionPipeline {
  const { rateLimitConfig, throttlingConfig, translationConfig, formatsConfig } = config;

  return new AdmissionPipeline({
    rateLimiter: new RateLimiter({
      enabled: rateLimitConfig.enabled,
      requestsPerMinute: rateLimitConfig.requestsPerMinute,
      burst: rateLimitConfig.burst,
      clock,
    }),
    throttler: new Throttler({
      enabled: throttlingConfig.enabled,
      maxConcurrent: throttlingConfig.concurrentRequests,
      retryAfterSeconds: throttlingConfig.retryAfterSeconds,
    }),
    translator,
    rules: {
      maxCharsPerRequest: translationConfig.maxCharsPerRequest,
      availablePackages: translationConfig.availablePackages,
      outputFormats: formatsConfig.output,
    },
    fallbackResponse: translationConfig.fallbackResponse,
  });
}

export function createTranslationEngine(config: AppConfig): TranslationEngine {
  const { translationConfig } = config;

  return new TranslationEngine({
    baseUrl: translationConfig.backendUrl,
    timeoutMs: translationConfig.backendTimeoutMs,
    languageCacheTtlMs: translationConfig.languageCacheTtlMs,
  });
}

export function createServices(config: AppConfig, overrides: ServiceOverrides = {}): AppServices {
  const translator = overrides.translator ?? createTranslationEngine(config);

  return {
    config,
    pipeline: createPipeline(config, translator, overrides.clock),
    translator,
  };
}
