import { BaseConfig } from './base-config';
import { ConfigSection, getSection, loadConfigFile } from './config-file';
import { getEnv } from './env-helpers';
import { validatePort } from './validators';
import { FormatsConfig } from './specialized/formats.config';
import { LoggingConfig } from './specialized/logging.config';
import { RateLimitConfig } from './specialized/rate-limit.config';
import { ThrottlingConfig } from './specialized/throttling.config';
import { TranslationConfig } from './specialized/translation.config';

/**
 * Effective configuration in the shape of the YAML file, as served by GET /config
 */
export interface EffectiveConfig {
  rate_limit: { requests_per_minute: number; burst: number; enabled: boolean };
  throttling: { concurrent_requests: number; enabled: boolean; retry_after_seconds: number };
  translation: {
    max_chars_per_request: number;
    available_packages: string[];
    fallback_response: string;
    backend_url: string;
    backend_timeout_ms: number;
    language_cache_ttl_ms: number;
  };
  formats: { input: string[]; output: string[] };
  logging: { level: string; format: string };
}

/**
 * AppConfig - Central configuration singleton
 *
 * Values resolve in three layers: built-in defaults, then the YAML file named
 * by CONFIG_PATH (default `config/default.yml` when present), then
 * environment variables. Specialized configs are created lazily and are
 * immutable once built.
 *
 * Testing:
 *   AppConfig.reset(); // Reset singleton between tests
 */
export class AppConfig extends BaseConfig {
  private static instance: AppConfig | null = null;

  private readonly file: ConfigSection;

  // Lazy-loaded config instances
  private _rateLimitConfig?: RateLimitConfig;
  private _throttlingConfig?: ThrottlingConfig;
  private _translationConfig?: TranslationConfig;
  private _formatsConfig?: FormatsConfig;
  private _loggingConfig?: LoggingConfig;

  private constructor() {
    super();
    const configPath = getEnv('CONFIG_PATH');
    this.file = loadConfigFile(configPath === '' ? undefined : configPath);
  }

  /**
   * Get singleton instance
   */
  static getInstance(): AppConfig {
    if (!AppConfig.instance) {
      AppConfig.instance = new AppConfig();
    }
    return AppConfig.instance;
  }

  /**
   * Reset singleton (for testing)
   */
  static reset(): void {
    AppConfig.instance = null;
  }

  get rateLimitConfig(): RateLimitConfig {
    if (!this._rateLimitConfig) {
      this._rateLimitConfig = new RateLimitConfig(getSection(this.file, 'rate_limit'));
    }
    return this._rateLimitConfig;
  }

  get throttlingConfig(): ThrottlingConfig {
    if (!this._throttlingConfig) {
      this._throttlingConfig = new ThrottlingConfig(getSection(this.file, 'throttling'));
    }
    return this._throttlingConfig;
  }

  get translationConfig(): TranslationConfig {
    if (!this._translationConfig) {
      this._translationConfig = new TranslationConfig(getSection(this.file, 'translation'));
    }
    return this._translationConfig;
  }

  get formatsConfig(): FormatsConfig {
    if (!this._formatsConfig) {
      this._formatsConfig = new FormatsConfig(getSection(this.file, 'formats'));
    }
    return this._formatsConfig;
  }

  get loggingConfig(): LoggingConfig {
    if (!this._loggingConfig) {
      this._loggingConfig = new LoggingConfig(getSection(this.file, 'logging'));
    }
    return this._loggingConfig;
  }

  toEffectiveConfig(): EffectiveConfig {
    const rateLimit = this.rateLimitConfig;
    const throttling = this.throttlingConfig;
    const translation = this.translationConfig;

    return {
      rate_limit: {
        requests_per_minute: rateLimit.requestsPerMinute,
        burst: rateLimit.burst,
        enabled: rateLimit.enabled,
      },
      throttling: {
        concurrent_requests: throttling.concurrentRequests,
        enabled: throttling.enabled,
        retry_after_seconds: throttling.retryAfterSeconds,
      },
      translation: {
        max_chars_per_request: translation.maxCharsPerRequest,
        available_packages: [...translation.availablePackages],
        fallback_response: translation.fallbackResponse,
        backend_url: translation.backendUrl,
        backend_timeout_ms: translation.backendTimeoutMs,
        language_cache_ttl_ms: translation.languageCacheTtlMs,
      },
      formats: {
        input: [...this.formatsConfig.input],
        output: [...this.formatsConfig.output],
      },
      logging: {
        level: this.loggingConfig.level,
        format: this.loggingConfig.format,
      },
    };
  }

  /**
   * Validate base configuration
   */
  protected validate(): void {
    validatePort(this.port, 'PORT');
  }
}
