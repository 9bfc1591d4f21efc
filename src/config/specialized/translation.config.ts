import { ConfigSection, readNumber, readString, readStringList } from '../config-file';
import { getEnv, getEnvAsInt, getEnvAsList } from '../env-helpers';
import { validatePositive, validateUrl } from '../validators';
import { ConfigurationError } from '../../types';

export const DEFAULT_PACKAGES = [
  'en-es',
  'es-en',
  'en-fr',
  'fr-en',
  'en-de',
  'de-en',
  'it-en',
  'en-it',
] as const;

const PACKAGE_CODE = /^[a-z]{2,3}-[a-z]{2,3}$/;

/**
 * TranslationConfig - Translation request limits and backend connection
 *
 * File section `translation`, overridden by environment variables:
 * - MAX_CHARS_PER_REQUEST: Longest accepted text (default: 5000)
 * - AVAILABLE_PACKAGES: Comma-separated `from-to` pairs (default: eight en/es/fr/de/it pairs)
 * - FALLBACK_RESPONSE: Message returned when the backend fails
 * - TRANSLATION_BACKEND_URL: Base URL of the translation engine (default: 'http://localhost:5000')
 * - TRANSLATION_BACKEND_TIMEOUT_MS: Per-call timeout (default: 30000)
 * - LANGUAGE_CACHE_TTL_MS: How long the backend language index is cached (default: 600000)
 */
export class TranslationConfig {
  readonly maxCharsPerRequest: number;
  readonly availablePackages: string[];
  readonly fallbackResponse: string;
  readonly backendUrl: string;
  readonly backendTimeoutMs: number;
  readonly languageCacheTtlMs: number;

  constructor(section: ConfigSection = {}) {
    this.maxCharsPerRequest = getEnvAsInt(
      'MAX_CHARS_PER_REQUEST',
      readNumber(section, 'max_chars_per_request', 5000)
    );
    this.availablePackages = getEnvAsList(
      'AVAILABLE_PACKAGES',
      readStringList(section, 'available_packages', DEFAULT_PACKAGES)
    );
    this.fallbackResponse = getEnv(
      'FALLBACK_RESPONSE',
      readString(
        section,
        'fallback_response',
        'Translation service unavailable. Please try again later.'
      )
    );
    this.backendUrl = getEnv(
      'TRANSLATION_BACKEND_URL',
      readString(section, 'backend_url', 'http://localhost:5000')
    );
    this.backendTimeoutMs = getEnvAsInt(
      'TRANSLATION_BACKEND_TIMEOUT_MS',
      readNumber(section, 'backend_timeout_ms', 30000)
    );
    this.languageCacheTtlMs = getEnvAsInt(
      'LANGUAGE_CACHE_TTL_MS',
      readNumber(section, 'language_cache_ttl_ms', 600000)
    );
    this.validate();
  }

  protected validate(): void {
    validatePositive(this.maxCharsPerRequest, 'MAX_CHARS_PER_REQUEST');
    validatePositive(this.backendTimeoutMs, 'TRANSLATION_BACKEND_TIMEOUT_MS');
    validatePositive(this.languageCacheTtlMs, 'LANGUAGE_CACHE_TTL_MS');
    validateUrl(this.backendUrl, 'TRANSLATION_BACKEND_URL');

    const malformed = this.availablePackages.filter((code) => !PACKAGE_CODE.test(code));
    if (malformed.length > 0) {
      throw new ConfigurationError(
        `AVAILABLE_PACKAGES entries must look like 'en-es', got: ${malformed.join(', ')}`
      );
    }
  }
}
