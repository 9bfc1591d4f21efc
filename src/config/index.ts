/**
 * Config Layer - Central configuration facade
 *
 * Usage:
 *   import { appConfig } from './config';
 *
 *   const rpm = appConfig.rateLimitConfig.requestsPerMinute;
 *   const pairs = appConfig.translationConfig.availablePackages;
 *
 * Testing:
 *   import { AppConfig } from './config';
 *
 *   beforeEach(() => {
 *     AppConfig.reset(); // Reset singleton for test isolation
 *   });
 */

import { AppConfig as AppConfigClass } from './app-config';

export { AppConfigClass as AppConfig };
export type { EffectiveConfig } from './app-config';
export { BaseConfig } from './base-config';

export { RateLimitConfig } from './specialized/rate-limit.config';
export { ThrottlingConfig } from './specialized/throttling.config';
export { TranslationConfig } from './specialized/translation.config';
export { FormatsConfig } from './specialized/formats.config';
export { LoggingConfig } from './specialized/logging.config';

export { getEnv, getEnvAsInt, getEnvAsBool, getEnvAsList } from './env-helpers';

export * from './validators';

/**
 * Singleton instance - use this for all config access
 */
export const appConfig = AppConfigClass.getInstance();
