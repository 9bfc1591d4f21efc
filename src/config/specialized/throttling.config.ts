import { ConfigSection, readBoolean, readNumber } from '../config-file';
import { getEnvAsBool, getEnvAsInt } from '../env-helpers';
import { validateNonNegative } from '../validators';
import { ConfigurationError } from '../../types';

/**
 * ThrottlingConfig - Concurrency limit configuration
 *
 * File section `throttling`, overridden by environment variables:
 * - THROTTLING_ENABLED: Enable the concurrency gate (default: true)
 * - THROTTLING_CONCURRENT: Maximum requests in flight (default: 5)
 * - THROTTLING_RETRY_AFTER: Advisory Retry-After on 503, in seconds (default: 1)
 */
export class ThrottlingConfig {
  readonly enabled: boolean;
  readonly concurrentRequests: number;
  readonly retryAfterSeconds: number;

  constructor(section: ConfigSection = {}) {
    this.enabled = getEnvAsBool('THROTTLING_ENABLED', readBoolean(section, 'enabled', true));
    this.concurrentRequests = getEnvAsInt(
      'THROTTLING_CONCURRENT',
      readNumber(section, 'concurrent_requests', 5)
    );
    this.retryAfterSeconds = getEnvAsInt(
      'THROTTLING_RETRY_AFTER',
      readNumber(section, 'retry_after_seconds', 1)
    );
    this.validate();
  }

  protected validate(): void {
    if (!Number.isInteger(this.concurrentRequests) || this.concurrentRequests < 1) {
      throw new ConfigurationError('THROTTLING_CONCURRENT must be an integer of at least 1');
    }

    validateNonNegative(this.retryAfterSeconds, 'THROTTLING_RETRY_AFTER');
  }
}
