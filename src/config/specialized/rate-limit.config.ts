import { ConfigSection, readBoolean, readNumber } from '../config-file';
import { getEnvAsBool, getEnvAsInt } from '../env-helpers';
import { ConfigurationError } from '../../types';

/**
 * RateLimitConfig - Token bucket configuration
 *
 * File section `rate_limit`, overridden by environment variables:
 * - RATE_LIMIT_ENABLED: Enable the rate limiter (default: true)
 * - RATE_LIMIT_RPM: Sustained requests per minute (default: 60)
 * - RATE_LIMIT_BURST: Bucket capacity (default: 10)
 */
export class RateLimitConfig {
  readonly enabled: boolean;
  readonly requestsPerMinute: number;
  readonly burst: number;

  constructor(section: ConfigSection = {}) {
    this.enabled = getEnvAsBool('RATE_LIMIT_ENABLED', readBoolean(section, 'enabled', true));
    this.requestsPerMinute = getEnvAsInt(
      'RATE_LIMIT_RPM',
      readNumber(section, 'requests_per_minute', 60)
    );
    this.burst = getEnvAsInt('RATE_LIMIT_BURST', readNumber(section, 'burst', 10));
    this.validate();
  }

  protected validate(): void {
    if (this.requestsPerMinute <= 0) {
      throw new ConfigurationError('RATE_LIMIT_RPM must be greater than 0');
    }

    if (!Number.isInteger(this.burst) || this.burst < 1) {
      throw new ConfigurationError('RATE_LIMIT_BURST must be an integer of at least 1');
    }
  }
}
