import { getEnv, getEnvAsInt } from './env-helpers';

/**
 * BaseConfig - Abstract base class for the root configuration
 *
 * Provides:
 * - Core Node.js environment variables (NODE_ENV, PORT)
 * - Validation enforcement for subclasses
 */
export abstract class BaseConfig {
  readonly nodeEnv: string;
  readonly port: number;

  constructor() {
    this.nodeEnv = getEnv('NODE_ENV', 'development');
    this.port = getEnvAsInt('PORT', 8080);
    this.validate();
  }

  /**
   * Validate configuration values
   * Must be implemented by all subclasses
   */
  protected abstract validate(): void;
}
