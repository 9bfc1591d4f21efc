import { ConfigSection, readString } from '../config-file';
import { getEnv } from '../env-helpers';
import { validateEnum } from '../validators';

const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
const LOG_FORMATS = ['json', 'pretty'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];
export type LogFormat = (typeof LOG_FORMATS)[number];

/**
 * LoggingConfig - Application logging configuration
 *
 * File section `logging`, overridden by environment variables:
 * - LOG_LEVEL: Logging level - debug, info, warn, error (default: 'info')
 * - LOG_FORMAT: Log format - json or pretty (default: 'json')
 *
 * LOGGING_LEVEL and LOGGING_FORMAT are read when the LOG_* names are unset.
 */
export class LoggingConfig {
  readonly level: LogLevel;
  readonly format: LogFormat;
  private readonly nodeEnv: string;

  constructor(section: ConfigSection = {}) {
    // File levels may be written upper-case ("INFO")
    const level = getEnv(
      'LOG_LEVEL',
      getEnv('LOGGING_LEVEL', readString(section, 'level', 'info'))
    ).toLowerCase();
    const format = getEnv(
      'LOG_FORMAT',
      getEnv('LOGGING_FORMAT', readString(section, 'format', 'json'))
    ).toLowerCase();

    validateEnum(level, LOG_LEVELS, 'LOG_LEVEL');
    validateEnum(format, LOG_FORMATS, 'LOG_FORMAT');

    this.level = level;
    this.format = format;
    this.nodeEnv = getEnv('NODE_ENV', 'development');
  }

  /**
   * Check if running in production environment
   */
  get isProduction(): boolean {
    return this.nodeEnv === 'production';
  }
}
