/**
 * Environment variable helper functions
 * Extract and parse environment variables with type safety and validation
 */

import { ConfigurationError } from '../types';

/**
 * Get environment variable as string with optional default
 */
export function getEnv(key: string, defaultValue?: string): string {
  const value = process.env[key];
  return value !== undefined && value !== '' ? value : (defaultValue ?? '');
}

/**
 * Get environment variable as integer with validation
 */
export function getEnvAsInt(key: string, defaultValue: number): number {
  const value = process.env[key];

  if (!value) {
    return defaultValue;
  }

  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new ConfigurationError(`Environment variable ${key} must be a valid integer, got: ${value}`);
  }

  return parsed;
}

/**
 * Get environment variable as a comma-separated list (blank entries dropped)
 */
export function getEnvAsList(key: string, defaultValue: readonly string[]): string[] {
  const value = process.env[key];

  if (!value) {
    return [...defaultValue];
  }

  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item !== '');
}

/**
 * Get environment variable as boolean
 * Only 'false', 'FALSE', '0', and empty string are considered false
 * Everything else (including 'true', '1', 'yes', etc.) is true
 */
export function getEnvAsBool(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];

  if (!value) {
    return defaultValue;
  }

  const lowerValue = value.toLowerCase();
  return lowerValue !== 'false' && lowerValue !== '0' && value !== '';
}
