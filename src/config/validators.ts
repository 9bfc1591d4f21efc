/**
 * Validation utilities for configuration values
 */

import { ConfigurationError } from '../types';

/**
 * Validate that a value is one of allowed options
 */
export function validateEnum<T extends string>(
  value: string,
  allowedValues: readonly T[],
  fieldName: string
): asserts value is T {
  if (!allowedValues.some((allowed) => allowed === value)) {
    throw new ConfigurationError(
      `${fieldName} must be one of: ${allowedValues.join(', ')}, got: ${value}`
    );
  }
}

/**
 * Validate URL format
 */
export function validateUrl(value: string, fieldName: string): void {
  try {
    new URL(value);
  } catch {
    throw new ConfigurationError(`${fieldName} must be a valid URL, got: ${value}`);
  }
}

/**
 * Validate positive number
 */
export function validatePositive(value: number, fieldName: string): void {
  if (value <= 0) {
    throw new ConfigurationError(`${fieldName} must be greater than 0, got: ${value}`);
  }
}

/**
 * Validate non-negative number
 */
export function validateNonNegative(value: number, fieldName: string): void {
  if (value < 0) {
    throw new ConfigurationError(`${fieldName} must be >= 0, got: ${value}`);
  }
}

/**
 * Validate port number
 */
export function validatePort(value: number, fieldName: string): void {
  if (value <= 0 || value > 65535) {
    throw new ConfigurationError(`${fieldName} must be between 1 and 65535, got: ${value}`);
  }
}
