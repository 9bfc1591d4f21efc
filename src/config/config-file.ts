import { existsSync, readFileSync } from 'fs';
import { resolve } from 'path';
import { load as parseYaml } from 'js-yaml';
import { ConfigurationError } from '../types';

/**
 * One mapping node of the YAML configuration file
 */
export type ConfigSection = Record<string, unknown>;

export const DEFAULT_CONFIG_PATH = 'config/default.yml';

function isSection(value: unknown): value is ConfigSection {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load the YAML configuration file.
 *
 * An explicitly requested file must exist; the default path is optional and
 * an absent file yields an empty section, leaving built-in defaults in place.
 */
export function loadConfigFile(configPath?: string): ConfigSection {
  const absolutePath = resolve(configPath ?? DEFAULT_CONFIG_PATH);

  if (!existsSync(absolutePath)) {
    if (configPath) {
      throw new ConfigurationError(`Config file not found at ${absolutePath}`);
    }
    return {};
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(readFileSync(absolutePath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(
      `Failed to parse YAML config file at ${absolutePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  // An empty document parses to undefined
  if (parsed === undefined || parsed === null) {
    return {};
  }

  if (!isSection(parsed)) {
    throw new ConfigurationError(`Config file at ${absolutePath} must contain a YAML mapping`);
  }

  return parsed;
}

/**
 * Get a nested section, or an empty one when the key is absent
 */
export function getSection(parent: ConfigSection, key: string): ConfigSection {
  const value = parent[key];
  if (value === undefined || value === null) {
    return {};
  }
  if (!isSection(value)) {
    throw new ConfigurationError(`Config key '${key}' must be a mapping`);
  }
  return value;
}

export function readNumber(section: ConfigSection, key: string, defaultValue: number): number {
  const value = section[key];
  if (value === undefined || value === null) {
    return defaultValue;
  }
  if (typeof value !== 'number' || Number.isNaN(value)) {
    throw new ConfigurationError(`Config key '${key}' must be a number, got: ${String(value)}`);
  }
  return value;
}

export function readBoolean(section: ConfigSection, key: string, defaultValue: boolean): boolean {
  const value = section[key];
  if (value === undefined || value === null) {
    return defaultValue;
  }
  if (typeof value !== 'boolean') {
    throw new ConfigurationError(`Config key '${key}' must be a boolean, got: ${String(value)}`);
  }
  return value;
}

export function readString(section: ConfigSection, key: string, defaultValue: string): string {
  const value = section[key];
  if (value === undefined || value === null) {
    return defaultValue;
  }
  if (typeof value !== 'string') {
    throw new ConfigurationError(`Config key '${key}' must be a string, got: ${String(value)}`);
  }
  return value;
}

export function readStringList(
  section: ConfigSection,
  key: string,
  defaultValue: readonly string[]
): string[] {
  const value = section[key];
  if (value === undefined || value === null) {
    return [...defaultValue];
  }
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new ConfigurationError(`Config key '${key}' must be a list of strings`);
  }
  return [...value];
}
