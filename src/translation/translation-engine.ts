import axios, { AxiosInstance, isAxiosError } from 'axios';
import { LRUCache } from 'lru-cache';
import { BackendError, TranslationService, UnsupportedPairError } from '../types';
import logger from '../utils/logger';

export interface TranslationEngineOptions {
  baseUrl: string;
  timeoutMs: number;
  languageCacheTtlMs: number;
  // Pre-configured client, mainly so tests can plug in an in-process adapter
  http?: AxiosInstance;
}

/**
 * One entry of the backend's GET /languages index
 */
interface BackendLanguage {
  code: string;
  targets: string[];
}

const LANGUAGES_KEY = 'languages';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

export function packageKey(from: string, to: string): string {
  return `${from}-${to}`;
}

/**
 * Split a `from-to` package code; null when malformed
 */
export function parsePackageCode(code: string): { from: string; to: string } | null {
  const parts = code.split('-');
  if (parts.length !== 2 || !parts[0] || !parts[1]) {
    return null;
  }
  return { from: parts[0], to: parts[1] };
}

function parseLanguages(data: unknown): BackendLanguage[] {
  if (!Array.isArray(data)) {
    throw new BackendError('Translation backend returned a malformed language index');
  }

  return data.map((entry) => {
    if (!isRecord(entry) || typeof entry.code !== 'string') {
      throw new BackendError('Translation backend returned a malformed language entry', { entry });
    }
    return {
      code: entry.code,
      targets: isStringArray(entry.targets) ? entry.targets : [],
    };
  });
}

function describeFailure(error: unknown): { message: string; status?: number } {
  if (isAxiosError(error)) {
    return { message: error.message, status: error.response?.status };
  }
  return { message: error instanceof Error ? error.message : String(error) };
}

/**
 * Client for a LibreTranslate-compatible translation backend.
 *
 * A language pair counts as installed once the backend's language index
 * lists the source with the target among its targets. The index is cached
 * for `languageCacheTtlMs`.
 */
export class TranslationEngine implements TranslationService {
  private readonly http: AxiosInstance;
  private readonly languageCache: LRUCache<string, BackendLanguage[]>;
  private readonly installed = new Set<string>();

  constructor(options: TranslationEngineOptions) {
    this.http =
      options.http ??
      axios.create({
        baseURL: options.baseUrl,
        timeout: options.timeoutMs,
        headers: { 'Content-Type': 'application/json' },
      });

    this.languageCache = new LRUCache<string, BackendLanguage[]>({
      max: 1,
      ttl: options.languageCacheTtlMs,
    });
  }

  installedPackages(): string[] {
    return [...this.installed].sort();
  }

  /**
   * Install every configured pair. Failures are logged, never thrown: pairs
   * left out here are retried on first use.
   */
  async installConfiguredPackages(packages: readonly string[]): Promise<void> {
    for (const [index, code] of packages.entries()) {
      const pair = parsePackageCode(code);
      if (!pair) {
        logger.error('Invalid package code format', { package: code });
        continue;
      }

      try {
        await this.installPackage(pair.from, pair.to);
      } catch (error) {
        logger.error('Failed to install package', {
          package: code,
          ...describeFailure(error),
        });

        // Every remaining pair needs the same language index
        if (error instanceof BackendError) {
          logger.warn('Translation backend unreachable; remaining packages install on first use', {
            skipped: packages.slice(index + 1),
          });
          break;
        }
      }
    }

    logger.info('Translation packages ready', { installed: this.installedPackages() });
  }

  /**
   * Mark a pair installed if the backend offers it
   */
  async installPackage(from: string, to: string): Promise<boolean> {
    const key = packageKey(from, to);
    if (this.installed.has(key)) {
      return true;
    }

    const languages = await this.getLanguages();
    const source = languages.find((language) => language.code === from);

    if (!source || !source.targets.includes(to)) {
      logger.warn('Package not found on translation backend', { package: key });
      return false;
    }

    this.installed.add(key);
    logger.info('Package installed', { package: key });
    return true;
  }

  async translate(text: string, source: string, target: string): Promise<string> {
    if (!(await this.installPackage(source, target))) {
      throw new UnsupportedPairError(source, target);
    }

    let data: unknown;
    try {
      const response = await this.http.post<unknown>('/translate', {
        q: text,
        source,
        target,
        format: 'text',
      });
      data = response.data;
    } catch (error) {
      const failure = describeFailure(error);
      throw new BackendError(`Translation request failed: ${failure.message}`, failure);
    }

    if (!isRecord(data) || typeof data.translatedText !== 'string') {
      throw new BackendError('Translation backend returned a malformed response');
    }

    return data.translatedText;
  }

  private async getLanguages(): Promise<BackendLanguage[]> {
    const cached = this.languageCache.get(LANGUAGES_KEY);
    if (cached) {
      return cached;
    }

    let data: unknown;
    try {
      const response = await this.http.get<unknown>('/languages');
      data = response.data;
    } catch (error) {
      const failure = describeFailure(error);
      throw new BackendError(`Failed to load language index: ${failure.message}`, failure);
    }

    const languages = parseLanguages(data);
    this.languageCache.set(LANGUAGES_KEY, languages);
    logger.debug('Language index refreshed', { languages: languages.length });
    return languages;
  }
}
