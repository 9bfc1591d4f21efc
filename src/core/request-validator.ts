import {
  OutputFormat,
  TranslationRequest,
  TranslationRequestInput,
  ValidationError,
} from '../types';

export interface TranslationRules {
  maxCharsPerRequest: number;
  availablePackages: readonly string[];
  outputFormats: readonly OutputFormat[];
}

/**
 * Character count as users see it (code points, not UTF-16 units)
 */
export function countCharacters(text: string): number {
  return Array.from(text).length;
}

function nonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim() !== '';
}

/**
 * Check a translation request before it is admitted. Throws ValidationError;
 * nothing here touches the rate limiter or the throttler.
 */
export function validateTranslationRequest(
  input: TranslationRequestInput,
  rules: TranslationRules
): TranslationRequest {
  const { text, source, target, outputFormat } = input;

  if (!nonEmptyString(text) || !nonEmptyString(source) || !nonEmptyString(target)) {
    throw new ValidationError("Missing required fields. Need 'text', 'source', and 'target'");
  }

  const format = rules.outputFormats.find((candidate) => candidate === outputFormat);
  if (!format) {
    throw new ValidationError(
      `Unsupported output format. Supported formats: ${rules.outputFormats.join(', ')}`,
      { outputFormat }
    );
  }

  const characters = countCharacters(text);
  if (characters > rules.maxCharsPerRequest) {
    throw new ValidationError(
      `Text exceeds maximum character limit of ${rules.maxCharsPerRequest}`,
      { characters }
    );
  }

  const pair = `${source}-${target}`;
  if (!rules.availablePackages.includes(pair)) {
    throw new ValidationError(
      `Unsupported language pair: ${pair}. Supported pairs: ${rules.availablePackages.join(', ')}`,
      { pair }
    );
  }

  return { text, source, target, outputFormat: format };
}
