import { Request } from 'express';
import { TranslationRequestInput } from '../types';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function firstString(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value;
  }
  if (Array.isArray(value) && typeof value[0] === 'string') {
    return value[0];
  }
  return undefined;
}

/**
 * Read a translation request from a JSON body, a form body or the query
 * string. JSON requests default to JSON output, the others to plain text.
 */
export function parseTranslationRequest(req: Request): TranslationRequestInput {
  const body: unknown = req.body;

  if (req.is('application/json')) {
    const fields = isRecord(body) ? body : {};
    const outputFormat = fields.outputFormat;

    return {
      text: fields.text,
      source: fields.source,
      target: fields.target,
      outputFormat: typeof outputFormat === 'string' ? outputFormat : 'json',
    };
  }

  const form = isRecord(body) ? body : {};
  const query: Record<string, unknown> = req.query;
  const field = (name: string) => firstString(form[name]) ?? firstString(query[name]);

  return {
    text: field('text'),
    source: field('source'),
    target: field('target'),
    outputFormat: field('outputFormat') ?? 'text',
  };
}
