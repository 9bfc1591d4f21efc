/**
 * Unit tests for the admission pipeline
 */

import { AdmissionPipeline } from '../../../src/core/admission-pipeline';
import { ManualClock } from '../../../src/core/clock';
import { RateLimiter } from '../../../src/core/rate-limiter';
import { Throttler } from '../../../src/core/throttler';
import {
  BackendError,
  TranslationRequestInput,
  UnsupportedPairError,
} from '../../../src/types';
import logger from '../../../src/utils/logger';
import { deferred, FakeTranslator } from '../../helpers/fake-translator';

interface PipelineSetup {
  requestsPerMinute?: number;
  burst?: number;
  rateLimitEnabled?: boolean;
  maxConcurrent?: number;
  throttlingEnabled?: boolean;
}

const FALLBACK = 'Translation service unavailable. Please try again later.';

const HELLO: TranslationRequestInput = {
  text: 'Hello world',
  source: 'en',
  target: 'es',
  outputFormat: 'json',
};

describe('AdmissionPipeline', () => {
  let clock: ManualClock;
  let translator: FakeTranslator;

  beforeEach(() => {
    clock = new ManualClock();
    translator = new FakeTranslator();
    jest.spyOn(logger, 'error').mockImplementation(() => logger);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  function createPipeline(setup: PipelineSetup = {}): AdmissionPipeline {
    return new AdmissionPipeline({
      rateLimiter: new RateLimiter({
        enabled: setup.rateLimitEnabled ?? true,
        requestsPerMinute: setup.requestsPerMinute ?? 60,
        burst: setup.burst ?? 10,
        clock,
      }),
      throttler: new Throttler({
        enabled: setup.throttlingEnabled ?? true,
        maxConcurrent: setup.maxConcurrent ?? 2,
        retryAfterSeconds: 1,
      }),
      translator,
      rules: {
        maxCharsPerRequest: 20,
        availablePackages: ['en-es', 'es-en'],
        outputFormats: ['json', 'text'],
      },
      fallbackResponse: FALLBACK,
    });
  }

  describe('successful translation', () => {
    it('should return the translation with every quota header', async () => {
      const pipeline = createPipeline();

      const outcome = await pipeline.translate(HELLO);

      expect(outcome).toEqual({
        status: 'ok',
        headers: {
          'X-RateLimit-Limit': '60',
          'X-RateLimit-Remaining': '9',
          'X-RateLimit-Reset': '0',
          'X-Throttle-Limit': '2',
          'X-Throttle-Usage': '1',
          'X-Throttle-Remaining': '1',
          'X-Translation-Characters': '11',
        },
        body: {
          payload: {
            translated: 'Translated: Hello world',
            source: 'en',
            target: 'es',
            original: 'Hello world',
          },
          outputFormat: 'json',
        },
      });
      expect(translator.calls).toEqual([{ text: 'Hello world', source: 'en', target: 'es' }]);
      expect(pipeline.throttler.snapshot().active).toBe(0);
    });

    it('should omit headers of disabled gates', async () => {
      const pipeline = createPipeline({ rateLimitEnabled: false, throttlingEnabled: false });

      const outcome = await pipeline.translate({ ...HELLO, outputFormat: 'text' });

      expect(outcome.status).toBe('ok');
      expect(outcome.headers).toEqual({ 'X-Translation-Characters': '11' });
    });

    it('should count characters by code point', async () => {
      const pipeline = createPipeline();

      const outcome = await pipeline.translate({ ...HELLO, text: 'héllo 👋' });

      expect(outcome.headers['X-Translation-Characters']).toBe('7');
    });
  });

  describe('rate limiting', () => {
    it('should answer 429 data once the bucket is empty', async () => {
      const pipeline = createPipeline({ burst: 1 });
      await pipeline.translate(HELLO);

      const outcome = await pipeline.translate(HELLO);

      expect(outcome).toEqual({
        status: 'rate_limited',
        headers: {
          'X-RateLimit-Limit': '60',
          'X-RateLimit-Remaining': '0',
          'X-RateLimit-Reset': '1',
          'Retry-After': '1',
        },
        body: { error: 'Too Many Requests', message: 'Rate limit exceeded' },
      });
      expect(translator.calls).toHaveLength(1);
    });

    it('should never take a throttle slot for a rate-limited request', async () => {
      const pipeline = createPipeline({ burst: 1 });
      await pipeline.translate(HELLO);
      const acquireSpy = jest.spyOn(pipeline.throttler, 'acquire');

      await pipeline.translate(HELLO);
      await pipeline.translate(HELLO);

      expect(acquireSpy).not.toHaveBeenCalled();
      expect(pipeline.throttler.snapshot().active).toBe(0);
    });

    it('should admit again once the clock has refilled a token', async () => {
      const pipeline = createPipeline({ burst: 1 });
      await pipeline.translate(HELLO);
      expect((await pipeline.translate(HELLO)).status).toBe('rate_limited');

      clock.advanceSeconds(1);

      expect((await pipeline.translate(HELLO)).status).toBe('ok');
    });
  });

  describe('throttling', () => {
    it('should answer 503 data while every slot is busy', async () => {
      const pipeline = createPipeline({ maxConcurrent: 1 });
      const pending = deferred<string>();
      translator.respondWith(() => pending.promise);

      const first = pipeline.translate(HELLO);
      const second = await pipeline.translate(HELLO);

      expect(second).toEqual({
        status: 'overloaded',
        headers: {
          'X-RateLimit-Limit': '60',
          'X-RateLimit-Remaining': '8',
          'X-RateLimit-Reset': '0',
          'X-Throttle-Limit': '1',
          'X-Throttle-Usage': '1',
          'X-Throttle-Remaining': '0',
          'Retry-After': '1',
        },
        body: { error: 'Service Unavailable', message: 'Service overloaded, try again later' },
      });

      pending.resolve('Hola mundo');
      const completed = await first;

      expect(completed.status).toBe('ok');
      expect(pipeline.throttler.snapshot().active).toBe(0);
      expect(translator.calls).toHaveLength(1);
    });
  });

  describe('failures inside the slot', () => {
    it('should map an unsupported pair from the backend to a bad request', async () => {
      const pipeline = createPipeline();
      translator.respondWith(async (_text, source, target) => {
        throw new UnsupportedPairError(source, target);
      });

      const outcome = await pipeline.translate(HELLO);

      expect(outcome).toEqual({
        status: 'bad_request',
        headers: {
          'X-RateLimit-Limit': '60',
          'X-RateLimit-Remaining': '9',
          'X-RateLimit-Reset': '0',
          'X-Throttle-Limit': '2',
          'X-Throttle-Usage': '1',
          'X-Throttle-Remaining': '1',
        },
        body: { error: 'Bad Request', message: 'Unsupported language pair: en-es' },
      });
      expect(pipeline.throttler.snapshot().active).toBe(0);
    });

    it('should map a backend fault to an internal error carrying the fallback message', async () => {
      const pipeline = createPipeline();
      translator.respondWith(async () => {
        throw new BackendError('connection refused');
      });

      const outcome = await pipeline.translate(HELLO);

      expect(outcome.status).toBe('internal_error');
      expect(outcome.body).toEqual({ error: 'Internal Server Error', message: FALLBACK });
      expect(outcome.headers['X-Throttle-Usage']).toBe('1');
      expect(pipeline.throttler.snapshot().active).toBe(0);
    });

    it('should release the slot when an arbitrary operation throws', async () => {
      const pipeline = createPipeline({ maxConcurrent: 1 });

      const outcome = await pipeline.handle(async () => {
        throw new TypeError('unexpected');
      });

      expect(outcome.status).toBe('internal_error');
      expect(pipeline.throttler.snapshot().active).toBe(0);
      expect((await pipeline.handle(async () => ({ body: 'next' }))).status).toBe('ok');
    });
  });

  describe('validation before admission', () => {
    const invalidRequests: Array<[string, TranslationRequestInput, string]> = [
      [
        'missing text',
        { source: 'en', target: 'es', outputFormat: 'json' },
        "Missing required fields. Need 'text', 'source', and 'target'",
      ],
      [
        'text too long',
        { ...HELLO, text: 'x'.repeat(21) },
        'Text exceeds maximum character limit of 20',
      ],
      [
        'pair not offered',
        { ...HELLO, target: 'ja' },
        'Unsupported language pair: en-ja. Supported pairs: en-es, es-en',
      ],
      [
        'unknown output format',
        { ...HELLO, outputFormat: 'xml' },
        'Unsupported output format. Supported formats: json, text',
      ],
    ];

    it.each(invalidRequests)('should reject %s without spending quota', async (_name, input, message) => {
      const pipeline = createPipeline();

      const outcome = await pipeline.translate(input);

      expect(outcome).toEqual({
        status: 'bad_request',
        headers: {
          'X-RateLimit-Limit': '60',
          'X-RateLimit-Remaining': '10',
          'X-RateLimit-Reset': '0',
          'X-Throttle-Limit': '2',
          'X-Throttle-Usage': '0',
          'X-Throttle-Remaining': '2',
        },
        body: { error: 'Bad Request', message },
      });
      expect(pipeline.rateLimiter.snapshot().tokens).toBe(10);
      expect(pipeline.throttler.snapshot().active).toBe(0);
      expect(translator.calls).toHaveLength(0);
    });

    it('should report the refilled level without storing it', async () => {
      const pipeline = createPipeline({ burst: 2 });
      await pipeline.translate(HELLO);
      await pipeline.translate(HELLO);
      clock.advance(500);

      const outcome = await pipeline.translate({ ...HELLO, text: undefined });

      expect(outcome.headers).toMatchObject({
        'X-RateLimit-Remaining': '0',
        'X-RateLimit-Reset': '1',
      });
      expect(outcome.headers['Retry-After']).toBeUndefined();
      expect(pipeline.rateLimiter.snapshot()).toMatchObject({ tokens: 0, lastRefillTime: 0 });
    });

    it('should send no quota headers when both gates are disabled', async () => {
      const pipeline = createPipeline({ rateLimitEnabled: false, throttlingEnabled: false });

      const outcome = await pipeline.translate({ ...HELLO, target: 'ja' });

      expect(outcome.status).toBe('bad_request');
      expect(outcome.headers).toEqual({});
    });
  });
});
