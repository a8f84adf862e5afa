/**
 * Unit tests for the feature registry and appliers
 */
import {
  applyFeature,
  applyFeatureInput,
  FEATURE_CATEGORIES,
  FEATURES,
  isFeatureKey,
  listFeatureKeys,
} from '../../src/features';
import type { FeatureContext } from '../../src/features';
import {
  computeEtag,
  createExpectation,
  jsonResponseBody,
  NameValueCollection,
  renderBody,
} from '../../src/expectation';
import type { Expectation } from '../../src/expectation';
import { InputValidationError, ValidationError } from '../../src/errors';

function baseExpectation(): Expectation {
  return createExpectation({
    description: 'Users',
    httpRequest: { method: 'GET', path: '/users' },
    httpResponse: { statusCode: 200, body: jsonResponseBody([{ id: 1 }]) },
  });
}

const fixedRandom = (value: number): FeatureContext => ({ random: () => value });

describe('feature registry', () => {
  it('should group every feature into exactly one category', () => {
    const grouped = FEATURE_CATEGORIES.flatMap((category) => category.features);

    expect(grouped).toHaveLength(Object.keys(FEATURES).length);
    expect(new Set(grouped).size).toBe(grouped.length);
    expect(FEATURE_CATEGORIES.map((category) => category.label)).toEqual(['Response Behavior', 'Connection Control']);
  });

  it('should recognize feature keys', () => {
    expect(isFeatureKey('compression')).toBe(true);
    expect(isFeatureKey('teleport')).toBe(false);
    expect(listFeatureKeys()).toContain('drop-connection');
  });

  it('should restore the expectation when an applier throws', () => {
    const expectation = baseExpectation();

    expect(() => applyFeature(expectation, 'compression', { algorithm: 'zstd', mode: 'pre-compress' })).toThrow(
      'unsupported compression algorithm: zstd'
    );
    expect(expectation).toEqual(baseExpectation());
  });

  it('should report schema issues for raw options', () => {
    const expectation = baseExpectation();

    expect(() => applyFeatureInput(expectation, 'limits', { mode: 'count', count: 0 })).toThrow(ValidationError);
    expect(() => applyFeatureInput(expectation, 'limits', { mode: 'count', count: 0 })).toThrow(
      "invalid options for feature 'limits': count: Number must be greater than 0"
    );
  });
});

describe('response behavior features', () => {
  describe('delays', () => {
    it('should set a fixed delay', () => {
      const expectation = baseExpectation();
      applyFeature(expectation, 'delays', { mode: 'fixed', value: 250 });

      expect(expectation.httpResponse.delay).toEqual({ timeUnit: 'MILLISECONDS', value: 250 });
    });

    it('should pick a delay from a range with the injected random source', () => {
      const expectation = baseExpectation();
      applyFeature(expectation, 'delays', { mode: 'range', min: 100, max: 200 }, fixedRandom(0.5));

      expect(expectation.httpResponse.delay?.value).toBe(150);
      expect(expectation.description).toBe('Users [delay 150ms from 100-200]');
    });

    it('should include both range bounds', () => {
      const low = baseExpectation();
      const high = baseExpectation();
      applyFeature(low, 'delays', { mode: 'range', min: 10, max: 20 }, fixedRandom(0));
      applyFeature(high, 'delays', { mode: 'range', min: 10, max: 20 }, fixedRandom(0.999));

      expect(low.httpResponse.delay?.value).toBe(10);
      expect(high.httpResponse.delay?.value).toBe(20);
    });

    it('should reject an inverted range', () => {
      expect(() => applyFeature(baseExpectation(), 'delays', { mode: 'range', min: 20, max: 10 })).toThrow(
        InputValidationError
      );
    });

    it('should store a progressive policy and start at base', () => {
      const expectation = baseExpectation();
      applyFeature(expectation, 'delays', { mode: 'progressive', base: 100, step: 50, cap: 300 });

      expect(expectation.httpResponse.delay).toEqual({ timeUnit: 'MILLISECONDS', value: 100 });
      expect(expectation.times).toEqual({ unlimited: false, remainingTimes: 1 });
      expect(expectation.progressive).toEqual({ base: 100, step: 50, cap: 300 });
      expect(expectation.description).toBe('Users [progressive delay: base=100, step=50, cap=300]');
    });

    it('should reject inconsistent progressive bounds', () => {
      const expectation = baseExpectation();

      expect(() =>
        applyFeature(expectation, 'delays', { mode: 'progressive', base: 300, step: 50, cap: 100 })
      ).toThrow("invalid progressive delay value 'base=300, step=50, cap=100' (expected: step > 0, base >= 0, cap >= base)");
      expect(expectation.progressive).toBeUndefined();
    });
  });

  describe('limits and priority', () => {
    it('should set a match count', () => {
      const expectation = baseExpectation();
      applyFeature(expectation, 'limits', { mode: 'count', count: 3 });

      expect(expectation.times).toEqual({ unlimited: false, remainingTimes: 3 });
    });

    it('should set unlimited matches', () => {
      const expectation = baseExpectation();
      applyFeatureInput(expectation, 'limits', { mode: 'unlimited' });

      expect(expectation.times).toEqual({ unlimited: true });
    });

    it('should set the priority', () => {
      const expectation = baseExpectation();
      applyFeatureInput(expectation, 'priority', { priority: 7 });

      expect(expectation.priority).toBe(7);
    });
  });

  describe('content-length-headers', () => {
    it('should switch between override and suppress', () => {
      const expectation = baseExpectation();
      applyFeature(expectation, 'content-length-headers', { mode: 'override', value: 42 });
      expect(expectation.httpResponse.connectionOptions).toEqual({ contentLengthHeaderOverride: 42 });

      applyFeature(expectation, 'content-length-headers', { mode: 'suppress' });
      expect(expectation.httpResponse.connectionOptions).toEqual({ suppressContentLengthHeader: true });
    });
  });

  describe('caching', () => {
    it('should set Cache-Control and an ETag of the body bytes', () => {
      const expectation = baseExpectation();
      applyFeatureInput(expectation, 'caching', { cacheControl: 'public, max-age=300' });

      expect(expectation.httpResponse.headers?.toArray()).toEqual([
        { name: 'Cache-Control', values: ['public, max-age=300'] },
        { name: 'ETag', values: [computeEtag(Buffer.from('[{"id":1}]'))] },
      ]);
      expect(computeEtag(renderBody(expectation.httpResponse.body).bytes)).toBe(
        computeEtag(Buffer.from('[{"id":1}]'))
      );
    });

    it('should skip the ETag when disabled', () => {
      const expectation = baseExpectation();
      applyFeatureInput(expectation, 'caching', { cacheControl: 'no-store', etag: false });

      expect(expectation.httpResponse.headers?.has('ETag')).toBe(false);
    });
  });

  describe('compression', () => {
    it('should normalize the algorithm and default to headers-only', () => {
      const expectation = baseExpectation();
      applyFeatureInput(expectation, 'compression', { algorithm: ' GZIP ' });

      expect(expectation.httpResponse.headers?.get('Content-Encoding')).toEqual(['gzip']);
      expect(expectation.httpResponse.body).toEqual(jsonResponseBody([{ id: 1 }]));
    });
  });
});

describe('connection control features', () => {
  it('should enable chunking and drop conflicting headers', () => {
    const expectation = baseExpectation();
    expectation.httpResponse.headers = NameValueCollection.fromRecord({
      'Content-Length': '10',
      'Transfer-Encoding': 'chunked',
      'X-Keep': 'yes',
    });
    applyFeature(expectation, 'chunked-encoding', { chunkSize: 512 });

    expect(expectation.httpResponse.connectionOptions).toEqual({ chunkSize: 512 });
    expect(expectation.httpResponse.headers.names()).toEqual(['X-Keep']);
  });

  it('should treat chunk size 0 as a no-op', () => {
    const expectation = baseExpectation();
    applyFeature(expectation, 'chunked-encoding', { chunkSize: 0 });

    expect(expectation).toEqual(baseExpectation());
  });

  it('should let keep-alive cancel a socket close', () => {
    const expectation = baseExpectation();
    expectation.httpResponse.headers = NameValueCollection.fromRecord({ Connection: 'close' });
    applyFeature(expectation, 'close-socket', { delayMs: 50 });
    applyFeature(expectation, 'keep-alive', {});

    expect(expectation.httpResponse.connectionOptions).toEqual({ closeSocket: false, keepAliveOverride: true });
    expect(expectation.httpResponse.headers.has('Connection')).toBe(false);
  });

  it('should set the remaining connection flags', () => {
    const expectation = baseExpectation();
    applyFeatureInput(expectation, 'suppress-connection-header', undefined);
    applyFeatureInput(expectation, 'drop-connection', {});
    applyFeatureInput(expectation, 'close-socket', { delayMs: 25 });

    expect(expectation.httpResponse.connectionOptions).toEqual({
      suppressConnectionHeader: true,
      dropConnection: true,
      closeSocket: true,
      closeSocketDelay: { timeUnit: 'MILLISECONDS', value: 25 },
    });
  });
});
