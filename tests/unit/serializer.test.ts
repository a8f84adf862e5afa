/**
 * Unit tests for MockServer JSON export and import
 */
import {
  computeExpectationStats,
  parseMockServerJson,
  toMockServerExpectation,
  toMockServerJson,
} from '../../src/serializer';
import {
  createExpectation,
  jsonBodyFromValue,
  jsonResponseBody,
  NameValueCollection,
  regexBody,
} from '../../src/expectation';
import type { Expectation } from '../../src/expectation';
import { JsonValidationError, ValidationError } from '../../src/errors';

function fullExpectation(): Expectation {
  const expectation = createExpectation({
    id: 'create-user',
    description: 'not exported',
    priority: 4,
    httpRequest: {
      method: 'POST',
      path: '/users',
      headers: NameValueCollection.fromRecord({ 'Content-Type': 'application/json' }),
      queryStringParameters: new NameValueCollection(),
      body: jsonBodyFromValue({ name: 'test-user' }, 'ONLY_MATCHING_FIELDS'),
    },
    httpResponse: {
      statusCode: 201,
      body: jsonResponseBody({ id: 1 }),
      delay: { timeUnit: 'MILLISECONDS', value: 100 },
      connectionOptions: { closeSocket: true },
    },
    times: { unlimited: false, remainingTimes: 2 },
  });
  expectation.progressive = { base: 100, step: 50, cap: 200 };
  return expectation;
}

describe('serializer', () => {
  describe('toMockServerExpectation', () => {
    it('should map the model to the wire format', () => {
      expect(toMockServerExpectation(fullExpectation())).toEqual({
        id: 'create-user',
        httpRequest: {
          method: 'POST',
          path: '/users',
          headers: [{ name: 'Content-Type', values: ['application/json'] }],
          body: { type: 'JSON', json: { name: 'test-user' }, matchType: 'ONLY_MATCHING_FIELDS' },
        },
        httpResponse: {
          statusCode: 201,
          body: { type: 'JSON', json: { id: 1 } },
          delay: { timeUnit: 'MILLISECONDS', value: 100 },
          connectionOptions: { closeSocket: true },
        },
        priority: 4,
        times: { remainingTimes: 2 },
      });
    });

    it('should put the id first and omit it on request', () => {
      expect(Object.keys(toMockServerExpectation(fullExpectation()))).toEqual([
        'id',
        'httpRequest',
        'httpResponse',
        'priority',
        'times',
      ]);
      expect('id' in toMockServerExpectation(fullExpectation(), { includeIds: false })).toBe(false);
    });

    it('should export absent times as unlimited and drop the unsafe tag', () => {
      const expectation = createExpectation({
        httpRequest: { method: 'GET', path: '/search', body: regexBody('[a-', { allowInvalid: true }) },
      });

      expect(toMockServerExpectation(expectation)).toEqual({
        httpRequest: { method: 'GET', path: '/search', body: { type: 'REGEX', regex: '[a-' } },
        httpResponse: { statusCode: 200 },
        priority: 0,
        times: { unlimited: true },
      });
    });
  });

  describe('toMockServerJson', () => {
    it('should write a single line with indent 0', () => {
      const expectation = createExpectation({ httpRequest: { method: 'GET', path: '/' } });

      expect(toMockServerJson([expectation], { indent: 0 })).toBe(
        '[{"httpRequest":{"method":"GET","path":"/"},"httpResponse":{"statusCode":200},"priority":0,"times":{"unlimited":true}}]'
      );
    });

    it('should indent with two spaces by default', () => {
      expect(toMockServerJson([])).toBe('[]');
      expect(toMockServerJson([fullExpectation()]).split('\n')[1]).toBe('  {');
    });
  });

  describe('parseMockServerJson', () => {
    it('should read back what was exported', () => {
      const original = fullExpectation();
      const [parsed] = parseMockServerJson(toMockServerJson([original]));

      expect(toMockServerExpectation(parsed)).toEqual(toMockServerExpectation(original));
      expect(parsed.times).toEqual({ unlimited: false, remainingTimes: 2 });
      expect(parsed.httpRequest.headers?.get('content-type')).toEqual(['application/json']);
    });

    it('should accept a single object, header records and plain bodies', () => {
      const [parsed] = parseMockServerJson(
        JSON.stringify({
          httpRequest: { method: 'PUT', path: '/items', headers: { Accept: 'text/plain' }, body: 'raw' },
          httpResponse: { body: { done: true } },
        })
      );

      expect(parsed.priority).toBe(0);
      expect(parsed.httpResponse.statusCode).toBe(200);
      expect(parsed.httpRequest.headers?.toArray()).toEqual([{ name: 'Accept', values: ['text/plain'] }]);
      expect(parsed.httpRequest.body).toEqual({ type: 'STRING', string: 'raw' });
      expect(parsed.httpResponse.body).toEqual({ type: 'JSON', json: { done: true } });
      expect(parsed.times).toBeUndefined();
    });

    it('should keep the values of headers repeated in another case', () => {
      const [parsed] = parseMockServerJson(
        JSON.stringify([
          {
            httpRequest: {
              method: 'GET',
              path: '/',
              headers: [
                { name: 'Accept', values: ['a'] },
                { name: 'accept', values: ['b'] },
              ],
            },
            httpResponse: {},
          },
        ])
      );

      expect(parsed.httpRequest.headers?.toArray()).toEqual([{ name: 'Accept', values: ['a', 'b'] }]);
    });

    it('should tag invalid regex bodies as unsafe', () => {
      const [parsed] = parseMockServerJson(
        '[{"httpRequest":{"method":"GET","path":"/","body":{"type":"REGEX","regex":"(("}},"httpResponse":{}}]'
      );

      expect(parsed.httpRequest.body).toEqual({ type: 'REGEX', regex: '((', unsafe: true });
    });

    it('should report shape errors with their location', () => {
      expect(() => parseMockServerJson('[{"httpResponse":{}}]')).toThrow(ValidationError);
      expect(() => parseMockServerJson('[{"httpResponse":{}}]')).toThrow(
        'invalid MockServer expectations: 0.httpRequest: Required'
      );
    });

    it('should reject text that is not JSON', () => {
      expect(() => parseMockServerJson('[{')).toThrow(JsonValidationError);
    });
  });

  describe('computeExpectationStats', () => {
    it('should count by method and status code', () => {
      const get = createExpectation({ httpRequest: { method: 'get', path: '/a' } });
      const post = createExpectation({
        httpRequest: { method: 'POST', path: '/b' },
        httpResponse: { statusCode: 201 },
      });

      expect(computeExpectationStats([get, post, get])).toEqual({
        total: 3,
        byMethod: { GET: 2, POST: 1 },
        byStatusCode: { '200': 2, '201': 1 },
      });
    });
  });
});
