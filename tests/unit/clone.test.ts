/**
 * Unit tests for the clone engine
 */
import {
  cloneExpectation,
  createExpectation,
  jsonBodyFromValue,
  jsonResponseBody,
  NameValueCollection,
  restoreExpectation,
} from '../../src/expectation';
import type { Expectation } from '../../src/expectation';

function sampleExpectation(): Expectation {
  const expectation = createExpectation({
    id: 'orders',
    description: 'List orders',
    priority: 3,
    httpRequest: {
      method: 'POST',
      path: '/orders/{id}',
      pathParameters: { id: ['[0-9]+'] },
      headers: NameValueCollection.fromRecord({ Accept: 'application/json' }),
      queryStringParameters: NameValueCollection.fromRecord({ page: '1' }),
      body: jsonBodyFromValue({ items: [{ sku: 'A-1', qty: 2 }] }, 'ONLY_MATCHING_FIELDS'),
    },
    httpResponse: {
      statusCode: 201,
      headers: NameValueCollection.fromRecord({ 'X-Request-Id': 'abc' }),
      body: jsonResponseBody({ created: true, tags: ['new'] }),
      delay: { timeUnit: 'MILLISECONDS', value: 50 },
      connectionOptions: { closeSocket: true, closeSocketDelay: { timeUnit: 'MILLISECONDS', value: 10 } },
    },
    times: { unlimited: false, remainingTimes: 2 },
  });
  expectation.progressive = { base: 100, step: 50, cap: 300 };
  return expectation;
}

describe('clone', () => {
  it('should produce an equal expectation', () => {
    const original = sampleExpectation();
    expect(cloneExpectation(original)).toEqual(original);
  });

  it('should share no storage with the original', () => {
    const original = sampleExpectation();
    const copy = cloneExpectation(original);

    copy.httpRequest.headers?.upsert('Accept', ['text/plain']);
    copy.httpRequest.queryStringParameters?.append('page', '2');
    copy.httpRequest.pathParameters?.['id'].push('x');
    if (copy.httpRequest.body?.type === 'JSON') {
      copy.httpRequest.body.json = null;
    }
    if (copy.httpResponse.body?.type === 'JSON') {
      copy.httpResponse.body.json = 'changed';
    }
    if (copy.httpResponse.delay) copy.httpResponse.delay.value = 999;
    if (copy.httpResponse.connectionOptions?.closeSocketDelay) {
      copy.httpResponse.connectionOptions.closeSocketDelay.value = 999;
    }
    if (copy.progressive) copy.progressive.cap = 1000;

    expect(original).toEqual(sampleExpectation());
  });

  it('should not change when the original is mutated afterwards', () => {
    const original = sampleExpectation();
    const copy = cloneExpectation(original);

    original.id = 'renamed';
    original.httpRequest.headers?.append('Accept', 'text/html');
    original.httpRequest.queryStringParameters?.delete('page');
    original.httpRequest.pathParameters?.['id'].push('[a-z]+');
    const json = original.httpResponse.body?.type === 'JSON' ? original.httpResponse.body.json : null;
    if (json !== null && typeof json === 'object' && !Array.isArray(json)) {
      const tags = json['tags'];
      if (Array.isArray(tags)) tags.push('mutated');
    }
    original.httpResponse.headers?.upsert('X-Request-Id', ['xyz']);
    if (original.httpResponse.delay) original.httpResponse.delay.value = 1;
    if (original.times && !original.times.unlimited) original.times.remainingTimes = 7;
    if (original.progressive) original.progressive.step = 5;

    expect(copy).toEqual(sampleExpectation());
  });

  it('should deep-copy nested JSON values', () => {
    const original = sampleExpectation();
    const copy = cloneExpectation(original);

    const body = original.httpResponse.body;
    const copiedBody = copy.httpResponse.body;
    expect(body?.type === 'JSON' && copiedBody?.type === 'JSON' && body.json !== copiedBody.json).toBe(true);
  });

  it('should pass absent expectations through', () => {
    expect(cloneExpectation(undefined)).toBeUndefined();
    expect(cloneExpectation(null)).toBeNull();
  });

  describe('restoreExpectation', () => {
    it('should revert an edited expectation in place', () => {
      const target = sampleExpectation();
      const snapshot = cloneExpectation(target);

      target.priority = 10;
      target.httpResponse.statusCode = 500;
      delete target.times;
      target.description = 'edited';

      restoreExpectation(target, snapshot);
      expect(target).toEqual(sampleExpectation());
    });

    it('should drop optional fields the snapshot did not have', () => {
      const target = createExpectation({ httpRequest: { method: 'GET', path: '/' } });
      const snapshot = cloneExpectation(target);
      target.id = 'added';
      target.times = { unlimited: true };

      restoreExpectation(target, snapshot);
      expect(target.id).toBeUndefined();
      expect(target.times).toBeUndefined();
    });
  });
});
