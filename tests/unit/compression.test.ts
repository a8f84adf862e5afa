/**
 * Unit tests for response body rendering and the compression transform
 */
import { gunzipSync, inflateSync } from 'zlib';
import {
  applyCompression,
  computeEtag,
  createExpectation,
  inferContentType,
  jsonResponseBody,
  NameValueCollection,
  renderBody,
  stringResponseBody,
} from '../../src/expectation';
import type { Expectation, JsonValue } from '../../src/expectation';
import { TransformError } from '../../src/errors';

function jsonExpectation(json: JsonValue = { message: 'hello' }): Expectation {
  return createExpectation({
    httpRequest: { method: 'GET', path: '/greeting' },
    httpResponse: { statusCode: 200, body: jsonResponseBody(json) },
  });
}

function decodedBody(expectation: Expectation): Buffer {
  const body = expectation.httpResponse.body;
  if (body?.type !== 'BINARY') {
    throw new Error(`expected a BINARY body, got ${body?.type}`);
  }
  return Buffer.from(body.base64Bytes, 'base64');
}

describe('response-body', () => {
  describe('inferContentType', () => {
    it('should infer JSON for JSON bodies and JSON-looking text', () => {
      expect(inferContentType(jsonResponseBody([1]))).toBe('application/json');
      expect(inferContentType(stringResponseBody(' {"a":1} '))).toBe('application/json');
    });

    it('should infer plain text for other strings', () => {
      expect(inferContentType(stringResponseBody('hello'))).toBe('text/plain; charset=utf-8');
    });

    it('should inspect binary bodies without a declared type', () => {
      const json = Buffer.from('{"x":1}').toString('base64');
      const text = Buffer.from('abc').toString('base64');

      expect(inferContentType({ type: 'BINARY', base64Bytes: json })).toBe('application/json');
      expect(inferContentType({ type: 'BINARY', base64Bytes: text })).toBe('application/octet-stream');
      expect(inferContentType({ type: 'BINARY', base64Bytes: text, contentType: 'image/png' })).toBe('image/png');
    });

    it('should return undefined without a body', () => {
      expect(inferContentType(undefined)).toBeUndefined();
    });
  });

  describe('renderBody', () => {
    it('should serialize JSON compactly', () => {
      expect(renderBody(jsonResponseBody({ a: [1, 2] })).bytes.toString('utf8')).toBe('{"a":[1,2]}');
    });

    it('should reject invalid base64', () => {
      expect(() => renderBody({ type: 'BINARY', base64Bytes: '!!!' })).toThrow(TransformError);
    });

    it('should render no body as zero bytes', () => {
      expect(renderBody(undefined)).toEqual({ bytes: Buffer.alloc(0) });
    });
  });

  describe('computeEtag', () => {
    it('should quote the SHA-1 hex digest', () => {
      expect(computeEtag(Buffer.alloc(0))).toBe('"da39a3ee5e6b4b0d3255bfef95601890afd80709"');
    });
  });
});

describe('compression', () => {
  describe('pre-compress', () => {
    it('should gzip a JSON body and describe the compressed entity', () => {
      const expectation = jsonExpectation();
      applyCompression(expectation, 'gzip', 'pre-compress');

      const compressed = decodedBody(expectation);
      const headers = expectation.httpResponse.headers;
      expect(gunzipSync(compressed).toString('utf8')).toBe('{"message":"hello"}');
      expect(headers?.get('Content-Encoding')).toEqual(['gzip']);
      expect(headers?.get('Vary')).toEqual(['Accept-Encoding']);
      expect(headers?.get('Content-Type')).toEqual(['application/json']);
      expect(headers?.get('Content-Length')).toEqual([String(compressed.length)]);
      expect(expectation.httpResponse.body).toEqual({
        type: 'BINARY',
        base64Bytes: compressed.toString('base64'),
        contentType: 'application/json',
      });
    });

    it('should use the zlib format for deflate', () => {
      const expectation = createExpectation({
        httpRequest: { method: 'GET', path: '/text' },
        httpResponse: { statusCode: 200, body: stringResponseBody('plain text') },
      });
      applyCompression(expectation, 'deflate', 'pre-compress');

      const bytes = decodedBody(expectation);
      expect([...bytes.subarray(0, 2)]).toEqual([0x78, 0x9c]);
      expect(inflateSync(bytes).toString('utf8')).toBe('plain text');
      expect(expectation.httpResponse.headers?.get('Content-Type')).toEqual(['text/plain; charset=utf-8']);
    });

    it('should merge Accept-Encoding into an existing Vary header', () => {
      const expectation = jsonExpectation();
      expectation.httpResponse.headers = NameValueCollection.fromRecord({ Vary: 'Origin' });
      applyCompression(expectation, 'gzip', 'pre-compress');
      applyCompression(expectation, 'gzip', 'headers-only');

      expect(expectation.httpResponse.headers.get('Vary')).toEqual(['Origin, Accept-Encoding']);
    });

    it('should recompute a present ETag from the compressed bytes', () => {
      const expectation = jsonExpectation();
      expectation.httpResponse.headers = NameValueCollection.fromRecord({ ETag: '"old"' });
      applyCompression(expectation, 'gzip', 'pre-compress');

      expect(expectation.httpResponse.headers.get('ETag')).toEqual([computeEtag(decodedBody(expectation))]);
    });

    it('should not add an ETag that was not there', () => {
      const expectation = jsonExpectation();
      applyCompression(expectation, 'gzip', 'pre-compress');

      expect(expectation.httpResponse.headers?.has('ETag')).toBe(false);
    });

    it('should drop Content-Encoding for identity and keep the body', () => {
      const expectation = jsonExpectation();
      expectation.httpResponse.headers = NameValueCollection.fromRecord({ 'Content-Encoding': 'gzip' });
      applyCompression(expectation, 'identity', 'pre-compress');

      expect(expectation.httpResponse.headers.has('Content-Encoding')).toBe(false);
      expect(expectation.httpResponse.body).toEqual(jsonResponseBody({ message: 'hello' }));
    });
  });

  describe('headers-only', () => {
    it('should advertise the encoding and leave the body alone', () => {
      const expectation = jsonExpectation();
      applyCompression(expectation, 'gzip');

      expect(expectation.httpResponse.headers?.toArray()).toEqual([
        { name: 'Content-Encoding', values: ['gzip'] },
        { name: 'Vary', values: ['Accept-Encoding'] },
        { name: 'Content-Type', values: ['application/json'] },
      ]);
      expect(expectation.httpResponse.body).toEqual(jsonResponseBody({ message: 'hello' }));
    });

    it('should keep a configured Content-Type', () => {
      const expectation = jsonExpectation();
      expectation.httpResponse.headers = NameValueCollection.fromRecord({ 'Content-Type': 'application/hal+json' });
      applyCompression(expectation, 'deflate', 'headers-only');

      expect(expectation.httpResponse.headers.get('Content-Type')).toEqual(['application/hal+json']);
    });
  });

  describe('failures', () => {
    it('should reject an unsupported algorithm and leave the expectation unchanged', () => {
      const expectation = jsonExpectation();

      expect(() => applyCompression(expectation, 'br', 'pre-compress')).toThrow(
        'unsupported compression algorithm: br'
      );
      expect(expectation).toEqual(jsonExpectation());
    });

    it('should reject an unknown mode', () => {
      expect(() => applyCompression(jsonExpectation(), 'gzip', 'lazy')).toThrow('unknown compression mode: lazy');
    });

    it('should fail on a body that cannot be serialized without touching it', () => {
      const cyclic: { [key: string]: JsonValue } = { name: 'loop' };
      cyclic['self'] = cyclic;
      const expectation = jsonExpectation(cyclic);
      const body = expectation.httpResponse.body;

      expect(() => applyCompression(expectation, 'gzip', 'pre-compress')).toThrow(TransformError);
      expect(expectation.httpResponse.body).toBe(body);
      expect(expectation.httpResponse.headers).toBeUndefined();
    });
  });
});
