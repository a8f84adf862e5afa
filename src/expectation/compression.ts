/**
 * Compression Transform
 *
 * headers-only: advertise an encoding without touching the body.
 * pre-compress: compress the body bytes and store them as a BINARY body,
 * with Content-Encoding, Vary, Content-Type, Content-Length and ETag
 * describing the compressed entity.
 *
 * The transform is all-or-nothing: new headers and body are computed on
 * copies and only assigned once every step succeeded.
 *
 * @module expectation/compression
 */

import { deflateSync, gzipSync } from 'zlib';
import { TransformError } from '../errors';
import { createLogger } from '../utils/logger';
import { binaryResponseBody } from './body-matchers';
import type { Expectation, ResponseBody } from './expectation-types';
import { NameValueCollection } from './name-values';
import { computeEtag, inferContentType, renderBody } from './response-body';

const log = createLogger('compression');

export type CompressionAlgorithm = 'identity' | 'gzip' | 'deflate';
export type CompressionMode = 'headers-only' | 'pre-compress';

export const COMPRESSION_ALGORITHMS: readonly CompressionAlgorithm[] = ['identity', 'gzip', 'deflate'];
export const COMPRESSION_MODES: readonly CompressionMode[] = ['headers-only', 'pre-compress'];

export function isCompressionAlgorithm(value: string): value is CompressionAlgorithm {
  return COMPRESSION_ALGORITHMS.some((algorithm) => algorithm === value);
}

export function isCompressionMode(value: string): value is CompressionMode {
  return COMPRESSION_MODES.some((mode) => mode === value);
}

/**
 * Compress bytes. `deflate` produces the zlib-wrapped stream (RFC 1950)
 * that `Content-Encoding: deflate` names, not a raw RFC 1951 stream:
 * a client that inflates raw deflate must strip the 2-byte header and
 * 4-byte Adler-32 trailer first.
 */
export function compressBytes(bytes: Uint8Array, algorithm: Exclude<CompressionAlgorithm, 'identity'>): Buffer {
  try {
    return algorithm === 'gzip' ? gzipSync(bytes) : deflateSync(bytes);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new TransformError(`compression failed: ${reason}`, 'compress', error);
  }
}

function advertiseEncoding(headers: NameValueCollection, algorithm: CompressionAlgorithm): void {
  if (algorithm === 'identity') {
    headers.delete('Content-Encoding');
    return;
  }
  headers.upsert('Content-Encoding', [algorithm]);
  headers.mergeToken('Vary', 'Accept-Encoding');
}

/**
 * Apply a compression policy to the expectation's response.
 *
 * @throws TransformError for an unsupported algorithm or mode, or a body
 *   that cannot be rendered to bytes; the expectation is then unchanged.
 */
export function applyCompression(expectation: Expectation, algorithm: string, mode: string = 'headers-only'): void {
  if (!isCompressionAlgorithm(algorithm)) {
    throw new TransformError(`unsupported compression algorithm: ${algorithm}`, 'compress');
  }
  if (!isCompressionMode(mode)) {
    throw new TransformError(`unknown compression mode: ${mode}`, 'compress');
  }

  const response = expectation.httpResponse;
  const headers = response.headers ? response.headers.clone() : new NameValueCollection();
  let body: ResponseBody | undefined = response.body;

  if (mode === 'headers-only' || algorithm === 'identity') {
    advertiseEncoding(headers, algorithm);
    if (mode === 'headers-only' && !headers.has('Content-Type')) {
      const contentType = inferContentType(response.body);
      if (contentType) headers.upsert('Content-Type', [contentType]);
    }
  } else {
    const rendered = renderBody(response.body);
    const compressed = compressBytes(rendered.bytes, algorithm);

    advertiseEncoding(headers, algorithm);
    if (rendered.contentType) {
      headers.upsert('Content-Type', [rendered.contentType]);
    }
    headers.upsert('Content-Length', [String(compressed.length)]);

    const etag = headers.first('ETag');
    if (etag !== undefined && etag.trim() !== '') {
      headers.upsert('ETag', [computeEtag(compressed)]);
    }

    body = binaryResponseBody(compressed, rendered.contentType);
    log.debug('Pre-compressed response body', {
      algorithm,
      originalBytes: rendered.bytes.length,
      compressedBytes: compressed.length,
    });
  }

  response.headers = headers;
  if (body) {
    response.body = body;
  }
}
