/**
 * Response body rendering
 *
 * Converts a response body variant into the bytes the mocking engine
 * would transmit, infers its content type, and derives entity tags from
 * those bytes.
 *
 * @module expectation/response-body
 */

import { createHash } from 'crypto';
import { TransformError } from '../errors';
import type { ResponseBody } from './expectation-types';
import { isValidJson } from './body-matchers';

export const CONTENT_TYPE_JSON = 'application/json';
export const CONTENT_TYPE_TEXT = 'text/plain; charset=utf-8';
export const CONTENT_TYPE_OCTET_STREAM = 'application/octet-stream';

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

export interface RenderedBody {
  bytes: Buffer;
  /** Undefined when there is no body */
  contentType?: string;
}

function decodeBase64(encoded: string): Buffer {
  const compact = encoded.replace(/\s+/g, '');
  if (compact.length % 4 !== 0 || !BASE64_PATTERN.test(compact)) {
    throw new TransformError('binary body is not valid base64', 'render body');
  }
  return Buffer.from(compact, 'base64');
}

/**
 * Content type a body would be served with when none is configured.
 */
export function inferContentType(body: ResponseBody | undefined): string | undefined {
  if (!body) return undefined;
  switch (body.type) {
    case 'JSON':
      return CONTENT_TYPE_JSON;
    case 'STRING':
      return isValidJson(body.string.trim()) ? CONTENT_TYPE_JSON : CONTENT_TYPE_TEXT;
    case 'BINARY': {
      if (body.contentType) return body.contentType;
      let text: string;
      try {
        text = decodeBase64(body.base64Bytes).toString('utf8').trim();
      } catch {
        return CONTENT_TYPE_OCTET_STREAM;
      }
      return text !== '' && isValidJson(text) ? CONTENT_TYPE_JSON : CONTENT_TYPE_OCTET_STREAM;
    }
  }
}

/**
 * Canonical bytes of a body: JSON serialized, text as UTF-8, binary
 * decoded from base64.
 */
export function renderBody(body: ResponseBody | undefined): RenderedBody {
  if (!body) {
    return { bytes: Buffer.alloc(0) };
  }

  const contentType = inferContentType(body);
  switch (body.type) {
    case 'JSON': {
      let text: string;
      try {
        text = JSON.stringify(body.json);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new TransformError(`cannot serialize JSON body: ${reason}`, 'render body', error);
      }
      return { bytes: Buffer.from(text, 'utf8'), contentType };
    }
    case 'STRING':
      return { bytes: Buffer.from(body.string, 'utf8'), contentType };
    case 'BINARY':
      return { bytes: decodeBase64(body.base64Bytes), contentType };
  }
}

/**
 * Strong entity tag: quoted SHA-1 hex of the bytes.
 */
export function computeEtag(bytes: Uint8Array): string {
  return `"${createHash('sha1').update(bytes).digest('hex')}"`;
}
