/**
 * Expectation model
 *
 * One expectation is a request matcher, a response definition and the
 * scheduling metadata (priority, times, progressive policy) the mocking
 * engine uses to pick between overlapping expectations.
 *
 * @module expectation/expectation-types
 */

import type { NameValueCollection } from './name-values';

// ============================================================================
// STRUCTURED VALUES
// ============================================================================

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

// ============================================================================
// BODY VARIANTS
// ============================================================================

/**
 * STRICT: every field must match. ONLY_MATCHING_FIELDS: fields the
 * matcher does not mention are ignored on the incoming request.
 */
export type MatchType = 'STRICT' | 'ONLY_MATCHING_FIELDS';

export const MATCH_TYPES: readonly MatchType[] = ['STRICT', 'ONLY_MATCHING_FIELDS'];

export interface JsonBodyMatcher {
  type: 'JSON';
  json: JsonValue;
  matchType?: MatchType;
}

export interface RegexBodyMatcher {
  type: 'REGEX';
  regex: string;
  /** Set when the operator accepted a pattern that does not compile */
  unsafe?: true;
}

export interface StringBodyMatcher {
  type: 'STRING';
  string: string;
}

export interface ParametersBodyMatcher {
  type: 'PARAMETERS';
  parameters: Array<{ name: string; values: string[] }>;
}

export type RequestBodyMatcher =
  | JsonBodyMatcher
  | RegexBodyMatcher
  | StringBodyMatcher
  | ParametersBodyMatcher;

export type RequestBodyType = RequestBodyMatcher['type'];

export interface JsonResponseBody {
  type: 'JSON';
  json: JsonValue;
}

export interface StringResponseBody {
  type: 'STRING';
  string: string;
}

export interface BinaryResponseBody {
  type: 'BINARY';
  base64Bytes: string;
  contentType?: string;
}

export type ResponseBody = JsonResponseBody | StringResponseBody | BinaryResponseBody;

// ============================================================================
// SCHEDULING
// ============================================================================

export type TimeUnit =
  | 'NANOSECONDS'
  | 'MICROSECONDS'
  | 'MILLISECONDS'
  | 'SECONDS'
  | 'MINUTES'
  | 'HOURS'
  | 'DAYS';

export const TIME_UNITS: readonly TimeUnit[] = [
  'NANOSECONDS',
  'MICROSECONDS',
  'MILLISECONDS',
  'SECONDS',
  'MINUTES',
  'HOURS',
  'DAYS',
];

export interface Delay {
  timeUnit: TimeUnit;
  value: number;
}

/** Match-count policy: unlimited, or a positive number of remaining matches */
export type Times = { unlimited: true } | { unlimited: false; remainingTimes: number };

export interface ProgressivePolicy {
  base: number;
  step: number;
  cap: number;
}

export interface ConnectionOptions {
  dropConnection?: boolean;
  suppressContentLengthHeader?: boolean;
  contentLengthHeaderOverride?: number;
  suppressConnectionHeader?: boolean;
  chunkSize?: number;
  keepAliveOverride?: boolean;
  closeSocket?: boolean;
  closeSocketDelay?: Delay;
}

// ============================================================================
// AGGREGATE
// ============================================================================

export interface HttpRequestMatcher {
  method: string;
  /** Literal path, or a regular expression when the operator asked for one */
  path: string;
  pathParameters?: Record<string, string[]>;
  queryStringParameters?: NameValueCollection;
  headers?: NameValueCollection;
  body?: RequestBodyMatcher;
}

export interface HttpResponseDefinition {
  statusCode: number;
  body?: ResponseBody;
  headers?: NameValueCollection;
  delay?: Delay;
  connectionOptions?: ConnectionOptions;
}

export interface Expectation {
  id?: string;
  description?: string;
  priority: number;
  httpRequest: HttpRequestMatcher;
  httpResponse: HttpResponseDefinition;
  times?: Times;
  progressive?: ProgressivePolicy;
}
