/**
 * Expectation construction helpers
 *
 * @module expectation/expectation
 */

import { InputValidationError } from '../errors';
import type {
  ConnectionOptions,
  Delay,
  Expectation,
  HttpRequestMatcher,
  HttpResponseDefinition,
  TimeUnit,
  Times,
} from './expectation-types';
import { NameValueCollection } from './name-values';

export interface ExpectationInit {
  id?: string;
  description?: string;
  priority?: number;
  httpRequest: HttpRequestMatcher;
  httpResponse?: Partial<HttpResponseDefinition>;
  times?: Times;
}

export function createExpectation(init: ExpectationInit): Expectation {
  const expectation: Expectation = {
    priority: init.priority ?? 0,
    httpRequest: init.httpRequest,
    httpResponse: { statusCode: 200, ...init.httpResponse },
  };
  if (init.id !== undefined) expectation.id = init.id;
  if (init.description !== undefined) expectation.description = init.description;
  if (init.times !== undefined) expectation.times = init.times;
  return expectation;
}

export function unlimitedTimes(): Times {
  return { unlimited: true };
}

/**
 * Limited match count; `count` must be a positive integer.
 */
export function limitedTimes(count: number): Times {
  if (!Number.isInteger(count) || count <= 0) {
    throw new InputValidationError('times', String(count), 'positive integer');
  }
  return { unlimited: false, remainingTimes: count };
}

export function millisecondsDelay(value: number): Delay {
  return createDelay(value, 'MILLISECONDS');
}

/**
 * Delay of `value` units; `value` must be a non-negative integer.
 */
export function createDelay(value: number, timeUnit: TimeUnit): Delay {
  if (!Number.isInteger(value) || value < 0) {
    throw new InputValidationError('delay', String(value), 'non-negative integer');
  }
  return { timeUnit, value };
}

/**
 * Response headers, created on first use.
 */
export function ensureResponseHeaders(expectation: Expectation): NameValueCollection {
  if (!expectation.httpResponse.headers) {
    expectation.httpResponse.headers = new NameValueCollection();
  }
  return expectation.httpResponse.headers;
}

/**
 * Request headers, created on first use.
 */
export function ensureRequestHeaders(expectation: Expectation): NameValueCollection {
  if (!expectation.httpRequest.headers) {
    expectation.httpRequest.headers = new NameValueCollection();
  }
  return expectation.httpRequest.headers;
}

/**
 * Query string parameters, created on first use.
 */
export function ensureQueryParameters(expectation: Expectation): NameValueCollection {
  if (!expectation.httpRequest.queryStringParameters) {
    expectation.httpRequest.queryStringParameters = new NameValueCollection();
  }
  return expectation.httpRequest.queryStringParameters;
}

export function ensureConnectionOptions(expectation: Expectation): ConnectionOptions {
  if (!expectation.httpResponse.connectionOptions) {
    expectation.httpResponse.connectionOptions = {};
  }
  return expectation.httpResponse.connectionOptions;
}

/**
 * Short one-line label: "GET /api/users -> 200 (description)".
 */
export function describeExpectation(expectation: Expectation): string {
  const { method, path } = expectation.httpRequest;
  const label = `${method.toUpperCase()} ${path} -> ${expectation.httpResponse.statusCode}`;
  return expectation.description ? `${label} (${expectation.description})` : label;
}
