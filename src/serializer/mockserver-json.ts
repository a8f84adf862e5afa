/**
 * MockServer JSON export / import
 *
 * @module serializer/mockserver-json
 */

import type { ZodIssue } from 'zod';
import { ValidationError } from '../errors';
import { parseJsonText } from '../expectation';
import type {
  ConnectionOptions,
  Delay,
  Expectation,
  HttpRequestMatcher,
  HttpResponseDefinition,
  RequestBodyMatcher,
  ResponseBody,
  Times,
} from '../expectation';
import { createLogger } from '../utils/logger';
import type {
  ExpectationInput,
  WireConnectionOptions,
  WireDelay,
  WireExpectation,
  WireRequest,
  WireRequestBody,
  WireResponse,
  WireResponseBody,
  WireTimes,
} from './wire-schema';
import { expectationListSchema } from './wire-schema';

const log = createLogger('serializer');

export interface ExportOptions {
  /** JSON indentation; 0 for a single line (default 2) */
  indent?: number;
  /** Emit `id` fields (default true) */
  includeIds?: boolean;
}

// ============================================================================
// EXPORT
// ============================================================================

function toWireDelay(delay: Delay): WireDelay {
  return { timeUnit: delay.timeUnit, value: delay.value };
}

function toWireTimes(times: Times | undefined): WireTimes {
  if (!times || times.unlimited) {
    return { unlimited: true };
  }
  return { remainingTimes: times.remainingTimes };
}

function toWireRequestBody(body: RequestBodyMatcher): WireRequestBody {
  switch (body.type) {
    case 'JSON':
      return body.matchType
        ? { type: 'JSON', json: body.json, matchType: body.matchType }
        : { type: 'JSON', json: body.json };
    case 'REGEX':
      return { type: 'REGEX', regex: body.regex };
    case 'STRING':
      return { type: 'STRING', string: body.string };
    case 'PARAMETERS':
      return {
        type: 'PARAMETERS',
        parameters: body.parameters.map((p) => ({ name: p.name, values: [...p.values] })),
      };
  }
}

function toWireResponseBody(body: ResponseBody): WireResponseBody {
  switch (body.type) {
    case 'JSON':
      return { type: 'JSON', json: body.json };
    case 'STRING':
      return { type: 'STRING', string: body.string };
    case 'BINARY':
      return body.contentType
        ? { type: 'BINARY', base64Bytes: body.base64Bytes, contentType: body.contentType }
        : { type: 'BINARY', base64Bytes: body.base64Bytes };
  }
}

function toWireConnectionOptions(options: ConnectionOptions): WireConnectionOptions {
  const { closeSocketDelay, ...flags } = options;
  const wire: WireConnectionOptions = { ...flags };
  if (closeSocketDelay) {
    wire.closeSocketDelay = toWireDelay(closeSocketDelay);
  }
  return wire;
}

function toWireRequest(request: HttpRequestMatcher): WireRequest {
  const wire: WireRequest = { method: request.method, path: request.path };
  if (request.pathParameters && Object.keys(request.pathParameters).length > 0) {
    wire.pathParameters = {};
    for (const [name, values] of Object.entries(request.pathParameters)) {
      wire.pathParameters[name] = [...values];
    }
  }
  if (request.queryStringParameters && request.queryStringParameters.size > 0) {
    wire.queryStringParameters = request.queryStringParameters.toArray();
  }
  if (request.headers && request.headers.size > 0) {
    wire.headers = request.headers.toArray();
  }
  if (request.body) {
    wire.body = toWireRequestBody(request.body);
  }
  return wire;
}

function toWireResponse(response: HttpResponseDefinition): WireResponse {
  const wire: WireResponse = { statusCode: response.statusCode };
  if (response.headers && response.headers.size > 0) {
    wire.headers = response.headers.toArray();
  }
  if (response.body) {
    wire.body = toWireResponseBody(response.body);
  }
  if (response.delay) {
    wire.delay = toWireDelay(response.delay);
  }
  if (response.connectionOptions && Object.keys(response.connectionOptions).length > 0) {
    wire.connectionOptions = toWireConnectionOptions(response.connectionOptions);
  }
  return wire;
}

/**
 * Wire form of one expectation. Description, progressive policy and the
 * unsafe-regex tag have no wire counterpart and are left out.
 */
export function toMockServerExpectation(expectation: Expectation, options: ExportOptions = {}): WireExpectation {
  const includeIds = options.includeIds ?? true;
  const wire: WireExpectation = {
    httpRequest: toWireRequest(expectation.httpRequest),
    httpResponse: toWireResponse(expectation.httpResponse),
    priority: expectation.priority,
    times: toWireTimes(expectation.times),
  };
  if (includeIds && expectation.id !== undefined) {
    return { id: expectation.id, ...wire };
  }
  return wire;
}

export function toMockServerJson(expectations: readonly Expectation[], options: ExportOptions = {}): string {
  const indent = options.indent ?? 2;
  const wire = expectations.map((expectation) => toMockServerExpectation(expectation, options));
  return JSON.stringify(wire, null, indent > 0 ? indent : undefined);
}

// ============================================================================
// IMPORT
// ============================================================================

export function formatZodIssue(issue: ZodIssue): string {
  const path = issue.path.join('.');
  return path ? `${path}: ${issue.message}` : issue.message;
}

function fromInput(input: ExpectationInput): Expectation {
  const { httpRequest, httpResponse } = input;

  const request: HttpRequestMatcher = { method: httpRequest.method, path: httpRequest.path };
  if (httpRequest.pathParameters) request.pathParameters = httpRequest.pathParameters;
  if (httpRequest.queryStringParameters) request.queryStringParameters = httpRequest.queryStringParameters;
  if (httpRequest.headers) request.headers = httpRequest.headers;
  if (httpRequest.body) request.body = httpRequest.body;

  const response: HttpResponseDefinition = { statusCode: httpResponse.statusCode };
  if (httpResponse.headers) response.headers = httpResponse.headers;
  if (httpResponse.body) response.body = httpResponse.body;
  if (httpResponse.delay) response.delay = httpResponse.delay;
  if (httpResponse.connectionOptions) response.connectionOptions = httpResponse.connectionOptions;

  const expectation: Expectation = { priority: input.priority, httpRequest: request, httpResponse: response };
  if (input.id !== undefined) expectation.id = input.id;
  if (input.times) expectation.times = input.times;
  return expectation;
}

/**
 * Read an exported MockServer JSON document (an array of expectations or
 * a single one) back into the model.
 *
 * @throws JsonValidationError when the text is not JSON
 * @throws ValidationError listing every shape problem
 */
export function parseMockServerJson(text: string): Expectation[] {
  const document = parseJsonText(text.trim(), 'MockServer expectations');
  const result = expectationListSchema.safeParse(Array.isArray(document) ? document : [document]);
  if (!result.success) {
    const details = result.error.issues.map(formatZodIssue);
    throw new ValidationError(`invalid MockServer expectations: ${details.join('; ')}`);
  }

  const expectations = result.data.map(fromInput);
  log.debug('Parsed MockServer expectations', { count: expectations.length });
  return expectations;
}

// ============================================================================
// STATS
// ============================================================================

export interface ExpectationStats {
  total: number;
  byMethod: Record<string, number>;
  byStatusCode: Record<string, number>;
}

export function computeExpectationStats(expectations: readonly Expectation[]): ExpectationStats {
  const stats: ExpectationStats = { total: expectations.length, byMethod: {}, byStatusCode: {} };
  for (const expectation of expectations) {
    const method = expectation.httpRequest.method.toUpperCase();
    const status = String(expectation.httpResponse.statusCode);
    stats.byMethod[method] = (stats.byMethod[method] ?? 0) + 1;
    stats.byStatusCode[status] = (stats.byStatusCode[status] ?? 0) + 1;
  }
  return stats;
}
