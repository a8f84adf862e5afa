/**
 * Clone Engine
 *
 * Produces a copy of an expectation that shares no backing storage with
 * the original: every collection, record and optional object is
 * reallocated, and structured body values go through a JSON encode/decode
 * round trip. Used before destructive edits so a failed edit can be
 * reverted, and by progressive expansion.
 *
 * @module expectation/clone
 */

import type {
  ConnectionOptions,
  Delay,
  Expectation,
  HttpRequestMatcher,
  HttpResponseDefinition,
  JsonValue,
  RequestBodyMatcher,
  ResponseBody,
  Times,
} from './expectation-types';

/**
 * Structural copy of a JSON value via canonical encode/decode.
 */
export function deepCopyJson(value: JsonValue): JsonValue {
  const copy: JsonValue = JSON.parse(JSON.stringify(value));
  return copy;
}

function copyRecord(record: Record<string, string[]>): Record<string, string[]> {
  const copy: Record<string, string[]> = {};
  for (const [name, values] of Object.entries(record)) {
    copy[name] = [...values];
  }
  return copy;
}

function copyDelay(delay: Delay): Delay {
  return { timeUnit: delay.timeUnit, value: delay.value };
}

function copyTimes(times: Times): Times {
  return times.unlimited ? { unlimited: true } : { unlimited: false, remainingTimes: times.remainingTimes };
}

function copyConnectionOptions(options: ConnectionOptions): ConnectionOptions {
  const copy: ConnectionOptions = { ...options };
  if (options.closeSocketDelay) {
    copy.closeSocketDelay = copyDelay(options.closeSocketDelay);
  }
  return copy;
}

export function cloneRequestBody(body: RequestBodyMatcher): RequestBodyMatcher {
  switch (body.type) {
    case 'JSON':
      return { ...body, json: deepCopyJson(body.json) };
    case 'PARAMETERS':
      return {
        type: 'PARAMETERS',
        parameters: body.parameters.map((p) => ({ name: p.name, values: [...p.values] })),
      };
    case 'REGEX':
    case 'STRING':
      return { ...body };
  }
}

export function cloneResponseBody(body: ResponseBody): ResponseBody {
  if (body.type === 'JSON') {
    return { type: 'JSON', json: deepCopyJson(body.json) };
  }
  return { ...body };
}

function cloneRequest(request: HttpRequestMatcher): HttpRequestMatcher {
  const copy: HttpRequestMatcher = { method: request.method, path: request.path };
  if (request.pathParameters) copy.pathParameters = copyRecord(request.pathParameters);
  if (request.queryStringParameters) copy.queryStringParameters = request.queryStringParameters.clone();
  if (request.headers) copy.headers = request.headers.clone();
  if (request.body) copy.body = cloneRequestBody(request.body);
  return copy;
}

function cloneResponse(response: HttpResponseDefinition): HttpResponseDefinition {
  const copy: HttpResponseDefinition = { statusCode: response.statusCode };
  if (response.body) copy.body = cloneResponseBody(response.body);
  if (response.headers) copy.headers = response.headers.clone();
  if (response.delay) copy.delay = copyDelay(response.delay);
  if (response.connectionOptions) copy.connectionOptions = copyConnectionOptions(response.connectionOptions);
  return copy;
}

/**
 * Fully independent copy of `expectation`. An absent expectation clones
 * to itself.
 */
export function cloneExpectation(expectation: Expectation): Expectation;
export function cloneExpectation(expectation: Expectation | null | undefined): Expectation | null | undefined;
export function cloneExpectation(expectation: Expectation | null | undefined): Expectation | null | undefined {
  if (expectation === null || expectation === undefined) {
    return expectation;
  }

  const copy: Expectation = {
    priority: expectation.priority,
    httpRequest: cloneRequest(expectation.httpRequest),
    httpResponse: cloneResponse(expectation.httpResponse),
  };
  if (expectation.id !== undefined) copy.id = expectation.id;
  if (expectation.description !== undefined) copy.description = expectation.description;
  if (expectation.times) copy.times = copyTimes(expectation.times);
  if (expectation.progressive) copy.progressive = { ...expectation.progressive };
  return copy;
}

/**
 * Overwrite `target` in place with the contents of `snapshot` (a clone
 * taken before an edit), so references held by callers see the revert.
 */
export function restoreExpectation(target: Expectation, snapshot: Expectation): void {
  const restored = cloneExpectation(snapshot);
  delete target.id;
  delete target.description;
  delete target.times;
  delete target.progressive;
  Object.assign(target, restored);
}
