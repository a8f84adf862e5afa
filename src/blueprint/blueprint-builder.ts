/**
 * Blueprint Builder
 *
 * Turns blueprint entries into expectations: request and response are
 * assembled with the body-matcher constructors, then each feature is
 * applied in order. `buildBatch` runs the whole pipeline used by
 * `mockcraft build`: build, validate, expand progressive ramps.
 */

import { BlueprintError, isMockcraftError } from '../errors';
import {
  applyGraphQLRequest,
  assertValidExpectations,
  buildPatternValues,
  createDelay,
  createExpectation,
  expandProgressive,
  jsonBody,
  jsonBodyFromValue,
  jsonResponseBody,
  NameValueCollection,
  parametersBody,
  regexBody,
  stringBody,
  stringResponseBody,
  validateRegex,
} from '../expectation';
import type {
  Expectation,
  HttpRequestMatcher,
  HttpResponseDefinition,
  MatchType,
  RequestBodyMatcher,
  ValidationReport,
} from '../expectation';
import { applyFeatureInput, defaultFeatureContext } from '../features';
import type { FeatureContext } from '../features';
import { DEFAULT_DEFAULTS_SETTINGS } from '../config';
import type { DefaultsSettings } from '../config';
import { createLogger } from '../utils/logger';
import type {
  Blueprint,
  BlueprintEntry,
  BlueprintNameValues,
  BlueprintRequest,
  BlueprintRequestBody,
  BlueprintResponse,
} from './blueprint-schema';

const log = createLogger('builder');

export interface BuildOptions {
  defaults?: DefaultsSettings;
  featureContext?: FeatureContext;
}

function toList(value: string | string[]): string[] {
  return Array.isArray(value) ? value : [value];
}

function toCollection(input: BlueprintNameValues): NameValueCollection {
  const collection = new NameValueCollection();
  if (Array.isArray(input)) {
    for (const entry of input) {
      collection.merge(entry.name, toList(entry.values));
    }
  } else {
    for (const [name, values] of Object.entries(input)) {
      collection.merge(name, toList(values));
    }
  }
  return collection;
}

function buildRequestBody(body: BlueprintRequestBody, defaultMatchType: MatchType): RequestBodyMatcher {
  switch (body.type) {
    case 'json': {
      const matchType = body.match_type ?? defaultMatchType;
      if (typeof body.json === 'string') {
        return jsonBody(body.json, { matchType, fallbackToString: body.fallback_to_string });
      }
      return jsonBodyFromValue(body.json, matchType);
    }
    case 'regex':
      return regexBody(body.regex, { allowInvalid: body.allow_invalid });
    case 'string':
      return stringBody(body.string);
    case 'parameters':
      return parametersBody(body.parameters);
  }
}

function buildRequest(request: BlueprintRequest, defaults: DefaultsSettings): HttpRequestMatcher {
  if (request.path_regex) {
    validateRegex(request.path, 'path matching');
  }

  const matcher: HttpRequestMatcher = {
    method: (request.method ?? 'GET').toUpperCase(),
    path: request.path,
  };

  if (request.path_parameters) {
    matcher.pathParameters = {};
    for (const [name, values] of Object.entries(request.path_parameters)) {
      matcher.pathParameters[name] = buildPatternValues(toList(values), 'path parameter matching', { regex: true });
    }
  }
  if (request.query) {
    matcher.queryStringParameters = toCollection(request.query);
  }
  if (request.headers) {
    matcher.headers = toCollection(request.headers);
  }

  if (request.graphql) {
    applyGraphQLRequest(matcher, {
      query: request.graphql.query,
      variables: request.graphql.variables,
      transport: request.graphql.transport ?? (request.method?.toUpperCase() === 'GET' ? 'GET' : 'POST'),
      matchType: request.graphql.match_type ?? defaults.json_match_type,
    });
  } else if (request.body) {
    matcher.body = buildRequestBody(request.body, defaults.json_match_type);
  }

  return matcher;
}

function buildResponse(response: BlueprintResponse, defaults: DefaultsSettings): HttpResponseDefinition {
  const definition: HttpResponseDefinition = { statusCode: response.status };
  if (response.headers) {
    definition.headers = toCollection(response.headers);
  }
  if (response.body !== undefined) {
    definition.body = jsonResponseBody(response.body);
  } else if (response.body_text !== undefined) {
    definition.body = stringResponseBody(response.body_text);
  }
  if (response.delay !== undefined) {
    definition.delay = createDelay(response.delay, defaults.delay_time_unit);
  }
  return definition;
}

function entryLabel(entry: BlueprintEntry, index: number): string {
  return entry.id ? `'${entry.id}'` : `#${index}`;
}

/**
 * Build one entry.
 *
 * @throws BlueprintError naming the entry, with the underlying problem as
 *   its issue
 */
export function buildExpectation(
  entry: BlueprintEntry,
  index: number,
  options: BuildOptions = {},
  source?: string
): Expectation {
  const defaults = options.defaults ?? DEFAULT_DEFAULTS_SETTINGS;
  const context = options.featureContext ?? defaultFeatureContext;
  let step = 'request';

  try {
    const expectation = createExpectation({
      id: entry.id,
      description: entry.description,
      priority: entry.priority,
      httpRequest: buildRequest(entry.request, defaults),
    });
    step = 'response';
    expectation.httpResponse = buildResponse(entry.response, defaults);

    for (const feature of entry.features) {
      step = `feature ${feature.key}`;
      applyFeatureInput(expectation, feature.key, feature.options, context);
    }
    return expectation;
  } catch (error) {
    if (!isMockcraftError(error)) throw error;
    throw new BlueprintError(`cannot build expectation ${entryLabel(entry, index)} (${step})`, source, [
      error.message,
    ]);
  }
}

export function buildExpectations(blueprint: Blueprint, options: BuildOptions = {}): Expectation[] {
  return blueprint.entries.map((entry, index) => buildExpectation(entry, index, options, blueprint.source));
}

export interface BatchOptions extends BuildOptions {
  /** Expand progressive policies into delay ramps (default true) */
  progressive?: boolean;
}

export interface BatchResult {
  expectations: Expectation[];
  report: ValidationReport;
  /** Clones added by progressive expansion */
  expanded: number;
}

/**
 * Build, validate and expand a blueprint.
 *
 * @throws BlueprintError when an entry cannot be built
 * @throws ValidationError for the first invalid expectation
 */
export function buildBatch(blueprint: Blueprint, options: BatchOptions = {}): BatchResult {
  const built = buildExpectations(blueprint, options);
  const report = assertValidExpectations(built);
  const expectations = options.progressive === false ? built : expandProgressive(built);

  log.info('Built expectation batch', {
    source: blueprint.source,
    built: built.length,
    total: expectations.length,
  });
  return { expectations, report, expanded: expectations.length - built.length };
}
