/**
 * GraphQL request matchers
 *
 * POST operations are matched on their JSON envelope
 * (`{query, variables?, operationName?}`); GET operations on the `query`
 * and `variables` query string parameters.
 *
 * @module expectation/graphql
 */

import { jsonBodyFromValue } from './body-matchers';
import type { Expectation, HttpRequestMatcher, JsonObject, MatchType } from './expectation-types';
import { NameValueCollection } from './name-values';

export type GraphQLOperationType = 'query' | 'mutation' | 'subscription';
export type GraphQLTransport = 'POST' | 'GET';

export interface GraphQLOperation {
  /** Undefined when the document does not start with an operation keyword */
  type?: GraphQLOperationType;
  /** Undefined for anonymous operations */
  name?: string;
}

const NAMED_OPERATION = /^\s*(query|mutation|subscription)\s+([_A-Za-z][_0-9A-Za-z]*)/m;
const OPERATION_KEYWORDS: readonly GraphQLOperationType[] = ['query', 'mutation', 'subscription'];

function isOperationType(value: string): value is GraphQLOperationType {
  return OPERATION_KEYWORDS.some((keyword) => keyword === value);
}

export function extractGraphQLOperation(query: string): GraphQLOperation {
  const document = query.trim();
  const match = NAMED_OPERATION.exec(document);
  if (match && isOperationType(match[1])) {
    return { type: match[1], name: match[2] };
  }

  const lower = document.toLowerCase();
  const keyword = OPERATION_KEYWORDS.find((kw) => lower.startsWith(kw));
  return keyword ? { type: keyword } : {};
}

export interface GraphQLRequestOptions {
  query: string;
  variables?: JsonObject;
  transport?: GraphQLTransport;
  /** POST only; defaults to ONLY_MATCHING_FIELDS */
  matchType?: MatchType;
}

/**
 * Configure `request` to match a GraphQL operation.
 */
export function applyGraphQLRequest(request: HttpRequestMatcher, options: GraphQLRequestOptions): void {
  const query = options.query.trim();
  const transport = options.transport ?? 'POST';

  request.method = transport;

  if (transport === 'GET') {
    if (!request.queryStringParameters) {
      request.queryStringParameters = new NameValueCollection();
    }
    const params = request.queryStringParameters;
    params.upsert('query', [query]);
    if (options.variables !== undefined) {
      params.upsert('variables', [JSON.stringify(options.variables)]);
    }
    return;
  }

  if (!request.headers) {
    request.headers = new NameValueCollection();
  }
  request.headers.upsert('Content-Type', ['application/json']);

  const envelope: JsonObject = { query };
  if (options.variables !== undefined) {
    envelope.variables = options.variables;
  }
  const { name } = extractGraphQLOperation(query);
  if (name) {
    envelope.operationName = name;
  }
  request.body = jsonBodyFromValue(envelope, options.matchType ?? 'ONLY_MATCHING_FIELDS');
}

export interface GraphQLBodySummary {
  /** STRICT, ONLY_MATCHING_FIELDS, REGEX, or N/A when there is no JSON/REGEX body */
  mode: string;
  hasVariables: boolean;
}

/**
 * Match mode and variables presence of a GraphQL request body.
 */
export function summarizeGraphQLBody(expectation: Expectation | undefined): GraphQLBodySummary {
  const body = expectation?.httpRequest.body;
  if (body?.type === 'JSON') {
    const envelope = body.json;
    const hasVariables =
      typeof envelope === 'object' && envelope !== null && !Array.isArray(envelope) && 'variables' in envelope;
    return { mode: body.matchType ?? 'STRICT', hasVariables };
  }
  if (body?.type === 'REGEX') {
    return { mode: 'REGEX', hasVariables: false };
  }

  const params = expectation?.httpRequest.queryStringParameters ?? new NameValueCollection();
  return { mode: 'N/A', hasVariables: params.has('variables') };
}
