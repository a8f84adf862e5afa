/**
 * MockServer expectation JSON: wire types and the zod schemas used to read
 * exported files back.
 *
 * Headers and query parameters are written as `[{name, values}]`; on
 * input the `{name: values}` object form is accepted too. Bodies are
 * written as `{type, ...}` wrappers; on input a plain string or plain JSON
 * value is accepted as well. The input schemas transform straight into
 * model values.
 */

import { z } from 'zod';
import {
  jsonBodyFromValue,
  jsonResponseBody,
  MATCH_TYPES,
  NameValueCollection,
  parametersBody,
  regexBody,
  stringBody,
  stringResponseBody,
  TIME_UNITS,
} from '../expectation';
import type {
  JsonValue,
  MatchType,
  NameValues,
  RequestBodyMatcher,
  ResponseBody,
  TimeUnit,
  Times,
} from '../expectation';

// ============================================================================
// WIRE TYPES (output)
// ============================================================================

export type WireRequestBody =
  | { type: 'JSON'; json: JsonValue; matchType?: MatchType }
  | { type: 'REGEX'; regex: string }
  | { type: 'STRING'; string: string }
  | { type: 'PARAMETERS'; parameters: NameValues[] };

export type WireResponseBody =
  | { type: 'JSON'; json: JsonValue }
  | { type: 'STRING'; string: string }
  | { type: 'BINARY'; base64Bytes: string; contentType?: string };

export interface WireDelay {
  timeUnit: TimeUnit;
  value: number;
}

export interface WireConnectionOptions {
  dropConnection?: boolean;
  suppressContentLengthHeader?: boolean;
  contentLengthHeaderOverride?: number;
  suppressConnectionHeader?: boolean;
  chunkSize?: number;
  keepAliveOverride?: boolean;
  closeSocket?: boolean;
  closeSocketDelay?: WireDelay;
}

export interface WireRequest {
  method: string;
  path: string;
  pathParameters?: Record<string, string[]>;
  queryStringParameters?: NameValues[];
  headers?: NameValues[];
  body?: WireRequestBody;
}

export interface WireResponse {
  statusCode: number;
  headers?: NameValues[];
  body?: WireResponseBody;
  delay?: WireDelay;
  connectionOptions?: WireConnectionOptions;
}

export type WireTimes = { unlimited: true } | { remainingTimes: number };

export interface WireExpectation {
  id?: string;
  httpRequest: WireRequest;
  httpResponse: WireResponse;
  priority: number;
  times: WireTimes;
}

// ============================================================================
// SCHEMAS (input)
// ============================================================================

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValueSchema), z.record(jsonValueSchema)])
);

const stringOrList = z.union([z.array(z.string()), z.string()]);

function toList(value: string | string[]): string[] {
  return Array.isArray(value) ? [...value] : [value];
}

export const nameValuesInputSchema = z
  .union([z.array(z.object({ name: z.string().min(1), values: stringOrList })), z.record(stringOrList)])
  .transform((input) =>
    Array.isArray(input)
      ? new NameValueCollection(input.map((entry) => ({ name: entry.name, values: toList(entry.values) })))
      : NameValueCollection.fromRecord(input)
  );

const pathParametersSchema = z.record(stringOrList).transform((record) => {
  const parameters: Record<string, string[]> = {};
  for (const [name, values] of Object.entries(record)) {
    parameters[name] = toList(values);
  }
  return parameters;
});

const matchTypeSchema = z.custom<MatchType>(
  (value) => typeof value === 'string' && MATCH_TYPES.some((type) => type === value),
  { message: `matchType must be one of ${MATCH_TYPES.join(', ')}` }
);

const timeUnitSchema = z.custom<TimeUnit>(
  (value) => typeof value === 'string' && TIME_UNITS.some((unit) => unit === value),
  { message: `timeUnit must be one of ${TIME_UNITS.join(', ')}` }
);

const BODY_TAGS = ['JSON', 'REGEX', 'STRING', 'PARAMETERS', 'BINARY'];

function hasBodyTag(value: JsonValue): boolean {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    typeof value.type === 'string' &&
    BODY_TAGS.includes(value.type)
  );
}

/** Plain JSON body; a tagged object that failed its wrapper schema is not accepted here */
const plainJsonBodySchema = jsonValueSchema.refine((value) => !hasBodyTag(value), {
  message: 'malformed body wrapper',
});

const requestBodyWrapperSchema = z
  .discriminatedUnion('type', [
    z.object({ type: z.literal('JSON'), json: jsonValueSchema, matchType: matchTypeSchema.optional() }),
    z.object({ type: z.literal('REGEX'), regex: z.string() }),
    z.object({ type: z.literal('STRING'), string: z.string() }),
    z.object({ type: z.literal('PARAMETERS'), parameters: nameValuesInputSchema }),
  ])
  .transform((wrapper, ctx): RequestBodyMatcher => {
    switch (wrapper.type) {
      case 'JSON':
        return jsonBodyFromValue(wrapper.json, wrapper.matchType);
      case 'REGEX':
        // patterns that do not compile are kept and tagged unsafe
        return regexBody(wrapper.regex, { allowInvalid: true });
      case 'STRING':
        return stringBody(wrapper.string);
      case 'PARAMETERS':
        try {
          return parametersBody(wrapper.parameters.toArray());
        } catch (error) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: error instanceof Error ? error.message : String(error) });
          return z.NEVER;
        }
    }
  });

export const requestBodyInputSchema = z.union([
  requestBodyWrapperSchema,
  z.string().transform((text): RequestBodyMatcher => stringBody(text)),
  plainJsonBodySchema.transform((value): RequestBodyMatcher => jsonBodyFromValue(value)),
]);

const responseBodyWrapperSchema = z
  .discriminatedUnion('type', [
    z.object({ type: z.literal('JSON'), json: jsonValueSchema }),
    z.object({ type: z.literal('STRING'), string: z.string() }),
    z.object({ type: z.literal('BINARY'), base64Bytes: z.string(), contentType: z.string().optional() }),
  ])
  .transform((wrapper): ResponseBody => {
    switch (wrapper.type) {
      case 'JSON':
        return jsonResponseBody(wrapper.json);
      case 'STRING':
        return stringResponseBody(wrapper.string);
      case 'BINARY':
        return wrapper.contentType
          ? { type: 'BINARY', base64Bytes: wrapper.base64Bytes, contentType: wrapper.contentType }
          : { type: 'BINARY', base64Bytes: wrapper.base64Bytes };
    }
  });

export const responseBodyInputSchema = z.union([
  responseBodyWrapperSchema,
  z.string().transform((text): ResponseBody => stringResponseBody(text)),
  plainJsonBodySchema.transform((value): ResponseBody => jsonResponseBody(value)),
]);

export const delayInputSchema = z.object({
  timeUnit: timeUnitSchema,
  value: z.number().int().nonnegative(),
});

export const connectionOptionsInputSchema = z.object({
  dropConnection: z.boolean().optional(),
  suppressContentLengthHeader: z.boolean().optional(),
  contentLengthHeaderOverride: z.number().int().nonnegative().optional(),
  suppressConnectionHeader: z.boolean().optional(),
  chunkSize: z.number().int().nonnegative().optional(),
  keepAliveOverride: z.boolean().optional(),
  closeSocket: z.boolean().optional(),
  closeSocketDelay: delayInputSchema.optional(),
});

export const timesInputSchema = z
  .union([
    z.object({ unlimited: z.literal(true) }),
    z.object({ remainingTimes: z.number().int().positive(), unlimited: z.literal(false).optional() }),
  ])
  .transform((times): Times =>
    'remainingTimes' in times ? { unlimited: false, remainingTimes: times.remainingTimes } : { unlimited: true }
  );

export const expectationInputSchema = z.object({
  id: z.string().min(1).optional(),
  priority: z.number().int().default(0),
  httpRequest: z.object({
    method: z.string().min(1),
    path: z.string().min(1),
    pathParameters: pathParametersSchema.optional(),
    queryStringParameters: nameValuesInputSchema.optional(),
    headers: nameValuesInputSchema.optional(),
    body: requestBodyInputSchema.optional(),
  }),
  httpResponse: z.object({
    statusCode: z.number().int().min(100).max(599).default(200),
    headers: nameValuesInputSchema.optional(),
    body: responseBodyInputSchema.optional(),
    delay: delayInputSchema.optional(),
    connectionOptions: connectionOptionsInputSchema.optional(),
  }),
  times: timesInputSchema.optional(),
});

export type ExpectationInput = z.infer<typeof expectationInputSchema>;

export const expectationListSchema = z.array(expectationInputSchema);
