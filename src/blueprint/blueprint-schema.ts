/**
 * Blueprint schema
 *
 * A blueprint is a YAML (or JSON) document describing a batch of
 * expectations declaratively:
 *
 * ```yaml
 * expectations:
 *   - id: get-user
 *     description: Fetch one user
 *     request:
 *       method: GET
 *       path: /api/users/{id}
 *       path_parameters: { id: "[0-9]+" }
 *     response:
 *       status: 200
 *       body: { id: 1, name: test-user }
 *     features:
 *       - key: delays
 *         options: { mode: fixed, value: 250 }
 * ```
 *
 * A bare list of entries is accepted as well.
 */

import { z } from 'zod';
import { isFeatureKey } from '../features';
import type { FeatureKey } from '../features';
import { MATCH_TYPES } from '../expectation';
import type { MatchType } from '../expectation';
import { jsonValueSchema } from '../serializer';

const scalar = z.union([z.string(), z.number(), z.boolean()]).transform((value) => String(value));
const scalarOrList = z.union([scalar, z.array(scalar)]);

/** `{name: value | [values]}` or `[{name, values}]` */
export const blueprintNameValuesSchema = z.union([
  z.record(scalarOrList),
  z.array(z.object({ name: z.string().min(1), values: scalarOrList })),
]);

const matchTypeSchema = z.preprocess(
  (value) => (typeof value === 'string' ? value.trim().toUpperCase() : value),
  z.custom<MatchType>((value) => typeof value === 'string' && MATCH_TYPES.some((type) => type === value), {
    message: `match_type must be one of ${MATCH_TYPES.join(', ')}`,
  })
);

const featureKeySchema = z.custom<FeatureKey>((value) => typeof value === 'string' && isFeatureKey(value), {
  message: 'unknown feature key',
});

export const requestBodySchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('json'),
    /** Structured value, or JSON text to parse */
    json: jsonValueSchema,
    match_type: matchTypeSchema.optional(),
    /** With text input: keep malformed JSON as an exact string matcher */
    fallback_to_string: z.boolean().optional(),
  }),
  z.object({
    type: z.literal('regex'),
    regex: z.string().min(1),
    allow_invalid: z.boolean().optional(),
  }),
  z.object({
    type: z.literal('string'),
    string: z.string(),
  }),
  z.object({
    type: z.literal('parameters'),
    parameters: z.array(
      z.union([z.string(), z.object({ name: z.string(), values: z.union([z.string(), z.array(z.string())]) })])
    ),
  }),
]);

export const graphqlSchema = z.object({
  query: z.string().trim().min(1),
  variables: z.record(jsonValueSchema).optional(),
  transport: z
    .preprocess((value) => (typeof value === 'string' ? value.trim().toUpperCase() : value), z.enum(['POST', 'GET']))
    .optional(),
  match_type: matchTypeSchema.optional(),
});

export const requestSchema = z
  .object({
    method: z.string().trim().min(1).optional(),
    path: z.string().trim().min(1),
    path_regex: z.boolean().optional(),
    path_parameters: z.record(scalarOrList).optional(),
    query: blueprintNameValuesSchema.optional(),
    headers: blueprintNameValuesSchema.optional(),
    body: requestBodySchema.optional(),
    graphql: graphqlSchema.optional(),
  })
  .refine((request) => !(request.body && request.graphql), {
    message: 'body and graphql cannot be combined',
    path: ['graphql'],
  });

export const responseSchema = z
  .object({
    status: z.number().int().min(100).max(599).default(200),
    headers: blueprintNameValuesSchema.optional(),
    /** Structured JSON body */
    body: jsonValueSchema.optional(),
    /** Literal text body */
    body_text: z.string().optional(),
    /** Fixed delay in the configured default time unit */
    delay: z.number().int().nonnegative().optional(),
  })
  .refine((response) => response.body === undefined || response.body_text === undefined, {
    message: 'body and body_text cannot be combined',
    path: ['body_text'],
  });

export const featureRequestSchema = z.object({
  key: featureKeySchema,
  options: z.unknown().optional(),
});

export const blueprintEntrySchema = z.object({
  id: z.string().trim().min(1).optional(),
  description: z.string().optional(),
  priority: z.number().int().nonnegative().optional(),
  request: requestSchema,
  response: responseSchema.default({}),
  features: z.array(featureRequestSchema).default([]),
});

export const blueprintEntryListSchema = z.array(blueprintEntrySchema).min(1, 'at least one expectation is required');

export const blueprintDocumentSchema = z.object({
  version: z.number().int().positive().optional(),
  expectations: blueprintEntryListSchema,
});

export type BlueprintNameValues = z.infer<typeof blueprintNameValuesSchema>;
export type BlueprintRequestBody = z.infer<typeof requestBodySchema>;
export type BlueprintGraphQL = z.infer<typeof graphqlSchema>;
export type BlueprintRequest = z.infer<typeof requestSchema>;
export type BlueprintResponse = z.infer<typeof responseSchema>;
export type BlueprintFeature = z.infer<typeof featureRequestSchema>;
export type BlueprintEntry = z.infer<typeof blueprintEntrySchema>;

export interface Blueprint {
  /** File the blueprint was read from, or a label for inline input */
  source: string;
  entries: BlueprintEntry[];
}
