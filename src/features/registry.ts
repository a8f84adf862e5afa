/**
 * Feature Registry
 *
 * Static catalog of every feature, keyed by FeatureKey, plus the category
 * grouping used for listings. Applying a feature is transactional: the
 * expectation is snapshotted first and restored if the edit throws.
 */

import { ValidationError } from '../errors';
import { cloneExpectation, restoreExpectation } from '../expectation';
import type { Expectation } from '../expectation';
import { createLogger } from '../utils/logger';
import {
  applyChunked,
  applyCloseSocket,
  applyDropConnection,
  applyKeepAlive,
  applySuppressConnectionHeader,
  chunkedSchema,
  closeSocketSchema,
  noOptionsSchema,
} from './connection-control';
import type {
  FeatureCategory,
  FeatureContext,
  FeatureDefinition,
  FeatureKey,
  FeatureOptionsMap,
} from './feature-types';
import {
  applyCaching,
  applyCompressionFeature,
  applyContentLength,
  applyDelays,
  applyLimits,
  applyPriority,
  cachingSchema,
  compressionSchema,
  contentLengthSchema,
  delaysSchema,
  limitsSchema,
  prioritySchema,
} from './response-behavior';

const log = createLogger('features');

export const FEATURES: { readonly [K in FeatureKey]: FeatureDefinition<K> } = {
  delays: {
    key: 'delays',
    label: 'Response Delays',
    description: 'Add fixed, random, or progressive delays',
    category: 'response-behavior',
    schema: delaysSchema,
    apply: applyDelays,
  },
  limits: {
    key: 'limits',
    label: 'Response Limits',
    description: 'Limit how many times expectation matches',
    category: 'response-behavior',
    schema: limitsSchema,
    apply: applyLimits,
  },
  priority: {
    key: 'priority',
    label: 'Expectation Priority',
    description: 'Set priority for conflicting expectations',
    category: 'response-behavior',
    schema: prioritySchema,
    apply: applyPriority,
  },
  'content-length-headers': {
    key: 'content-length-headers',
    label: 'Control Content Length Header',
    description: 'Manually set or remove Content-Length header',
    category: 'response-behavior',
    schema: contentLengthSchema,
    apply: applyContentLength,
  },
  caching: {
    key: 'caching',
    label: 'Cache Control',
    description: 'Configure cache headers and ETags',
    category: 'response-behavior',
    schema: cachingSchema,
    apply: applyCaching,
  },
  compression: {
    key: 'compression',
    label: 'Response Compression',
    description: 'Enable gzip/deflate compression',
    category: 'response-behavior',
    schema: compressionSchema,
    apply: applyCompressionFeature,
  },
  'suppress-connection-header': {
    key: 'suppress-connection-header',
    label: 'Suppress Connection Header',
    description: 'Suppress the Connection header in responses',
    category: 'connection',
    schema: noOptionsSchema,
    apply: applySuppressConnectionHeader,
  },
  'chunked-encoding': {
    key: 'chunked-encoding',
    label: 'Chunked Encoding',
    description: 'Send the response in chunks of a given size',
    category: 'connection',
    schema: chunkedSchema,
    apply: applyChunked,
  },
  'keep-alive': {
    key: 'keep-alive',
    label: 'Override Keep-Alive Settings',
    description: 'Keep the connection open after the response',
    category: 'connection',
    schema: noOptionsSchema,
    apply: applyKeepAlive,
  },
  'close-socket': {
    key: 'close-socket',
    label: 'Close Socket',
    description: 'Forcefully close the connection after response',
    category: 'connection',
    schema: closeSocketSchema,
    apply: applyCloseSocket,
  },
  'drop-connection': {
    key: 'drop-connection',
    label: 'Drop Connection',
    description: 'Drop the connection without sending a response',
    category: 'connection',
    schema: noOptionsSchema,
    apply: applyDropConnection,
  },
};

export const FEATURE_CATEGORIES: readonly FeatureCategory[] = [
  {
    key: 'response-behavior',
    label: 'Response Behavior',
    features: ['delays', 'limits', 'priority', 'content-length-headers', 'caching', 'compression'],
  },
  {
    key: 'connection',
    label: 'Connection Control',
    features: ['suppress-connection-header', 'chunked-encoding', 'keep-alive', 'close-socket', 'drop-connection'],
  },
];

const FEATURE_KEYS: readonly FeatureKey[] = FEATURE_CATEGORIES.flatMap((category) => category.features);

export function isFeatureKey(value: string): value is FeatureKey {
  return FEATURE_KEYS.some((key) => key === value);
}

export function listFeatureKeys(): FeatureKey[] {
  return [...FEATURE_KEYS];
}

export const defaultFeatureContext: FeatureContext = {
  random: Math.random,
};

/**
 * Apply a feature with typed options. On failure the expectation is
 * restored to its state before the call and the error is rethrown.
 */
export function applyFeature<K extends FeatureKey>(
  expectation: Expectation,
  key: K,
  options: FeatureOptionsMap[K],
  context: FeatureContext = defaultFeatureContext
): void {
  const definition: FeatureDefinition<K> = FEATURES[key];
  const snapshot = cloneExpectation(expectation);
  try {
    definition.apply(expectation, options, context);
    log.debug('Applied feature', { feature: key });
  } catch (error) {
    restoreExpectation(expectation, snapshot);
    log.debug('Feature failed, expectation restored', {
      feature: key,
      error: error instanceof Error ? error.message : String(error),
    });
    throw error;
  }
}

/**
 * Validate raw options (e.g. from a blueprint) against the feature's
 * schema, then apply it.
 *
 * @throws ValidationError listing every schema issue
 */
export function applyFeatureInput<K extends FeatureKey>(
  expectation: Expectation,
  key: K,
  rawOptions: unknown,
  context: FeatureContext = defaultFeatureContext
): void {
  const definition: FeatureDefinition<K> = FEATURES[key];
  const parsed = definition.schema.safeParse(rawOptions ?? {});
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new ValidationError(`invalid options for feature '${key}': ${details}`, key);
  }
  applyFeature(expectation, key, parsed.data, context);
}
