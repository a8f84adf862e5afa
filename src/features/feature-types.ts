/**
 * Feature Types
 *
 * A feature is a named edit of an expectation (delays, limits, caching,
 * connection control, ...). Options are typed per feature key and
 * validated with the feature's schema before the edit runs.
 */

import type { z } from 'zod';
import type { Expectation } from '../expectation';

export type FeatureKey =
  | 'delays'
  | 'limits'
  | 'priority'
  | 'content-length-headers'
  | 'caching'
  | 'compression'
  | 'suppress-connection-header'
  | 'chunked-encoding'
  | 'keep-alive'
  | 'close-socket'
  | 'drop-connection';

export type FeatureCategoryKey = 'response-behavior' | 'connection';

export type DelaysOptions =
  | { mode: 'fixed'; value: number }
  | { mode: 'range'; min: number; max: number }
  | { mode: 'progressive'; base: number; step: number; cap: number };

export type LimitsOptions = { mode: 'unlimited' } | { mode: 'count'; count: number };

export interface PriorityOptions {
  priority: number;
}

export type ContentLengthOptions = { mode: 'override'; value: number } | { mode: 'suppress' };

export interface CachingOptions {
  /** Cache-Control value: one of the presets or any custom directive list */
  cacheControl: string;
  /** Add a strong ETag computed from the body bytes (default true) */
  etag: boolean;
}

export interface CompressionOptions {
  algorithm: string;
  mode: 'headers-only' | 'pre-compress';
}

export interface ChunkedOptions {
  chunkSize: number;
}

export interface CloseSocketOptions {
  delayMs?: number;
}

/** Features that take no options */
export type NoOptions = Record<string, never>;

export interface FeatureOptionsMap {
  delays: DelaysOptions;
  limits: LimitsOptions;
  priority: PriorityOptions;
  'content-length-headers': ContentLengthOptions;
  caching: CachingOptions;
  compression: CompressionOptions;
  'suppress-connection-header': NoOptions;
  'chunked-encoding': ChunkedOptions;
  'keep-alive': NoOptions;
  'close-socket': CloseSocketOptions;
  'drop-connection': NoOptions;
}

/**
 * Runtime inputs a feature may need besides its options.
 */
export interface FeatureContext {
  /** Uniform random number in [0, 1); replaced in tests */
  random: () => number;
}

export type FeatureApplier<K extends FeatureKey> = (
  expectation: Expectation,
  options: FeatureOptionsMap[K],
  context: FeatureContext
) => void;

export interface FeatureDefinition<K extends FeatureKey> {
  key: K;
  label: string;
  description: string;
  category: FeatureCategoryKey;
  /** Validates raw options (blueprint input) into the typed form */
  schema: z.ZodType<FeatureOptionsMap[K], z.ZodTypeDef, unknown>;
  apply: FeatureApplier<K>;
}

export interface FeatureCategory {
  key: FeatureCategoryKey;
  label: string;
  features: FeatureKey[];
}
