/**
 * Response Behavior features: delays, limits, priority, Content-Length,
 * caching, compression.
 */

import { z } from 'zod';
import { InputValidationError } from '../errors';
import {
  applyCompression,
  computeEtag,
  ensureConnectionOptions,
  ensureResponseHeaders,
  isValidProgressivePolicy,
  limitedTimes,
  millisecondsDelay,
  renderBody,
  unlimitedTimes,
} from '../expectation';
import type { Expectation } from '../expectation';
import type {
  CachingOptions,
  CompressionOptions,
  ContentLengthOptions,
  DelaysOptions,
  FeatureApplier,
  LimitsOptions,
  PriorityOptions,
} from './feature-types';

const nonNegativeInt = z.number().int().nonnegative();
const positiveInt = z.number().int().positive();

/**
 * Append a bracketed note to the description.
 */
export function annotateDescription(expectation: Expectation, note: string): void {
  expectation.description = `${expectation.description ?? ''} ${note}`.trim();
}

// ============================================================================
// DELAYS
// ============================================================================

export const delaysSchema: z.ZodType<DelaysOptions, z.ZodTypeDef, unknown> = z.discriminatedUnion('mode', [
  z.object({ mode: z.literal('fixed'), value: nonNegativeInt }),
  z.object({ mode: z.literal('range'), min: nonNegativeInt, max: nonNegativeInt }),
  z.object({ mode: z.literal('progressive'), base: nonNegativeInt, step: positiveInt, cap: nonNegativeInt }),
]);

export const applyDelays: FeatureApplier<'delays'> = (expectation, options, context) => {
  switch (options.mode) {
    case 'fixed':
      expectation.httpResponse.delay = millisecondsDelay(options.value);
      return;

    case 'range': {
      const { min, max } = options;
      if (!Number.isInteger(min) || !Number.isInteger(max) || min < 0 || max < min) {
        throw new InputValidationError('delay range', `${min}-${max}`, 'min-max with 0 <= min <= max');
      }
      const pick = min + Math.floor(context.random() * (max - min + 1));
      expectation.httpResponse.delay = millisecondsDelay(pick);
      annotateDescription(expectation, `[delay ${pick}ms from ${min}-${max}]`);
      return;
    }

    case 'progressive': {
      const policy = { base: options.base, step: options.step, cap: options.cap };
      if (!isValidProgressivePolicy(policy)) {
        throw new InputValidationError(
          'progressive delay',
          `base=${policy.base}, step=${policy.step}, cap=${policy.cap}`,
          'step > 0, base >= 0, cap >= base'
        );
      }
      expectation.httpResponse.delay = millisecondsDelay(policy.base);
      expectation.times = limitedTimes(1);
      expectation.progressive = policy;
      annotateDescription(
        expectation,
        `[progressive delay: base=${policy.base}, step=${policy.step}, cap=${policy.cap}]`
      );
      return;
    }
  }
};

// ============================================================================
// LIMITS / PRIORITY
// ============================================================================

export const limitsSchema: z.ZodType<LimitsOptions, z.ZodTypeDef, unknown> = z.discriminatedUnion('mode', [
  z.object({ mode: z.literal('unlimited') }),
  z.object({ mode: z.literal('count'), count: positiveInt }),
]);

export const applyLimits: FeatureApplier<'limits'> = (expectation, options) => {
  expectation.times = options.mode === 'unlimited' ? unlimitedTimes() : limitedTimes(options.count);
};

export const prioritySchema: z.ZodType<PriorityOptions, z.ZodTypeDef, unknown> = z.object({
  priority: nonNegativeInt,
});

export const applyPriority: FeatureApplier<'priority'> = (expectation, options) => {
  if (!Number.isInteger(options.priority) || options.priority < 0) {
    throw new InputValidationError('priority', String(options.priority), 'non-negative integer');
  }
  expectation.priority = options.priority;
};

// ============================================================================
// CONTENT-LENGTH
// ============================================================================

export const contentLengthSchema: z.ZodType<ContentLengthOptions, z.ZodTypeDef, unknown> = z.discriminatedUnion(
  'mode',
  [z.object({ mode: z.literal('override'), value: nonNegativeInt }), z.object({ mode: z.literal('suppress') })]
);

export const applyContentLength: FeatureApplier<'content-length-headers'> = (expectation, options) => {
  const connection = ensureConnectionOptions(expectation);
  if (options.mode === 'suppress') {
    delete connection.contentLengthHeaderOverride;
    connection.suppressContentLengthHeader = true;
    return;
  }
  if (!Number.isInteger(options.value) || options.value < 0) {
    throw new InputValidationError('Content-Length', String(options.value), 'non-negative integer');
  }
  delete connection.suppressContentLengthHeader;
  connection.contentLengthHeaderOverride = options.value;
};

// ============================================================================
// CACHING
// ============================================================================

export const CACHE_CONTROL_PRESETS: readonly string[] = [
  'no-store',
  'no-cache',
  'private, max-age=60',
  'public, max-age=300',
];

export const cachingSchema: z.ZodType<CachingOptions, z.ZodTypeDef, unknown> = z.object({
  cacheControl: z.string().trim().min(1),
  etag: z.boolean().default(true),
});

export const applyCaching: FeatureApplier<'caching'> = (expectation, options) => {
  const cacheControl = options.cacheControl.trim();
  if (!cacheControl) {
    throw new InputValidationError('Cache-Control', options.cacheControl, 'non-empty directive list');
  }
  const etag = options.etag ? computeEtag(renderBody(expectation.httpResponse.body).bytes) : undefined;

  const headers = ensureResponseHeaders(expectation);
  headers.upsert('Cache-Control', [cacheControl]);
  if (etag) {
    headers.upsert('ETag', [etag]);
  }
};

// ============================================================================
// COMPRESSION
// ============================================================================

export const compressionSchema: z.ZodType<CompressionOptions, z.ZodTypeDef, unknown> = z.object({
  algorithm: z.string().trim().toLowerCase(),
  mode: z.enum(['headers-only', 'pre-compress']).default('headers-only'),
});

export const applyCompressionFeature: FeatureApplier<'compression'> = (expectation, options) => {
  applyCompression(expectation, options.algorithm, options.mode);
};
