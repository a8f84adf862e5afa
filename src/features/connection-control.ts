/**
 * Connection Control features
 *
 * All of these only set connection options (and drop headers that would
 * contradict them); the mocking engine acts on the options at serve time.
 */

import { z } from 'zod';
import { InputValidationError } from '../errors';
import { ensureConnectionOptions, millisecondsDelay } from '../expectation';
import type { ChunkedOptions, CloseSocketOptions, FeatureApplier, NoOptions } from './feature-types';

export const noOptionsSchema: z.ZodType<NoOptions, z.ZodTypeDef, unknown> = z.record(z.string(), z.never());

export const applySuppressConnectionHeader: FeatureApplier<'suppress-connection-header'> = (expectation) => {
  ensureConnectionOptions(expectation).suppressConnectionHeader = true;
};

export const chunkedSchema: z.ZodType<ChunkedOptions, z.ZodTypeDef, unknown> = z.object({
  chunkSize: z.number().int().nonnegative(),
});

/**
 * Chunk size 0 leaves the expectation as it is.
 */
export const applyChunked: FeatureApplier<'chunked-encoding'> = (expectation, options) => {
  if (!Number.isInteger(options.chunkSize) || options.chunkSize < 0) {
    throw new InputValidationError('chunk size', String(options.chunkSize), 'non-negative integer');
  }
  if (options.chunkSize === 0) return;

  ensureConnectionOptions(expectation).chunkSize = options.chunkSize;
  const headers = expectation.httpResponse.headers;
  if (headers) {
    headers.delete('Content-Length');
    headers.delete('Transfer-Encoding');
  }
};

export const applyKeepAlive: FeatureApplier<'keep-alive'> = (expectation) => {
  const connection = ensureConnectionOptions(expectation);
  connection.keepAliveOverride = true;
  connection.closeSocket = false;
  delete connection.closeSocketDelay;
  expectation.httpResponse.headers?.delete('Connection');
};

export const closeSocketSchema: z.ZodType<CloseSocketOptions, z.ZodTypeDef, unknown> = z.object({
  delayMs: z.number().int().nonnegative().optional(),
});

export const applyCloseSocket: FeatureApplier<'close-socket'> = (expectation, options) => {
  const delay = options.delayMs === undefined ? undefined : millisecondsDelay(options.delayMs);
  const connection = ensureConnectionOptions(expectation);
  connection.closeSocket = true;
  if (delay) {
    connection.closeSocketDelay = delay;
  }
};

export const applyDropConnection: FeatureApplier<'drop-connection'> = (expectation) => {
  ensureConnectionOptions(expectation).dropConnection = true;
};
