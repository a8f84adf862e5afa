/**
 * Expectation sources
 *
 * Commands that only read expectations (validate, inspect) accept either
 * a blueprint or a MockServer export file. The two are told apart by
 * content: JSON whose entries carry `httpRequest` is an export.
 */

import * as fs from 'fs';
import { BlueprintError } from '../errors';
import type { Expectation } from '../expectation';
import { parseMockServerJson } from '../serializer';
import { createLogger } from '../utils/logger';
import { buildExpectations } from './blueprint-builder';
import type { BuildOptions } from './blueprint-builder';
import { parseBlueprint } from './blueprint-loader';

const log = createLogger('source');

export type SourceKind = 'blueprint' | 'mockserver';

export interface ExpectationSource {
  kind: SourceKind;
  path: string;
  expectations: Expectation[];
}

function hasHttpRequest(value: unknown): boolean {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && 'httpRequest' in value;
}

export function detectSourceKind(text: string): SourceKind {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return 'blueprint';
  }
  if (Array.isArray(parsed)) {
    return parsed.length > 0 && parsed.every(hasHttpRequest) ? 'mockserver' : 'blueprint';
  }
  return hasHttpRequest(parsed) ? 'mockserver' : 'blueprint';
}

/**
 * Read expectations from a blueprint or an export file. Blueprints are
 * built but not validated or expanded.
 */
export function loadExpectationSource(filePath: string, options: BuildOptions = {}): ExpectationSource {
  if (!fs.existsSync(filePath)) {
    throw new BlueprintError(`file not found: ${filePath}`, filePath);
  }
  const text = fs.readFileSync(filePath, 'utf8');
  const kind = detectSourceKind(text);
  log.debug('Detected source kind', { path: filePath, kind });

  const expectations =
    kind === 'mockserver' ? parseMockServerJson(text) : buildExpectations(parseBlueprint(text, filePath), options);
  return { kind, path: filePath, expectations };
}
