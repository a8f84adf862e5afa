/**
 * Blueprint Loader
 *
 * Reads a YAML or JSON blueprint and validates it. Every problem is
 * reported with its location, e.g.
 * `expectations.0.request.path: String must contain at least 1 character(s)`.
 */

import * as fs from 'fs';
import * as yaml from 'js-yaml';
import type { ZodError } from 'zod';
import { BlueprintError } from '../errors';
import { formatZodIssue } from '../serializer';
import { createLogger } from '../utils/logger';
import { Blueprint, blueprintDocumentSchema, blueprintEntryListSchema } from './blueprint-schema';

const log = createLogger('blueprint');

function issuesOf(error: ZodError): string[] {
  return error.issues.map(formatZodIssue);
}

/**
 * Validate an already parsed document.
 *
 * @throws BlueprintError listing every schema issue
 */
export function parseBlueprintDocument(document: unknown, source = '<inline>'): Blueprint {
  if (Array.isArray(document)) {
    const result = blueprintEntryListSchema.safeParse(document);
    if (!result.success) {
      throw new BlueprintError('invalid blueprint', source, issuesOf(result.error));
    }
    return { source, entries: result.data };
  }

  const result = blueprintDocumentSchema.safeParse(document);
  if (!result.success) {
    throw new BlueprintError('invalid blueprint', source, issuesOf(result.error));
  }
  return { source, entries: result.data.expectations };
}

/**
 * Parse blueprint text (YAML; JSON is accepted as a YAML subset).
 */
export function parseBlueprint(text: string, source = '<inline>'): Blueprint {
  let document: unknown;
  try {
    document = yaml.load(text, { filename: source });
  } catch (err) {
    if (err instanceof yaml.YAMLException) {
      const mark = err.mark;
      throw new BlueprintError('YAML syntax error', source, [
        `line ${(mark?.line ?? 0) + 1}, column ${(mark?.column ?? 0) + 1}: ${err.reason || 'invalid syntax'}`,
      ]);
    }
    throw err;
  }

  if (document === undefined || document === null) {
    throw new BlueprintError('blueprint is empty', source);
  }

  const blueprint = parseBlueprintDocument(document, source);
  log.debug('Loaded blueprint', { source, entries: blueprint.entries.length });
  return blueprint;
}

export function loadBlueprintFile(filePath: string): Blueprint {
  if (!fs.existsSync(filePath)) {
    throw new BlueprintError(`blueprint not found: ${filePath}`, filePath);
  }
  return parseBlueprint(fs.readFileSync(filePath, 'utf8'), filePath);
}
