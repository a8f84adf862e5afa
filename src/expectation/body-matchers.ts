/**
 * Body matcher construction
 *
 * Builds the request body matcher variants (JSON, REGEX, STRING,
 * PARAMETERS) and the response body variants from operator input.
 * Invalid input raises a validation or construction error; the operator
 * may explicitly opt into the lenient fallbacks (JSON as exact STRING,
 * force-accepted regex tagged `unsafe`).
 *
 * @module expectation/body-matchers
 */

import { ConstructionError, JsonValidationError, RegexValidationError } from '../errors';
import type {
  BinaryResponseBody,
  JsonBodyMatcher,
  JsonResponseBody,
  JsonValue,
  MatchType,
  ParametersBodyMatcher,
  RegexBodyMatcher,
  StringBodyMatcher,
  StringResponseBody,
} from './expectation-types';
import { parseCsvValues } from './name-values';

/** Context labels used in validation errors */
export type PatternContext =
  | 'request body'
  | 'path matching'
  | 'header matching'
  | 'query parameter matching'
  | 'path parameter matching';

// ============================================================================
// JSON / REGEX PRIMITIVES
// ============================================================================

/**
 * Parse JSON text, raising JsonValidationError with the given context.
 */
export function parseJsonText(text: string, context: string): JsonValue {
  try {
    const parsed: JsonValue = JSON.parse(text);
    return parsed;
  } catch (error) {
    throw new JsonValidationError(context, text, error);
  }
}

export function isValidJson(text: string): boolean {
  try {
    JSON.parse(text);
    return true;
  } catch {
    return false;
  }
}

/**
 * Compile `pattern`, raising RegexValidationError naming the pattern and context.
 */
export function validateRegex(pattern: string, context: PatternContext): void {
  try {
    new RegExp(pattern);
  } catch (error) {
    throw new RegexValidationError(pattern, context, error);
  }
}

export function isValidRegex(pattern: string): boolean {
  try {
    new RegExp(pattern);
    return true;
  } catch {
    return false;
  }
}

export interface PatternOptions {
  /** Values are regular expressions rather than literals */
  regex?: boolean;
  /** Keep patterns that do not compile (operator confirmed) */
  allowInvalid?: boolean;
}

/**
 * Validate the alternatives of a path, header or query matcher.
 * Literal values are returned untouched; regex values are compiled first.
 */
export function buildPatternValues(
  values: readonly string[],
  context: PatternContext,
  options: PatternOptions = {}
): string[] {
  if (options.regex && !options.allowInvalid) {
    for (const value of values) {
      validateRegex(value, context);
    }
  }
  return [...values];
}

// ============================================================================
// REQUEST BODY MATCHERS
// ============================================================================

export interface JsonBodyOptions {
  matchType?: MatchType;
  /** Keep malformed input as an exact STRING matcher instead of failing */
  fallbackToString?: boolean;
}

/**
 * JSON matcher from operator text. Numbers, booleans and null keep their
 * types. Malformed text fails unless `fallbackToString` is set.
 */
export function jsonBody(text: string, options: JsonBodyOptions = {}): JsonBodyMatcher | StringBodyMatcher {
  const trimmed = text.trim();
  if (options.fallbackToString && !isValidJson(trimmed)) {
    return stringBody(trimmed);
  }
  return jsonBodyFromValue(parseJsonText(trimmed, 'request body'), options.matchType);
}

export function jsonBodyFromValue(value: JsonValue, matchType?: MatchType): JsonBodyMatcher {
  const matcher: JsonBodyMatcher = { type: 'JSON', json: value };
  if (matchType) {
    matcher.matchType = matchType;
  }
  return matcher;
}

/**
 * REGEX matcher. An invalid pattern is rejected unless `allowInvalid` is
 * set, in which case the matcher is tagged `unsafe`.
 */
export function regexBody(pattern: string, options: { allowInvalid?: boolean } = {}): RegexBodyMatcher {
  if (!isValidRegex(pattern)) {
    if (!options.allowInvalid) {
      validateRegex(pattern, 'request body');
    }
    return { type: 'REGEX', regex: pattern, unsafe: true };
  }
  return { type: 'REGEX', regex: pattern };
}

export function stringBody(text: string): StringBodyMatcher {
  return { type: 'STRING', string: text };
}

export interface ParameterInput {
  name: string;
  /** Comma-separated values, or an already split list */
  values: string | string[];
}

/**
 * Parse one `name=value1,value2` line.
 */
export function parseParameterLine(line: string): ParameterInput {
  const separator = line.indexOf('=');
  if (separator < 0) {
    throw new ConstructionError(`expected name=value[,value2], got '${line.trim()}'`, 'PARAMETERS');
  }
  return { name: line.slice(0, separator).trim(), values: line.slice(separator + 1) };
}

/**
 * PARAMETERS matcher. Every entry needs a name and at least one non-empty
 * value; at least one entry is required.
 */
export function parametersBody(inputs: ReadonlyArray<ParameterInput | string>): ParametersBodyMatcher {
  const parameters: ParametersBodyMatcher['parameters'] = [];

  for (const raw of inputs) {
    const input = typeof raw === 'string' ? parseParameterLine(raw) : raw;
    const name = input.name.trim();
    const values = Array.isArray(input.values)
      ? input.values.map((value) => value.trim()).filter((value) => value !== '')
      : parseCsvValues(input.values);

    if (!name) {
      throw new ConstructionError('body parameter is missing a name', 'PARAMETERS');
    }
    if (values.length === 0) {
      throw new ConstructionError(`body parameter '${name}' needs at least one value`, 'PARAMETERS');
    }
    parameters.push({ name, values });
  }

  if (parameters.length === 0) {
    throw new ConstructionError('no parameters provided', 'PARAMETERS');
  }
  return { type: 'PARAMETERS', parameters };
}

// ============================================================================
// RESPONSE BODIES
// ============================================================================

export function jsonResponseBody(value: JsonValue): JsonResponseBody {
  return { type: 'JSON', json: value };
}

export function stringResponseBody(text: string): StringResponseBody {
  return { type: 'STRING', string: text };
}

export function binaryResponseBody(bytes: Uint8Array, contentType?: string): BinaryResponseBody {
  const body: BinaryResponseBody = {
    type: 'BINARY',
    base64Bytes: Buffer.from(bytes).toString('base64'),
  };
  if (contentType) {
    body.contentType = contentType;
  }
  return body;
}

/**
 * Response body from operator text: valid JSON becomes a JSON body,
 * anything else is kept as text.
 */
export function responseBodyFromText(text: string): JsonResponseBody | StringResponseBody {
  const trimmed = text.trim();
  if (trimmed !== '' && isValidJson(trimmed)) {
    return jsonResponseBody(parseJsonText(trimmed, 'response body'));
  }
  return stringResponseBody(text);
}
