/**
 * Config Types for mockcraft
 *
 * Stored in ~/.mockcraft/config.yaml. Every section is optional on disk;
 * missing or invalid values fall back to the defaults below.
 */

import { MATCH_TYPES, TIME_UNITS } from '../expectation';
import type { MatchType, TimeUnit } from '../expectation';

export const CONFIG_VERSION = 2;

export interface ExportSettings {
  /** JSON indentation of exported files; 0 writes one line */
  indent: number;
  /** Emit expectation ids in exported files */
  include_ids: boolean;
}

/**
 * Defaults applied to blueprint entries that do not set these themselves
 */
export interface DefaultsSettings {
  json_match_type: MatchType;
  delay_time_unit: TimeUnit;
}

export interface ProgressiveSettings {
  /** Expand progressive policies on build */
  enabled: boolean;
}

export interface MockcraftConfig {
  version: number;
  export: ExportSettings;
  defaults: DefaultsSettings;
  progressive: ProgressiveSettings;
}

export const DEFAULT_EXPORT_SETTINGS: ExportSettings = {
  indent: 2,
  include_ids: true,
};

export const DEFAULT_DEFAULTS_SETTINGS: DefaultsSettings = {
  json_match_type: 'ONLY_MATCHING_FIELDS',
  delay_time_unit: 'MILLISECONDS',
};

export const DEFAULT_PROGRESSIVE_SETTINGS: ProgressiveSettings = {
  enabled: true,
};

export const MAX_EXPORT_INDENT = 8;

export function createDefaultConfig(): MockcraftConfig {
  return {
    version: CONFIG_VERSION,
    export: { ...DEFAULT_EXPORT_SETTINGS },
    defaults: { ...DEFAULT_DEFAULTS_SETTINGS },
    progressive: { ...DEFAULT_PROGRESSIVE_SETTINGS },
  };
}

/**
 * Loose shape check for a parsed config document.
 */
export function isConfigDocument(obj: unknown): obj is { version: number } & Record<string, unknown> {
  if (typeof obj !== 'object' || obj === null || Array.isArray(obj)) return false;
  return 'version' in obj && typeof obj.version === 'number' && obj.version >= 1;
}

export function isMatchType(value: unknown): value is MatchType {
  return typeof value === 'string' && MATCH_TYPES.some((type) => type === value);
}

export function isTimeUnit(value: unknown): value is TimeUnit {
  return typeof value === 'string' && TIME_UNITS.some((unit) => unit === value);
}

export function isValidIndent(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 && value <= MAX_EXPORT_INDENT;
}
