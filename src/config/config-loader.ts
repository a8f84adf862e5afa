/**
 * Config Loader
 *
 * Loads and saves ~/.mockcraft/config.yaml (directory overridable with
 * MOCKCRAFT_HOME). Writes go through a temp file and a rename while a
 * lock file is held.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { ConfigError, InputValidationError } from '../errors';
import { createLogger } from '../utils/logger';
import {
  CONFIG_VERSION,
  DEFAULT_DEFAULTS_SETTINGS,
  DEFAULT_EXPORT_SETTINGS,
  DEFAULT_PROGRESSIVE_SETTINGS,
  MAX_EXPORT_INDENT,
  MockcraftConfig,
  createDefaultConfig,
  isConfigDocument,
  isMatchType,
  isTimeUnit,
  isValidIndent,
} from './config-types';

const log = createLogger('config');

const CONFIG_YAML = 'config.yaml';
const CONFIG_LOCK = 'config.yaml.lock';
const LOCK_STALE_MS = 5000;

export function getMockcraftDir(): string {
  const override = process.env['MOCKCRAFT_HOME'];
  return override && override.trim() ? override : path.join(os.homedir(), '.mockcraft');
}

export function getConfigPath(): string {
  return path.join(getMockcraftDir(), CONFIG_YAML);
}

function getLockFilePath(): string {
  return path.join(getMockcraftDir(), CONFIG_LOCK);
}

function acquireLock(): boolean {
  const lockPath = getLockFilePath();
  const lockData = `${process.pid}\n${Date.now()}`;

  try {
    // wx fails when the lock file already exists
    const fd = fs.openSync(lockPath, 'wx', 0o600);
    fs.writeSync(fd, lockData);
    fs.closeSync(fd);
    return true;
  } catch {
    try {
      const content = fs.readFileSync(lockPath, 'utf8');
      const [pidStr, timestampStr] = content.trim().split('\n');
      const timestamp = parseInt(timestampStr, 10);

      if (Date.now() - timestamp > LOCK_STALE_MS) {
        fs.unlinkSync(lockPath);
        return acquireLock();
      }

      // holder still alive?
      try {
        process.kill(parseInt(pidStr, 10), 0);
        return false;
      } catch {
        fs.unlinkSync(lockPath);
        return acquireLock();
      }
    } catch {
      return false;
    }
  }
}

function releaseLock(): void {
  const lockPath = getLockFilePath();
  try {
    if (fs.existsSync(lockPath)) fs.unlinkSync(lockPath);
  } catch (error) {
    log.debug('Could not remove lock file', { lockPath, error: String(error) });
  }
}

export function hasConfig(): boolean {
  return fs.existsSync(getConfigPath());
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(document: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = document[key];
  return isRecord(value) ? value : {};
}

/**
 * Complete config from a partial document; invalid values are replaced by
 * their defaults.
 */
export function mergeWithDefaults(document: Record<string, unknown>): MockcraftConfig {
  const exportSection = section(document, 'export');
  const defaultsSection = section(document, 'defaults');
  const progressiveSection = section(document, 'progressive');
  const version = document['version'];

  return {
    version: typeof version === 'number' ? version : CONFIG_VERSION,
    export: {
      indent: isValidIndent(exportSection['indent']) ? exportSection['indent'] : DEFAULT_EXPORT_SETTINGS.indent,
      include_ids:
        typeof exportSection['include_ids'] === 'boolean'
          ? exportSection['include_ids']
          : DEFAULT_EXPORT_SETTINGS.include_ids,
    },
    defaults: {
      json_match_type: isMatchType(defaultsSection['json_match_type'])
        ? defaultsSection['json_match_type']
        : DEFAULT_DEFAULTS_SETTINGS.json_match_type,
      delay_time_unit: isTimeUnit(defaultsSection['delay_time_unit'])
        ? defaultsSection['delay_time_unit']
        : DEFAULT_DEFAULTS_SETTINGS.delay_time_unit,
    },
    progressive: {
      enabled:
        typeof progressiveSection['enabled'] === 'boolean'
          ? progressiveSection['enabled']
          : DEFAULT_PROGRESSIVE_SETTINGS.enabled,
    },
  };
}

/**
 * Load the config. Returns null when the file is missing or cannot be
 * parsed (the problem is logged).
 */
export function loadConfig(): MockcraftConfig | null {
  const configPath = getConfigPath();

  if (!fs.existsSync(configPath)) return null;

  try {
    const content = fs.readFileSync(configPath, 'utf8');
    const parsed = yaml.load(content);

    if (!isConfigDocument(parsed)) {
      log.error('Invalid config format', { path: configPath });
      return null;
    }

    const config = mergeWithDefaults(parsed);

    if (parsed.version < CONFIG_VERSION) {
      config.version = CONFIG_VERSION;
      try {
        saveConfig(config);
        log.info('Upgraded config file', { from: parsed.version, to: CONFIG_VERSION });
      } catch (error) {
        // the upgraded config is still usable in memory
        log.warn('Could not save upgraded config', { error: error instanceof Error ? error.message : String(error) });
      }
    }

    return config;
  } catch (err) {
    if (err instanceof yaml.YAMLException) {
      const mark = err.mark;
      log.error('YAML syntax error in config', {
        path: configPath,
        line: (mark?.line ?? 0) + 1,
        column: (mark?.column ?? 0) + 1,
        reason: err.reason || 'Invalid syntax',
      });
    } else {
      log.error('Failed to load config', { path: configPath, error: err instanceof Error ? err.message : String(err) });
    }
    return null;
  }
}

export function loadOrCreateConfig(): MockcraftConfig {
  return loadConfig() ?? createDefaultConfig();
}

function generateYaml(config: MockcraftConfig): string {
  const dump = (value: Record<string, unknown>): string =>
    yaml.dump(value, { indent: 2, lineWidth: -1, quotingType: '"' }).trim();

  const lines: string[] = [
    '# mockcraft configuration',
    `version: ${config.version}`,
    '',
    '# ----------------------------------------------------------------------------',
    '# Export: formatting of generated MockServer JSON',
    '# ----------------------------------------------------------------------------',
    dump({ export: config.export }),
    '',
    '# ----------------------------------------------------------------------------',
    '# Defaults: applied to blueprint entries that do not set their own',
    '# ----------------------------------------------------------------------------',
    dump({ defaults: config.defaults }),
    '',
    '# ----------------------------------------------------------------------------',
    '# Progressive: expansion of escalating-delay expectations on build',
    '# ----------------------------------------------------------------------------',
    dump({ progressive: config.progressive }),
    '',
  ];
  return lines.join('\n');
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function saveConfig(config: MockcraftConfig): void {
  const configPath = getConfigPath();
  const dir = path.dirname(configPath);

  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
  }

  const maxRetries = 10;
  const retryDelayMs = 100;
  let lockAcquired = false;
  for (let i = 0; i < maxRetries; i++) {
    if (acquireLock()) {
      lockAcquired = true;
      break;
    }
    const waitUntil = Date.now() + retryDelayMs;
    while (Date.now() < waitUntil) {
      /* spin */
    }
  }

  if (!lockAcquired) {
    throw new ConfigError('Config file is locked by another process. Wait a moment and try again.', configPath);
  }

  try {
    config.version = CONFIG_VERSION;
    const tempPath = `${configPath}.tmp.${process.pid}`;

    try {
      fs.writeFileSync(tempPath, generateYaml(config), { mode: 0o600 });
      fs.renameSync(tempPath, configPath);
    } catch (error) {
      if (fs.existsSync(tempPath)) {
        fs.rmSync(tempPath, { force: true });
      }
      const code = errorCode(error);
      const message = error instanceof Error ? error.message : String(error);
      if (code === 'ENOSPC') {
        throw new ConfigError('Disk full - cannot save config. Free up space and try again.', configPath);
      } else if (code === 'EROFS' || code === 'EACCES') {
        throw new ConfigError(`Cannot write config - check file permissions: ${message}`, configPath);
      }
      throw new ConfigError(`Failed to save config: ${message}`, configPath);
    }
  } finally {
    releaseLock();
  }
}

export function updateConfig(update: (config: MockcraftConfig) => void): MockcraftConfig {
  const config = loadOrCreateConfig();
  update(config);
  saveConfig(config);
  return config;
}

// ============================================================================
// DOTTED KEYS
// ============================================================================

export type ConfigValue = string | number | boolean;

interface ConfigKeyDefinition {
  description: string;
  get(config: MockcraftConfig): ConfigValue;
  set(config: MockcraftConfig, raw: string): void;
}

function parseBoolean(key: string, raw: string): boolean {
  const value = raw.trim().toLowerCase();
  if (value === 'true' || value === 'yes' || value === '1') return true;
  if (value === 'false' || value === 'no' || value === '0') return false;
  throw new InputValidationError(key, raw, 'true or false');
}

const CONFIG_KEYS: Record<string, ConfigKeyDefinition> = {
  'export.indent': {
    description: 'JSON indentation of exported files (0 = single line)',
    get: (config) => config.export.indent,
    set: (config, raw) => {
      const value = Number(raw.trim());
      if (raw.trim() === '' || !isValidIndent(value)) {
        throw new InputValidationError('export.indent', raw, `integer 0-${MAX_EXPORT_INDENT}`);
      }
      config.export.indent = value;
    },
  },
  'export.include_ids': {
    description: 'Emit expectation ids in exported files',
    get: (config) => config.export.include_ids,
    set: (config, raw) => {
      config.export.include_ids = parseBoolean('export.include_ids', raw);
    },
  },
  'defaults.json_match_type': {
    description: 'Match type for JSON bodies without one (STRICT | ONLY_MATCHING_FIELDS)',
    get: (config) => config.defaults.json_match_type,
    set: (config, raw) => {
      const value = raw.trim().toUpperCase();
      if (!isMatchType(value)) {
        throw new InputValidationError('defaults.json_match_type', raw, 'STRICT or ONLY_MATCHING_FIELDS');
      }
      config.defaults.json_match_type = value;
    },
  },
  'defaults.delay_time_unit': {
    description: 'Time unit of fixed delays given in blueprints',
    get: (config) => config.defaults.delay_time_unit,
    set: (config, raw) => {
      const value = raw.trim().toUpperCase();
      if (!isTimeUnit(value)) {
        throw new InputValidationError('defaults.delay_time_unit', raw, 'a time unit such as MILLISECONDS');
      }
      config.defaults.delay_time_unit = value;
    },
  },
  'progressive.enabled': {
    description: 'Expand progressive delay policies on build',
    get: (config) => config.progressive.enabled,
    set: (config, raw) => {
      config.progressive.enabled = parseBoolean('progressive.enabled', raw);
    },
  },
};

export function listConfigKeys(): Array<{ key: string; description: string }> {
  return Object.entries(CONFIG_KEYS).map(([key, definition]) => ({ key, description: definition.description }));
}

function lookupKey(key: string): ConfigKeyDefinition {
  if (!Object.hasOwn(CONFIG_KEYS, key)) {
    throw new ConfigError(`Unknown config key '${key}'. Known keys: ${Object.keys(CONFIG_KEYS).join(', ')}`);
  }
  return CONFIG_KEYS[key];
}

export function getConfigValue(config: MockcraftConfig, key: string): ConfigValue {
  return lookupKey(key).get(config);
}

/**
 * Set a dotted key from its string form, validating the value.
 */
export function setConfigValue(config: MockcraftConfig, key: string, raw: string): void {
  lookupKey(key).set(config, raw);
}
