import JSON5 from 'json5';
import { readFileSync } from 'node:fs';
import type { EventLogBackend, SwitchyardConfig } from './config.js';
import { LOG_LEVELS } from './logger.js';
import type { LogLevel } from './logger.js';
import { isRecord } from './utils.js';

/** Sections that must exist at the top level of the config. */
const REQUIRED_SECTIONS = ['dispatcher', 'eventLog', 'logging'] as const;

const VALID_TOP_LEVEL_KEYS = new Set<string>(REQUIRED_SECTIONS);

const BACKENDS: readonly EventLogBackend[] = ['memory', 'sqlite'];

export interface ConfigValidationError {
  path: string;
  message: string;
}

export interface ConfigValidationResult {
  valid: boolean;
  errors: ConfigValidationError[];
  config?: SwitchyardConfig;
}

function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((l) => l === value);
}

function isBackend(value: unknown): value is EventLogBackend {
  return BACKENDS.some((b) => b === value);
}

function isPositiveNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0;
}

/**
 * Validate an already-parsed config value.
 * Rejects unknown top-level keys (strict mode).
 */
export function validateConfigObject(parsed: unknown): ConfigValidationResult {
  if (!isRecord(parsed)) {
    return {
      valid: false,
      errors: [{ path: '', message: 'Config must be an object' }],
    };
  }

  const errors: ConfigValidationError[] = [];

  for (const key of Object.keys(parsed)) {
    if (!VALID_TOP_LEVEL_KEYS.has(key)) {
      errors.push({ path: key, message: `Unknown top-level key: "${key}"` });
    }
  }

  for (const section of REQUIRED_SECTIONS) {
    if (!(section in parsed)) {
      errors.push({ path: section, message: `Missing required section: "${section}"` });
    } else if (!isRecord(parsed[section])) {
      errors.push({ path: section, message: `Section "${section}" must be an object` });
    }
  }

  if (errors.length > 0) {
    return { valid: false, errors };
  }

  const { dispatcher, eventLog, logging } = parsed;

  if (isRecord(dispatcher)) {
    if (typeof dispatcher['agentName'] !== 'string' || dispatcher['agentName'] === '') {
      errors.push({ path: 'dispatcher.agentName', message: 'Must be a non-empty string' });
    }
    if (!isPositiveNumber(dispatcher['deadlineMs'])) {
      errors.push({ path: 'dispatcher.deadlineMs', message: 'Must be a positive number' });
    }
  }

  if (isRecord(eventLog)) {
    const backend = eventLog['backend'];
    if (!isBackend(backend)) {
      errors.push({
        path: 'eventLog.backend',
        message: `Must be one of: ${BACKENDS.join(', ')}`,
      });
    } else if (backend === 'sqlite' && typeof eventLog['dbPath'] !== 'string') {
      errors.push({ path: 'eventLog.dbPath', message: 'Required for the sqlite backend' });
    }
    const capacity = eventLog['capacity'];
    if (capacity !== undefined && !(Number.isInteger(capacity) && isPositiveNumber(capacity))) {
      errors.push({ path: 'eventLog.capacity', message: 'Must be a positive integer' });
    }
  }

  if (isRecord(logging) && !isLogLevel(logging['level'])) {
    errors.push({
      path: 'logging.level',
      message: `Must be one of: ${LOG_LEVELS.join(', ')}`,
    });
  }

  return {
    valid: errors.length === 0,
    errors,
    config: errors.length === 0 ? (parsed as unknown as SwitchyardConfig) : undefined,
  };
}

/** Parse and validate a JSON5 config string. */
export function validateConfig(json5String: string): ConfigValidationResult {
  let parsed: unknown;
  try {
    parsed = JSON5.parse(json5String);
  } catch (err) {
    return {
      valid: false,
      errors: [{ path: '', message: `Invalid JSON5: ${String(err)}` }],
    };
  }
  return validateConfigObject(parsed);
}

/**
 * Load and validate a JSON5 config file from disk.
 */
export function loadConfig(filePath: string): ConfigValidationResult {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (err) {
    return {
      valid: false,
      errors: [{ path: '', message: `Cannot read config file: ${String(err)}` }],
    };
  }
  return validateConfig(content);
}
