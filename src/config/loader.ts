/**
 * Config File Loader
 *
 * Reads runtime overrides from a JSON file and merges them over the
 * defaults. Unknown keys are ignored; known keys with the wrong type are
 * rejected rather than coerced.
 *
 * @module config/loader
 */

import { readFile } from 'fs/promises';
import { createCollatorError, ERROR_CODES } from '../errors/collator-error.js';
import { log } from '../debug/index.js';
import { assertValidRuntimeConfig } from './validate.js';
import {
  createRuntimeConfig,
  isLogLevelName,
  type CollatorConfigOverrides,
  type DataLoaderConfigSchema,
  type DebugConfigOverrides,
  type RuntimeConfigOverrides,
  type RuntimeConfigSchema,
  type SpecialTokensSchema,
} from './schema/index.js';

// =============================================================================
// Field Readers
// =============================================================================

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function configError(path: string, expected: string, value: unknown): Error {
  return createCollatorError(
    ERROR_CODES.CONFIGURATION,
    `${path} must be ${expected}, got ${JSON.stringify(value)}`
  );
}

function readSection(raw: JsonObject, key: string, path: string): JsonObject | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (!isObject(value)) throw configError(`${path}.${key}`, 'an object', value);
  return value;
}

function readNumber(raw: JsonObject, key: string, path: string): number | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'number') throw configError(`${path}.${key}`, 'a number', value);
  return value;
}

function readBoolean(raw: JsonObject, key: string, path: string): boolean | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'boolean') throw configError(`${path}.${key}`, 'a boolean', value);
  return value;
}

function readNumberArray(raw: JsonObject, key: string, path: string): number[] | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (!Array.isArray(value)) throw configError(`${path}.${key}`, 'an array of numbers', value);
  const out: number[] = [];
  for (const item of value) {
    if (typeof item !== 'number') throw configError(`${path}.${key}`, 'an array of numbers', value);
    out.push(item);
  }
  return out;
}

/** Drop keys whose value is undefined so spreads keep the defaults */
function compact<T extends object>(value: T): T {
  for (const [key, entry] of Object.entries(value)) {
    if (entry === undefined) Reflect.deleteProperty(value, key);
  }
  return value;
}

// =============================================================================
// Section Parsers
// =============================================================================

function parseSpecialTokens(raw: JsonObject, path: string): Partial<SpecialTokensSchema> {
  return compact({
    bosId: readNumber(raw, 'bosId', path),
    eosId: readNumber(raw, 'eosId', path),
    padId: readNumber(raw, 'padId', path),
    ignoreLabel: readNumber(raw, 'ignoreLabel', path),
  });
}

function parseCollatorOverrides(raw: JsonObject, path: string): CollatorConfigOverrides {
  const specialTokens = readSection(raw, 'specialTokens', path);
  return compact({
    maxLength: readNumber(raw, 'maxLength', path),
    separator: readNumberArray(raw, 'separator', path),
    includeHistory: readBoolean(raw, 'includeHistory', path),
    emitGenerationPrompt: readBoolean(raw, 'emitGenerationPrompt', path),
    addSpecialTokens: readBoolean(raw, 'addSpecialTokens', path),
    contextPadId: readNumber(raw, 'contextPadId', path),
    specialTokens: specialTokens ? parseSpecialTokens(specialTokens, `${path}.specialTokens`) : undefined,
  });
}

function parseLoaderOverrides(raw: JsonObject, path: string): Partial<DataLoaderConfigSchema> {
  return compact({
    batchSize: readNumber(raw, 'batchSize', path),
    shuffle: readBoolean(raw, 'shuffle', path),
    groupByAuthor: readBoolean(raw, 'groupByAuthor', path),
    seed: readNumber(raw, 'seed', path),
    dropLast: readBoolean(raw, 'dropLast', path),
  });
}

function parseDebugOverrides(raw: JsonObject, path: string): DebugConfigOverrides {
  const logHistory = readSection(raw, 'logHistory', path);
  const logLevel = readSection(raw, 'logLevel', path);
  const overrides: DebugConfigOverrides = {};

  if (logHistory) {
    overrides.logHistory = compact({
      maxLogHistoryEntries: readNumber(logHistory, 'maxLogHistoryEntries', `${path}.logHistory`),
    });
  }
  if (logLevel) {
    const level = logLevel.defaultLogLevel;
    if (level !== undefined) {
      if (typeof level !== 'string' || !isLogLevelName(level)) {
        throw configError(`${path}.logLevel.defaultLogLevel`, 'a log level name', level);
      }
      overrides.logLevel = { defaultLogLevel: level };
    }
  }
  return overrides;
}

/**
 * Convert parsed JSON into typed runtime overrides.
 */
export function parseRuntimeOverrides(raw: unknown): RuntimeConfigOverrides {
  if (!isObject(raw)) throw configError('config', 'an object', raw);

  const collator = readSection(raw, 'collator', 'config');
  const loader = readSection(raw, 'loader', 'config');
  const debug = readSection(raw, 'debug', 'config');

  return compact({
    collator: collator ? parseCollatorOverrides(collator, 'config.collator') : undefined,
    loader: loader ? parseLoaderOverrides(loader, 'config.loader') : undefined,
    debug: debug ? parseDebugOverrides(debug, 'config.debug') : undefined,
  });
}

// =============================================================================
// File Loading
// =============================================================================

/**
 * Load a JSON config file, merge it over the defaults and validate the result.
 */
export async function loadRuntimeConfig(filePath: string): Promise<RuntimeConfigSchema> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf8');
  } catch (error) {
    throw createCollatorError(ERROR_CODES.CONFIGURATION, `Cannot read config file ${filePath}`, {
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw createCollatorError(ERROR_CODES.CONFIGURATION, `Config file ${filePath} is not valid JSON`, {
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  const config = createRuntimeConfig(parseRuntimeOverrides(raw));
  assertValidRuntimeConfig(config);
  log.verbose('Config', `Loaded ${filePath}`, {
    maxLength: config.collator.maxLength,
    batchSize: config.loader.batchSize,
  });
  return config;
}
