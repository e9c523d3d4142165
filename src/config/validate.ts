/**
 * Config Validation
 *
 * Checks a merged configuration before any batch is built, so a bad
 * sentinel or budget fails once at setup instead of producing batches
 * with hidden labels.
 *
 * @module config/validate
 */

import { createCollatorError, ERROR_CODES } from '../errors/collator-error.js';
import {
  DEFAULT_COLLATOR_CONFIG,
  MAX_TOKEN_ID,
  MIN_LABEL_SENTINEL,
  WRAP_TOKEN_SLOTS,
  isLogLevelName,
  mergeCollatorConfig,
  type CollatorConfigOverrides,
  type CollatorConfigSchema,
  type DataLoaderConfigSchema,
  type DebugConfigSchema,
  type RuntimeConfigSchema,
} from './schema/index.js';

export interface ValidationResult {
  ok: boolean;
  errors: string[];
}

function resultBase(): ValidationResult {
  return { ok: true, errors: [] };
}

function addError(result: ValidationResult, message: string): void {
  result.ok = false;
  result.errors.push(message);
}

function isTokenId(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 && value <= MAX_TOKEN_ID;
}

function isLabelSentinel(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value < 0 && value >= MIN_LABEL_SENTINEL;
}

export function validateCollatorConfig(config: CollatorConfigSchema): ValidationResult {
  const result = resultBase();
  const { maxLength, separator, specialTokens } = config;

  if (!Number.isInteger(maxLength) || maxLength <= 0) {
    addError(result, `collator: maxLength must be a positive integer, got ${maxLength}.`);
  } else if (config.addSpecialTokens && maxLength < WRAP_TOKEN_SLOTS) {
    addError(
      result,
      `collator: maxLength ${maxLength} cannot hold the ${WRAP_TOKEN_SLOTS} bos/eos slots.`
    );
  }

  if (!separator.every(isTokenId)) {
    addError(result, `collator: separator must be an array of token ids in [0, ${MAX_TOKEN_ID}].`);
  } else if (config.includeHistory && separator.length === 0) {
    addError(result, 'collator: separator must not be empty when includeHistory is enabled.');
  }

  for (const key of ['bosId', 'eosId', 'padId'] as const) {
    if (!isTokenId(specialTokens[key])) {
      addError(
        result,
        `collator: specialTokens.${key} must be a token id in [0, ${MAX_TOKEN_ID}], got ${specialTokens[key]}.`
      );
    }
  }

  // Token ids are non-negative, so a negative sentinel never hides a real label.
  if (!isLabelSentinel(specialTokens.ignoreLabel)) {
    addError(
      result,
      `collator: specialTokens.ignoreLabel must be a negative integer no smaller than ${MIN_LABEL_SENTINEL}, got ${specialTokens.ignoreLabel}.`
    );
  }

  if (!isTokenId(config.contextPadId)) {
    addError(
      result,
      `collator: contextPadId must be a token id in [0, ${MAX_TOKEN_ID}], got ${config.contextPadId}.`
    );
  }

  return result;
}

export function validateLoaderConfig(config: DataLoaderConfigSchema): ValidationResult {
  const result = resultBase();
  if (!Number.isInteger(config.batchSize) || config.batchSize <= 0) {
    addError(result, `loader: batchSize must be a positive integer, got ${config.batchSize}.`);
  }
  if (!Number.isInteger(config.seed)) {
    addError(result, `loader: seed must be an integer, got ${config.seed}.`);
  }
  return result;
}

export function validateDebugConfig(config: DebugConfigSchema): ValidationResult {
  const result = resultBase();
  const maxEntries = config.logHistory.maxLogHistoryEntries;
  if (!Number.isInteger(maxEntries) || maxEntries < 0) {
    addError(result, `debug: maxLogHistoryEntries must be a non-negative integer, got ${maxEntries}.`);
  }
  if (!isLogLevelName(config.logLevel.defaultLogLevel)) {
    addError(result, `debug: unknown log level "${config.logLevel.defaultLogLevel}".`);
  }
  return result;
}

export function validateRuntimeConfig(config: RuntimeConfigSchema): ValidationResult {
  const errors = [
    ...validateCollatorConfig(config.collator).errors,
    ...validateLoaderConfig(config.loader).errors,
    ...validateDebugConfig(config.debug).errors,
  ];
  return { ok: errors.length === 0, errors };
}

function throwIfInvalid(result: ValidationResult): void {
  if (result.errors.length > 0) {
    const detail = result.errors.map((err) => `- ${err}`).join('\n');
    throw createCollatorError(ERROR_CODES.CONFIGURATION, `Config validation failed:\n${detail}`, {
      errors: result.errors,
    });
  }
}

export function assertValidCollatorConfig(config: CollatorConfigSchema): void {
  throwIfInvalid(validateCollatorConfig(config));
}

export function assertValidLoaderConfig(config: DataLoaderConfigSchema): void {
  throwIfInvalid(validateLoaderConfig(config));
}

export function assertValidRuntimeConfig(config: RuntimeConfigSchema): void {
  throwIfInvalid(validateRuntimeConfig(config));
}

/**
 * Merge overrides over the default collator config and validate the result.
 */
export function createCollatorConfig(overrides?: CollatorConfigOverrides): CollatorConfigSchema {
  const config = mergeCollatorConfig(DEFAULT_COLLATOR_CONFIG, overrides);
  assertValidCollatorConfig(config);
  return config;
}
