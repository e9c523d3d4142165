/**
 * Runtime Config Schema
 *
 * Master configuration composing the collator, data loader and debug
 * settings. Individual schemas stay importable for code that only needs
 * its own domain.
 *
 * @module config/schema/runtime
 */

import type { CollatorConfigSchema, SpecialTokensSchema } from './collator.schema.js';
import type { DataLoaderConfigSchema } from './loader.schema.js';
import type {
  DebugConfigSchema,
  LogHistoryConfigSchema,
  LogLevelConfigSchema,
} from './debug.schema.js';

import { DEFAULT_COLLATOR_CONFIG } from './collator.schema.js';
import { DEFAULT_DATA_LOADER_CONFIG } from './loader.schema.js';
import { DEFAULT_DEBUG_CONFIG } from './debug.schema.js';

// =============================================================================
// Runtime Config
// =============================================================================

export interface RuntimeConfigSchema {
  /** Turn merging, padding ids and budget */
  collator: CollatorConfigSchema;

  /** Batch size and example ordering */
  loader: DataLoaderConfigSchema;

  /** Logging */
  debug: DebugConfigSchema;
}

/** Default runtime configuration */
export const DEFAULT_RUNTIME_CONFIG: RuntimeConfigSchema = {
  collator: DEFAULT_COLLATOR_CONFIG,
  loader: DEFAULT_DATA_LOADER_CONFIG,
  debug: DEFAULT_DEBUG_CONFIG,
};

// =============================================================================
// Overrides
// =============================================================================

export interface CollatorConfigOverrides
  extends Partial<Omit<CollatorConfigSchema, 'specialTokens'>> {
  specialTokens?: Partial<SpecialTokensSchema>;
}

export interface DebugConfigOverrides {
  logHistory?: Partial<LogHistoryConfigSchema>;
  logLevel?: Partial<LogLevelConfigSchema>;
}

export interface RuntimeConfigOverrides {
  collator?: CollatorConfigOverrides;
  loader?: Partial<DataLoaderConfigSchema>;
  debug?: DebugConfigOverrides;
}

// =============================================================================
// Factory Functions
// =============================================================================

/**
 * Merge collator overrides over a base config.
 *
 * `separator` is replaced, never concatenated.
 */
export function mergeCollatorConfig(
  base: CollatorConfigSchema,
  overrides?: CollatorConfigOverrides
): CollatorConfigSchema {
  if (!overrides) {
    return { ...base, specialTokens: { ...base.specialTokens } };
  }
  return {
    ...base,
    ...overrides,
    separator: overrides.separator ?? base.separator,
    specialTokens: { ...base.specialTokens, ...overrides.specialTokens },
  };
}

/**
 * Create a runtime configuration with optional overrides.
 *
 * Performs a deep merge of nested objects over the defaults.
 *
 * @example
 * ```typescript
 * const config = createRuntimeConfig({
 *   collator: { maxLength: 256, specialTokens: { padId: 0 } },
 *   debug: { logLevel: { defaultLogLevel: 'debug' } },
 * });
 * ```
 */
export function createRuntimeConfig(overrides?: RuntimeConfigOverrides): RuntimeConfigSchema {
  const base = DEFAULT_RUNTIME_CONFIG;
  return {
    collator: mergeCollatorConfig(base.collator, overrides?.collator),
    loader: { ...base.loader, ...overrides?.loader },
    debug: {
      logHistory: { ...base.debug.logHistory, ...overrides?.debug?.logHistory },
      logLevel: { ...base.debug.logLevel, ...overrides?.debug?.logLevel },
    },
  };
}
