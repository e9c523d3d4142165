/**
 * Schema Index
 *
 * Re-exports all schema definitions.
 *
 * Naming Convention:
 * - *Schema: Type definitions (interface structure)
 * - DEFAULT_*: Default instances
 * - *Overrides: Partial inputs merged over defaults
 *
 * @module config/schema
 */

export {
  DEFAULT_SPECIAL_TOKENS,
  DEFAULT_TURN_SEPARATOR,
  DEFAULT_COLLATOR_CONFIG,
  WRAP_TOKEN_SLOTS,
  MAX_TOKEN_ID,
  MIN_LABEL_SENTINEL,
  type SpecialTokensSchema,
  type CollatorConfigSchema,
} from './collator.schema.js';

export {
  DEFAULT_DATA_LOADER_CONFIG,
  type DataLoaderConfigSchema,
} from './loader.schema.js';

export {
  DEFAULT_LOG_HISTORY_CONFIG,
  DEFAULT_LOG_LEVEL_CONFIG,
  DEFAULT_DEBUG_CONFIG,
  LOG_LEVEL_NAMES,
  isLogLevelName,
  type LogLevelName,
  type LogHistoryConfigSchema,
  type LogLevelConfigSchema,
  type DebugConfigSchema,
} from './debug.schema.js';

export {
  DEFAULT_RUNTIME_CONFIG,
  createRuntimeConfig,
  mergeCollatorConfig,
  type RuntimeConfigSchema,
  type RuntimeConfigOverrides,
  type CollatorConfigOverrides,
  type DebugConfigOverrides,
} from './runtime.schema.js';
