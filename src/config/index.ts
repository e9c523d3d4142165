/**
 * Config Module Index
 *
 * Central export for config-as-code architecture.
 *
 * @module config
 */

// Schema types
export * from './schema/index.js';

// Runtime registry
export { getRuntimeConfig, setRuntimeConfig, resetRuntimeConfig } from './runtime.js';

// Validation
export {
  validateCollatorConfig,
  validateLoaderConfig,
  validateDebugConfig,
  validateRuntimeConfig,
  assertValidCollatorConfig,
  assertValidLoaderConfig,
  assertValidRuntimeConfig,
  createCollatorConfig,
  type ValidationResult,
} from './validate.js';

// File loader
export { loadRuntimeConfig, parseRuntimeOverrides } from './loader.js';
