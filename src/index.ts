/**
 * history-collator
 *
 * History-aware batch assembly for sequence-to-sequence training and
 * autoregressive continuation.
 *
 * @module history-collator
 */

export * from './training/index.js';
export * from './config/index.js';
export {
  ERROR_CODES,
  CollatorError,
  createCollatorError,
  isCollatorError,
  type ErrorCode,
} from './errors/collator-error.js';
export {
  log,
  setLogLevel,
  getLogLevel,
  enableModules,
  disableModules,
  resetModuleFilters,
  applyDebugConfig,
  getLogHistory,
  clearLogHistory,
  type LogEntry,
} from './debug/index.js';
