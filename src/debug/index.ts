/**
 * Debug Module - Logging
 *
 * ## Log Levels (verbosity - how much to show)
 *   silent  - nothing
 *   error   - errors only
 *   warn    - errors + warnings
 *   info    - normal operation (default)
 *   verbose - detailed info
 *   debug   - everything
 *
 * ## Usage
 *   import { log, setLogLevel } from '../debug/index.js';
 *
 *   log.info('Loader', 'Epoch 0: 128 batches');
 *   log.verbose('Collator', 'Truncated current utterance 600 -> 512');
 *   log.debug('Collator', `batch=${n} msg=${msgWidth}`);
 *
 *   setLogLevel('verbose');
 *   disableModules('Sampler');
 *
 * @module debug
 */

export {
  LOG_LEVELS,
  type LogLevel,
  type LogLevelValue,
  type LogEntry,
  setLogLevel,
  getLogLevel,
  enableModules,
  disableModules,
  resetModuleFilters,
  applyDebugConfig,
  getLogHistory,
  clearLogHistory,
} from './config.js';

export { log } from './log.js';
