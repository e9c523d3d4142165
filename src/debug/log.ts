/**
 * Debug Module - Core Logging Interface
 *
 * Provides structured logging with level filtering and history tracking.
 *
 * @module debug/log
 */

import { getRuntimeConfig } from '../config/runtime.js';
import {
  LOG_LEVELS,
  type LogLevelValue,
  currentLogLevel,
  enabledModules,
  disabledModules,
  logHistory,
} from './config.js';

// ============================================================================
// Internal Helpers
// ============================================================================

/**
 * Check if logging is enabled for a module at a level.
 */
function shouldLog(module: string, level: LogLevelValue): boolean {
  if (level < currentLogLevel) return false;

  const moduleLower = module.toLowerCase();

  if (enabledModules.size > 0 && !enabledModules.has(moduleLower)) {
    return false;
  }

  if (disabledModules.has(moduleLower)) {
    return false;
  }

  return true;
}

/**
 * Format a log message with timestamp and module tag.
 */
function formatMessage(module: string, message: string): string {
  const timestamp = performance.now().toFixed(1);
  return `[${timestamp}ms][${module}] ${message}`;
}

/**
 * Store log in history for later retrieval.
 */
function storeLog(level: string, module: string, message: string, data?: unknown): void {
  logHistory.push({
    time: Date.now(),
    perfTime: performance.now(),
    level,
    module,
    message,
    data,
  });

  const maxHistory = getRuntimeConfig().debug.logHistory.maxLogHistoryEntries;
  while (logHistory.length > maxHistory) {
    logHistory.shift();
  }
}

type ConsoleMethod = (...args: unknown[]) => void;

function emit(
  write: ConsoleMethod,
  level: string,
  module: string,
  message: string,
  data?: unknown
): void {
  const formatted = formatMessage(module, message);
  storeLog(level, module, message, data);
  if (data !== undefined) {
    write(formatted, data);
  } else {
    write(formatted);
  }
}

// ============================================================================
// Logging Interface
// ============================================================================

/**
 * Main logging interface.
 */
export const log = {
  /**
   * Debug level logging (most verbose).
   */
  debug(module: string, message: string, data?: unknown): void {
    if (!shouldLog(module, LOG_LEVELS.DEBUG)) return;
    emit(console.debug, 'DEBUG', module, message, data);
  },

  /**
   * Verbose level logging (detailed operational info).
   */
  verbose(module: string, message: string, data?: unknown): void {
    if (!shouldLog(module, LOG_LEVELS.VERBOSE)) return;
    emit(console.log, 'VERBOSE', module, message, data);
  },

  /**
   * Info level logging (normal operations).
   */
  info(module: string, message: string, data?: unknown): void {
    if (!shouldLog(module, LOG_LEVELS.INFO)) return;
    emit(console.log, 'INFO', module, message, data);
  },

  warn(module: string, message: string, data?: unknown): void {
    if (!shouldLog(module, LOG_LEVELS.WARN)) return;
    emit(console.warn, 'WARN', module, message, data);
  },

  error(module: string, message: string, data?: unknown): void {
    if (!shouldLog(module, LOG_LEVELS.ERROR)) return;
    emit(console.error, 'ERROR', module, message, data);
  },

  /**
   * Always log regardless of level (for critical messages).
   */
  always(module: string, message: string, data?: unknown): void {
    emit(console.log, 'ALWAYS', module, message, data);
  },
};
