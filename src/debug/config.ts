/**
 * Debug Module - Configuration and State Management
 *
 * Manages log levels, module filters and log history.
 *
 * @module debug/config
 */

import {
  LOG_LEVEL_NAMES,
  type DebugConfigSchema,
  type LogLevelName,
} from '../config/schema/debug.schema.js';

// ============================================================================
// Types and Constants
// ============================================================================

/**
 * Log level values (higher = less verbose)
 */
export const LOG_LEVELS = {
  DEBUG: 0,
  VERBOSE: 1,
  INFO: 2,
  WARN: 3,
  ERROR: 4,
  SILENT: 5,
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;
export type LogLevelValue = (typeof LOG_LEVELS)[LogLevel];

const LEVEL_BY_NAME: Record<LogLevelName, LogLevelValue> = {
  debug: LOG_LEVELS.DEBUG,
  verbose: LOG_LEVELS.VERBOSE,
  info: LOG_LEVELS.INFO,
  warn: LOG_LEVELS.WARN,
  error: LOG_LEVELS.ERROR,
  silent: LOG_LEVELS.SILENT,
};

/**
 * Log entry for history
 */
export interface LogEntry {
  time: number;
  perfTime: number;
  level: string;
  module: string;
  message: string;
  data?: unknown;
}

// ============================================================================
// Global State
// ============================================================================

export let currentLogLevel: LogLevelValue = LOG_LEVELS.INFO;
export const enabledModules = new Set<string>();
export const disabledModules = new Set<string>();
export const logHistory: LogEntry[] = [];

// ============================================================================
// Configuration Functions
// ============================================================================

/**
 * Set the global log level.
 */
export function setLogLevel(level: LogLevelName): void {
  currentLogLevel = LEVEL_BY_NAME[level];
}

/**
 * Get current log level name.
 */
export function getLogLevel(): LogLevelName {
  return LOG_LEVEL_NAMES.find((name) => LEVEL_BY_NAME[name] === currentLogLevel) ?? 'info';
}

/**
 * Only log these modules (case-insensitive). Empty = all modules.
 */
export function enableModules(...modules: string[]): void {
  for (const module of modules) {
    enabledModules.add(module.toLowerCase());
  }
}

/**
 * Never log these modules (case-insensitive).
 */
export function disableModules(...modules: string[]): void {
  for (const module of modules) {
    disabledModules.add(module.toLowerCase());
  }
}

/**
 * Clear module filters.
 */
export function resetModuleFilters(): void {
  enabledModules.clear();
  disabledModules.clear();
}

/**
 * Apply the debug section of the runtime config.
 */
export function applyDebugConfig(config: DebugConfigSchema): void {
  setLogLevel(config.logLevel.defaultLogLevel);
}

// ============================================================================
// History
// ============================================================================

export function getLogHistory(filter?: { level?: string; module?: string; last?: number }): LogEntry[] {
  let entries = logHistory.slice();
  if (filter?.level) {
    const level = filter.level.toUpperCase();
    entries = entries.filter((entry) => entry.level === level);
  }
  if (filter?.module) {
    const module = filter.module.toLowerCase();
    entries = entries.filter((entry) => entry.module.toLowerCase() === module);
  }
  if (filter?.last !== undefined) {
    entries = entries.slice(-filter.last);
  }
  return entries;
}

export function clearLogHistory(): void {
  logHistory.length = 0;
}
