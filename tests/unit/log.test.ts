import { afterEach, describe, expect, it, vi } from 'vitest';

import {
  clearLogHistory,
  disableModules,
  enableModules,
  getLogHistory,
  getLogLevel,
  log,
  resetModuleFilters,
  setLogLevel,
  applyDebugConfig,
} from '../../src/debug/index.js';
import { resetRuntimeConfig, setRuntimeConfig } from '../../src/config/runtime.js';
import { createRuntimeConfig } from '../../src/config/schema/index.js';

describe('debug/log', () => {
  afterEach(() => {
    setLogLevel('info');
    resetModuleFilters();
    clearLogHistory();
    resetRuntimeConfig();
    vi.restoreAllMocks();
  });

  it('prefixes messages with a timestamp and module tag', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    log.info('Loader', 'epoch done');

    expect(spy).toHaveBeenCalledTimes(1);
    expect(String(spy.mock.calls[0][0])).toMatch(/^\[\d+\.\dms\]\[Loader\] epoch done$/);
  });

  it('passes structured data through', () => {
    const spy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    log.warn('Collator', 'slow batch', { ms: 12 });

    expect(spy.mock.calls[0][1]).toEqual({ ms: 12 });
    expect(getLogHistory({ level: 'warn' })[0].data).toEqual({ ms: 12 });
  });

  it('filters by level', () => {
    const info = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    setLogLevel('warn');

    log.info('Collator', 'hidden');
    log.warn('Collator', 'shown');

    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(getLogLevel()).toBe('warn');
  });

  it('filters by module, case-insensitively', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});

    disableModules('Sampler');
    log.info('sampler', 'hidden');
    expect(spy).not.toHaveBeenCalled();

    resetModuleFilters();
    enableModules('Collator');
    log.info('Loader', 'hidden');
    log.info('collator', 'shown');
    expect(spy).toHaveBeenCalledTimes(1);
  });

  it('always logs regardless of level', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    setLogLevel('silent');
    log.always('Config', 'loaded');
    expect(spy).toHaveBeenCalledTimes(1);
  });

  it('caps history at the configured size', () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    setRuntimeConfig({ debug: { logHistory: { maxLogHistoryEntries: 2 } } });

    log.always('A', 'one');
    log.always('A', 'two');
    log.always('A', 'three');

    expect(getLogHistory().map((entry) => entry.message)).toEqual(['two', 'three']);
    expect(getLogHistory({ last: 1 })[0].message).toBe('three');
  });

  it('applies the default level from the debug config', () => {
    applyDebugConfig(createRuntimeConfig({ debug: { logLevel: { defaultLogLevel: 'error' } } }).debug);
    expect(getLogLevel()).toBe('error');
  });
});
