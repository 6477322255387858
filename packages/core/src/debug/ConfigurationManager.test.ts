/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { afterEach, describe, expect, it, vi } from 'vitest';
import { ConfigurationManager } from './ConfigurationManager.js';

describe('ConfigurationManager', () => {
  const manager = ConfigurationManager.getInstance();

  afterEach(() => {
    manager.clearEphemeralConfig();
    manager.loadEnvironmentConfig({});
  });

  it('returns the same instance on every call', () => {
    expect(ConfigurationManager.getInstance()).toBe(manager);
  });

  it('is disabled without debug variables', () => {
    manager.loadEnvironmentConfig({});
    expect(manager.getEffectiveConfig()).toEqual({
      enabled: false,
      namespaces: [],
      level: 'debug',
    });
  });

  it('enables every logfilter namespace for LF_DEBUG=1', () => {
    manager.loadEnvironmentConfig({ LF_DEBUG: '1' });
    expect(manager.getEffectiveConfig().enabled).toBe(true);
    expect(manager.getEffectiveConfig().namespaces).toEqual(['logfilter:*']);
  });

  it('takes a namespace list from LF_DEBUG', () => {
    manager.loadEnvironmentConfig({
      LF_DEBUG: 'logfilter:config, logfilter:filter',
    });
    expect(manager.getEffectiveConfig().namespaces).toEqual([
      'logfilter:config',
      'logfilter:filter',
    ]);
  });

  it('only picks logfilter namespaces out of DEBUG', () => {
    manager.loadEnvironmentConfig({ DEBUG: 'express:*,logfilter:config' });
    expect(manager.getEffectiveConfig().namespaces).toEqual([
      'logfilter:config',
    ]);

    manager.loadEnvironmentConfig({ DEBUG: 'express:*' });
    expect(manager.getEffectiveConfig().enabled).toBe(false);
  });

  it('reads the level from LF_DEBUG_LEVEL', () => {
    manager.loadEnvironmentConfig({ LF_DEBUG: '1', LF_DEBUG_LEVEL: 'warn' });
    expect(manager.getLevel()).toBe('warn');
  });

  it('lets ephemeral settings override the environment', () => {
    manager.loadEnvironmentConfig({ LF_DEBUG: '1' });
    manager.setEphemeralConfig({ enabled: false });
    expect(manager.getEffectiveConfig().enabled).toBe(false);
    expect(manager.getEffectiveConfig().namespaces).toEqual(['logfilter:*']);
  });

  it('notifies subscribers on change', () => {
    const listener = vi.fn();
    manager.subscribe(listener);
    manager.setEphemeralConfig({ level: 'error' });
    manager.unsubscribe(listener);
    manager.setEphemeralConfig({ level: 'debug' });

    expect(listener).toHaveBeenCalledTimes(1);
  });
});
