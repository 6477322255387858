/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { DebugLogger } from './DebugLogger.js';
import { ConfigurationManager } from './ConfigurationManager.js';

describe('DebugLogger', () => {
  const configManager = ConfigurationManager.getInstance();

  beforeEach(() => {
    configManager.clearEphemeralConfig();
  });

  afterEach(() => {
    configManager.clearEphemeralConfig();
    DebugLogger.disposeAll();
  });

  it('keeps its namespace', () => {
    const logger = new DebugLogger('logfilter:test');
    expect(logger.namespace).toBe('logfilter:test');
  });

  it('returns the same instance per namespace', () => {
    expect(DebugLogger.getLogger('logfilter:a')).toBe(
      DebugLogger.getLogger('logfilter:a'),
    );
    expect(DebugLogger.getLogger('logfilter:a')).not.toBe(
      DebugLogger.getLogger('logfilter:b'),
    );
  });

  it('does not evaluate message functions when disabled', () => {
    const logger = new DebugLogger('logfilter:test');
    logger.enabled = false;
    const sink = vi.fn();
    logger.sink = sink;

    const expensiveFn = vi.fn(() => 'expensive message');
    logger.debug(expensiveFn);

    expect(expensiveFn).not.toHaveBeenCalled();
    expect(sink).not.toHaveBeenCalled();
  });

  it('evaluates message functions when enabled', () => {
    const logger = new DebugLogger('logfilter:test');
    logger.enabled = true;
    const sink = vi.fn();
    logger.sink = sink;

    logger.debug(() => 'expensive message');

    expect(sink).toHaveBeenCalledOnce();
    expect(String(sink.mock.calls[0][0])).toContain('debug: expensive message');
  });

  it('substitutes a marker when the message function throws', () => {
    const logger = new DebugLogger('logfilter:test');
    logger.enabled = true;
    const sink = vi.fn();
    logger.sink = sink;

    logger.warn(() => {
      throw new Error('boom');
    });

    expect(String(sink.mock.calls[0][0])).toContain(
      'warn: [Error evaluating log function]',
    );
  });

  it('drops messages below the configured level', () => {
    configManager.setEphemeralConfig({ level: 'error' });
    const logger = new DebugLogger('logfilter:test');
    logger.enabled = true;
    const sink = vi.fn();
    logger.sink = sink;

    logger.debug('debug message');
    logger.warn('warn message');
    logger.error('error message');

    expect(sink).toHaveBeenCalledOnce();
    expect(String(sink.mock.calls[0][0])).toContain('error: error message');
  });

  it('matches wildcard namespaces', () => {
    const logger = new DebugLogger('logfilter:config:sections');
    configManager.setEphemeralConfig({
      enabled: true,
      namespaces: ['logfilter:config:*'],
    });

    expect(logger.enabled).toBe(true);
    expect(logger.checkEnabled()).toBe(true);
  });

  it('stays disabled for namespaces that are not listed', () => {
    const logger = new DebugLogger('logfilter:filter');
    configManager.setEphemeralConfig({
      enabled: true,
      namespaces: ['logfilter:config:*'],
    });

    expect(logger.checkEnabled()).toBe(false);
  });
});
