/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import createDebug from 'debug';
import type { Debugger } from 'debug';
import { ConfigurationManager } from './ConfigurationManager.js';
import type { DebugLevel } from './types.js';

const LEVEL_RANK: Record<DebugLevel, number> = {
  debug: 0,
  warn: 1,
  error: 2,
};

/**
 * Namespaced diagnostic logger. Output goes to stderr through `debug` and
 * never touches stdout, which carries the filtered log lines.
 */
export class DebugLogger {
  private static instances: Map<string, DebugLogger> = new Map();

  private debugInstance: Debugger;
  private _namespace: string;
  private _configManager: ConfigurationManager;
  private _enabled: boolean;
  private boundOnConfigChange: () => void;

  /**
   * Returns the cached logger for a namespace, creating it on first use.
   */
  static getLogger(namespace: string): DebugLogger {
    let logger = DebugLogger.instances.get(namespace);
    if (!logger) {
      logger = new DebugLogger(namespace);
      DebugLogger.instances.set(namespace, logger);
    }
    return logger;
  }

  static disposeAll(): void {
    for (const logger of DebugLogger.instances.values()) {
      logger._configManager.unsubscribe(logger.boundOnConfigChange);
    }
    DebugLogger.instances.clear();
  }

  constructor(namespace: string) {
    this._namespace = namespace;
    this.debugInstance = createDebug(namespace);
    // Filtering is decided here, not by debug's own DEBUG parsing.
    this.debugInstance.enabled = true;
    this._configManager = ConfigurationManager.getInstance();
    this._enabled = this.checkEnabled();
    this.boundOnConfigChange = () => this.onConfigChange();
    this._configManager.subscribe(this.boundOnConfigChange);
  }

  get namespace(): string {
    return this._namespace;
  }

  get enabled(): boolean {
    return this._enabled;
  }

  set enabled(value: boolean) {
    this._enabled = value;
  }

  /**
   * Replaces the function that receives formatted output. Used by tests.
   */
  set sink(log: (...args: unknown[]) => void) {
    this.debugInstance.log = log;
  }

  debug(messageOrFn: string | (() => string), ...args: unknown[]): void {
    this.logWithLevel('debug', messageOrFn, ...args);
  }

  warn(messageOrFn: string | (() => string), ...args: unknown[]): void {
    this.logWithLevel('warn', messageOrFn, ...args);
  }

  error(messageOrFn: string | (() => string), ...args: unknown[]): void {
    this.logWithLevel('error', messageOrFn, ...args);
  }

  private logWithLevel(
    level: DebugLevel,
    messageOrFn: string | (() => string),
    ...args: unknown[]
  ): void {
    if (!this._enabled) {
      return;
    }
    if (LEVEL_RANK[level] < LEVEL_RANK[this._configManager.getLevel()]) {
      return;
    }

    let message: string;
    if (typeof messageOrFn === 'function') {
      try {
        message = messageOrFn();
      } catch (_error) {
        message = '[Error evaluating log function]';
      }
    } else {
      message = messageOrFn;
    }

    this.debugInstance(`${level}: ${message}`, ...args);
  }

  checkEnabled(): boolean {
    const config = this._configManager.getEffectiveConfig();
    if (!config.enabled) {
      return false;
    }
    return config.namespaces.some((pattern) =>
      this.matchesPattern(this._namespace, pattern),
    );
  }

  private matchesPattern(namespace: string, pattern: string): boolean {
    if (pattern === namespace) {
      return true;
    }

    if (pattern.includes('*')) {
      const regexPattern = pattern
        .replace(/[.+?^${}()|[\]\\]/g, '\\$&')
        .replace(/\*/g, '.*');
      return new RegExp(`^${regexPattern}$`).test(namespace);
    }

    return false;
  }

  private onConfigChange(): void {
    this._enabled = this.checkEnabled();
  }

  dispose(): void {
    this._configManager.unsubscribe(this.boundOnConfigChange);
    if (DebugLogger.instances.get(this._namespace) === this) {
      DebugLogger.instances.delete(this._namespace);
    }
  }
}
