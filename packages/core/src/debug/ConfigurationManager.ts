/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { DebugLevel, DebugSettings } from './types.js';

export const DEBUG_NAMESPACE_ROOT = 'logfilter';

const TRUTHY = new Set(['1', 'true', 'yes', 'on', '*']);

/**
 * Holds the debug logging configuration. Sources, lowest priority first:
 * built-in defaults, the environment (`DEBUG`, `LF_DEBUG`, `LF_DEBUG_LEVEL`),
 * then ephemeral overrides set at run time.
 */
export class ConfigurationManager {
  private static instance: ConfigurationManager | undefined;

  private defaultConfig: DebugSettings;
  private envConfig: Partial<DebugSettings> | null = null;
  private ephemeralConfig: Partial<DebugSettings> | null = null;
  private mergedConfig: DebugSettings;
  private listeners: Set<() => void> = new Set();

  static getInstance(): ConfigurationManager {
    if (!ConfigurationManager.instance) {
      ConfigurationManager.instance = new ConfigurationManager();
    }
    return ConfigurationManager.instance;
  }

  private constructor() {
    this.defaultConfig = {
      enabled: false,
      namespaces: [],
      level: 'debug',
    };
    this.loadEnvironmentConfig(process.env);
    this.mergedConfig = this.mergeConfigurations();
  }

  /**
   * Re-reads the environment. The entry point calls this with the
   * environment the run was given.
   */
  loadEnvironmentConfig(env: NodeJS.ProcessEnv): void {
    this.envConfig = null;

    if (env['DEBUG']) {
      const namespaces = this.parseDebugEnv(env['DEBUG']).filter(
        (ns) => ns.startsWith(DEBUG_NAMESPACE_ROOT) || ns === '*',
      );
      if (namespaces.length > 0) {
        this.envConfig = { enabled: true, namespaces };
      }
    }

    const lfDebug = env['LF_DEBUG'];
    if (lfDebug) {
      this.envConfig = TRUTHY.has(lfDebug.trim().toLowerCase())
        ? { enabled: true, namespaces: [`${DEBUG_NAMESPACE_ROOT}:*`] }
        : { enabled: true, namespaces: this.parseDebugEnv(lfDebug) };
    }

    const level = env['LF_DEBUG_LEVEL'];
    if (level === 'debug' || level === 'warn' || level === 'error') {
      this.envConfig = { ...this.envConfig, level };
    }

    this.refresh();
  }

  setEphemeralConfig(config: Partial<DebugSettings>): void {
    this.ephemeralConfig = {
      ...this.ephemeralConfig,
      ...config,
    };
    this.refresh();
  }

  clearEphemeralConfig(): void {
    this.ephemeralConfig = null;
    this.refresh();
  }

  getEffectiveConfig(): DebugSettings {
    return this.mergedConfig;
  }

  getLevel(): DebugLevel {
    return this.mergedConfig.level;
  }

  subscribe(listener: () => void): void {
    this.listeners.add(listener);
  }

  unsubscribe(listener: () => void): void {
    this.listeners.delete(listener);
  }

  private refresh(): void {
    this.mergedConfig = this.mergeConfigurations();
    this.listeners.forEach((listener) => listener());
  }

  private mergeConfigurations(): DebugSettings {
    return {
      ...this.defaultConfig,
      ...this.envConfig,
      ...this.ephemeralConfig,
    };
  }

  private parseDebugEnv(value: string): string[] {
    return value
      .split(',')
      .map((s) => s.trim())
      .filter(Boolean);
  }
}
