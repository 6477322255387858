/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  buildFilterSpec,
  applyOverrides,
  type FilterSpec,
  type FilterSpecDeps,
} from '../filter/filterSpec.js';
import { mergeLayers, type ConfigLayer } from './configLayer.js';
import { loadDefaults, loadGlobalConfig } from './configLoader.js';
import { resolveSettings } from './configParser.js';
import {
  loadSections,
  resolveForFile,
  type LogfileSections,
} from './sections.js';
import type { CliOverrides, ResolvedConfig } from './settings.js';
import { Storage } from './storage.js';

export interface ConfigParameters {
  defaults: ConfigLayer;
  global: ConfigLayer;
  sections: LogfileSections;
  cli?: CliOverrides;
  globalPath?: string;
}

/**
 * The configuration of one invocation: built-in defaults, the global config
 * file, the per-logfile sections and the command-line overrides. Layers are
 * read once; the per-file view is rebuilt for every log file.
 */
export class Config {
  private readonly defaults: ConfigLayer;
  private readonly global: ConfigLayer;
  private readonly sections: LogfileSections;
  private readonly cli: CliOverrides;
  private readonly globalPath?: string;

  constructor(params: ConfigParameters) {
    this.defaults = params.defaults;
    this.global = params.global;
    this.sections = params.sections;
    this.cli = params.cli ?? {};
    this.globalPath = params.globalPath;
  }

  /**
   * Reads the global and per-logfile configuration files from the XDG
   * search path described by `env`.
   *
   * @throws ConfigParseError if either file is present but malformed
   */
  static load(
    cli: CliOverrides = {},
    env: NodeJS.ProcessEnv = process.env,
  ): Config {
    const storage = new Storage(env);
    const global = loadGlobalConfig(storage.getGlobalConfigSearchPath());
    const sections = loadSections(storage.getLogfilesConfigSearchPath());
    return new Config({
      defaults: loadDefaults(),
      global: global.layer,
      sections,
      cli,
      globalPath: global.path,
    });
  }

  getGlobalConfigPath(): string | undefined {
    return this.globalPath;
  }

  getLogfilesConfigPath(): string | undefined {
    return this.sections.path;
  }

  /**
   * Raw values that apply to every file, before any pattern section.
   */
  getProgramLayer(): ConfigLayer {
    return mergeLayers([
      this.sections.defaultSection,
      this.global,
      this.defaults,
    ]);
  }

  /**
   * Settings for the whole run, with command-line overrides applied. Only
   * `batch` and `logfiles` are meant to be read from here.
   */
  getProgramSettings(): ResolvedConfig {
    return applyOverrides(resolveSettings(this.getProgramLayer()), this.cli);
  }

  /**
   * Raw values for one log file, without command-line overrides.
   */
  getFileLayer(filename: string): ConfigLayer {
    const fileLayer = resolveForFile(
      filename,
      this.sections.defaultSection,
      this.sections.sections,
    );
    return mergeLayers([fileLayer, this.global, this.defaults]);
  }

  /**
   * Typed settings for one log file, without command-line overrides.
   */
  resolveFile(filename: string): ResolvedConfig {
    return resolveSettings(this.getFileLayer(filename));
  }

  /**
   * @throws ConfigParseError, DateResolutionError or MissingProgramError
   */
  buildFilterSpec(filename: string, deps: FilterSpecDeps): FilterSpec {
    return buildFilterSpec(this.resolveFile(filename), this.cli, deps);
  }
}
