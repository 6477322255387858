/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as path from 'node:path';
import * as os from 'os';

export const CONFIG_DIR_NAME = 'logfilter';
export const GLOBAL_CONFIG_FILENAME = 'config';
export const LOGFILES_CONFIG_FILENAME = 'logfiles.conf';

const DEFAULT_CONFIG_DIRS = '/etc/xdg';

/**
 * Locates configuration files on the XDG search path. Earlier entries take
 * precedence over later ones.
 */
export class Storage {
  private readonly env: NodeJS.ProcessEnv;

  constructor(env: NodeJS.ProcessEnv = process.env) {
    this.env = env;
  }

  getHomeDir(): string {
    return this.env['HOME'] || os.homedir();
  }

  getConfigHome(): string {
    return this.env['XDG_CONFIG_HOME'] || path.join(this.getHomeDir(), '.config');
  }

  /**
   * `$XDG_CONFIG_HOME` followed by each `$XDG_CONFIG_DIRS` entry.
   */
  getConfigDirs(): string[] {
    const systemDirs = (this.env['XDG_CONFIG_DIRS'] || DEFAULT_CONFIG_DIRS)
      .split(':')
      .filter((dir) => dir !== '');
    return [this.getConfigHome(), ...systemDirs];
  }

  getSearchPath(filename: string): string[] {
    return this.getConfigDirs().map((dir) =>
      path.join(dir, CONFIG_DIR_NAME, filename),
    );
  }

  getGlobalConfigSearchPath(): string[] {
    return this.getSearchPath(GLOBAL_CONFIG_FILENAME);
  }

  getLogfilesConfigSearchPath(): string[] {
    return this.getSearchPath(LOGFILES_CONFIG_FILENAME);
  }
}
