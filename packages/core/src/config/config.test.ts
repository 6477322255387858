/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'node:path';
import { Config } from './config.js';
import { layerValues } from './configLayer.js';
import type { DateResolver } from '../filter/dateResolver.js';
import { ConfigParseError } from '../utils/errors.js';

const stubResolver: DateResolver = {
  resolve: (expression, datefmt) => `${expression}@${datefmt}`,
};

describe('Config', () => {
  let tempDir: string;
  let env: NodeJS.ProcessEnv;
  let configDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'logfilter-layers-'));
    configDir = path.join(tempDir, 'config', 'logfilter');
    fs.mkdirSync(configDir, { recursive: true });
    env = {
      HOME: path.join(tempDir, 'home'),
      XDG_CONFIG_HOME: path.join(tempDir, 'config'),
      XDG_CONFIG_DIRS: path.join(tempDir, 'system'),
    };
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function writeConfig(name: string, text: string): string {
    const file = path.join(configDir, name);
    fs.writeFileSync(file, text);
    return file;
  }

  it('uses the built-in defaults when no files exist', () => {
    const config = Config.load({}, env);

    expect(config.getGlobalConfigPath()).toBeUndefined();
    expect(config.getLogfilesConfigPath()).toBeUndefined();

    const spec = config.buildFilterSpec('/var/log/app.log', {
      dateResolver: stubResolver,
      env,
    });
    expect(spec).toEqual({
      afterStamp: 'today-3days@+%Y-%m-%d',
      beforeStamp: 'today+1day@+%Y-%m-%d',
      levelThreshold: 'WARNING',
      datefmt: '+%Y-%m-%d',
      programText: '$1 > after && $1 <= before && $3 ~ level',
    });
  });

  it('lets logfile sections override the global config per file', () => {
    const globalPath = writeConfig('config', 'level = info\n');
    const logfilesPath = writeConfig(
      'logfiles.conf',
      '[*.log]\nlevel = error\n',
    );
    const config = Config.load({}, env);

    expect(config.getGlobalConfigPath()).toBe(globalPath);
    expect(config.getLogfilesConfigPath()).toBe(logfilesPath);
    expect(config.resolveFile('app.log').level).toBe('ERROR');
    expect(config.resolveFile('other.txt').level).toBe('INFO');
  });

  it('lets the logfiles DEFAULT section override the global config', () => {
    writeConfig('config', 'level = info\ndatefmt = +%F\n');
    writeConfig('logfiles.conf', 'level = notice\n[*.log]\nlevel = error\n');
    const config = Config.load({}, env);

    expect(layerValues(config.getFileLayer('x.txt'))).toMatchObject({
      level: 'notice',
      datefmt: '+%F',
    });
  });

  it('applies command-line values over every file setting', () => {
    writeConfig('logfiles.conf', '[*.log]\nlevel = error\nafter = monday\n');
    const config = Config.load({ after: 'yesterday' }, env);

    const spec = config.buildFilterSpec('app.log', {
      dateResolver: stubResolver,
      env,
    });
    expect(spec.afterStamp).toBe('yesterday@+%Y-%m-%d');
    expect(spec.beforeStamp).toBe('today+1day@+%Y-%m-%d');
    expect(spec.levelThreshold).toBe('ERROR');
  });

  it('reads batch and logfiles from program-wide layers only', () => {
    writeConfig('config', 'logfiles = /srv/a.log\n');
    writeConfig(
      'logfiles.conf',
      'batch = no\n[*.log]\nbatch = yes\nlogfiles = /srv/b.log\n',
    );
    const config = Config.load({}, env);

    const settings = config.getProgramSettings();
    expect(settings.batch).toBe(false);
    expect(settings.logfiles).toEqual(['/srv/a.log']);
  });

  it('applies command-line batch to the program settings', () => {
    const config = Config.load({ batch: true }, env);
    expect(config.getProgramSettings().batch).toBe(true);
  });

  it('reports malformed files with their path', () => {
    const globalPath = writeConfig('config', 'level\n');
    expect(() => Config.load({}, env)).toThrow(ConfigParseError);
    expect(() => Config.load({}, env)).toThrow(
      `${globalPath}:1: expected 'key = value', got 'level'`,
    );
  });

  it('reports invalid values when a file is resolved', () => {
    const logfilesPath = writeConfig(
      'logfiles.conf',
      '[*.log]\nlevel = loud\n',
    );
    const config = Config.load({}, env);

    expect(config.resolveFile('x.txt').level).toBe('WARNING');
    expect(() => config.resolveFile('app.log')).toThrow(
      new RegExp(`^${logfilesPath}:2: invalid value for 'level': 'loud'`),
    );
  });
});
