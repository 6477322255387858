/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as fs from 'fs';
import { ConfigParseError, getErrorMessage } from '../utils/errors.js';
import { DebugLogger } from '../debug/DebugLogger.js';
import { createLayer, EMPTY_LAYER, type ConfigLayer } from './configLayer.js';
import { parseConfigText } from './configParser.js';
import { DEFAULTS } from './settings.js';

const logger = DebugLogger.getLogger('logfilter:config');

export interface ConfigFile {
  path: string;
  text: string;
}

export interface LoadedLayer {
  layer: ConfigLayer;
  /** The file the layer was read from, if one was found. */
  path?: string;
}

export function loadDefaults(): ConfigLayer {
  return createLayer(DEFAULTS);
}

/**
 * Reads the first file on the search path that exists. Files further down
 * the path are never consulted.
 *
 * @throws ConfigParseError if the file exists but cannot be read
 */
export function readFirstExisting(
  searchPath: readonly string[],
): ConfigFile | undefined {
  for (const candidate of searchPath) {
    if (!fs.existsSync(candidate)) {
      logger.debug(() => `no config file at ${candidate}`);
      continue;
    }
    try {
      return { path: candidate, text: fs.readFileSync(candidate, 'utf-8') };
    } catch (error: unknown) {
      throw new ConfigParseError(
        candidate,
        0,
        `cannot read file: ${getErrorMessage(error)}`,
        { cause: error },
      );
    }
  }
  return undefined;
}

/**
 * Loads the global `key = value` configuration file. A missing file yields
 * an empty layer.
 */
export function loadGlobalConfig(searchPath: readonly string[]): LoadedLayer {
  const file = readFirstExisting(searchPath);
  if (!file) {
    return { layer: EMPTY_LAYER };
  }
  const layer = parseConfigText(file.text, file.path);
  logger.debug(() => `read configuration from file: ${file.path}`);
  return { layer, path: file.path };
}
