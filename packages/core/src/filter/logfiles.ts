/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { globSync } from 'glob';
import { expandHome, expandVars } from '../utils/paths.js';
import { DebugLogger } from '../debug/DebugLogger.js';

const logger = DebugLogger.getLogger('logfilter:filter');

/**
 * Expands the configured `logfiles` words into existing paths: `~` and
 * environment variables first, then glob patterns. Each word's matches are
 * sorted; words that match nothing are dropped.
 */
export function expandLogfiles(
  words: readonly string[],
  env: NodeJS.ProcessEnv = process.env,
): string[] {
  const files: string[] = [];
  for (const word of words) {
    const expanded = expandHome(expandVars(word, env), env);
    const matches = globSync(expanded, { nodir: true }).sort();
    if (matches.length === 0) {
      logger.debug(() => `no files match ${expanded}`);
    }
    files.push(...matches);
  }
  return files;
}
