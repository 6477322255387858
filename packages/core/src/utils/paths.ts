/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as path from 'node:path';
import * as os from 'os';

/**
 * Replaces a leading `~` with the home directory.
 */
export function expandHome(
  filePath: string,
  env: NodeJS.ProcessEnv = process.env,
): string {
  if (filePath !== '~' && !filePath.startsWith('~/')) {
    return filePath;
  }
  const home = env['HOME'] || os.homedir();
  return path.join(home, filePath.slice(1));
}

/**
 * Substitutes `$NAME` and `${NAME}` from `env`. References to unset
 * variables are kept as written.
 */
export function expandVars(
  text: string,
  env: NodeJS.ProcessEnv = process.env,
): string {
  return text.replace(
    /\$(?:\{([A-Za-z_][A-Za-z0-9_]*)\}|([A-Za-z_][A-Za-z0-9_]*))/g,
    (match: string, braced: string | undefined, bare: string | undefined) =>
      env[braced ?? bare ?? ''] ?? match,
  );
}
