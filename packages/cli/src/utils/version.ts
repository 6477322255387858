/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as fs from 'fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const PACKAGE_NAME = '@logfilter/cli';

let cachedVersion: string | undefined;

function readVersion(packageJsonPath: string): string | undefined {
  const parsed: unknown = JSON.parse(fs.readFileSync(packageJsonPath, 'utf-8'));
  if (
    typeof parsed === 'object' &&
    parsed !== null &&
    'name' in parsed &&
    parsed.name === PACKAGE_NAME &&
    'version' in parsed &&
    typeof parsed.version === 'string'
  ) {
    return parsed.version;
  }
  return undefined;
}

/**
 * Version of the CLI package. Looks for its package.json above this module,
 * which sits at a different depth in the sources and in dist/.
 */
export function getCliVersion(): string {
  if (cachedVersion !== undefined) {
    return cachedVersion;
  }
  let dir = __dirname;
  for (;;) {
    const candidate = path.join(dir, 'package.json');
    const version = fs.existsSync(candidate) ? readVersion(candidate) : undefined;
    if (version !== undefined) {
      cachedVersion = version;
      return version;
    }
    const parent = path.dirname(dir);
    if (parent === dir) {
      cachedVersion = 'unknown';
      return cachedVersion;
    }
    dir = parent;
  }
}
