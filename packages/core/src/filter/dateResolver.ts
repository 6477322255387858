/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { spawnSync } from 'child_process';
import { DateResolutionError } from '../utils/errors.js';
import { DebugLogger } from '../debug/DebugLogger.js';

const logger = DebugLogger.getLogger('logfilter:filter');

/**
 * Turns a human date expression ("today-3days", "last Tuesday") into a
 * stamp that compares correctly against the dates in log lines.
 */
export interface DateResolver {
  /**
   * @param datefmt a `date` output format, starting with `+`
   * @throws DateResolutionError if the expression cannot be resolved
   */
  resolve(expression: string, datefmt: string): string;
}

/**
 * Resolves dates with GNU `date --date EXPR +FORMAT`.
 */
export class GnuDateResolver implements DateResolver {
  constructor(private readonly executable: string = 'date') {}

  resolve(expression: string, datefmt: string): string {
    const args = ['--date', expression, datefmt];
    logger.debug(() => `${this.executable} ${args.join(' ')}`);

    const result = spawnSync(this.executable, args, {
      encoding: 'utf-8',
      stdio: 'pipe',
    });
    if (result.error) {
      throw new DateResolutionError(
        expression,
        `cannot run ${this.executable}: ${result.error.message}`,
      );
    }
    if (result.status !== 0) {
      throw new DateResolutionError(
        expression,
        result.stderr.trim() || `${this.executable} exited with status ${result.status}`,
      );
    }
    return result.stdout.trim();
  }
}
