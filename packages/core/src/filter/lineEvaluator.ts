/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { spawnSync } from 'child_process';
import { levelPattern } from '../levels/levels.js';
import { FilterExecutionError } from '../utils/errors.js';
import { DebugLogger } from '../debug/DebugLogger.js';
import type { FilterSpec } from './filterSpec.js';

const logger = DebugLogger.getLogger('logfilter:filter');

const MAX_OUTPUT_BYTES = 1024 * 1024 * 1024;

/**
 * Runs a filter program over one log file and returns the lines it prints.
 */
export interface LineEvaluator {
  evaluate(spec: FilterSpec, file: string): string;
}

/** Sorts before every non-empty date field. */
export const OPEN_LOWER_BOUND = '';
/** Sorts after every printable ASCII date field under the C locale. */
export const OPEN_UPPER_BOUND = '~';

/**
 * Variables bound in the filter program. An open end of the date range is
 * bound to a value that every dated line passes.
 */
export function programVariables(spec: FilterSpec): Record<string, string> {
  return {
    after: spec.afterStamp ?? OPEN_LOWER_BOUND,
    before: spec.beforeStamp ?? OPEN_UPPER_BOUND,
    level: levelPattern(spec.levelThreshold),
  };
}

/**
 * `awk [-v name=value...] -- PROGRAM FILE`
 */
export function awkArguments(spec: FilterSpec, file: string): string[] {
  const args: string[] = [];
  for (const [name, value] of Object.entries(programVariables(spec))) {
    args.push('-v', `${name}=${value}`);
  }
  args.push('--', spec.programText, file);
  return args;
}

export class AwkEvaluator implements LineEvaluator {
  constructor(private readonly executable: string = 'awk') {}

  evaluate(spec: FilterSpec, file: string): string {
    const args = awkArguments(spec, file);
    logger.debug(() => `${this.executable} ${args.join(' ')}`);

    const result = spawnSync(this.executable, args, {
      encoding: 'utf-8',
      stdio: ['ignore', 'pipe', 'pipe'],
      maxBuffer: MAX_OUTPUT_BYTES,
      env: { ...process.env, LC_ALL: 'C' },
    });
    if (result.error) {
      throw new FilterExecutionError(
        file,
        `cannot run ${this.executable}: ${result.error.message}`,
        null,
      );
    }
    if (result.status !== 0) {
      throw new FilterExecutionError(
        file,
        result.stderr.trim() ||
          `${this.executable} exited with status ${result.status}`,
        result.status,
      );
    }
    return result.stdout;
  }
}
