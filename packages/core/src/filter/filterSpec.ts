/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as fs from 'fs';
import type { Level } from '../levels/levels.js';
import {
  dateExpression,
  type CliOverrides,
  type DateValue,
  type ResolvedConfig,
} from '../config/settings.js';
import { MissingProgramError, getErrorMessage } from '../utils/errors.js';
import { expandHome } from '../utils/paths.js';
import type { DateResolver } from './dateResolver.js';

/**
 * Everything the line evaluator needs to filter one file. An absent stamp
 * means the range is open on that side.
 */
export interface FilterSpec {
  readonly afterStamp?: string;
  readonly beforeStamp?: string;
  readonly levelThreshold: Level;
  readonly datefmt: string;
  readonly programText: string;
}

export interface FilterSpecDeps {
  dateResolver: DateResolver;
  readProgramFile?: (filePath: string) => string;
  env?: NodeJS.ProcessEnv;
}

function optionalText(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

/**
 * Replaces each configured setting that was also given on the command
 * line. Settings the command line leaves out keep their configured value.
 */
export function applyOverrides(
  resolved: ResolvedConfig,
  cli: CliOverrides,
): ResolvedConfig {
  return {
    ...resolved,
    after: cli.after !== undefined ? dateExpression(cli.after) : resolved.after,
    before:
      cli.before !== undefined ? dateExpression(cli.before) : resolved.before,
    batch: cli.batch ?? resolved.batch,
    level: cli.level ?? resolved.level,
    program:
      cli.program !== undefined ? optionalText(cli.program) : resolved.program,
    progfile:
      cli.progfile !== undefined
        ? optionalText(cli.progfile)
        : resolved.progfile,
  };
}

export function resolveDate(
  value: DateValue | undefined,
  datefmt: string,
  resolver: DateResolver,
): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (value.kind === 'stamp') {
    return value.stamp;
  }
  return resolver.resolve(value.text, datefmt);
}

function readProgramText(
  config: ResolvedConfig,
  readProgramFile: (filePath: string) => string,
  env: NodeJS.ProcessEnv,
): string {
  if (config.progfile !== undefined) {
    const progfile = expandHome(config.progfile, env);
    try {
      return readProgramFile(progfile);
    } catch (error: unknown) {
      throw new MissingProgramError(
        `cannot read progfile '${progfile}': ${getErrorMessage(error)}`,
        progfile,
        { cause: error },
      );
    }
  }
  if (config.program !== undefined) {
    return config.program;
  }
  throw new MissingProgramError('no program or progfile configured');
}

/**
 * Builds the filter for one file from its resolved configuration and the
 * command-line overrides.
 *
 * @throws DateResolutionError if `after` or `before` cannot be resolved
 * @throws MissingProgramError if no program text is available
 */
export function buildFilterSpec(
  resolved: ResolvedConfig,
  cli: CliOverrides,
  deps: FilterSpecDeps,
): FilterSpec {
  const config = applyOverrides(resolved, cli);
  const readProgramFile =
    deps.readProgramFile ?? ((filePath) => fs.readFileSync(filePath, 'utf-8'));

  const spec: FilterSpec = {
    afterStamp: resolveDate(config.after, config.datefmt, deps.dateResolver),
    beforeStamp: resolveDate(config.before, config.datefmt, deps.dateResolver),
    levelThreshold: config.level,
    datefmt: config.datefmt,
    programText: readProgramText(
      config,
      readProgramFile,
      deps.env ?? process.env,
    ),
  };
  return Object.freeze(spec);
}
