/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import yargs from 'yargs/yargs';
import {
  DebugLogger,
  FatalInputError,
  LEVELS,
  parseLevel,
  type CliOverrides,
  type Level,
} from '@logfilter/core';

const logger = DebugLogger.getLogger('logfilter:cli');

export interface CliArgs {
  after: string | undefined;
  before: string | undefined;
  batch: boolean | undefined;
  level: Level | undefined;
  program: string | undefined;
  progfile: string | undefined;
  debug: boolean;
  dumpConfig: boolean;
  files: string[];
}

/**
 * Either the arguments to run with, or text yargs produced for `--help` or
 * `--version`, after which there is nothing left to do.
 */
export type ParsedArguments =
  | { kind: 'run'; args: CliArgs }
  | { kind: 'output'; text: string };

function buildParser(version: string) {
  return yargs()
    .locale('en')
    .scriptName('logfilter')
    .usage('$0 [options] [FILE...]')
    .epilogue(
      'Prints the log lines dated within a range whose level meets a threshold.',
    )
    .parserConfiguration({ 'parse-positional-numbers': false })
    .option('after', {
      alias: 'a',
      type: 'string',
      description: 'Only lines dated after this date expression',
    })
    .option('before', {
      alias: 'b',
      type: 'string',
      description: 'Only lines dated on or before this date expression',
    })
    .option('batch', {
      type: 'boolean',
      description: 'Print matching lines without per-file headers',
    })
    .option('level', {
      alias: 'l',
      type: 'string',
      description: `Hide lines below LEVEL (${LEVELS.join(', ')}; abbreviations accepted)`,
      coerce: (value: string): Level => parseLevel(value),
    })
    .option('program', {
      alias: 'p',
      type: 'string',
      description: 'Filter program text',
    })
    .option('progfile', {
      alias: 'f',
      type: 'string',
      description: 'Read the filter program from this file',
    })
    .option('debug', {
      alias: 'd',
      type: 'boolean',
      description: 'Write debug traces to stderr',
      default: false,
    })
    .option('dump-config', {
      type: 'boolean',
      description: 'Print the resolved configuration and exit',
      default: false,
    })
    .version(version)
    .help()
    .alias('h', 'help')
    .strictOptions();
}

/**
 * @throws FatalInputError for unknown options or invalid values
 */
export function parseArguments(
  argv: readonly string[],
  version: string,
): ParsedArguments {
  const outcome: { error?: Error; output: string } = { output: '' };
  const parsed = buildParser(version).parseSync(
    [...argv],
    {},
    (error, _argv, output) => {
      outcome.error = error ?? undefined;
      outcome.output = output;
    },
  );

  if (outcome.error) {
    throw new FatalInputError(outcome.error.message, { cause: outcome.error });
  }
  if (outcome.output !== '') {
    return { kind: 'output', text: outcome.output };
  }

  const args: CliArgs = {
    after: parsed.after,
    before: parsed.before,
    batch: parsed.batch,
    level: parsed.level,
    program: parsed.program,
    progfile: parsed.progfile,
    debug: parsed.debug,
    dumpConfig: parsed['dump-config'],
    files: parsed._.map(String),
  };
  logger.debug(() => `arguments: ${JSON.stringify(args)}`);
  return { kind: 'run', args };
}

export function toCliOverrides(args: CliArgs): CliOverrides {
  return {
    after: args.after,
    before: args.before,
    batch: args.batch,
    level: args.level,
    program: args.program,
    progfile: args.progfile,
  };
}
