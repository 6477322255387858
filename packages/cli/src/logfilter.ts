/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  AwkEvaluator,
  Config,
  ConfigurationManager,
  DEBUG_NAMESPACE_ROOT,
  DebugLogger,
  FatalConfigError,
  GnuDateResolver,
  LogfilterError,
  createLayer,
  expandLogfiles,
  formatLayer,
  getErrorMessage,
  settingsToValues,
  type CliOverrides,
  type DateResolver,
  type LineEvaluator,
  type ResolvedConfig,
} from '@logfilter/core';
import { parseArguments, toCliOverrides } from './config/config.js';
import { getCliVersion } from './utils/version.js';

const logger = DebugLogger.getLogger('logfilter:cli');

interface TextSink {
  write(chunk: string): unknown;
}

export interface LogfilterIo {
  stdout: TextSink;
  stderr: TextSink;
  env: NodeJS.ProcessEnv;
}

export interface LogfilterDeps {
  dateResolver: DateResolver;
  evaluator: LineEvaluator;
  readProgramFile?: (filePath: string) => string;
}

function defaultIo(): LogfilterIo {
  return { stdout: process.stdout, stderr: process.stderr, env: process.env };
}

function defaultDeps(): LogfilterDeps {
  return {
    dateResolver: new GnuDateResolver(),
    evaluator: new AwkEvaluator(),
  };
}

function loadConfig(cli: CliOverrides, env: NodeJS.ProcessEnv): Config {
  try {
    return Config.load(cli, env);
  } catch (error: unknown) {
    throw new FatalConfigError(getErrorMessage(error), { cause: error });
  }
}

function loadProgramSettings(config: Config): ResolvedConfig {
  try {
    return config.getProgramSettings();
  } catch (error: unknown) {
    throw new FatalConfigError(getErrorMessage(error), { cause: error });
  }
}

/**
 * Runs one invocation and returns its exit status: 0 when every file was
 * filtered, 1 when any file failed.
 *
 * @throws FatalInputError for bad arguments
 * @throws FatalConfigError when the configuration files cannot be used
 */
export function main(
  argv: readonly string[],
  io: LogfilterIo = defaultIo(),
  deps: LogfilterDeps = defaultDeps(),
): number {
  ConfigurationManager.getInstance().loadEnvironmentConfig(io.env);

  const parsed = parseArguments(argv, getCliVersion());
  if (parsed.kind === 'output') {
    io.stdout.write(`${parsed.text}\n`);
    return 0;
  }
  const { args } = parsed;
  if (args.debug) {
    ConfigurationManager.getInstance().setEphemeralConfig({
      enabled: true,
      namespaces: [`${DEBUG_NAMESPACE_ROOT}:*`],
    });
  }

  const config = loadConfig(toCliOverrides(args), io.env);
  logger.debug(
    () =>
      `global config: ${config.getGlobalConfigPath() ?? 'none'}, logfiles config: ${
        config.getLogfilesConfigPath() ?? 'none'
      }`,
  );
  const settings = loadProgramSettings(config);

  if (args.dumpConfig) {
    io.stdout.write(formatLayer(createLayer(settingsToValues(settings))));
    return 0;
  }

  const files =
    args.files.length > 0
      ? args.files
      : expandLogfiles(settings.logfiles, io.env);
  if (files.length === 0) {
    logger.debug('no log files to filter');
    return 0;
  }

  let exitCode = 0;
  for (const file of files) {
    if (!settings.batch) {
      io.stdout.write(`\n==> ${file} <==\n`);
    }
    try {
      const spec = config.buildFilterSpec(file, {
        dateResolver: deps.dateResolver,
        readProgramFile: deps.readProgramFile,
        env: io.env,
      });
      logger.debug(() => `filter for ${file}: ${JSON.stringify(spec)}`);
      io.stdout.write(deps.evaluator.evaluate(spec, file));
    } catch (error: unknown) {
      if (!(error instanceof LogfilterError)) {
        throw error;
      }
      logger.error(`${file}: ${error.name}`);
      io.stderr.write(`logfilter: ${file}: ${error.message}\n`);
      exitCode = 1;
    }
  }
  return exitCode;
}
