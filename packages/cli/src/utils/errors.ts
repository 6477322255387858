/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { FatalError } from '@logfilter/core';

export interface ErrorReport {
  message: string;
  exitCode: number;
}

/**
 * Describes how the entry point reports an error that escaped `main`.
 * Fatal errors print their message, red unless NO_COLOR is set; anything
 * else is unexpected and prints its stack.
 */
export function reportError(
  error: unknown,
  env: NodeJS.ProcessEnv = process.env,
): ErrorReport {
  if (error instanceof FatalError) {
    let errorMessage = `logfilter: ${error.message}`;
    if (!env['NO_COLOR']) {
      errorMessage = `\x1b[31m${errorMessage}\x1b[0m`;
    }
    return { message: errorMessage, exitCode: error.exitCode };
  }
  const detail =
    error instanceof Error ? (error.stack ?? error.message) : String(error);
  return {
    message: `An unexpected critical error occurred:\n${detail}`,
    exitCode: 1,
  };
}
