#!/usr/bin/env node

/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { hideBin } from 'yargs/helpers';
import { main } from './src/logfilter.js';
import { reportError } from './src/utils/errors.js';

// --- Global Entry Point ---
try {
  process.exitCode = main(hideBin(process.argv));
} catch (error: unknown) {
  const report = reportError(error);
  console.error(report.message);
  process.exit(report.exitCode);
}
