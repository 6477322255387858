/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';
import { dirname, resolve } from 'node:path';

const __dirname = dirname(fileURLToPath(import.meta.url));
const coreEntryPath = resolve(__dirname, '../core/index.ts');

export default defineConfig({
  root: __dirname,
  resolve: {
    alias: {
      '@logfilter/core': coreEntryPath,
    },
  },
  test: {
    include: ['src/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    passWithNoTests: true,
    reporters: ['default'],
    testTimeout: 30000,
    silent: true,
    setupFiles: ['./test-setup.ts'],
  },
});
