/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    passWithNoTests: true,
    reporters: ['default'],
    include: ['src/**/*.test.ts'],
    testTimeout: 30000,
    silent: true,
    setupFiles: ['./test-setup.ts'],
  },
});
