/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { afterEach } from 'vitest';
import { ConfigurationManager } from './src/debug/ConfigurationManager.js';

// Debug output is driven by the environment; keep it off for tests.
for (const name of ['DEBUG', 'LF_DEBUG', 'LF_DEBUG_LEVEL', 'NO_COLOR']) {
  delete process.env[name];
}
ConfigurationManager.getInstance().loadEnvironmentConfig(process.env);

afterEach(() => {
  ConfigurationManager.getInstance().clearEphemeralConfig();
});
