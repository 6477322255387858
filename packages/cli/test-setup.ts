/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { afterEach } from 'vitest';
import { ConfigurationManager } from '@logfilter/core';

// Unset variables that change output so local and CI runs agree
for (const name of ['DEBUG', 'LF_DEBUG', 'LF_DEBUG_LEVEL', 'NO_COLOR']) {
  delete process.env[name];
}

afterEach(() => {
  ConfigurationManager.getInstance().clearEphemeralConfig();
});
