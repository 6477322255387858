/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect } from 'vitest';
import { GnuDateResolver } from './dateResolver.js';
import { DateResolutionError } from '../utils/errors.js';

describe('GnuDateResolver', () => {
  it('reports a date command that cannot be started', () => {
    const resolver = new GnuDateResolver('logfilter-no-such-date');
    expect(() => resolver.resolve('today', '+%F')).toThrow(DateResolutionError);
    expect(() => resolver.resolve('today', '+%F')).toThrow(
      /^cannot resolve date 'today': cannot run logfilter-no-such-date: /,
    );
  });
});
