/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect } from 'vitest';
import { FatalConfigError, FatalInputError } from '@logfilter/core';
import { reportError } from './errors.js';

describe('reportError', () => {
  it('prints fatal errors in red with their exit code', () => {
    expect(reportError(new FatalConfigError('config:1: oops'), {})).toEqual({
      message: '\x1b[31mlogfilter: config:1: oops\x1b[0m',
      exitCode: 52,
    });
  });

  it('drops colour when NO_COLOR is set', () => {
    expect(
      reportError(new FatalInputError('unknown level'), { NO_COLOR: '1' }),
    ).toEqual({ message: 'logfilter: unknown level', exitCode: 42 });
  });

  it('prints the stack of unexpected errors', () => {
    const error = new TypeError('boom');
    error.stack = 'TypeError: boom\n    at somewhere';
    expect(reportError(error, {})).toEqual({
      message:
        'An unexpected critical error occurred:\nTypeError: boom\n    at somewhere',
      exitCode: 1,
    });
  });

  it('handles thrown values that are not errors', () => {
    expect(reportError('bad', {}).message).toBe(
      'An unexpected critical error occurred:\nbad',
    );
  });
});
