/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect } from 'vitest';
import { FatalInputError } from '@logfilter/core';
import { parseArguments, toCliOverrides, type CliArgs } from './config.js';

function runArgs(argv: string[]): CliArgs {
  const parsed = parseArguments(argv, '1.2.3');
  if (parsed.kind !== 'run') {
    throw new Error(`expected arguments, got output: ${parsed.text}`);
  }
  return parsed.args;
}

describe('parseArguments', () => {
  it('leaves every setting unset by default', () => {
    expect(runArgs([])).toEqual({
      after: undefined,
      before: undefined,
      batch: undefined,
      level: undefined,
      program: undefined,
      progfile: undefined,
      debug: false,
      dumpConfig: false,
      files: [],
    });
  });

  it('takes bare file names as positional arguments', () => {
    expect(runArgs(['other.txt']).files).toEqual(['other.txt']);
    expect(runArgs(['/var/log/a.log', 'b.log', '-l', 'info']).files).toEqual([
      '/var/log/a.log',
      'b.log',
    ]);
  });

  it('reads the debug switch', () => {
    expect(runArgs(['-d']).debug).toBe(true);
    expect(runArgs(['--debug', 'a.log']).debug).toBe(true);
  });

  it('reads short and long options', () => {
    const args = runArgs([
      '-a',
      'yesterday',
      '--before',
      'today',
      '-p',
      '{ print }',
      '--progfile',
      '~/f.awk',
      'app.log',
      '2024.log',
    ]);
    expect(args.after).toBe('yesterday');
    expect(args.before).toBe('today');
    expect(args.program).toBe('{ print }');
    expect(args.progfile).toBe('~/f.awk');
    expect(args.files).toEqual(['app.log', '2024.log']);
  });

  it('resolves level abbreviations', () => {
    expect(runArgs(['-l', 'err']).level).toBe('ERROR');
    expect(runArgs(['--level', 'Crit']).level).toBe('CRITICAL');
  });

  it('rejects ambiguous and unknown levels', () => {
    expect(() => parseArguments(['-l', 'e'], '1.2.3')).toThrow(FatalInputError);
    expect(() => parseArguments(['-l', 'e'], '1.2.3')).toThrow(
      "ambiguous level 'e' (could be EMERG, ERROR)",
    );
    expect(() => parseArguments(['--level', 'loud'], '1.2.3')).toThrow(
      FatalInputError,
    );
  });

  it('accepts --batch and --no-batch', () => {
    expect(runArgs(['--batch']).batch).toBe(true);
    expect(runArgs(['--no-batch']).batch).toBe(false);
  });

  it('rejects unknown options', () => {
    expect(() => parseArguments(['--colour'], '1.2.3')).toThrow(
      FatalInputError,
    );
  });

  it('returns the version text', () => {
    expect(parseArguments(['--version'], '1.2.3')).toEqual({
      kind: 'output',
      text: '1.2.3',
    });
  });

  it('returns the help text', () => {
    const parsed = parseArguments(['--help'], '1.2.3');
    expect(parsed.kind).toBe('output');
    if (parsed.kind === 'output') {
      expect(parsed.text).toContain('--dump-config');
    }
  });
});

describe('toCliOverrides', () => {
  it('carries the settings given on the command line', () => {
    const args = runArgs(['-l', 'info', '--batch']);
    expect(toCliOverrides(args)).toEqual({
      after: undefined,
      before: undefined,
      batch: true,
      level: 'INFO',
      program: undefined,
      progfile: undefined,
    });
  });
});
