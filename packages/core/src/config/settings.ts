/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { Level } from '../levels/levels.js';

export const SETTING_KEYS = [
  'after',
  'before',
  'batch',
  'datefmt',
  'level',
  'logfiles',
  'program',
  'progfile',
] as const;

export type SettingKey = (typeof SETTING_KEYS)[number];

/**
 * Settings that apply to the whole invocation rather than to one log file.
 * They are ignored inside per-logfile pattern sections.
 */
export const PROGRAM_WIDE_KEYS: readonly SettingKey[] = ['batch', 'logfiles'];

export function isSettingKey(key: string): key is SettingKey {
  return SETTING_KEYS.some((settingKey) => settingKey === key);
}

/**
 * Built-in defaults, in raw `key = value` form.
 */
export const DEFAULTS: Readonly<Record<SettingKey, string>> = {
  after: 'today-3days',
  before: 'today+1day',
  batch: 'false',
  datefmt: '+%Y-%m-%d',
  level: 'WARNING',
  logfiles: '',
  program: '$1 > after && $1 <= before && $3 ~ level',
  progfile: '',
};

/**
 * A date as written in configuration, or the comparable stamp it resolved
 * to. Unset dates are `undefined` rather than a placeholder value.
 */
export type DateValue =
  | { readonly kind: 'expression'; readonly text: string }
  | { readonly kind: 'stamp'; readonly stamp: string };

export function dateExpression(text: string): DateValue | undefined {
  const trimmed = text.trim();
  return trimmed === '' ? undefined : { kind: 'expression', text: trimmed };
}

/**
 * Typed view of a merged set of layers for one log file.
 */
export interface ResolvedConfig {
  readonly after?: DateValue;
  readonly before?: DateValue;
  readonly batch: boolean;
  readonly datefmt: string;
  readonly level: Level;
  readonly logfiles: readonly string[];
  readonly program?: string;
  readonly progfile?: string;
}

/**
 * Values given on the command line. Each one replaces the configured value
 * of the same setting and nothing else.
 */
export interface CliOverrides {
  after?: string;
  before?: string;
  batch?: boolean;
  level?: Level;
  program?: string;
  progfile?: string;
}
