/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { AmbiguousLevelError, UnknownLevelError } from '../utils/errors.js';

/**
 * Severity levels, most severe first. The index of a level is its ordinal.
 */
export const LEVELS = [
  'EMERG',
  'ALERT',
  'CRITICAL',
  'ERROR',
  'WARNING',
  'NOTICE',
  'INFO',
  'DEBUG',
] as const;

export type Level = (typeof LEVELS)[number];

export function isLevel(value: string): value is Level {
  return LEVELS.some((level) => level === value);
}

export function levelOrdinal(level: Level): number {
  return LEVELS.indexOf(level);
}

/**
 * Resolves a level name, accepting any case and any unambiguous prefix
 * ("err" → ERROR, "warn" → WARNING).
 */
export function parseLevel(text: string): Level {
  const value = text.trim().toUpperCase();
  if (value === '') {
    throw new UnknownLevelError(text, LEVELS);
  }
  if (isLevel(value)) {
    return value;
  }

  const candidates = LEVELS.filter((name) => name.startsWith(value));
  if (candidates.length === 1) {
    return candidates[0];
  }
  if (candidates.length > 1) {
    throw new AmbiguousLevelError(text, candidates);
  }
  throw new UnknownLevelError(text, LEVELS);
}

/**
 * Negative when `a` is more severe than `b`, positive when less severe.
 */
export function compareLevels(a: Level, b: Level): number {
  return levelOrdinal(a) - levelOrdinal(b);
}

/**
 * A message at level `message` passes `threshold` when it is at least as
 * severe.
 */
export function meetsThreshold(message: Level, threshold: Level): boolean {
  return compareLevels(message, threshold) <= 0;
}

export function levelsAtOrAbove(threshold: Level): Level[] {
  return LEVELS.slice(0, levelOrdinal(threshold) + 1);
}

/**
 * Unanchored alternation of the level names that pass `threshold`; bound to
 * `level` in the filter program. A decorated field such as `ERROR:` or
 * `[WARNING]` still matches.
 */
export function levelPattern(threshold: Level): string {
  return levelsAtOrAbove(threshold).join('|');
}
