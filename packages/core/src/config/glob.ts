/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as path from 'node:path';

const cache = new Map<string, RegExp>();

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\/-]/g, '\\$&');
}

/**
 * Translates a shell glob into an anchored regular expression. `*` and `?`
 * also match `/`. A `[` without a closing `]` is a literal bracket.
 */
export function globToRegExp(pattern: string): RegExp {
  const cached = cache.get(pattern);
  if (cached) {
    return cached;
  }

  let source = '';
  let i = 0;
  while (i < pattern.length) {
    const char = pattern[i];
    i++;
    if (char === '*') {
      source += '.*';
    } else if (char === '?') {
      source += '.';
    } else if (char === '\\' && i < pattern.length) {
      source += escapeRegExp(pattern[i]);
      i++;
    } else if (char === '[') {
      let j = i;
      if (pattern[j] === '!' || pattern[j] === '^') {
        j++;
      }
      // A ']' right after the opening bracket is a member, not the end.
      if (pattern[j] === ']') {
        j++;
      }
      while (j < pattern.length && pattern[j] !== ']') {
        j++;
      }
      if (j >= pattern.length) {
        source += '\\[';
        continue;
      }
      let body = pattern.slice(i, j);
      i = j + 1;
      let negate = false;
      if (body.startsWith('!') || body.startsWith('^')) {
        negate = true;
        body = body.slice(1);
      }
      const members = body.replace(/[\\\]^]/g, '\\$&');
      source += `[${negate ? '^' : ''}${members}]`;
    } else {
      source += escapeRegExp(char);
    }
  }

  const regex = new RegExp(`^${source}$`, 's');
  cache.set(pattern, regex);
  return regex;
}

/**
 * Shell-style match of a log file name against a section pattern. Patterns
 * without a `/` are also tried against the file's base name.
 */
export function matchesGlob(pattern: string, filename: string): boolean {
  const regex = globToRegExp(pattern);
  if (regex.test(filename)) {
    return true;
  }
  return !pattern.includes('/') && regex.test(path.basename(filename));
}
