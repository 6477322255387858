/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { ConfigParseError } from '../utils/errors.js';
import { DebugLogger } from '../debug/DebugLogger.js';
import {
  EMPTY_LAYER,
  mergeLayers,
  withoutKeys,
  type ConfigLayer,
} from './configLayer.js';
import { readFirstExisting } from './configLoader.js';
import { parseConfigText } from './configParser.js';
import { matchesGlob } from './glob.js';
import { PROGRAM_WIDE_KEYS } from './settings.js';

const logger = DebugLogger.getLogger('logfilter:config:sections');

export const DEFAULT_SECTION = 'DEFAULT';

export interface Section {
  readonly pattern: string;
  readonly settings: ConfigLayer;
  /** Line of the `[pattern]` header. */
  readonly line: number;
  /**
   * Why the section body could not be parsed. Raised only for the files
   * the section matches.
   */
  readonly error?: ConfigParseError;
}

export interface LogfileSections {
  readonly defaultSection: ConfigLayer;
  readonly sections: readonly Section[];
  /** The file the sections were read from, if one was found. */
  readonly path?: string;
}

export const NO_SECTIONS: LogfileSections = {
  defaultSection: EMPTY_LAYER,
  sections: [],
};

interface PendingSection {
  name: string;
  line: number;
  lines: string[];
}

/**
 * Parses a per-logfile configuration file. Lines before the first header
 * belong to DEFAULT; every other header starts a new section whose name is
 * its glob pattern. Declaration order is preserved. A malformed line in a
 * pattern section is kept on that section and reported by
 * {@link resolveForFile} for the files it matches.
 *
 * @throws ConfigParseError for malformed headers or malformed lines in DEFAULT
 */
export function parseSections(text: string, source: string): LogfileSections {
  const pending: PendingSection[] = [];
  let current: PendingSection = { name: DEFAULT_SECTION, line: 0, lines: [] };
  pending.push(current);

  text.split(/\r?\n/).forEach((line, index) => {
    const trimmed = line.trim();
    if (!trimmed.startsWith('[')) {
      current.lines.push(line);
      return;
    }
    if (!trimmed.endsWith(']') || trimmed.length < 3) {
      throw new ConfigParseError(
        source,
        index + 1,
        `malformed section header '${trimmed}'`,
      );
    }
    current = { name: trimmed.slice(1, -1).trim(), line: index + 1, lines: [] };
    pending.push(current);
  });

  const layerOf = (section: PendingSection): ConfigLayer =>
    parseConfigText(section.lines.join('\n'), source, section.line + 1);

  const defaults: ConfigLayer[] = [];
  const sections: Section[] = [];
  for (const section of pending) {
    if (section.name === DEFAULT_SECTION) {
      defaults.push(layerOf(section));
      continue;
    }
    try {
      sections.push({
        pattern: section.name,
        settings: layerOf(section),
        line: section.line,
      });
    } catch (error: unknown) {
      if (!(error instanceof ConfigParseError)) {
        throw error;
      }
      logger.warn(`[${section.name}]: ${error.message}`);
      sections.push({
        pattern: section.name,
        settings: EMPTY_LAYER,
        line: section.line,
        error,
      });
    }
  }

  // A repeated DEFAULT header keeps adding to the same section; later
  // values win.
  return {
    defaultSection: mergeLayers(defaults.reverse()),
    sections,
    path: source,
  };
}

/**
 * Loads the first per-logfile configuration file on the search path. A
 * missing file means there are no sections.
 */
export function loadSections(searchPath: readonly string[]): LogfileSections {
  const file = readFirstExisting(searchPath);
  if (!file) {
    return NO_SECTIONS;
  }
  const result = parseSections(file.text, file.path);
  logger.debug(
    () =>
      `read ${result.sections.length} section(s) from file: ${file.path}`,
  );
  return result;
}

export function matchingSections(
  filename: string,
  sections: readonly Section[],
): Section[] {
  return sections.filter((section) => matchesGlob(section.pattern, filename));
}

/**
 * The per-file layer for `filename`: the DEFAULT section, overridden by each
 * matching section in declared order so later sections win. Program-wide
 * settings inside pattern sections are dropped.
 *
 * @throws ConfigParseError if a matching section could not be parsed
 */
export function resolveForFile(
  filename: string,
  defaultSection: ConfigLayer,
  sections: readonly Section[],
): ConfigLayer {
  const matched = matchingSections(filename, sections);
  const broken = matched.find((section) => section.error !== undefined);
  if (broken?.error) {
    throw broken.error;
  }
  logger.debug(
    () =>
      `${filename}: matched ${
        matched.map((section) => `[${section.pattern}]`).join(' ') || 'no sections'
      }`,
  );

  const layers = matched
    .map((section) => {
      const dropped = PROGRAM_WIDE_KEYS.filter((key) =>
        section.settings.has(key),
      );
      if (dropped.length > 0) {
        logger.warn(
          () =>
            `[${section.pattern}]: ignoring program-wide ${dropped.join(', ')}`,
        );
      }
      return withoutKeys(section.settings, PROGRAM_WIDE_KEYS);
    })
    .reverse();

  return mergeLayers([...layers, defaultSection]);
}
