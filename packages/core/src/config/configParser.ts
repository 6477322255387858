/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { z } from 'zod';
import { parse as parseShellWords, quote as quoteShellWords } from 'shell-quote';
import { parseLevel } from '../levels/levels.js';
import {
  ConfigParseError,
  InvalidValueError,
  LogfilterError,
  MalformedLineError,
  getErrorMessage,
} from '../utils/errors.js';
import { DebugLogger } from '../debug/DebugLogger.js';
import {
  DEFAULTS,
  dateExpression,
  isSettingKey,
  type DateValue,
  type ResolvedConfig,
  type SettingKey,
} from './settings.js';
import type { ConfigEntry, ConfigLayer } from './configLayer.js';

const logger = DebugLogger.getLogger('logfilter:config');

const BOOLEAN_STATES: Readonly<Record<string, boolean>> = {
  '1': true,
  yes: true,
  true: true,
  on: true,
  '0': false,
  no: false,
  false: false,
  off: false,
};

export interface ParsedLine {
  key: string;
  value: string;
}

/**
 * Parses one `key = value` line. Returns undefined for blank lines and
 * `#` comments. Keys are lower-cased; a `#` after the value is kept as part
 * of the value.
 */
export function parseLine(line: string): ParsedLine | undefined {
  const text = line.trim();
  if (text === '' || text.startsWith('#')) {
    return undefined;
  }
  const separator = text.indexOf('=');
  if (separator === -1) {
    throw new MalformedLineError(text);
  }
  return {
    key: text.slice(0, separator).trim().toLowerCase(),
    value: text.slice(separator + 1).trim(),
  };
}

/**
 * Splits a `logfiles` value into words using shell quoting rules. Variable
 * references are kept as written so they can be expanded against the
 * environment of the run.
 */
export function splitWords(text: string): string[] {
  const words: string[] = [];
  for (const entry of parseShellWords(text, (name) => `$${name}`)) {
    if (typeof entry === 'string') {
      words.push(entry);
    } else if ('pattern' in entry) {
      words.push(entry.pattern);
    } else if ('comment' in entry) {
      break;
    } else {
      throw new InvalidValueError(
        'logfiles',
        text,
        `unexpected shell operator '${entry.op}'`,
      );
    }
  }
  return words;
}

export function joinWords(words: readonly string[]): string {
  return quoteShellWords([...words]);
}

function issueFrom(ctx: z.RefinementCtx, error: unknown): typeof z.NEVER {
  ctx.addIssue({ code: z.ZodIssueCode.custom, message: getErrorMessage(error) });
  return z.NEVER;
}

const dateSchema = z
  .string()
  .transform((value): DateValue | undefined => dateExpression(value));

const booleanSchema = z.string().transform((value, ctx) => {
  const state = BOOLEAN_STATES[value.trim().toLowerCase()];
  if (state === undefined) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `expected one of ${Object.keys(BOOLEAN_STATES).join(', ')}`,
    });
    return z.NEVER;
  }
  return state;
});

const levelSchema = z.string().transform((value, ctx) => {
  try {
    return parseLevel(value);
  } catch (error) {
    return issueFrom(ctx, error);
  }
});

const wordsSchema = z.string().transform((value, ctx) => {
  try {
    return splitWords(value);
  } catch (error) {
    if (error instanceof InvalidValueError) {
      return issueFrom(ctx, error.reason);
    }
    throw error;
  }
});

const optionalTextSchema = z
  .string()
  .transform((value) => (value.trim() === '' ? undefined : value));

const SettingsSchema = z.object({
  after: dateSchema.default(DEFAULTS.after),
  before: dateSchema.default(DEFAULTS.before),
  batch: booleanSchema.default(DEFAULTS.batch),
  datefmt: z
    .string()
    .refine((value) => value.startsWith('+'), {
      message: "date format must start with '+'",
    })
    .default(DEFAULTS.datefmt),
  level: levelSchema.default(DEFAULTS.level),
  logfiles: wordsSchema.default(DEFAULTS.logfiles),
  program: optionalTextSchema.default(DEFAULTS.program),
  progfile: optionalTextSchema.default(DEFAULTS.progfile),
});

type ParsedSettings = z.infer<typeof SettingsSchema>;

/**
 * Converts one raw value to the type of its setting.
 *
 * @throws InvalidValueError when the text does not fit the setting's type
 */
export function coerce<K extends SettingKey>(
  key: K,
  rawValue: string,
): ParsedSettings[K] {
  const result = SettingsSchema.safeParse({ [key]: rawValue });
  if (!result.success) {
    throw new InvalidValueError(key, rawValue, result.error.issues[0].message);
  }
  return result.data[key];
}

/**
 * Coerces every value of a merged layer. Settings the layer does not define
 * take their built-in default. Errors name the file and line the offending
 * value came from.
 */
export function resolveSettings(layer: ConfigLayer): ResolvedConfig {
  const raw: Partial<Record<SettingKey, string>> = {};
  for (const [key, entry] of layer) {
    raw[key] = entry.value;
  }

  const result = SettingsSchema.safeParse(raw);
  if (result.success) {
    return result.data;
  }

  const issue = result.error.issues[0];
  const key = String(issue.path[0]);
  const entry = isSettingKey(key) ? layer.get(key) : undefined;
  const error = new InvalidValueError(key, entry?.value ?? '', issue.message);
  if (entry?.origin) {
    throw new ConfigParseError(
      entry.origin.path,
      entry.origin.line,
      error.message,
      { cause: error },
    );
  }
  throw error;
}

/**
 * Writes typed settings back to raw values, the inverse of
 * {@link resolveSettings}.
 */
export function settingsToValues(
  config: ResolvedConfig,
): Record<SettingKey, string> {
  const dateText = (value: DateValue | undefined) =>
    value === undefined
      ? ''
      : value.kind === 'expression'
        ? value.text
        : value.stamp;

  return {
    after: dateText(config.after),
    before: dateText(config.before),
    batch: String(config.batch),
    datefmt: config.datefmt,
    level: config.level,
    logfiles: joinWords(config.logfiles),
    program: config.program ?? '',
    progfile: config.progfile ?? '',
  };
}

/**
 * Parses the text of a `key = value` file into a layer. Unknown keys are
 * skipped; a key repeated in one file keeps its last value.
 *
 * @param source path reported in errors and recorded as each value's origin
 * @param firstLine line number of the first line of `text` within `source`
 * @throws ConfigParseError for a line without `=`
 */
export function parseConfigText(
  text: string,
  source: string,
  firstLine = 1,
): ConfigLayer {
  const layer = new Map<SettingKey, ConfigEntry>();
  const lines = text.split(/\r?\n/);

  lines.forEach((line, index) => {
    const lineNumber = index + firstLine;
    let parsed: ParsedLine | undefined;
    try {
      parsed = parseLine(line);
    } catch (error) {
      if (error instanceof LogfilterError) {
        throw new ConfigParseError(source, lineNumber, error.message, {
          cause: error,
        });
      }
      throw error;
    }
    if (!parsed) {
      return;
    }
    const { key, value } = parsed;
    if (!isSettingKey(key)) {
      logger.warn(
        () => `${source}:${lineNumber}: ignoring unknown key '${key}'`,
      );
      return;
    }
    layer.set(key, { value, origin: { path: source, line: lineNumber } });
  });

  return layer;
}
