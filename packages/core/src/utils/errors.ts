/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Extracts a string error message from an unknown error type
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return String(error);
}

/**
 * Base class for every error raised while resolving configuration or
 * filtering a log file.
 */
export class LogfilterError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LogfilterError';
  }
}

export class UnknownLevelError extends LogfilterError {
  readonly value: string;

  constructor(value: string, choices: readonly string[]) {
    super(
      `unknown level '${value}' (choose from ${choices.join(', ')})`,
    );
    this.name = 'UnknownLevelError';
    this.value = value;
  }
}

export class AmbiguousLevelError extends LogfilterError {
  readonly value: string;
  readonly candidates: readonly string[];

  constructor(value: string, candidates: readonly string[]) {
    super(
      `ambiguous level '${value}' (could be ${candidates.join(', ')})`,
    );
    this.name = 'AmbiguousLevelError';
    this.value = value;
    this.candidates = candidates;
  }
}

export class MalformedLineError extends LogfilterError {
  readonly text: string;

  constructor(text: string) {
    super(`expected 'key = value', got '${text}'`);
    this.name = 'MalformedLineError';
    this.text = text;
  }
}

export class InvalidValueError extends LogfilterError {
  readonly key: string;
  readonly rawValue: string;
  readonly reason: string;

  constructor(key: string, rawValue: string, reason: string) {
    super(`invalid value for '${key}': '${rawValue}' (${reason})`);
    this.name = 'InvalidValueError';
    this.key = key;
    this.rawValue = rawValue;
    this.reason = reason;
  }
}

/**
 * Wraps a parse or value error with the file and line it came from. Line 0
 * means the error concerns the file as a whole.
 */
export class ConfigParseError extends LogfilterError {
  readonly path: string;
  readonly line: number;
  readonly detail: string;

  constructor(
    path: string,
    line: number,
    detail: string,
    options?: { cause?: unknown },
  ) {
    super(line > 0 ? `${path}:${line}: ${detail}` : `${path}: ${detail}`, options);
    this.name = 'ConfigParseError';
    this.path = path;
    this.line = line;
    this.detail = detail;
  }
}

export class DateResolutionError extends LogfilterError {
  readonly value: string;
  readonly reason: string;

  constructor(value: string, reason: string) {
    super(`cannot resolve date '${value}': ${reason}`);
    this.name = 'DateResolutionError';
    this.value = value;
    this.reason = reason;
  }
}

export class MissingProgramError extends LogfilterError {
  readonly progfile?: string;

  constructor(message: string, progfile?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MissingProgramError';
    this.progfile = progfile;
  }
}

export class FilterExecutionError extends LogfilterError {
  readonly file: string;
  readonly exitStatus: number | null;

  constructor(file: string, message: string, exitStatus: number | null) {
    super(message);
    this.name = 'FilterExecutionError';
    this.file = file;
    this.exitStatus = exitStatus;
  }
}

/**
 * An error that ends the whole invocation. The entry point prints the
 * message and exits with `exitCode`.
 */
export class FatalError extends Error {
  constructor(
    message: string,
    readonly exitCode: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'FatalError';
  }
}

export class FatalConfigError extends FatalError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 52, options);
    this.name = 'FatalConfigError';
  }
}

export class FatalInputError extends FatalError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 42, options);
    this.name = 'FatalInputError';
  }
}
