/**
 * @fileoverview Argument parsing shared by CLI commands
 */

import { parseArgs, type ParseArgsConfig } from 'node:util';
import { getErrorMessage } from '../../utils/errors.js';
import { createError } from '../errors.js';

export type CommandOptionsConfig = NonNullable<ParseArgsConfig['options']>;

export interface CommandArgs {
  positionals: string[];
  string(name: string): string | undefined;
  flag(name: string): boolean;
}

/** Accepted by every command; the entry point reads them before dispatch */
const GLOBAL_OPTIONS: CommandOptionsConfig = {
  config: { type: 'string', short: 'c' },
  json: { type: 'boolean', default: false },
};

/**
 * Strict parse of a command's arguments. Unknown options and missing option
 * values are usage errors.
 */
export function parseCommandArgs(command: string, args: string[], options: CommandOptionsConfig): CommandArgs {
  let parsed: { values: Readonly<Record<string, unknown>>; positionals: string[] };
  try {
    parsed = parseArgs({
      args,
      options: { ...GLOBAL_OPTIONS, ...options },
      allowPositionals: true,
      strict: true,
    });
  } catch (error: unknown) {
    throw createError('EINVALID_ARGUMENT', `${command}: ${getErrorMessage(error)}`);
  }
  const { values, positionals } = parsed;
  return {
    positionals,
    string(name) {
      const value = values[name];
      return typeof value === 'string' ? value : undefined;
    },
    flag(name) {
      return values[name] === true;
    },
  };
}

export interface ReadNumberOptions {
  integer?: boolean;
}

/**
 * A positive number from an option value; undefined when the option was not
 * given.
 */
export function readNumber(value: string | undefined, flag: string, options: ReadNumberOptions = {}): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  const valid = value.trim().length > 0
    && Number.isFinite(parsed)
    && parsed > 0
    && (!options.integer || Number.isInteger(parsed));
  if (!valid) {
    const expected = options.integer ? 'a positive integer' : 'a positive number';
    throw createError('EINVALID_ARGUMENT', `${flag} expects ${expected}, got "${value}"`, { flag });
  }
  return parsed;
}

/** Comma-separated names, blanks dropped */
export function readList(value: string | undefined): string[] {
  if (value === undefined) return [];
  return value.split(',').map((item) => item.trim()).filter((item) => item.length > 0);
}
