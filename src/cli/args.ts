import type { ParseArgsConfig } from 'node:util';
import { createError } from './errors.js';

/** Global flags every command accepts, so strict parsing does not reject them. */
export const GLOBAL_ARG_OPTIONS = {
  workspace: { type: 'string', short: 'w' },
  json: { type: 'boolean' },
  verbose: { type: 'boolean' },
  help: { type: 'boolean', short: 'h' },
} as const satisfies NonNullable<ParseArgsConfig['options']>;

export function requirePositiveInt(raw: string | undefined, flag: string): number {
  const value = Number(raw);
  if (raw === undefined || !Number.isInteger(value) || value < 1) {
    throw createError('INVALID_ARGUMENT', `${flag} needs a positive integer, got ${raw ?? 'nothing'}`);
  }
  return value;
}

export function requirePositional(positionals: string[], name: string, usage: string): string {
  const value = positionals[0];
  if (!value) {
    throw createError('INVALID_ARGUMENT', `Missing <${name}>. Usage: ${usage}`);
  }
  return value;
}

export function parseStyle(raw: string | undefined, fallback: 'flat' | 'fenced'): 'flat' | 'fenced' {
  if (raw === undefined) return fallback;
  if (raw === 'flat' || raw === 'fenced') return raw;
  throw createError('INVALID_ARGUMENT', `--style must be flat or fenced, got ${raw}`);
}
