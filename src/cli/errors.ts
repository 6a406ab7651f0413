/**
 * @fileoverview CLI error handling with helpful suggestions
 */

import { isDocfactsError } from '../core/errors.js';
import { isErrnoException } from '../core/result.js';

export class CliError extends Error {
  constructor(
    message: string,
    public readonly code: CliErrorCode,
    public readonly suggestion?: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'CliError';
  }
}

export type CliErrorCode =
  | 'INVALID_ARGUMENT'
  | 'FILE_NOT_FOUND'
  | 'UNSUPPORTED_LANGUAGE'
  | 'FUNCTION_NOT_FOUND'
  | 'CONFIG_INVALID'
  | 'PARSER_UNAVAILABLE'
  | 'UNEXPECTED';

export const ERROR_SUGGESTIONS: Record<CliErrorCode, string> = {
  INVALID_ARGUMENT: 'Run `docfacts help <command>` for usage information.',
  FILE_NOT_FOUND: 'Check the path; relative paths resolve against --workspace.',
  UNSUPPORTED_LANGUAGE: 'Supported extensions: .py .pyi .js .jsx .mjs .cjs .ts .tsx .mts .cts',
  FUNCTION_NOT_FOUND: 'Run `docfacts collect <file>` to list functions and their lines.',
  CONFIG_INVALID: 'Fix docfacts.config.yaml or the DOCFACTS_* environment variables.',
  PARSER_UNAVAILABLE: 'Reinstall dependencies so the tree-sitter grammars can load.',
  UNEXPECTED: 'Re-run with --verbose for debug logs.',
};

/** Exit status: 0 success, 1 failures found, 2 invalid usage. */
export const ExitCodes = {
  OK: 0,
  FAILURE: 1,
  USAGE: 2,
} as const;

export function createError(
  code: CliErrorCode,
  message: string,
  details?: Record<string, unknown>,
): CliError {
  return new CliError(message, code, ERROR_SUGGESTIONS[code], details);
}

function isParseArgsError(error: unknown): boolean {
  return error instanceof TypeError && 'code' in error && typeof error.code === 'string' && error.code.startsWith('ERR_PARSE_ARGS');
}

/** Map anything thrown by a command onto a CliError. */
export function classifyError(error: unknown): CliError {
  if (error instanceof CliError) return error;
  if (isParseArgsError(error)) {
    return createError('INVALID_ARGUMENT', error instanceof Error ? error.message : String(error));
  }
  if (isDocfactsError(error)) {
    switch (error.code) {
      case 'CONFIG_ERROR':
        return createError('CONFIG_INVALID', error.message);
      case 'TOOL_UNAVAILABLE':
        return createError('PARSER_UNAVAILABLE', error.message);
      case 'UNSUPPORTED_LANGUAGE':
        return createError('UNSUPPORTED_LANGUAGE', error.message);
      default:
        return new CliError(error.message, 'UNEXPECTED', ERROR_SUGGESTIONS.UNEXPECTED, { cause: error.code });
    }
  }
  if (isErrnoException(error) && error.code === 'ENOENT') {
    return createError('FILE_NOT_FOUND', error.message);
  }
  return createError('UNEXPECTED', error instanceof Error ? error.message : String(error));
}

export function getExitCode(error: CliError): number {
  return error.code === 'INVALID_ARGUMENT' ? ExitCodes.USAGE : ExitCodes.FAILURE;
}

export function formatError(error: unknown): string {
  const cliError = classifyError(error);
  const head = `Error [${cliError.code}]: ${cliError.message}`;
  return cliError.suggestion ? `${head}\n\nSuggestion: ${cliError.suggestion}` : head;
}

export function formatErrorJson(error: unknown): string {
  const cliError = classifyError(error);
  return JSON.stringify(
    {
      error: {
        code: cliError.code,
        message: cliError.message,
        ...(cliError.suggestion ? { suggestion: cliError.suggestion } : {}),
        ...(cliError.details ? { details: cliError.details } : {}),
      },
    },
    null,
    2,
  );
}
