/**
 * @fileoverview docfacts error hierarchy
 *
 * Every failure that crosses a module boundary is one of these typed errors.
 * Expected failures travel inside a Result; only programming errors throw.
 */

// ============================================================================
// ERROR JSON TYPE
// ============================================================================

export interface ErrorJSON {
  code: string;
  message: string;
  retryable: boolean;
  timestamp: number;
  stack?: string;
  details?: Record<string, unknown>;
}

// ============================================================================
// BASE ERROR
// ============================================================================

export abstract class DocfactsError extends Error {
  abstract readonly code: string;
  abstract readonly retryable: boolean;
  readonly timestamp = Date.now();

  toJSON(): ErrorJSON {
    return {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

// ============================================================================
// SOURCE ERRORS
// ============================================================================

export class SourceSyntaxError extends DocfactsError {
  readonly code = 'SYNTAX_ERROR';
  readonly retryable = false;

  constructor(
    readonly detail: string,
    readonly filePath?: string,
    readonly line?: number,
  ) {
    super(`Syntax check failed${filePath ? ` for ${filePath}` : ''}${line ? ` at line ${line}` : ''}: ${detail}`);
    this.name = 'SourceSyntaxError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: { filePath: this.filePath, line: this.line },
    };
  }
}

export class DocInsertionError extends DocfactsError {
  readonly code = 'INSERTION_ERROR';
  readonly retryable = false;

  constructor(
    message: string,
    readonly filePath: string,
    readonly line: number,
  ) {
    super(`Cannot insert documentation in ${filePath} at line ${line}: ${message}`);
    this.name = 'DocInsertionError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: { filePath: this.filePath, line: this.line },
    };
  }
}

export class UnsupportedLanguageError extends DocfactsError {
  readonly code = 'UNSUPPORTED_LANGUAGE';
  readonly retryable = false;

  constructor(readonly filePath: string) {
    super(`No language adapter registered for ${filePath}`);
    this.name = 'UnsupportedLanguageError';
  }
}

// ============================================================================
// COLLECTOR AND TOOL ERRORS
// ============================================================================

export class CollectorError extends DocfactsError {
  readonly code = 'COLLECTOR_ERROR';
  readonly retryable = false;

  constructor(
    readonly collector: string,
    message: string,
    readonly cause?: Error,
  ) {
    super(`Collector ${collector} failed: ${message}`);
    this.name = 'CollectorError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: { collector: this.collector, cause: this.cause?.message },
    };
  }
}

export class ToolUnavailableError extends DocfactsError {
  readonly code = 'TOOL_UNAVAILABLE';

  constructor(
    readonly tool: string,
    readonly retryable: boolean,
    message: string,
  ) {
    super(`${tool} unavailable: ${message}`);
    this.name = 'ToolUnavailableError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: { tool: this.tool },
    };
  }
}

export class RegistrationError extends DocfactsError {
  readonly code = 'REGISTRATION_ERROR';
  readonly retryable = false;

  constructor(message: string) {
    super(message);
    this.name = 'RegistrationError';
  }
}

// ============================================================================
// I/O AND CONFIG ERRORS
// ============================================================================

export type FileOperation = 'read' | 'decode' | 'write' | 'rename' | 'create-temp' | 'stat';

export class FileIoError extends DocfactsError {
  readonly code = 'IO_ERROR';

  constructor(
    readonly operation: FileOperation,
    readonly filePath: string,
    readonly retryable: boolean,
    message: string,
  ) {
    super(`File ${operation} failed for ${filePath}: ${message}`);
    this.name = 'FileIoError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: { operation: this.operation, filePath: this.filePath },
    };
  }
}

export class ConfigError extends DocfactsError {
  readonly code = 'CONFIG_ERROR';
  readonly retryable = false;

  constructor(
    readonly source: string,
    message: string,
  ) {
    super(`Invalid configuration in ${source}: ${message}`);
    this.name = 'ConfigError';
  }
}

// ============================================================================
// UTILITIES
// ============================================================================

export function isDocfactsError(error: unknown): error is DocfactsError {
  return error instanceof DocfactsError;
}

/**
 * Extract error message from any error type
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return 'Unknown error';
}
