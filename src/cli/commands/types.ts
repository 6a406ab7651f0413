import type { CliRuntime } from '../runtime.js';

export interface CommandOptions {
  runtime: CliRuntime;
  /** Arguments after the command name, global flags included. */
  rawArgs: string[];
  json: boolean;
}

/** Process exit status. */
export type CommandResult = number;
