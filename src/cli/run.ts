/**
 * @fileoverview Argument dispatch for the docfacts CLI
 */

import { parseArgs } from 'node:util';
import { DOCFACTS_VERSION } from '../version.js';
import { applyCommand } from './commands/apply.js';
import { collectCommand } from './commands/collect.js';
import { discoverCommand } from './commands/discover.js';
import { documentCommand } from './commands/document.js';
import { extractCommand } from './commands/extract.js';
import { lintCommand } from './commands/lint.js';
import type { CommandOptions, CommandResult } from './commands/types.js';
import { ExitCodes, classifyError, createError, formatError, formatErrorJson, getExitCode } from './errors.js';
import { showHelp } from './help.js';
import { createRuntime } from './runtime.js';

type Command = 'discover' | 'collect' | 'apply' | 'document' | 'extract' | 'lint';

const COMMANDS: Record<Command, (options: CommandOptions) => Promise<CommandResult>> = {
  discover: discoverCommand,
  collect: collectCommand,
  apply: applyCommand,
  document: documentCommand,
  extract: extractCommand,
  lint: lintCommand,
};

function isCommand(value: string): value is Command {
  return Object.prototype.hasOwnProperty.call(COMMANDS, value);
}

/** Run one CLI invocation and return its exit status. */
export async function runCli(argv: string[], cwd: string = process.cwd()): Promise<number> {
  const { values, positionals } = parseArgs({
    args: argv,
    options: {
      help: { type: 'boolean', short: 'h', default: false },
      version: { type: 'boolean', short: 'v', default: false },
      workspace: { type: 'string', short: 'w' },
      json: { type: 'boolean', default: false },
      verbose: { type: 'boolean', default: false },
    },
    allowPositionals: true,
    strict: false,
  });
  const json = values.json === true;

  if (values.version === true) {
    console.log(`docfacts ${DOCFACTS_VERSION}`);
    return ExitCodes.OK;
  }

  const command = positionals[0];
  if (values.help === true || !command || command === 'help') {
    showHelp(command === 'help' ? positionals[1] : command);
    return ExitCodes.OK;
  }

  try {
    if (!isCommand(command)) {
      throw createError('INVALID_ARGUMENT', `Unknown command: ${command}`, { available: Object.keys(COMMANDS) });
    }
    const runtime = await createRuntime({
      workspace: typeof values.workspace === 'string' ? values.workspace : cwd,
      json,
      verbose: values.verbose === true,
    });
    return await COMMANDS[command]({ runtime, rawArgs: argv.slice(argv.indexOf(command) + 1), json });
  } catch (error) {
    console.error(json ? formatErrorJson(error) : formatError(error));
    return getExitCode(classifyError(error));
  }
}
