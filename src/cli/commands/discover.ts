import * as path from 'node:path';
import { parseArgs } from 'node:util';
import { GLOBAL_ARG_OPTIONS } from '../args.js';
import { discoverSources } from '../runtime.js';
import { ExitCodes } from '../errors.js';
import type { CommandOptions, CommandResult } from './types.js';

export async function discoverCommand(options: CommandOptions): Promise<CommandResult> {
  const { runtime, rawArgs, json } = options;
  const { positionals } = parseArgs({
    args: rawArgs,
    options: { ...GLOBAL_ARG_OPTIONS },
    allowPositionals: true,
    strict: true,
  });

  const files = await discoverSources(runtime, positionals[0] ?? '.');

  if (json) {
    console.log(JSON.stringify({ files }, null, 2));
    return ExitCodes.OK;
  }
  for (const file of files) {
    console.log(path.relative(runtime.workspace, file) || file);
  }
  console.log(`\n${files.length} source file${files.length === 1 ? '' : 's'}`);
  return ExitCodes.OK;
}
