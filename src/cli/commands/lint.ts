import * as path from 'node:path';
import { parseArgs } from 'node:util';
import { lintFiles } from '../../blocks/lint.js';
import { GLOBAL_ARG_OPTIONS, requirePositional } from '../args.js';
import { ExitCodes } from '../errors.js';
import { discoverSources } from '../runtime.js';
import type { CommandOptions, CommandResult } from './types.js';

const USAGE = 'docfacts lint <path>';

export async function lintCommand(options: CommandOptions): Promise<CommandResult> {
  const { runtime, rawArgs, json } = options;
  const { positionals } = parseArgs({
    args: rawArgs,
    options: { ...GLOBAL_ARG_OPTIONS },
    allowPositionals: true,
    strict: true,
  });

  const target = requirePositional(positionals, 'path', USAGE);
  const findings = await lintFiles(runtime.registry, await discoverSources(runtime, target));

  if (json) {
    console.log(JSON.stringify({ findings }, null, 2));
    return findings.length === 0 ? ExitCodes.OK : ExitCodes.FAILURE;
  }

  if (findings.length === 0) {
    console.log('All documentation blocks are well-formed.');
    return ExitCodes.OK;
  }

  let current: string | null = null;
  for (const finding of findings) {
    if (finding.filePath !== current) {
      current = finding.filePath;
      console.log(`\n${path.relative(runtime.workspace, current) || current}:`);
    }
    console.log(`  Line ${finding.line}: [${finding.rule}] ${finding.message}`);
  }
  console.log(`\nFound ${findings.length} issue${findings.length === 1 ? '' : 's'}.`);
  return ExitCodes.FAILURE;
}
