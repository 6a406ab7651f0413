import * as path from 'node:path';
import { parseArgs } from 'node:util';
import { collectFunctions } from '../../collectors/pipeline.js';
import { buildFacts } from '../../metadata/facts.js';
import type { CollectedMetadata } from '../../types.js';
import { GLOBAL_ARG_OPTIONS, requirePositional } from '../args.js';
import { ExitCodes } from '../errors.js';
import { printTable } from '../progress.js';
import { discoverSources } from '../runtime.js';
import type { CommandOptions, CommandResult } from './types.js';

const USAGE = 'docfacts collect <path> [--function <name>] [--json]';

export async function collectCommand(options: CommandOptions): Promise<CommandResult> {
  const { runtime, rawArgs, json } = options;
  const { values, positionals } = parseArgs({
    args: rawArgs,
    options: {
      ...GLOBAL_ARG_OPTIONS,
      function: { type: 'string' },
    },
    allowPositionals: true,
    strict: true,
  });
  const target = requirePositional(positionals, 'path', USAGE);

  const byFile: Record<string, Record<string, CollectedMetadata>> = {};
  const rows: string[][] = [];

  for (const filePath of await discoverSources(runtime, target)) {
    const adapter = runtime.registry.resolve(filePath);
    if (!adapter) continue;
    const entries = await collectFunctions(adapter, filePath, runtime.orchestrator, { functionName: values.function });
    if (entries.length === 0) continue;

    const relative = path.relative(runtime.workspace, filePath) || filePath;
    byFile[relative] = Object.fromEntries(entries.map((entry) => [entry.key, entry.metadata]));
    for (const entry of entries) {
      const facts = buildFacts(entry.metadata);
      rows.push([relative, entry.fn.name, String(entry.fn.startLine), String(facts.calls.length), String(facts.imports.length)]);
    }
  }

  if (json) {
    console.log(JSON.stringify(byFile, null, 2));
  } else if (rows.length === 0) {
    console.log('No functions found.');
  } else {
    printTable(['File', 'Function', 'Line', 'Calls', 'Imports'], rows);
  }
  return ExitCodes.OK;
}
