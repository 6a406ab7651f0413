import * as fs from 'node:fs/promises';
import { parseArgs } from 'node:util';
import { exportJson, exportMarkdown, extractBlocks } from '../../blocks/extract.js';
import { GLOBAL_ARG_OPTIONS, requirePositional } from '../args.js';
import { ExitCodes, createError } from '../errors.js';
import { discoverSources, resolveTarget } from '../runtime.js';
import type { CommandOptions, CommandResult } from './types.js';

const USAGE = 'docfacts extract <path> [--format json|markdown] [--output <file>]';

export async function extractCommand(options: CommandOptions): Promise<CommandResult> {
  const { runtime, rawArgs, json } = options;
  const { values, positionals } = parseArgs({
    args: rawArgs,
    options: {
      ...GLOBAL_ARG_OPTIONS,
      format: { type: 'string' },
      output: { type: 'string' },
    },
    allowPositionals: true,
    strict: true,
  });

  const target = requirePositional(positionals, 'path', USAGE);
  const format = values.format ?? (json ? 'json' : 'markdown');
  if (format !== 'json' && format !== 'markdown') {
    throw createError('INVALID_ARGUMENT', `--format must be json or markdown, got ${format}`);
  }

  const blocks = await extractBlocks(runtime.registry, await discoverSources(runtime, target));
  const rendered = format === 'json' ? exportJson(blocks) : exportMarkdown(blocks);

  if (values.output) {
    const outPath = resolveTarget(runtime, values.output);
    await fs.writeFile(outPath, rendered.endsWith('\n') ? rendered : `${rendered}\n`, 'utf8');
    console.log(`Wrote ${blocks.length} block${blocks.length === 1 ? '' : 's'} to ${outPath}`);
  } else {
    console.log(rendered);
  }
  return ExitCodes.OK;
}
