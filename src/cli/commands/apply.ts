import * as fs from 'node:fs/promises';
import { parseArgs } from 'node:util';
import { TwoPhaseApplier } from '../../apply/two_phase.js';
import { collectFunctions } from '../../collectors/pipeline.js';
import { buildFacts } from '../../metadata/facts.js';
import { GLOBAL_ARG_OPTIONS, parseStyle, requirePositional, requirePositiveInt } from '../args.js';
import { ExitCodes, createError } from '../errors.js';
import { printKeyValue } from '../progress.js';
import { resolveTarget } from '../runtime.js';
import type { CommandOptions, CommandResult } from './types.js';

const USAGE = 'docfacts apply <file> --line <n> --narrative <file> [--style flat|fenced] [--dry-run]';

export async function readNarrative(filePath: string): Promise<string> {
  try {
    return (await fs.readFile(filePath, 'utf8')).trimEnd();
  } catch {
    throw createError('FILE_NOT_FOUND', `Cannot read narrative file ${filePath}`);
  }
}

export async function applyCommand(options: CommandOptions): Promise<CommandResult> {
  const { runtime, rawArgs, json } = options;
  const { values, positionals } = parseArgs({
    args: rawArgs,
    options: {
      ...GLOBAL_ARG_OPTIONS,
      line: { type: 'string' },
      narrative: { type: 'string' },
      style: { type: 'string' },
      'dry-run': { type: 'boolean' },
    },
    allowPositionals: true,
    strict: true,
  });

  const filePath = resolveTarget(runtime, requirePositional(positionals, 'file', USAGE));
  const line = requirePositiveInt(values.line, '--line');
  if (!values.narrative) {
    throw createError('INVALID_ARGUMENT', `--narrative is required. Usage: ${USAGE}`);
  }
  const style = parseStyle(values.style, runtime.config.style);
  const narrative = await readNarrative(resolveTarget(runtime, values.narrative));

  const adapter = runtime.registry.resolve(filePath);
  if (!adapter) {
    throw createError('UNSUPPORTED_LANGUAGE', `No language adapter for ${filePath}`);
  }
  const entry = (await collectFunctions(adapter, filePath, runtime.orchestrator)).find((item) => item.fn.startLine === line);
  if (!entry) {
    throw createError('FUNCTION_NOT_FOUND', `No function declaration starts at ${filePath}:${line}`);
  }

  const outcome = await new TwoPhaseApplier(runtime.registry).apply({
    filePath,
    line,
    narrative,
    facts: buildFacts(entry.metadata),
    style,
    dryRun: values['dry-run'] ?? false,
  });

  if (json) {
    console.log(
      JSON.stringify(
        outcome.status === 'applied' || outcome.status === 'planned'
          ? { status: outcome.status, function: entry.fn.name, line, declarationLine: outcome.declarationLine }
          : { status: outcome.status, function: entry.fn.name, line, error: outcome.error.toJSON() },
        null,
        2,
      ),
    );
  } else if (outcome.status === 'applied' || outcome.status === 'planned') {
    console.log(outcome.status === 'planned' ? `Would document ${entry.fn.name}()` : `Documented ${entry.fn.name}()`);
    printKeyValue([
      { key: 'File', value: filePath },
      { key: 'Declaration line', value: outcome.declarationLine },
      { key: 'Style', value: style },
    ]);
  } else {
    console.log(`Rejected ${entry.fn.name}(): ${outcome.error.message}`);
    printKeyValue([
      { key: 'Status', value: outcome.status },
      { key: 'Phase', value: outcome.status === 'rejected-syntax' ? outcome.phase : null },
      { key: 'File', value: `${filePath} (unchanged)` },
    ]);
  }
  return outcome.status === 'applied' || outcome.status === 'planned' ? ExitCodes.OK : ExitCodes.FAILURE;
}
