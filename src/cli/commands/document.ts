import * as path from 'node:path';
import { parseArgs } from 'node:util';
import { DocumentationPipeline, type FileReport } from '../../pipeline/document_files.js';
import { StaticNarrativeProvider } from '../../pipeline/narrative.js';
import { GLOBAL_ARG_OPTIONS, parseStyle, requirePositional, requirePositiveInt } from '../args.js';
import { ExitCodes, createError } from '../errors.js';
import { createProgressBar, formatDuration, printTable } from '../progress.js';
import { discoverSources, resolveTarget } from '../runtime.js';
import { readNarrative } from './apply.js';
import type { CommandOptions, CommandResult } from './types.js';

const USAGE = 'docfacts document <path> --narrative <file> [--style flat|fenced] [--undocumented] [--function <name>...] [--dry-run]';

/** `{name}` and `{signature}` in the template are replaced per function. */
export function narrativeFromTemplate(template: string): StaticNarrativeProvider {
  return new StaticNarrativeProvider((request) =>
    template.replaceAll('{name}', request.fn.name).replaceAll('{signature}', request.fn.signature),
  );
}

export async function documentCommand(options: CommandOptions): Promise<CommandResult> {
  const { runtime, rawArgs, json } = options;
  const { values, positionals } = parseArgs({
    args: rawArgs,
    options: {
      ...GLOBAL_ARG_OPTIONS,
      narrative: { type: 'string' },
      style: { type: 'string' },
      undocumented: { type: 'boolean' },
      function: { type: 'string', multiple: true },
      concurrency: { type: 'string' },
      'dry-run': { type: 'boolean' },
    },
    allowPositionals: true,
    strict: true,
  });

  const target = requirePositional(positionals, 'path', USAGE);
  if (!values.narrative) {
    throw createError('INVALID_ARGUMENT', `--narrative is required. Usage: ${USAGE}`);
  }
  const template = await readNarrative(resolveTarget(runtime, values.narrative));
  const concurrency =
    values.concurrency === undefined ? runtime.config.batch.concurrency : requirePositiveInt(values.concurrency, '--concurrency');

  const pipeline = new DocumentationPipeline({
    registry: runtime.registry,
    orchestrator: runtime.orchestrator,
    provider: narrativeFromTemplate(template),
    style: parseStyle(values.style, runtime.config.style),
    concurrency,
  });

  const files = await discoverSources(runtime, target);
  const bar = !json && process.stderr.isTTY && files.length > 1 ? createProgressBar({ total: files.length }) : null;
  const startedAt = Date.now();
  let reports: FileReport[];
  try {
    reports = await pipeline.documentFiles(files, {
      select: values.undocumented ? 'undocumented' : 'all',
      functionNames: values.function,
      dryRun: values['dry-run'] ?? false,
      onProgress: ({ completed, currentFile }) =>
        bar?.update(completed, { file: currentFile ? path.basename(currentFile) : 'done' }),
    });
  } finally {
    bar?.stop();
  }

  const failed = reports.some(
    (report) => report.error !== undefined || report.functions.some((fn) => fn.status !== 'applied' && fn.status !== 'planned'),
  );

  if (json) {
    console.log(JSON.stringify({ files: reports }, null, 2));
    return failed ? ExitCodes.FAILURE : ExitCodes.OK;
  }

  const rows: string[][] = [];
  for (const report of reports) {
    const relative = path.relative(runtime.workspace, report.filePath) || report.filePath;
    if (report.error !== undefined) {
      rows.push([relative, '-', '-', `error: ${report.error}`]);
    }
    for (const fn of report.functions) {
      const status = fn.phase ? `${fn.status} (${fn.phase})` : fn.status;
      rows.push([relative, fn.name, String(fn.line), status]);
    }
  }
  if (rows.length === 0) {
    console.log('Nothing to document.');
  } else {
    printTable(['File', 'Function', 'Line', 'Status'], rows);
  }
  console.log(`\n${files.length} file${files.length === 1 ? '' : 's'} in ${formatDuration(Date.now() - startedAt)}`);
  return failed ? ExitCodes.FAILURE : ExitCodes.OK;
}
