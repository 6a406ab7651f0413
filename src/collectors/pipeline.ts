import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { FileIoError, getErrorMessage } from '../core/errors.js';
import { findRepositoryRoot } from '../discovery/file_discovery.js';
import type { LanguageAdapter } from '../langs/types.js';
import type { CollectedMetadata, ParsedFunction } from '../types.js';
import type { CollectorOrchestrator } from './orchestrator.js';
import type { CollectorContext } from './types.js';

export interface FunctionMetadata {
  /** `name@line` */
  readonly key: string;
  readonly fn: ParsedFunction;
  readonly metadata: CollectedMetadata;
}

export interface CollectOptions {
  /** Limit collection to functions with this name. */
  functionName?: string;
}

export function functionKey(fn: ParsedFunction): string {
  return `${fn.name}@${fn.startLine}`;
}

/**
 * Parse `filePath` and run the orchestrator over each function, in source
 * order. Throws FileIoError when the file cannot be read and
 * ToolUnavailableError when the parser cannot load.
 */
export async function collectFunctions(
  adapter: LanguageAdapter,
  filePath: string,
  orchestrator: CollectorOrchestrator,
  options: CollectOptions = {},
): Promise<FunctionMetadata[]> {
  let source: string;
  try {
    source = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    throw new FileIoError('read', filePath, false, getErrorMessage(error));
  }

  const parsed = adapter.parse(source);
  const repoRoot = (await findRepositoryRoot(path.dirname(filePath))) ?? path.dirname(path.resolve(filePath));
  const results: FunctionMetadata[] = [];

  for (const site of adapter.functionSites(parsed, filePath)) {
    if (options.functionName !== undefined && site.fn.name !== options.functionName) continue;
    const context: CollectorContext = {
      filePath,
      repoRoot,
      functionName: site.fn.name,
      language: adapter.language,
    };
    const metadata = await orchestrator.collectAll(
      { fn: site.fn, node: site.node, parsed, profile: adapter.profile, adapter },
      context,
    );
    results.push({ key: functionKey(site.fn), fn: site.fn, metadata });
  }
  return results;
}

export async function collectForFile(
  adapter: LanguageAdapter,
  filePath: string,
  orchestrator: CollectorOrchestrator,
  options: CollectOptions = {},
): Promise<Record<string, CollectedMetadata>> {
  const entries = await collectFunctions(adapter, filePath, orchestrator, options);
  return Object.fromEntries(entries.map((entry) => [entry.key, entry.metadata]));
}
