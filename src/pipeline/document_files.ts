/**
 * @fileoverview Documentation pipeline
 *
 * parse -> collect -> facts -> narrative -> two-phase apply, per file.
 * Functions inside one file are applied bottom to top; files are spread
 * over a fixed pool of workers that each take whole files from a shared
 * queue.
 */

import * as path from 'node:path';
import { applyBatch, orderForApply, type LineRequest } from '../apply/batch.js';
import { TwoPhaseApplier, type ApplyOutcome, type ApplyPhase } from '../apply/two_phase.js';
import { collectFunctions, type FunctionMetadata } from '../collectors/pipeline.js';
import type { CollectorOrchestrator } from '../collectors/orchestrator.js';
import { UnsupportedLanguageError, getErrorMessage } from '../core/errors.js';
import type { LanguageRegistry } from '../langs/registry.js';
import { buildFacts } from '../metadata/facts.js';
import { logDebug, logInfo, logWarning } from '../telemetry/logger.js';
import type { DocStyle } from '../types.js';
import type { NarrativeProvider } from './narrative.js';

// ============================================================================
// TYPES
// ============================================================================

export type FunctionSelection = 'all' | 'undocumented';

export interface DocumentFileOptions {
  style?: DocStyle;
  select?: FunctionSelection;
  /** Only these function names. */
  functionNames?: readonly string[];
  /** Run every checkpoint but leave the files as they are. */
  dryRun?: boolean;
}

export type FunctionStatus = ApplyOutcome['status'] | 'narrative-failed';

export interface FunctionReport {
  readonly name: string;
  readonly line: number;
  readonly status: FunctionStatus;
  readonly phase?: ApplyPhase;
  readonly error?: string;
}

export interface FileReport {
  readonly filePath: string;
  readonly functions: FunctionReport[];
  /** Set when the file could not be processed at all. */
  readonly error?: string;
}

export interface DocumentationPipelineOptions {
  registry: LanguageRegistry;
  orchestrator: CollectorOrchestrator;
  provider: NarrativeProvider;
  applier?: TwoPhaseApplier;
  style?: DocStyle;
  concurrency?: number;
}

export interface DocumentFilesOptions extends DocumentFileOptions {
  onProgress?: (progress: { total: number; completed: number; currentFile?: string }) => void;
}

const DEFAULT_CONCURRENCY = 4;

// ============================================================================
// PIPELINE
// ============================================================================

export class DocumentationPipeline {
  private readonly registry: LanguageRegistry;
  private readonly orchestrator: CollectorOrchestrator;
  private readonly provider: NarrativeProvider;
  private readonly applier: TwoPhaseApplier;
  private readonly style: DocStyle;
  private readonly concurrency: number;

  constructor(options: DocumentationPipelineOptions) {
    this.registry = options.registry;
    this.orchestrator = options.orchestrator;
    this.provider = options.provider;
    this.applier = options.applier ?? new TwoPhaseApplier(options.registry);
    this.style = options.style ?? 'flat';
    this.concurrency = Math.max(1, options.concurrency ?? DEFAULT_CONCURRENCY);
  }

  async documentFile(filePath: string, options: DocumentFileOptions = {}): Promise<FileReport> {
    const adapter = this.registry.resolve(filePath);
    if (!adapter) {
      return { filePath, functions: [], error: new UnsupportedLanguageError(filePath).message };
    }

    let entries: FunctionMetadata[];
    try {
      entries = await collectFunctions(adapter, filePath, this.orchestrator);
    } catch (error) {
      logWarning('[docfacts] could not collect file', { filePath, error: getErrorMessage(error) });
      return { filePath, functions: [], error: getErrorMessage(error) };
    }

    const selected = entries.filter((entry) => selects(entry, options));
    const style = options.style ?? this.style;
    const reports: FunctionReport[] = [];
    const dryRun = options.dryRun ?? false;
    const requests: Array<LineRequest & { name: string }> = [];

    for (const entry of orderForApply(selected.map((item) => ({ ...item, line: item.fn.startLine })))) {
      const facts = buildFacts(entry.metadata);
      try {
        const narrative = await this.provider.generate({
          filePath,
          language: adapter.language,
          fn: entry.fn,
          facts,
          metadata: entry.metadata,
        });
        requests.push({ line: entry.line, narrative, facts, style, dryRun, name: entry.fn.name });
      } catch (error) {
        logDebug('[docfacts] narrative provider failed', { filePath, function: entry.fn.name, error: getErrorMessage(error) });
        reports.push({ name: entry.fn.name, line: entry.line, status: 'narrative-failed', error: getErrorMessage(error) });
      }
    }

    const names = new Map(requests.map((request) => [request.line, request.name]));
    for (const outcome of await applyBatch(this.applier, filePath, requests)) {
      reports.push(toReport(names.get(outcome.line) ?? '<anonymous>', outcome));
    }

    reports.sort((a, b) => b.line - a.line);
    return { filePath, functions: reports };
  }

  /**
   * Reports come back in input order, keyed by resolved path. Paths naming
   * the same file are processed once so no two workers edit it.
   */
  async documentFiles(files: readonly string[], options: DocumentFilesOptions = {}): Promise<FileReport[]> {
    const unique = [...new Set(files.map((filePath) => path.resolve(filePath)))];
    const reports = new Map<string, FileReport>();
    let next = 0;
    let completed = 0;

    const runWorker = async (): Promise<void> => {
      while (next < unique.length) {
        const filePath = unique[next];
        next += 1;
        options.onProgress?.({ total: unique.length, completed, currentFile: filePath });
        reports.set(filePath, await this.documentFile(filePath, options));
        completed += 1;
      }
    };

    const workerCount = Math.min(this.concurrency, unique.length);
    await Promise.all(Array.from({ length: workerCount }, () => runWorker()));
    options.onProgress?.({ total: unique.length, completed });

    const ordered = unique.flatMap((filePath) => {
      const report = reports.get(filePath);
      return report ? [report] : [];
    });
    const count = (status: FunctionStatus): number =>
      ordered.reduce((sum, report) => sum + report.functions.filter((fn) => fn.status === status).length, 0);
    logInfo('[docfacts] documentation pass complete', {
      files: ordered.length,
      applied: count('applied'),
      planned: count('planned'),
    });
    return ordered;
  }
}

function selects(entry: FunctionMetadata, options: DocumentFileOptions): boolean {
  if (options.functionNames && !options.functionNames.includes(entry.fn.name)) return false;
  if (options.select === 'undocumented' && entry.fn.docstring !== null) return false;
  return true;
}

function toReport(name: string, outcome: ApplyOutcome): FunctionReport {
  switch (outcome.status) {
    case 'applied':
    case 'planned':
      return { name, line: outcome.line, status: outcome.status };
    case 'rejected-syntax':
      return { name, line: outcome.line, status: outcome.status, phase: outcome.phase, error: outcome.error.message };
    case 'rejected-io':
      return { name, line: outcome.line, status: outcome.status, error: outcome.error.message };
  }
}
