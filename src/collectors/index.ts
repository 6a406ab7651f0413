import type { GitHistory } from '../git/types.js';
import { CODE_COLLECTORS } from './code_collectors.js';
import { createGitCollectors } from './git_collectors.js';
import { CollectorOrchestrator } from './orchestrator.js';
import type { CollectorDescriptor } from './types.js';

export * from './types.js';
export * from './code_collectors.js';
export * from './git_collectors.js';
export * from './orchestrator.js';
export * from './pipeline.js';

export interface DefaultCollectorOptions {
  /** Omit to leave out the git collectors. */
  git?: GitHistory;
  maxCommits?: number;
}

export function createDefaultCollectors(options: DefaultCollectorOptions = {}): CollectorDescriptor[] {
  const collectors = [...CODE_COLLECTORS];
  if (options.git) {
    collectors.push(...createGitCollectors({ history: options.git, maxCommits: options.maxCommits }));
  }
  return collectors;
}

export function createDefaultOrchestrator(options: DefaultCollectorOptions = {}): CollectorOrchestrator {
  return new CollectorOrchestrator().registerAll(createDefaultCollectors(options));
}
