import * as path from 'node:path';
import type { GitHistory } from '../git/types.js';
import { tallyAuthors } from '../git/parsers.js';
import type { CollectorDescriptor, CollectorContext } from './types.js';

export interface GitCollectorOptions {
  history: GitHistory;
  /** Commits requested per function. */
  maxCommits?: number;
}

const DEFAULT_MAX_COMMITS = 5;

/**
 * One `isRepository` probe per directory for the lifetime of the collector
 * pair.
 */
function repositoryProbe(history: GitHistory): (context: CollectorContext) => Promise<boolean> {
  const probes = new Map<string, Promise<boolean>>();
  return (context) => {
    const dir = path.dirname(context.filePath);
    let probe = probes.get(dir);
    if (!probe) {
      probe = history.isRepository(dir);
      probes.set(dir, probe);
    }
    return probe;
  };
}

export function createGitCollectors(options: GitCollectorOptions): CollectorDescriptor[] {
  const { history } = options;
  const maxCommits = options.maxCommits ?? DEFAULT_MAX_COMMITS;
  const inRepository = repositoryProbe(history);

  const commitHistory: CollectorDescriptor = {
    name: 'commit_history',
    category: 'git_analysis',
    priority: 50,
    appliesTo: inRepository,
    async collect({ fn }, context) {
      const commits = await history.recentCommits({
        filePath: context.filePath,
        startLine: fn.startLine,
        endLine: fn.endLine,
        limit: maxCommits,
      });
      return { commitHistory: { commits, totalCommits: commits.length } };
    },
  };

  const blame: CollectorDescriptor = {
    name: 'blame',
    category: 'git_analysis',
    priority: 55,
    appliesTo: inRepository,
    async collect({ fn }, context) {
      const lines = await history.blame({
        filePath: context.filePath,
        startLine: fn.startLine,
        endLine: fn.endLine,
      });
      return { gitBlame: tallyAuthors(lines) };
    },
  };

  return [commitHistory, blame];
}
