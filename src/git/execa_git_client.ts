import * as path from 'node:path';
import { execa } from 'execa';
import { getErrorMessage } from '../core/errors.js';
import { logDebug } from '../telemetry/logger.js';
import { COMMIT_LOG_FORMAT, parseBlamePorcelain, parseCommitLog } from './parsers.js';
import type { BlameLine, CommitQuery, CommitRecord, GitHistory, IgnoreOracle, LineRangeQuery } from './types.js';

export interface ExecaGitClientOptions {
  /** Repository probe; kept short so non-repositories are cheap to rule out. */
  probeTimeoutMs?: number;
  commandTimeoutMs?: number;
}

interface GitRun {
  ok: boolean;
  exitCode: number | undefined;
  stdout: string;
}

/**
 * GitHistory and IgnoreOracle over the `git` executable. Timeouts, missing
 * binaries and non-zero exits all degrade to "no data".
 */
export class ExecaGitClient implements GitHistory, IgnoreOracle {
  private readonly probeTimeoutMs: number;
  private readonly commandTimeoutMs: number;

  constructor(options: ExecaGitClientOptions = {}) {
    this.probeTimeoutMs = options.probeTimeoutMs ?? 2000;
    this.commandTimeoutMs = options.commandTimeoutMs ?? 10000;
  }

  async isRepository(dir: string): Promise<boolean> {
    const result = await this.run(['rev-parse', '--git-dir'], dir, this.probeTimeoutMs);
    return result.ok;
  }

  async recentCommits(query: CommitQuery): Promise<CommitRecord[]> {
    const args = [
      'log',
      `-L${query.startLine},${query.endLine}:${path.basename(query.filePath)}`,
      '-n',
      String(query.limit),
      '--date=short',
      `--format=${COMMIT_LOG_FORMAT}`,
    ];
    const result = await this.run(args, path.dirname(query.filePath), this.commandTimeoutMs);
    if (!result.ok) return [];
    return parseCommitLog(result.stdout).slice(0, query.limit);
  }

  async blame(query: LineRangeQuery): Promise<BlameLine[]> {
    const args = [
      'blame',
      '--line-porcelain',
      `-L${query.startLine},${query.endLine}`,
      '--',
      path.basename(query.filePath),
    ];
    const result = await this.run(args, path.dirname(query.filePath), this.commandTimeoutMs);
    if (!result.ok) return [];
    return parseBlamePorcelain(result.stdout);
  }

  async checkIgnore(repoRoot: string, relativePaths: readonly string[]): Promise<Set<string>> {
    if (relativePaths.length === 0) return new Set();
    // Exit code 1 means "nothing ignored", not a failure.
    const result = await this.run(
      ['check-ignore', '-z', '--stdin'],
      repoRoot,
      this.commandTimeoutMs,
      `${relativePaths.join('\0')}\0`,
    );
    if (!result.ok && result.exitCode !== 1) return new Set();
    return new Set(result.stdout.split('\0').filter((entry) => entry.length > 0));
  }

  private async run(args: string[], cwd: string, timeout: number, input?: string): Promise<GitRun> {
    try {
      const result = await execa('git', args, {
        cwd,
        input,
        timeout,
        reject: false,
        stripFinalNewline: false,
        maxBuffer: 10 * 1024 * 1024,
      });
      if (result.timedOut) {
        logDebug('[docfacts] git command timed out', { args: args[0], cwd, timeout });
        return { ok: false, exitCode: undefined, stdout: '' };
      }
      if (result.exitCode !== 0) {
        logDebug('[docfacts] git command failed', { args: args[0], cwd, exitCode: result.exitCode });
      }
      return { ok: result.exitCode === 0, exitCode: result.exitCode, stdout: result.stdout };
    } catch (error) {
      logDebug('[docfacts] git unavailable', { cwd, error: getErrorMessage(error) });
      return { ok: false, exitCode: undefined, stdout: '' };
    }
  }
}
