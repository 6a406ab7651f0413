/**
 * @fileoverview Ignore-aware source file discovery
 *
 * Directory targets are enumerated with glob, filtered by extension and a
 * denylist of directory names, then by `git check-ignore` (when the target
 * lives in a repository) and by the project ignore file. Results are sorted.
 */

import type { Stats } from 'node:fs';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { glob } from 'glob';
import { getErrorMessage } from '../core/errors.js';
import { isErrnoException } from '../core/result.js';
import type { IgnoreOracle } from '../git/types.js';
import { normalizeExtension } from '../langs/registry.js';
import type { SourceDiscovery } from '../langs/types.js';
import { logDebug, logWarning } from '../telemetry/logger.js';
import { BUILTIN_IGNORE_PATTERNS, IgnoreRules } from './ignore_rules.js';

export const DEFAULT_EXCLUDE_DIRS: readonly string[] = [
  '.git',
  '.hg',
  '.svn',
  '.venv',
  'venv',
  'env',
  '__pycache__',
  '.mypy_cache',
  '.pytest_cache',
  '.tox',
  '.eggs',
  'build',
  'dist',
  'site-packages',
  'node_modules',
  '.idea',
  '.vscode',
  '.next',
  '.nuxt',
  'coverage',
  '.rollup.cache',
  '.turbo',
];

export const DEFAULT_SOURCE_EXTENSIONS: readonly string[] = ['.py', '.js', '.jsx', '.ts', '.tsx'];

export interface FileDiscoveryOptions {
  /** Omit to skip the git ignore check entirely. */
  ignoreOracle?: IgnoreOracle;
  checkIgnoreBatchSize?: number;
  extraExcludeDirs?: readonly string[];
  ignoreFileName?: string;
  useBuiltinIgnore?: boolean;
}

export class FileDiscovery implements SourceDiscovery {
  private readonly excludeDirs: ReadonlySet<string>;
  private readonly batchSize: number;
  private readonly ignoreFileName: string;
  private readonly useBuiltinIgnore: boolean;

  constructor(private readonly options: FileDiscoveryOptions = {}) {
    this.excludeDirs = new Set([...DEFAULT_EXCLUDE_DIRS, ...(options.extraExcludeDirs ?? [])]);
    this.batchSize = Math.max(1, options.checkIgnoreBatchSize ?? 1024);
    this.ignoreFileName = options.ignoreFileName ?? '.docfactsignore';
    this.useBuiltinIgnore = options.useBuiltinIgnore ?? true;
  }

  async collectFiles(target: string, extensions: readonly string[] = DEFAULT_SOURCE_EXTENSIONS): Promise<string[]> {
    const absolute = path.resolve(target);
    const wanted = new Set(extensions.map(normalizeExtension));
    const matchesExtension = (file: string): boolean => wanted.has(normalizeExtension(path.extname(file)));

    let stat: Stats;
    try {
      stat = await fs.stat(absolute);
    } catch {
      return [];
    }

    const baseDir = stat.isDirectory() ? absolute : path.dirname(absolute);
    const repoRoot = await findRepositoryRoot(baseDir);
    // Denylisted segments count from the repository root, or from the target outside one.
    const segmentBase = repoRoot ?? baseDir;
    const excluded = (file: string): boolean => this.hasExcludedSegment(path.relative(segmentBase, path.dirname(file)));
    let candidates: string[];

    if (stat.isFile()) {
      if (!matchesExtension(absolute) || excluded(absolute)) return [];
      candidates = [absolute];
    } else if (stat.isDirectory()) {
      try {
        const found = await glob('**/*', {
          cwd: absolute,
          absolute: true,
          nodir: true,
          dot: true,
          ignore: [...this.excludeDirs].map((dir) => `**/${dir}/**`),
        });
        candidates = found
          .filter((file) => matchesExtension(file) && !excluded(file))
          .sort();
      } catch (error) {
        logWarning('[docfacts] file enumeration failed', { target: absolute, error: getErrorMessage(error) });
        return [];
      }
    } else {
      return [];
    }

    if (repoRoot && this.options.ignoreOracle && candidates.length > 0) {
      candidates = await this.dropGitIgnored(repoRoot, candidates, this.options.ignoreOracle);
    }

    const ruleRoot = repoRoot ?? baseDir;
    const rules = await this.loadRules(ruleRoot);
    if (rules.size > 0) {
      candidates = candidates.filter((file) => !rules.isIgnored(toPosix(path.relative(ruleRoot, file))));
    }

    return candidates;
  }

  private hasExcludedSegment(relativeDir: string): boolean {
    return relativeDir.split(/[\\/]/).some((segment) => this.excludeDirs.has(segment));
  }

  private async dropGitIgnored(repoRoot: string, files: string[], oracle: IgnoreOracle): Promise<string[]> {
    const relative = files.map((file) => toPosix(path.relative(repoRoot, file)));
    const ignored = new Set<string>();
    for (let start = 0; start < relative.length; start += this.batchSize) {
      const batch = relative.slice(start, start + this.batchSize);
      try {
        for (const entry of await oracle.checkIgnore(repoRoot, batch)) ignored.add(entry);
      } catch (error) {
        logDebug('[docfacts] ignore query failed; keeping batch', { repoRoot, error: getErrorMessage(error) });
      }
    }
    if (ignored.size === 0) return files;
    return files.filter((_, index) => !ignored.has(relative[index]));
  }

  private async loadRules(root: string): Promise<IgnoreRules> {
    let rules = this.useBuiltinIgnore ? IgnoreRules.fromLines(BUILTIN_IGNORE_PATTERNS) : new IgnoreRules();
    const filePath = path.join(root, this.ignoreFileName);
    try {
      rules = rules.concat(IgnoreRules.fromText(await fs.readFile(filePath, 'utf8')));
    } catch (error) {
      if (!isErrnoException(error) || error.code !== 'ENOENT') {
        logWarning('[docfacts] ignore file unreadable', { filePath, error: getErrorMessage(error) });
      }
    }
    return rules;
  }
}

/** Nearest ancestor (inclusive) that contains a `.git` entry. */
export async function findRepositoryRoot(start: string): Promise<string | null> {
  let dir = path.resolve(start);
  for (;;) {
    try {
      await fs.stat(path.join(dir, '.git'));
      return dir;
    } catch {
      const parent = path.dirname(dir);
      if (parent === dir) return null;
      dir = parent;
    }
  }
}

function toPosix(value: string): string {
  return value.split(path.sep).join('/');
}
