/**
 * @fileoverview Parsers for `git log` and `git blame --line-porcelain` output
 */

import type { BlameLine, CommitRecord } from './types.js';

export const RECORD_SEPARATOR = '\u001e';
export const FIELD_SEPARATOR = '\u001f';

/** `--format` value matching parseCommitLog. */
export const COMMIT_LOG_FORMAT = '%x1e%h%x1f%an%x1f%ae%x1f%ad%x1f%s';

/**
 * Split into at most `parts` pieces; the last piece keeps any remaining
 * separators.
 */
export function splitLimited(value: string, separator: string, parts: number): string[] {
  const result: string[] = [];
  let rest = value;
  while (result.length < parts - 1) {
    const index = rest.indexOf(separator);
    if (index === -1) break;
    result.push(rest.slice(0, index));
    rest = rest.slice(index + separator.length);
  }
  result.push(rest);
  return result;
}

/**
 * Parse `git log` output produced with COMMIT_LOG_FORMAT. Only the first
 * line of each record is read; `-L` queries append diffs after it.
 */
export function parseCommitLog(output: string): CommitRecord[] {
  const commits: CommitRecord[] = [];
  for (const record of output.split(RECORD_SEPARATOR)) {
    const header = record.split(/\r?\n/, 1)[0] ?? '';
    if (!header.includes(FIELD_SEPARATOR)) continue;
    const [hash, author, email, date, message] = splitLimited(header, FIELD_SEPARATOR, 5);
    if (!hash || !author || !date) continue;
    commits.push({
      hash: hash.trim(),
      author,
      email: email ?? '',
      date: date.trim(),
      message: message ?? '',
    });
  }
  return commits;
}

/**
 * Parse a single line of `git blame --line-porcelain` output.
 */
export function parseBlameLineHeader(line: string): { commitHash: string; originalLine: number; finalLine: number; groupLines?: number } | null {
  // Format: <commit-hash> <original-line> <final-line> [<num-lines>]
  // SHA-1 or SHA-256 object names
  const match = line.match(/^([0-9a-f]{40}|[0-9a-f]{64})\s+(\d+)\s+(\d+)(?:\s+(\d+))?$/);
  if (!match) return null;
  return {
    commitHash: match[1],
    originalLine: parseInt(match[2], 10),
    finalLine: parseInt(match[3], 10),
    groupLines: match[4] ? parseInt(match[4], 10) : undefined,
  };
}

interface BlameDraft {
  commitHash: string;
  originalLine: number;
  finalLine: number;
  author?: string;
  authorEmail?: string;
  authorTime?: number;
  summary?: string;
}

function finishDraft(draft: BlameDraft | null): BlameLine | null {
  if (!draft || draft.author === undefined || draft.authorTime === undefined) return null;
  return {
    commitHash: draft.commitHash,
    originalLine: draft.originalLine,
    finalLine: draft.finalLine,
    author: draft.author,
    authorEmail: draft.authorEmail ?? '',
    authorTime: draft.authorTime,
    summary: draft.summary ?? '',
  };
}

/**
 * Parse `git blame --line-porcelain` output into one entry per source line.
 */
export function parseBlamePorcelain(output: string): BlameLine[] {
  const results: BlameLine[] = [];
  let current: BlameDraft | null = null;

  for (const line of output.split('\n')) {
    if (line === '') continue;

    const header = parseBlameLineHeader(line);
    if (header) {
      const finished = finishDraft(current);
      if (finished) results.push(finished);
      current = { commitHash: header.commitHash, originalLine: header.originalLine, finalLine: header.finalLine };
      continue;
    }
    if (!current) continue;

    if (line.startsWith('author ')) {
      current.author = line.slice(7);
    } else if (line.startsWith('author-mail ')) {
      current.authorEmail = line.slice(12).replace(/[<>]/g, '');
    } else if (line.startsWith('author-time ')) {
      current.authorTime = parseInt(line.slice(12), 10);
    } else if (line.startsWith('summary ')) {
      current.summary = line.slice(8);
    }
  }

  const last = finishDraft(current);
  if (last) results.push(last);
  return results;
}

export interface AuthorTally {
  readonly primaryAuthor: string | null;
  /** Authors by descending line count, first appearance breaking ties. */
  readonly allAuthors: string[];
  readonly authorLineCounts: Record<string, number>;
}

export function tallyAuthors(lines: readonly BlameLine[]): AuthorTally {
  const counts = new Map<string, number>();
  for (const line of lines) {
    counts.set(line.author, (counts.get(line.author) ?? 0) + 1);
  }
  const ordered = [...counts.entries()]
    .map(([author, count], index) => ({ author, count, index }))
    .sort((a, b) => b.count - a.count || a.index - b.index)
    .map((entry) => entry.author);
  return {
    primaryAuthor: ordered[0] ?? null,
    allAuthors: ordered,
    authorLineCounts: Object.fromEntries(counts),
  };
}
