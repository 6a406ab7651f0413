export interface CommitRecord {
  /** Abbreviated hash as printed by `%h`. */
  readonly hash: string;
  readonly author: string;
  readonly email: string;
  /** YYYY-MM-DD */
  readonly date: string;
  readonly message: string;
}

export interface BlameLine {
  readonly commitHash: string;
  readonly originalLine: number;
  readonly finalLine: number;
  readonly author: string;
  readonly authorEmail: string;
  readonly authorTime: number;
  readonly summary: string;
}

export interface LineRangeQuery {
  readonly filePath: string;
  /** 1-based, inclusive. */
  readonly startLine: number;
  readonly endLine: number;
}

export interface CommitQuery extends LineRangeQuery {
  readonly limit: number;
}

/**
 * History queries the git collectors depend on. Every operation reports
 * "no data" (false / empty list) instead of failing.
 */
export interface GitHistory {
  isRepository(dir: string): Promise<boolean>;
  recentCommits(query: CommitQuery): Promise<CommitRecord[]>;
  blame(query: LineRangeQuery): Promise<BlameLine[]>;
}

/**
 * Answers which of the given repo-relative paths git ignores. A failed
 * query yields an empty set.
 */
export interface IgnoreOracle {
  checkIgnore(repoRoot: string, relativePaths: readonly string[]): Promise<Set<string>>;
}
