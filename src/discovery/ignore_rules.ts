/**
 * @fileoverview gitignore-style rules for the project ignore file
 *
 * Supported: `#` comments, `!` negation, leading `/` anchoring, trailing `/`
 * for directories only, bare names matching at any depth, `**`. The last
 * matching rule decides.
 */

import { Minimatch } from 'minimatch';

/** Applied before the project's own ignore file. */
export const BUILTIN_IGNORE_PATTERNS: readonly string[] = [
  '.venv*/',
  'venv*/',
  'node_modules/',
  'gh-pages/',
  '__pycache__/',
  '.tox/',
  'site-packages/',
  'vendor/',
  'third_party/',
  '*.min.js',
  '*.min.mjs',
  '*.bundle.js',
  '*.map',
];

export interface IgnoreRule {
  readonly source: string;
  readonly negate: boolean;
  readonly dirOnly: boolean;
  /** Matched against the whole relative path rather than a basename. */
  readonly anchored: boolean;
  readonly matcher: Minimatch;
}

export function parseIgnoreRule(line: string): IgnoreRule | null {
  let pattern = line.trim();
  if (!pattern || pattern.startsWith('#')) return null;

  const negate = pattern.startsWith('!');
  if (negate) pattern = pattern.slice(1);
  const dirOnly = pattern.endsWith('/');
  if (dirOnly) pattern = pattern.replace(/\/+$/, '');
  const anchored = pattern.includes('/');
  pattern = pattern.replace(/^\/+/, '');
  if (!pattern) return null;

  return {
    source: line.trim(),
    negate,
    dirOnly,
    anchored,
    matcher: new Minimatch(pattern, { dot: true }),
  };
}

export class IgnoreRules {
  constructor(private readonly rules: readonly IgnoreRule[] = []) {}

  static fromLines(lines: readonly string[]): IgnoreRules {
    const rules: IgnoreRule[] = [];
    for (const line of lines) {
      const rule = parseIgnoreRule(line);
      if (rule) rules.push(rule);
    }
    return new IgnoreRules(rules);
  }

  static fromText(text: string): IgnoreRules {
    return IgnoreRules.fromLines(text.split(/\r?\n/));
  }

  concat(other: IgnoreRules): IgnoreRules {
    return new IgnoreRules([...this.rules, ...other.rules]);
  }

  get size(): number {
    return this.rules.length;
  }

  /** @param relativePath POSIX path relative to the rules' root */
  isIgnored(relativePath: string): boolean {
    const segments = relativePath.split('/').filter((segment) => segment.length > 0);
    if (segments.length === 0) return false;
    const directories = segments.slice(0, -1).map((_, index) => segments.slice(0, index + 1).join('/'));

    let ignored = false;
    for (const rule of this.rules) {
      const targets = rule.dirOnly ? directories : [...directories, segments.join('/')];
      if (targets.some((target) => matchesTarget(rule, target))) {
        ignored = !rule.negate;
      }
    }
    return ignored;
  }
}

function matchesTarget(rule: IgnoreRule, target: string): boolean {
  if (rule.anchored) return rule.matcher.match(target);
  const slash = target.lastIndexOf('/');
  return rule.matcher.match(slash === -1 ? target : target.slice(slash + 1));
}
