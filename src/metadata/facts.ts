import { z } from 'zod';
import type { CollectedMetadata, Facts } from '../types.js';
import { decodeFlatSections, findSection } from './sections.js';

export const NO_GIT_HISTORY = '- no git history available';

const DependenciesSchema = z.object({
  calls: z.array(z.string()),
  imports: z.array(z.string()),
});

const CommitHistorySchema = z.object({
  commits: z.array(
    z.object({
      hash: z.string(),
      date: z.string(),
      message: z.string(),
    }),
  ),
});

export function formatChangelogEntry(commit: { date: string; message: string; hash: string }): string {
  return `- ${commit.date}: ${commit.message} (${commit.hash})`;
}

function sortedUnique(values: readonly string[]): string[] {
  return [...new Set(values)].sort();
}

/**
 * Facts for the injector. A missing commit history (collector skipped or
 * failed) yields a single placeholder entry; an empty one yields none.
 */
export function buildFacts(metadata: CollectedMetadata): Facts {
  const dependencies = DependenciesSchema.safeParse(metadata.codeAnalysis.dependencies);
  const history = CommitHistorySchema.safeParse(metadata.gitAnalysis.commitHistory);
  return {
    calls: dependencies.success ? sortedUnique(dependencies.data.calls) : [],
    imports: dependencies.success ? sortedUnique(dependencies.data.imports) : [],
    changelog: history.success ? history.data.commits.map(formatChangelogEntry) : [NO_GIT_HISTORY],
  };
}

function listItems(lines: readonly string[]): string[] {
  return lines
    .map((line) => line.trim())
    .filter((line) => line.startsWith('- '))
    .map((line) => line.slice(2).trim());
}

/**
 * Facts written in flat style, read back from a documentation text. Null
 * when the text has no dependency section.
 */
export function readFlatFacts(text: string): Facts | null {
  const sections = decodeFlatSections(text);
  const deps = findSection(sections, ['DEPENDENCIES', 'DEPS']);
  if (!deps) return null;

  const calls: string[] = [];
  const imports: string[] = [];
  let target: string[] | null = null;
  for (const line of deps.lines) {
    const label = line.trim().toLowerCase();
    if (label === 'calls:') target = calls;
    else if (label === 'imports:') target = imports;
    else if (target && line.trim().startsWith('- ')) {
      const item = line.trim().slice(2).trim();
      if (item !== 'none') target.push(item);
    }
  }

  const changelogSection = findSection(sections, ['CHANGELOG']);
  const changelog = changelogSection
    ? listItems(changelogSection.lines)
        .filter((entry) => entry !== 'none yet')
        .map((entry) => `- ${entry}`)
    : [];
  return { calls, imports, changelog };
}
