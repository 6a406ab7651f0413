/**
 * @fileoverview Deterministic fact injection
 *
 * `inject` replaces whatever dependency or changelog sections a narrative
 * carries with the facts derived from code and history. Applying it to its
 * own output yields the same text.
 */

import { stringify as stringifyYaml } from 'yaml';
import type { DocStyle, Facts } from '../types.js';
import { FENCE_END, FENCE_START, dedent, locateFence } from './fenced_block.js';
import { decodeFencedSections, decodeFlatSections, encodeSectionLines, withoutFactSections } from './sections.js';

export const DEPENDENCIES_HEADER = 'DEPENDENCIES (from code analysis):';
export const CHANGELOG_HEADER = 'CHANGELOG (from git history):';
export const EMPTY_LIST_ITEM = '- none';
export const EMPTY_CHANGELOG = 'none yet';

function trimTrailingBlank(lines: readonly string[]): string[] {
  let end = lines.length;
  while (end > 0 && lines[end - 1].trim().length === 0) end -= 1;
  return lines.slice(0, end);
}

function stripFlatFacts(lines: readonly string[]): string[] {
  if (lines.length === 0) return [];
  return encodeSectionLines(withoutFactSections(decodeFlatSections(lines.join('\n')), 'flat'));
}

function bulletList(items: readonly string[]): string[] {
  return items.length === 0 ? [EMPTY_LIST_ITEM] : items.map((item) => `- ${item}`);
}

export function renderFlatFacts(facts: Facts): string[] {
  return [
    DEPENDENCIES_HEADER,
    'Calls:',
    ...bulletList(facts.calls),
    'Imports:',
    ...bulletList(facts.imports),
    '',
    CHANGELOG_HEADER,
    ...(facts.changelog.length === 0 ? [`- ${EMPTY_CHANGELOG}`] : facts.changelog),
  ];
}

export function renderFencedFacts(facts: Facts): string[] {
  const changelog = facts.changelog.length === 0
    ? [EMPTY_CHANGELOG]
    : facts.changelog.map((entry) => entry.replace(/^- /, ''));
  const yaml = stringifyYaml({
    deps: { calls: [...facts.calls], imports: [...facts.imports] },
    changelog,
  });
  return trimTrailingBlank(yaml.split('\n'));
}

function injectFlat(narrative: string, facts: Facts): string {
  const body = trimTrailingBlank(stripFlatFacts(narrative.split(/\r?\n/)));
  const head = body.length === 0 ? [] : [...body, ''];
  return [...head, ...renderFlatFacts(facts)].join('\n');
}

function injectFenced(narrative: string, facts: Facts): string {
  const lines = narrative.split(/\r?\n/);
  const fence = locateFence(lines);
  const before = fence ? stripFlatFacts(lines.slice(0, fence.start)) : [];
  const inner = fence ? lines.slice(fence.start + 1, fence.end) : lines;
  const after = fence ? stripFlatFacts(lines.slice(fence.end + 1)) : [];

  const sections = withoutFactSections(decodeFencedSections(dedent(inner)), 'fenced');
  const body = trimTrailingBlank(encodeSectionLines(sections));
  return [...before, FENCE_START, ...body, ...renderFencedFacts(facts), FENCE_END, ...after].join('\n');
}

export function inject(narrative: string, facts: Facts, style: DocStyle): string {
  return style === 'fenced' ? injectFenced(narrative, facts) : injectFlat(narrative, facts);
}
