/**
 * @fileoverview Fenced documentation blocks
 *
 * A fenced block is YAML between a `---docfacts` line and a `---/docfacts`
 * line inside a function's documentation.
 */

import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { Err, Ok, type Result } from '../core/result.js';
import { getErrorMessage } from '../core/errors.js';
import type { DocumentBlock, Facts } from '../types.js';
import { readFlatFacts } from './facts.js';
import { decodeFlatSections, encodeSections, withoutFactSections } from './sections.js';

export const FENCE_START = '---docfacts';
export const FENCE_END = '---/docfacts';

export const REQUIRED_FENCED_KEYS = ['what', 'deps', 'why', 'guardrails'] as const;

export const FencedBlockSchema = z.object({
  what: z.string(),
  deps: z
    .object({
      calls: z.array(z.string()).optional(),
      imports: z.array(z.string()).optional(),
    })
    .passthrough(),
  why: z.string(),
  guardrails: z.array(z.string()).nonempty(),
  changelog: z.array(z.string()).optional(),
  testing: z.record(z.unknown()).optional(),
  performance: z.record(z.unknown()).optional(),
}).passthrough();

export type FencedBlock = z.infer<typeof FencedBlockSchema>;

export type FencedIssueKind = 'yaml' | 'missing-key' | 'deps-shape' | 'guardrails-shape' | 'invalid';

export interface FencedIssue {
  readonly kind: FencedIssueKind;
  readonly message: string;
}

export interface FenceLocation {
  /** Index of the start marker line. */
  readonly start: number;
  /** Index of the end marker line. */
  readonly end: number;
}

export function locateFence(lines: readonly string[]): FenceLocation | null {
  const start = lines.findIndex((line) => line.trim() === FENCE_START);
  if (start < 0) return null;
  const offset = lines.slice(start + 1).findIndex((line) => line.trim() === FENCE_END);
  return offset < 0 ? null : { start, end: start + 1 + offset };
}

/** Remove the common leading indentation of non-blank lines. */
export function dedent(lines: readonly string[]): string[] {
  let margin = Number.POSITIVE_INFINITY;
  for (const line of lines) {
    if (line.trim().length === 0) continue;
    margin = Math.min(margin, line.length - line.trimStart().length);
  }
  const cut = Number.isFinite(margin) ? margin : 0;
  return lines.map((line) => (line.trim().length === 0 ? '' : line.slice(cut)));
}

/** Dedented YAML between the markers, or null without a complete fence. */
export function findFencedBlock(doc: string): string | null {
  const lines = doc.split(/\r?\n/);
  const fence = locateFence(lines);
  if (!fence) return null;
  return dedent(lines.slice(fence.start + 1, fence.end)).join('\n');
}

function describeIssue(issue: z.ZodIssue): FencedIssue {
  const [key] = issue.path;
  const where = issue.path.join('.');
  if (issue.code === 'invalid_type' && issue.received === 'undefined' && issue.path.length === 1) {
    return { kind: 'missing-key', message: `missing required key '${where}'` };
  }
  if (key === 'deps') {
    return { kind: 'deps-shape', message: `'deps' must be a mapping with calls/imports lists (${issue.message})` };
  }
  if (key === 'guardrails') {
    return { kind: 'guardrails-shape', message: `'guardrails' must be a non-empty list (${issue.message})` };
  }
  return { kind: 'invalid', message: `${where || 'block'}: ${issue.message}` };
}

export function parseFencedBlock(body: string): Result<FencedBlock, FencedIssue[]> {
  let data: unknown;
  try {
    data = parseYaml(body);
  } catch (error) {
    return Err([{ kind: 'yaml', message: getErrorMessage(error) }]);
  }
  if (data === null || typeof data !== 'object' || Array.isArray(data)) {
    return Err([{ kind: 'yaml', message: 'fenced block is not a mapping' }]);
  }
  const parsed = FencedBlockSchema.safeParse(data);
  if (!parsed.success) {
    return Err(parsed.error.issues.map(describeIssue));
  }
  return Ok(parsed.data);
}

function fencedFacts(block: FencedBlock): Facts {
  return {
    calls: block.deps.calls ?? [],
    imports: block.deps.imports ?? [],
    changelog: (block.changelog ?? []).filter((entry) => entry !== 'none yet').map((entry) => `- ${entry}`),
  };
}

/**
 * Split a documentation text into narrative and facts. Fenced blocks that
 * fail validation keep their text as narrative and carry no facts.
 */
export function toDocumentBlock(doc: string, adapter: { readonly commentDelimiters: readonly [string, string] }): DocumentBlock {
  const body = findFencedBlock(doc);
  if (body !== null) {
    const parsed = parseFencedBlock(body);
    return {
      delimiters: adapter.commentDelimiters,
      narrative: doc,
      facts: parsed.ok ? fencedFacts(parsed.value) : null,
    };
  }
  return {
    delimiters: adapter.commentDelimiters,
    narrative: encodeSections(withoutFactSections(decodeFlatSections(doc), 'flat')).trimEnd(),
    facts: readFlatFacts(doc),
  };
}
