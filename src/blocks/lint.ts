/**
 * @fileoverview Structural lint of documentation blocks
 */

import * as fs from 'node:fs/promises';
import { SourceSyntaxError, getErrorMessage } from '../core/errors.js';
import type { LanguageRegistry } from '../langs/registry.js';
import { findFencedBlock, parseFencedBlock, type FencedIssueKind } from '../metadata/fenced_block.js';

export type LintRule = 'io' | 'syntax' | 'missing-doc' | 'missing-block' | FencedIssueKind;

export interface LintFinding {
  readonly filePath: string;
  readonly line: number;
  readonly functionName?: string;
  readonly rule: LintRule;
  readonly message: string;
}

/**
 * Findings for one file, in source order. Throws only when the parser
 * itself cannot load.
 */
export async function lintFile(registry: LanguageRegistry, filePath: string): Promise<LintFinding[]> {
  const adapter = registry.resolve(filePath);
  if (!adapter) return [];

  let source: string;
  try {
    source = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    return [{ filePath, line: 0, rule: 'io', message: getErrorMessage(error) }];
  }

  const check = await adapter.validate({ source });
  if (!check.ok) {
    if (!(check.error instanceof SourceSyntaxError)) throw check.error;
    return [{ filePath, line: check.error.line ?? 0, rule: 'syntax', message: check.error.detail }];
  }

  const findings: LintFinding[] = [];
  for (const fn of adapter.parseModule(filePath, source).functions) {
    const at = { filePath, line: fn.startLine, functionName: fn.name };
    if (fn.docstring === null) {
      findings.push({ ...at, rule: 'missing-doc', message: `${fn.name}() has no documentation` });
      continue;
    }
    const body = findFencedBlock(fn.docstring);
    if (body === null) {
      findings.push({ ...at, rule: 'missing-block', message: `${fn.name}() has no fenced block` });
      continue;
    }
    const parsed = parseFencedBlock(body);
    if (!parsed.ok) {
      for (const issue of parsed.error) {
        findings.push({ ...at, rule: issue.kind, message: `${fn.name}(): ${issue.message}` });
      }
    }
  }
  return findings;
}

export async function lintFiles(registry: LanguageRegistry, files: readonly string[]): Promise<LintFinding[]> {
  const findings: LintFinding[] = [];
  for (const filePath of files) {
    findings.push(...(await lintFile(registry, filePath)));
  }
  return findings;
}
