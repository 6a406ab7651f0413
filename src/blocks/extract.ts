/**
 * @fileoverview Fenced block extraction
 *
 * Collects the `---docfacts` blocks of every documented function and renders
 * them as JSON or Markdown.
 */

import * as fs from 'node:fs/promises';
import { getErrorMessage } from '../core/errors.js';
import type { LanguageRegistry } from '../langs/registry.js';
import { findFencedBlock, parseFencedBlock, type FencedBlock, type FencedIssue } from '../metadata/fenced_block.js';
import { logWarning } from '../telemetry/logger.js';
import type { ParsedFunction } from '../types.js';

export interface ExtractedBlock {
  readonly name: string;
  readonly line: number;
  readonly filePath: string;
  /** YAML between the markers, dedented. */
  readonly raw: string;
  /** Null when the block fails validation; see `issues`. */
  readonly data: FencedBlock | null;
  readonly issues: readonly FencedIssue[];
}

/**
 * Files without an adapter are skipped. Unreadable or unparsable files are
 * logged and skipped.
 */
export async function extractBlocks(registry: LanguageRegistry, files: readonly string[]): Promise<ExtractedBlock[]> {
  const blocks: ExtractedBlock[] = [];
  for (const filePath of files) {
    const adapter = registry.resolve(filePath);
    if (!adapter) continue;

    let functions: readonly ParsedFunction[];
    try {
      const source = await fs.readFile(filePath, 'utf8');
      functions = adapter.parseModule(filePath, source).functions;
    } catch (error) {
      logWarning('[docfacts] could not extract blocks', { filePath, error: getErrorMessage(error) });
      continue;
    }

    for (const fn of functions) {
      if (fn.docstring === null) continue;
      const raw = findFencedBlock(fn.docstring);
      if (raw === null) continue;
      const parsed = parseFencedBlock(raw);
      blocks.push({
        name: fn.name,
        line: fn.startLine,
        filePath,
        raw: raw.trim(),
        data: parsed.ok ? parsed.value : null,
        issues: parsed.ok ? [] : parsed.error,
      });
    }
  }
  return blocks;
}

export function exportJson(blocks: readonly ExtractedBlock[]): string {
  return JSON.stringify(
    blocks.map((block) => ({
      name: block.name,
      line: block.line,
      filePath: block.filePath,
      ...(block.data ?? {}),
      raw: block.raw,
    })),
    null,
    2,
  );
}

function bulletList(items: readonly string[], code = false): string[] {
  return items.map((item) => (code ? `- \`${item}\`` : `- ${item}`));
}

export function exportMarkdown(blocks: readonly ExtractedBlock[]): string {
  const out: string[] = ['# Extracted documentation blocks', ''];

  for (const block of blocks) {
    out.push(`## ${block.name}`, '', `**Location:** \`${block.filePath}:${block.line}\``, '');
    const data = block.data;
    if (data) {
      out.push('### What', '', data.what.trim(), '');
      const calls = data.deps.calls ?? [];
      const imports = data.deps.imports ?? [];
      if (calls.length > 0 || imports.length > 0) {
        out.push('### Dependencies', '');
        if (calls.length > 0) out.push('**Calls:**', ...bulletList(calls, true), '');
        if (imports.length > 0) out.push('**Imports:**', ...bulletList(imports, true), '');
      }
      out.push('### Why', '', data.why.trim(), '');
      out.push('### Guardrails', '', ...bulletList(data.guardrails), '');
      if (data.changelog && data.changelog.length > 0) {
        out.push('### Changelog', '', ...bulletList(data.changelog), '');
      }
    } else {
      out.push('### Issues', '', ...bulletList(block.issues.map((issue) => issue.message)), '');
    }
    out.push('### Raw block', '', '```yaml', block.raw, '```', '', '---', '');
  }

  return out.join('\n');
}
