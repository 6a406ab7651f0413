import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { FileDiscovery } from '../../discovery/file_discovery.js';
import { createDefaultRegistry } from '../../langs/registry.js';
import { lintFile, lintFiles } from '../lint.js';
import { DOCUMENTED_PY } from './fixtures.js';

describe('lintFile', () => {
  let root: string;
  const registry = createDefaultRegistry({ discovery: new FileDiscovery() });

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'docfacts-lint-'));
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('reports structural problems per function', async () => {
    const file = path.join(root, 'mod.py');
    fs.writeFileSync(file, DOCUMENTED_PY);

    const findings = await lintFile(registry, file);

    expect(findings.map((finding) => [finding.functionName, finding.line, finding.rule, finding.message])).toEqual([
      ['bare', 17, 'missing-doc', 'bare() has no documentation'],
      ['summary_only', 21, 'missing-block', 'summary_only() has no fenced block'],
      ['broken', 26, 'missing-key', "broken(): missing required key 'deps'"],
      ['broken', 26, 'missing-key', "broken(): missing required key 'guardrails'"],
    ]);
  });

  it('reports a file that does not parse once', async () => {
    const file = path.join(root, 'bad.py');
    fs.writeFileSync(file, 'def broken(:\n    pass\n\ndef other(:\n    pass\n');

    const findings = await lintFile(registry, file);

    expect(findings).toHaveLength(1);
    expect(findings[0]).toMatchObject({ filePath: file, rule: 'syntax' });
  });

  it('flags deps and guardrails of the wrong shape', async () => {
    const file = path.join(root, 'shape.js');
    fs.writeFileSync(
      file,
      [
        '/**',
        ' * ---docfacts',
        ' * what: X',
        ' * deps: just text',
        ' * why: Y',
        ' * guardrails: []',
        ' * ---/docfacts',
        ' */',
        'function shaped() {',
        '  return 1;',
        '}',
        '',
      ].join('\n'),
    );

    const findings = await lintFile(registry, file);

    expect(findings.map((finding) => finding.rule)).toEqual(['deps-shape', 'guardrails-shape']);
  });

  it('ignores files without an adapter and reports unreadable ones', async () => {
    const notes = path.join(root, 'notes.txt');
    fs.writeFileSync(notes, 'text');
    const missing = path.join(root, 'missing.py');

    const findings = await lintFiles(registry, [notes, missing]);

    expect(findings.map((finding) => [finding.filePath, finding.rule])).toEqual([[missing, 'io']]);
  });
});
