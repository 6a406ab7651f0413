import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { FileDiscovery } from '../../discovery/file_discovery.js';
import { createDefaultRegistry } from '../../langs/registry.js';
import { exportJson, exportMarkdown, extractBlocks, type ExtractedBlock } from '../extract.js';
import type { FencedBlock } from '../../metadata/fenced_block.js';
import { DOCUMENTED_PY, LOAD_RAW } from './fixtures.js';

const LOAD_DATA: FencedBlock = {
  what: 'Loads config.',
  deps: { calls: ['json.loads'] },
  why: 'Speed.',
  guardrails: ['keep it pure'],
};

describe('extractBlocks', () => {
  let root: string;
  const registry = createDefaultRegistry({ discovery: new FileDiscovery() });

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'docfacts-extract-'));
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('returns one block per fenced documentation', async () => {
    const file = path.join(root, 'mod.py');
    fs.writeFileSync(file, DOCUMENTED_PY);

    const blocks = await extractBlocks(registry, [file]);

    expect(blocks.map((block) => [block.name, block.line])).toEqual([
      ['load', 1],
      ['broken', 26],
    ]);
    expect(blocks[0]).toEqual({ name: 'load', line: 1, filePath: file, raw: LOAD_RAW, data: LOAD_DATA, issues: [] });
    expect(blocks[1]?.data).toBeNull();
    expect(blocks[1]?.issues.map((issue) => issue.kind)).toEqual(['missing-key', 'missing-key']);
  });

  it('skips files that cannot be parsed or read', async () => {
    const notes = path.join(root, 'notes.txt');
    fs.writeFileSync(notes, 'text');

    expect(await extractBlocks(registry, [notes, path.join(root, 'missing.py')])).toEqual([]);
  });
});

describe('exporters', () => {
  const block: ExtractedBlock = {
    name: 'load',
    line: 1,
    filePath: 'pkg/mod.py',
    raw: LOAD_RAW,
    data: LOAD_DATA,
    issues: [],
  };

  it('exports JSON with the block fields flattened', () => {
    expect(JSON.parse(exportJson([block]))).toEqual([
      { name: 'load', line: 1, filePath: 'pkg/mod.py', ...LOAD_DATA, raw: LOAD_RAW },
    ]);
  });

  it('exports Markdown sections', () => {
    expect(exportMarkdown([block])).toBe(
      [
        '# Extracted documentation blocks',
        '',
        '## load',
        '',
        '**Location:** `pkg/mod.py:1`',
        '',
        '### What',
        '',
        'Loads config.',
        '',
        '### Dependencies',
        '',
        '**Calls:**',
        '- `json.loads`',
        '',
        '### Why',
        '',
        'Speed.',
        '',
        '### Guardrails',
        '',
        '- keep it pure',
        '',
        '### Raw block',
        '',
        '```yaml',
        LOAD_RAW,
        '```',
        '',
        '---',
        '',
      ].join('\n'),
    );
  });

  it('lists issues for invalid blocks', () => {
    const invalid: ExtractedBlock = {
      ...block,
      data: null,
      issues: [{ kind: 'missing-key', message: "missing required key 'why'" }],
    };
    expect(exportMarkdown([invalid])).toContain("### Issues\n\n- missing required key 'why'\n\n### Raw block");
  });
});
