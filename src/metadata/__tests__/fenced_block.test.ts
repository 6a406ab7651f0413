import { describe, expect, it } from 'vitest';
import { findFencedBlock, parseFencedBlock, toDocumentBlock } from '../fenced_block.js';

const VALID = ['what: Loads config.', 'deps:', '  calls:', '    - json.loads', 'why: Speed.', 'guardrails:', '  - keep it pure'].join('\n');

function issueKinds(body: string): string[] {
  const result = parseFencedBlock(body);
  return result.ok ? [] : result.error.map((issue) => issue.kind);
}

describe('findFencedBlock', () => {
  it('returns the dedented body between markers', () => {
    expect(findFencedBlock('Summary\n    ---docfacts\n    what: x\n      - y\n    ---/docfacts\n')).toBe('what: x\n  - y');
  });

  it('returns null without a closing marker', () => {
    expect(findFencedBlock('---docfacts\nwhat: x')).toBeNull();
  });
});

describe('parseFencedBlock', () => {
  it('accepts a complete block', () => {
    const result = parseFencedBlock(VALID);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.deps.calls).toEqual(['json.loads']);
      expect(result.value.guardrails).toEqual(['keep it pure']);
    }
  });

  it('reports missing required keys', () => {
    const result = parseFencedBlock('what: X\nwhy: Y');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.map((issue) => issue.message)).toEqual([
        "missing required key 'deps'",
        "missing required key 'guardrails'",
      ]);
    }
  });

  it('rejects scalar deps and empty guardrails', () => {
    expect(issueKinds('what: X\ndeps: json.loads\nwhy: Y\nguardrails:\n  - one')).toEqual(['deps-shape']);
    expect(issueKinds('what: X\ndeps: {}\nwhy: Y\nguardrails: []')).toEqual(['guardrails-shape']);
  });

  it('reports unparsable YAML', () => {
    expect(issueKinds('what: [unclosed')).toEqual(['yaml']);
    expect(issueKinds('- just\n- a list')).toEqual(['yaml']);
  });
});

describe('toDocumentBlock', () => {
  const adapter = { commentDelimiters: ['"""', '"""'] as const };

  it('reads facts from flat text', () => {
    const doc = [
      'WHAT: X',
      '',
      'DEPENDENCIES (from code analysis):',
      'Calls:',
      '- a.b',
      'Imports:',
      '- none',
      '',
      'CHANGELOG (from git history):',
      '- none yet',
    ].join('\n');
    expect(toDocumentBlock(doc, adapter)).toEqual({
      delimiters: ['"""', '"""'],
      narrative: 'WHAT: X',
      facts: { calls: ['a.b'], imports: [], changelog: [] },
    });
  });

  it('reads facts from a fenced block', () => {
    const doc = `---docfacts\n${VALID}\nchangelog:\n  - none yet\n---/docfacts`;
    expect(toDocumentBlock(doc, adapter).facts).toEqual({ calls: ['json.loads'], imports: [], changelog: [] });
  });
});
