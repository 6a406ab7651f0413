import { parse as parseYaml } from 'yaml';
import { describe, expect, it } from 'vitest';
import type { Facts } from '../../types.js';
import { findFencedBlock } from '../fenced_block.js';
import { inject } from '../injector.js';

const FACTS: Facts = {
  calls: ['json.loads'],
  imports: ['json'],
  changelog: ['- 2024-03-02: Add run (abc1234)'],
};

const EMPTY: Facts = { calls: [], imports: [], changelog: [] };

describe('inject (flat)', () => {
  it('replaces fabricated fact sections with the real facts', () => {
    const narrative = [
      'WHAT: Loads config.',
      'DEPENDENCIES:',
      '- fake.call',
      '- another.fake',
      'WHY: Speed.',
      'CHANGELOG:',
      '- 2020-01-01: invented (0000000)',
      '',
    ].join('\n');

    const output = inject(narrative, FACTS, 'flat');

    expect(output).toBe(
      [
        'WHAT: Loads config.',
        'WHY: Speed.',
        '',
        'DEPENDENCIES (from code analysis):',
        'Calls:',
        '- json.loads',
        'Imports:',
        '- json',
        '',
        'CHANGELOG (from git history):',
        '- 2024-03-02: Add run (abc1234)',
      ].join('\n'),
    );
    expect(output).not.toContain('fake.call');
    expect(output).not.toContain('invented');
  });

  it('uses placeholders for empty facts', () => {
    expect(inject('Does things.', EMPTY, 'flat')).toBe(
      [
        'Does things.',
        '',
        'DEPENDENCIES (from code analysis):',
        'Calls:',
        '- none',
        'Imports:',
        '- none',
        '',
        'CHANGELOG (from git history):',
        '- none yet',
      ].join('\n'),
    );
  });

  it('strips markdown-decorated fact headers', () => {
    const output = inject('## Dependencies\n- fake\n\n**Why:** because', EMPTY, 'flat');
    expect(output.split('\n').slice(0, 3)).toEqual(['**Why:** because', '', 'DEPENDENCIES (from code analysis):']);
  });

  it('is idempotent', () => {
    const once = inject('WHAT: a\n\nDEPS:\n- nope\n\n\n', FACTS, 'flat');
    expect(inject(once, FACTS, 'flat')).toBe(once);
  });

  it('replaces facts from an earlier run with new ones', () => {
    const first = inject('WHAT: a', FACTS, 'flat');
    const second = inject(first, { ...FACTS, calls: ['yaml.load'] }, 'flat');
    expect(second).toContain('- yaml.load');
    expect(second).not.toContain('json.loads');
    expect(second.match(/DEPENDENCIES/g)).toHaveLength(1);
  });
});

describe('inject (fenced)', () => {
  const narrative = [
    'what: Loads config.',
    'deps:',
    '  calls:',
    '    - fake',
    'why: Speed.',
    'guardrails:',
    '  - keep it pure',
  ].join('\n');

  it('wraps the narrative and appends facts before the closing marker', () => {
    const output = inject(narrative, { calls: ['json.loads'], imports: [], changelog: [] }, 'fenced');
    const lines = output.split('\n');

    expect(lines.slice(0, 5)).toEqual([
      '---docfacts',
      'what: Loads config.',
      'why: Speed.',
      'guardrails:',
      '  - keep it pure',
    ]);
    expect(lines[lines.length - 1]).toBe('---/docfacts');
    const body = findFencedBlock(output);
    expect(body === null ? null : parseYaml(body)).toEqual({
      what: 'Loads config.',
      why: 'Speed.',
      guardrails: ['keep it pure'],
      deps: { calls: ['json.loads'], imports: [] },
      changelog: ['none yet'],
    });
  });

  it('keeps text around an existing fence and strips facts inside it', () => {
    const doc = ['Intro line.', '  ---docfacts', '  what: X', '  changelog:', '    - fabricated', '  ---/docfacts', 'Trailer.'].join('\n');

    const output = inject(doc, FACTS, 'fenced');
    const lines = output.split('\n');

    expect(lines.slice(0, 3)).toEqual(['Intro line.', '---docfacts', 'what: X']);
    expect(lines.slice(-2)).toEqual(['---/docfacts', 'Trailer.']);
    expect(output).not.toContain('fabricated');
    const body = findFencedBlock(output);
    expect(body === null ? null : parseYaml(body)).toEqual({
      what: 'X',
      deps: { calls: ['json.loads'], imports: ['json'] },
      changelog: ['2024-03-02: Add run (abc1234)'],
    });
  });

  it('is idempotent', () => {
    const once = inject(narrative, FACTS, 'fenced');
    expect(inject(once, FACTS, 'fenced')).toBe(once);
  });
});
