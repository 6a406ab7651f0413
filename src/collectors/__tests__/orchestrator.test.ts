import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { RegistrationError } from '../../core/errors.js';
import { FileDiscovery } from '../../discovery/file_discovery.js';
import { PythonAdapter } from '../../langs/python_adapter.js';
import { FakeGitHistory } from '../../test/fake_git.js';
import { createDefaultCollectors, createDefaultOrchestrator } from '../index.js';
import { CollectorOrchestrator, priorityBand } from '../orchestrator.js';
import { collectForFile } from '../pipeline.js';
import type { CollectorContext, CollectorDescriptor, FunctionHandle } from '../types.js';

const adapter = new PythonAdapter(new FileDiscovery());

function sampleHandle(): FunctionHandle {
  const parsed = adapter.parse('def greet(name):\n    return name\n');
  const [site] = adapter.functionSites(parsed, 'greet.py');
  if (!site) throw new Error('no function parsed');
  return { fn: site.fn, node: site.node, parsed, profile: adapter.profile, adapter };
}

const context: CollectorContext = {
  filePath: '/work/greet.py',
  repoRoot: '/work',
  functionName: 'greet',
  language: 'python',
};

function stub(name: string, priority: number, output: Record<string, unknown>, category = 'code_analysis'): CollectorDescriptor {
  return { name, category, priority, appliesTo: () => true, collect: () => output };
}

describe('CollectorOrchestrator', () => {
  it('keeps other collectors running when one throws', async () => {
    const orchestrator = new CollectorOrchestrator()
      .register(stub('first', 10, { first: 1 }))
      .register({
        name: 'broken',
        category: 'code_analysis',
        priority: 20,
        appliesTo: () => true,
        collect: () => {
          throw new Error('boom');
        },
      })
      .register(stub('last', 30, { last: 3 }));

    const metadata = await orchestrator.collectAll(sampleHandle(), context);

    expect(metadata.codeAnalysis).toEqual({ first: 1, last: 3 });
    expect(metadata.raw).toEqual({ broken_error: 'boom' });
    expect(metadata.functionName).toBe('greet');
    expect(metadata.filePath).toBe('/work/greet.py');
  });

  it('records rejected promises the same way', async () => {
    const orchestrator = new CollectorOrchestrator().register({
      name: 'async_broken',
      category: 'git_analysis',
      priority: 5,
      appliesTo: async () => true,
      collect: async () => Promise.reject(new Error('git went away')),
    });

    const metadata = await orchestrator.collectAll(sampleHandle(), context);

    expect(metadata.gitAnalysis).toEqual({});
    expect(metadata.raw).toEqual({ async_broken_error: 'git went away' });
  });

  it('records a collector that resolves to something other than an object', async () => {
    const orchestrator = new CollectorOrchestrator()
      .register({ name: 'empty', category: 'code_analysis', priority: 10, appliesTo: () => true, collect: vi.fn().mockResolvedValue(undefined) })
      .register({ name: 'nothing', category: 'git_analysis', priority: 20, appliesTo: () => true, collect: vi.fn().mockReturnValue(null) })
      .register(stub('last', 30, { last: 3 }));

    const metadata = await orchestrator.collectAll(sampleHandle(), context);

    expect(metadata.codeAnalysis).toEqual({ last: 3 });
    expect(metadata.gitAnalysis).toEqual({});
    expect(metadata.raw).toEqual({
      empty_error: 'returned undefined instead of an object',
      nothing_error: 'returned null instead of an object',
    });
  });

  it('runs in priority order and keeps registration order for ties', async () => {
    const calls: string[] = [];
    const tracking = (name: string, priority: number): CollectorDescriptor => ({
      name,
      category: 'code_analysis',
      priority,
      appliesTo: () => true,
      collect: () => {
        calls.push(name);
        return { value: name };
      },
    });
    const orchestrator = new CollectorOrchestrator().registerAll([
      tracking('c', 30),
      tracking('a1', 10),
      tracking('a2', 10),
      tracking('neg', -5),
    ]);

    const metadata = await orchestrator.collectAll(sampleHandle(), context);

    expect(calls).toEqual(['neg', 'a1', 'a2', 'c']);
    expect(orchestrator.names()).toEqual(['neg', 'a1', 'a2', 'c']);
    expect(metadata.codeAnalysis).toEqual({ value: 'c' });
  });

  it('skips collectors that do not apply and records a throwing check', async () => {
    const collect = vi.fn(() => ({ never: true }));
    const orchestrator = new CollectorOrchestrator()
      .register({ name: 'off', category: 'code_analysis', priority: 1, appliesTo: () => false, collect })
      .register({
        name: 'flaky',
        category: 'code_analysis',
        priority: 2,
        appliesTo: () => {
          throw new Error('probe failed');
        },
        collect,
      });

    const metadata = await orchestrator.collectAll(sampleHandle(), context);

    expect(collect).not.toHaveBeenCalled();
    expect(metadata.codeAnalysis).toEqual({});
    expect(metadata.raw).toEqual({ flaky_error: 'probe failed' });
  });

  it('routes unknown categories to the raw bucket', async () => {
    const orchestrator = new CollectorOrchestrator()
      .register(stub('tests', 1, { covered: true }, 'test_analysis'))
      .register(stub('custom', 2, { anything: 1 }, 'security_analysis'));

    const metadata = await orchestrator.collectAll(sampleHandle(), context);

    expect(metadata.testAnalysis).toEqual({ covered: true });
    expect(metadata.raw).toEqual({ custom: { anything: 1 } });
  });

  it('validates registrations and skips duplicates', () => {
    const orchestrator = new CollectorOrchestrator();
    expect(() => orchestrator.register(stub('  ', 1, {}))).toThrow(RegistrationError);
    expect(() => orchestrator.register(stub('fractional', 1.5, {}))).toThrow(RegistrationError);

    orchestrator.register(stub('once', 1, { a: 1 })).register(stub('once', 2, { b: 2 }));
    expect(orchestrator.names()).toEqual(['once']);
  });

  it('classifies priority bands', () => {
    expect(priorityBand(-1)).toBe('critical');
    expect(priorityBand(0)).toBe('standard');
    expect(priorityBand(100)).toBe('standard');
    expect(priorityBand(101)).toBe('optional');
  });
});

describe('default collectors', () => {
  it('lists the code collectors and adds git ones on request', () => {
    expect(createDefaultCollectors().map((collector) => collector.name)).toEqual([
      'signature',
      'dependencies',
      'decorators',
      'type_coverage',
      'exceptions',
      'complexity',
    ]);
    const withGit = createDefaultCollectors({ git: new FakeGitHistory() });
    expect(withGit.map((collector) => [collector.name, collector.priority]).slice(-2)).toEqual([
      ['commit_history', 50],
      ['blame', 55],
    ]);
  });
});

describe('collectForFile', () => {
  let root: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'docfacts-collect-'));
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('keys one record per function by name and line', async () => {
    const file = path.join(root, 'ops.py');
    fs.writeFileSync(file, 'import json\n\n\ndef load(raw):\n    return json.loads(raw)\n\n\ndef dump(value):\n    return json.dumps(value)\n');
    const history = new FakeGitHistory({ repository: false });

    const records = await collectForFile(adapter, file, createDefaultOrchestrator({ git: history }));

    expect(Object.keys(records)).toEqual(['load@4', 'dump@8']);
    expect(records['load@4']?.codeAnalysis.dependencies).toEqual({ calls: ['json.loads'], imports: ['json'] });
    expect(records['dump@8']?.gitAnalysis).toEqual({});
    expect(history.probes).toEqual([root]);
  });

  it('filters by function name', async () => {
    const file = path.join(root, 'ops.py');
    fs.writeFileSync(file, 'def a():\n    pass\n\ndef b():\n    pass\n');

    const records = await collectForFile(adapter, file, createDefaultOrchestrator(), { functionName: 'b' });

    expect(Object.keys(records)).toEqual(['b@4']);
  });
});
