import { describe, expect, it } from 'vitest';
import { FileDiscovery } from '../../discovery/file_discovery.js';
import { JavaScriptAdapter } from '../../langs/javascript_adapter.js';
import { PythonAdapter } from '../../langs/python_adapter.js';
import type { LanguageAdapter } from '../../langs/types.js';
import { FakeGitHistory, blameLine } from '../../test/fake_git.js';
import {
  complexityCollector,
  decoratorsCollector,
  dependenciesCollector,
  exceptionsCollector,
  signatureCollector,
  typeCoverageCollector,
} from '../code_collectors.js';
import { createGitCollectors } from '../git_collectors.js';
import type { CollectorContext, FunctionHandle } from '../types.js';

const PYTHON_SOURCE = [
  'import os',
  '',
  '',
  'class Worker:',
  '    @retry(3, delay=1)',
  '    def run(self, job: str, count: int = 1, *rest, **extra) -> bool:',
  '        if not job:',
  '            raise ValueError("job required")',
  '        for item in rest:',
  '            if item and count:',
  '                os.remove(item)',
  '        raise RuntimeError',
  '',
].join('\n');

const discovery = new FileDiscovery();

function handleFor(adapter: LanguageAdapter, source: string, name: string): FunctionHandle {
  const parsed = adapter.parse(source);
  const site = adapter.functionSites(parsed, 'sample').find((candidate) => candidate.fn.name === name);
  if (!site) throw new Error(`no function ${name}`);
  return { fn: site.fn, node: site.node, parsed, profile: adapter.profile, adapter };
}

function contextFor(handle: FunctionHandle, filePath = '/repo/pkg/worker.py'): CollectorContext {
  return { filePath, repoRoot: '/repo', functionName: handle.fn.name, language: handle.adapter.language };
}

describe('code collectors (python)', () => {
  const adapter = new PythonAdapter(discovery);
  const handle = handleFor(adapter, PYTHON_SOURCE, 'run');
  const context = contextFor(handle);

  it('describes the signature', async () => {
    expect(await signatureCollector.collect(handle, context)).toEqual({
      signature: {
        raw: 'def run(self, job: str, count: int = 1, *rest, **extra) -> bool:',
        parameters: [
          { name: 'self', type: null, default: null, kind: 'positional_or_keyword' },
          { name: 'job', type: 'str', default: null, kind: 'positional_or_keyword' },
          { name: 'count', type: 'int', default: '1', kind: 'positional_or_keyword' },
          { name: 'rest', type: null, default: null, kind: 'var_positional' },
          { name: 'extra', type: null, default: null, kind: 'var_keyword' },
        ],
        returnType: 'bool',
        isAsync: false,
        isGenerator: false,
        hasTypeHints: true,
      },
    });
  });

  it('reports calls and imports', async () => {
    expect(await dependenciesCollector.collect(handle, context)).toEqual({
      dependencies: { calls: ['ValueError', 'os.remove'], imports: ['os'] },
    });
  });

  it('reads decorator names and arguments', async () => {
    expect(await decoratorsCollector.collect(handle, context)).toEqual({
      decorators: [{ name: 'retry', args: ['3', 'delay=1'], full: 'retry(3, delay=1)' }],
    });
  });

  it('skips the receiver and variadics for type coverage', async () => {
    expect(await typeCoverageCollector.collect(handle, context)).toEqual({
      typeAnalysis: { parametersTyped: 2, parametersTotal: 2, parameterCoveragePercent: 100, hasReturnType: true },
    });
  });

  it('marks raises under branches as conditional', async () => {
    expect(await exceptionsCollector.collect(handle, context)).toEqual({
      exceptions: [
        { type: 'ValueError', message: 'job required', conditional: true },
        { type: 'RuntimeError', message: null, conditional: false },
      ],
    });
  });

  it('measures complexity', async () => {
    expect(await complexityCollector.collect(handle, context)).toEqual({
      complexity: { linesOfCode: 7, cyclomaticComplexity: 5, maxNestingDepth: 2 },
    });
  });

  it('reports zero coverage for a function without parameters', async () => {
    const bare = handleFor(adapter, 'def ping():\n    return 1\n', 'ping');
    expect(await typeCoverageCollector.collect(bare, contextFor(bare))).toEqual({
      typeAnalysis: { parametersTyped: 0, parametersTotal: 0, parameterCoveragePercent: 0, hasReturnType: false },
    });
  });
});

describe('code collectors (typescript)', () => {
  const adapter = new JavaScriptAdapter(discovery, 'typescript');

  it('reads annotations and defaults', async () => {
    const handle = handleFor(adapter, 'export function add(a: number, b = 2): number {\n  return a + b;\n}\n', 'add');
    const context = contextFor(handle, '/repo/add.ts');

    expect(await typeCoverageCollector.collect(handle, context)).toEqual({
      typeAnalysis: { parametersTyped: 1, parametersTotal: 2, parameterCoveragePercent: 50, hasReturnType: true },
    });
    const { signature } = await signatureCollector.collect(handle, context);
    expect(signature).toMatchObject({
      parameters: [
        { name: 'a', type: 'number', default: null, kind: 'positional' },
        { name: 'b', type: null, default: '2', kind: 'positional' },
      ],
      returnType: 'number',
    });
  });

  it('counts logical operators and ternaries as decisions', async () => {
    const handle = handleFor(
      adapter,
      'function pick(a: boolean, b: boolean) {\n  if (a && b) {\n    return 1;\n  }\n  return a ? 2 : 3;\n}\n',
      'pick',
    );
    expect(await complexityCollector.collect(handle, contextFor(handle, '/repo/pick.ts'))).toEqual({
      complexity: { linesOfCode: 6, cyclomaticComplexity: 4, maxNestingDepth: 1 },
    });
  });

  it('records thrown errors', async () => {
    const handle = handleFor(
      adapter,
      "function check(x: number) {\n  if (x < 0) throw new RangeError('negative');\n  throw failure;\n}\n",
      'check',
    );
    expect(await exceptionsCollector.collect(handle, contextFor(handle, '/repo/check.ts'))).toEqual({
      exceptions: [
        { type: 'RangeError', message: 'negative', conditional: true },
        { type: 'failure', message: null, conditional: false },
      ],
    });
  });
});

describe('git collectors', () => {
  const adapter = new PythonAdapter(discovery);
  const handle = handleFor(adapter, PYTHON_SOURCE, 'run');
  const context = contextFor(handle);
  const commits = [
    { hash: 'abc1234', author: 'Alice', email: 'alice@example.com', date: '2024-03-02', message: 'Add run' },
    { hash: 'def5678', author: 'Bob', email: 'bob@example.com', date: '2024-03-01', message: 'Start worker' },
  ];

  it('queries history for the function line range', async () => {
    const history = new FakeGitHistory({ commits, blame: [blameLine('Alice', 6), blameLine('Alice', 7), blameLine('Bob', 8)] });
    const [commitHistory, blame] = createGitCollectors({ history, maxCommits: 3 });

    expect(await commitHistory?.collect(handle, context)).toEqual({ commitHistory: { commits, totalCommits: 2 } });
    expect(history.commitQueries).toEqual([{ filePath: '/repo/pkg/worker.py', startLine: 6, endLine: 12, limit: 3 }]);
    expect(await blame?.collect(handle, context)).toEqual({
      gitBlame: { primaryAuthor: 'Alice', allAuthors: ['Alice', 'Bob'], authorLineCounts: { Alice: 2, Bob: 1 } },
    });
  });

  it('probes each directory once', async () => {
    const history = new FakeGitHistory({ repository: false });
    const [commitHistory, blame] = createGitCollectors({ history });

    expect(await commitHistory?.appliesTo(context)).toBe(false);
    expect(await blame?.appliesTo(context)).toBe(false);
    expect(history.probes).toEqual(['/repo/pkg']);
  });
});
