import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { FileIoError, SourceSyntaxError, UnsupportedLanguageError } from '../../core/errors.js';
import { Err } from '../../core/result.js';
import { FileDiscovery } from '../../discovery/file_discovery.js';
import { LanguageRegistry, createDefaultRegistry } from '../../langs/registry.js';
import { PythonAdapter } from '../../langs/python_adapter.js';
import type { ValidationResult, ValidationTarget } from '../../langs/types.js';
import type { Facts } from '../../types.js';
import { TwoPhaseApplier } from '../two_phase.js';

const SOURCE = 'def add(a, b):\n    return a + b\n';

const FACTS: Facts = { calls: [], imports: [], changelog: ['- 2024-03-02: Add add (abc1234)'] };

const EXPECTED = [
  'def add(a, b):',
  '    """',
  '    Adds numbers.',
  '',
  '    DEPENDENCIES (from code analysis):',
  '    Calls:',
  '    - none',
  '    Imports:',
  '    - none',
  '',
  '    CHANGELOG (from git history):',
  '    - 2024-03-02: Add add (abc1234)',
  '    """',
  '    return a + b',
  '',
].join('\n');

/** Rejects any file that already carries injected facts. */
class RejectFactsAdapter extends PythonAdapter {
  async validate(target: ValidationTarget): Promise<ValidationResult> {
    const result = await super.validate(target);
    if (result.ok && 'path' in target && fs.readFileSync(target.path, 'utf8').includes('DEPENDENCIES (from code')) {
      return Err(new SourceSyntaxError('forced failure', target.path));
    }
    return result;
  }
}

describe('TwoPhaseApplier', () => {
  let root: string;
  const discovery = new FileDiscovery();
  const applier = new TwoPhaseApplier(createDefaultRegistry({ discovery }));

  const writeFile = (name: string, content: string): string => {
    const filePath = path.join(root, name);
    fs.writeFileSync(filePath, content);
    return filePath;
  };

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'docfacts-apply-'));
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('writes narrative and facts and reports the result', async () => {
    const file = writeFile('ops.py', SOURCE);

    const outcome = await applier.apply({ filePath: file, line: 1, narrative: 'Adds numbers.', facts: FACTS, style: 'flat' });

    expect(outcome).toMatchObject({ status: 'applied', filePath: file, line: 1, declarationLine: 1 });
    expect(fs.readFileSync(file, 'utf8')).toBe(EXPECTED);
    expect(fs.readdirSync(root)).toEqual(['ops.py']);
  });

  it('is idempotent', async () => {
    const file = writeFile('ops.py', SOURCE);
    const request = { filePath: file, line: 1, narrative: 'Adds numbers.', facts: FACTS, style: 'flat' as const };

    await applier.apply(request);
    const first = fs.readFileSync(file, 'utf8');
    const second = await applier.apply(request);

    expect(second.status).toBe('applied');
    expect(fs.readFileSync(file, 'utf8')).toBe(first);
  });

  it('leaves the original untouched when the facts phase fails', async () => {
    const file = writeFile('ops.py', SOURCE);
    const strict = new TwoPhaseApplier(new LanguageRegistry().register(new RejectFactsAdapter(discovery)));

    const outcome = await strict.apply({ filePath: file, line: 1, narrative: 'Adds numbers.', facts: FACTS, style: 'flat' });

    expect(outcome.status).toBe('rejected-syntax');
    if (outcome.status === 'rejected-syntax') {
      expect(outcome.phase).toBe('facts');
      expect(outcome.error).toBeInstanceOf(SourceSyntaxError);
    }
    expect(fs.readFileSync(file, 'utf8')).toBe(SOURCE);
    expect(fs.readdirSync(root)).toEqual(['ops.py']);
  });

  it('rejects a source that does not parse before touching anything', async () => {
    const file = writeFile('broken.py', 'def broken(:\n    pass\n');

    const outcome = await applier.apply({ filePath: file, line: 1, narrative: 'x', facts: FACTS, style: 'flat' });

    expect(outcome).toMatchObject({ status: 'rejected-syntax', phase: 'source' });
    expect(fs.readdirSync(root)).toEqual(['broken.py']);
  });

  it('rejects a line without a declaration in the narrative phase', async () => {
    const file = writeFile('ops.py', SOURCE);

    const outcome = await applier.apply({ filePath: file, line: 2, narrative: 'x', facts: FACTS, style: 'flat' });

    expect(outcome).toMatchObject({ status: 'rejected-syntax', phase: 'narrative' });
    expect(fs.readFileSync(file, 'utf8')).toBe(SOURCE);
    expect(fs.readdirSync(root)).toEqual(['ops.py']);
  });

  it('reports unsupported and unreadable files as io rejections', async () => {
    const notes = writeFile('notes.txt', 'hello');

    const unsupported = await applier.apply({ filePath: notes, line: 1, narrative: 'x', facts: FACTS, style: 'flat' });
    const missing = await applier.apply({
      filePath: path.join(root, 'missing.py'),
      line: 1,
      narrative: 'x',
      facts: FACTS,
      style: 'flat',
    });

    expect(unsupported.status).toBe('rejected-io');
    if (unsupported.status === 'rejected-io') expect(unsupported.error).toBeInstanceOf(UnsupportedLanguageError);
    expect(missing.status).toBe('rejected-io');
    if (missing.status === 'rejected-io') expect(missing.error).toBeInstanceOf(FileIoError);
  });

  it('refuses a file that is not valid UTF-8 and keeps its bytes', async () => {
    const file = path.join(root, 'legacy.py');
    const original = Buffer.concat([
      Buffer.from('# -*- coding: latin-1 -*-\n# caf', 'utf8'),
      Buffer.from([0xe9]),
      Buffer.from('\ndef f():\n    pass\n', 'utf8'),
    ]);
    fs.writeFileSync(file, original);

    const outcome = await applier.apply({ filePath: file, line: 3, narrative: 'x', facts: FACTS, style: 'flat' });

    expect(outcome.status).toBe('rejected-io');
    if (outcome.status === 'rejected-io') {
      expect(outcome.error).toBeInstanceOf(FileIoError);
      expect(outcome.error).toMatchObject({ operation: 'decode', filePath: file });
    }
    expect(fs.readFileSync(file).equals(original)).toBe(true);
    expect(fs.readdirSync(root)).toEqual(['legacy.py']);
  });

  it('checks both phases on a dry run and writes nothing', async () => {
    const file = writeFile('ops.py', SOURCE);

    const outcome = await applier.apply({
      filePath: file,
      line: 1,
      narrative: 'Adds numbers.',
      facts: FACTS,
      style: 'flat',
      dryRun: true,
    });

    expect(outcome).toMatchObject({ status: 'planned', filePath: file, line: 1, declarationLine: 1 });
    if (outcome.status === 'planned') expect(outcome.text.split('\n')[0]).toBe('Adds numbers.');
    expect(fs.readFileSync(file, 'utf8')).toBe(SOURCE);
    expect(fs.readdirSync(root)).toEqual(['ops.py']);
  });

  it('keeps the file mode', async () => {
    const file = writeFile('ops.py', SOURCE);
    fs.chmodSync(file, 0o640);

    await applier.apply({ filePath: file, line: 1, narrative: 'Adds numbers.', facts: FACTS, style: 'flat' });

    expect(fs.statSync(file).mode & 0o777).toBe(0o640);
  });

  it('writes fenced blocks', async () => {
    const file = writeFile('ops.py', SOURCE);

    const outcome = await applier.apply({
      filePath: file,
      line: 1,
      narrative: 'what: Adds numbers.\nwhy: Needed.\nguardrails:\n  - keep it pure',
      facts: FACTS,
      style: 'fenced',
    });

    expect(outcome.status).toBe('applied');
    const lines = fs.readFileSync(file, 'utf8').split('\n');
    expect(lines.slice(0, 4)).toEqual(['def add(a, b):', '    """', '    ---docfacts', '    what: Adds numbers.']);
  });
});
