import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { FakeIgnoreOracle } from '../../test/fake_git.js';
import { FileDiscovery, findRepositoryRoot } from '../file_discovery.js';

function write(root: string, relative: string, content = ''): string {
  const filePath = path.join(root, relative);
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, content);
  return filePath;
}

describe('FileDiscovery', () => {
  let root: string;

  beforeEach(() => {
    root = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'docfacts-discovery-')));
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('returns sorted files with matching extensions, skipping denylisted directories', async () => {
    write(root, 'src/b.py');
    write(root, 'src/a.py');
    write(root, 'src/UPPER.PY');
    write(root, 'src/readme.md');
    write(root, 'node_modules/pkg/index.py');
    write(root, 'build/gen.py');
    write(root, 'src/__pycache__/a.py');
    write(root, 'pkg/.venv/lib/site.py');

    const files = await new FileDiscovery().collectFiles(root, ['.py']);

    expect(files).toEqual([
      path.join(root, 'src/UPPER.PY'),
      path.join(root, 'src/a.py'),
      path.join(root, 'src/b.py'),
    ]);
  });

  it('returns nothing for a missing target', async () => {
    expect(await new FileDiscovery().collectFiles(path.join(root, 'missing'))).toEqual([]);
  });

  it('accepts a single file target with a matching extension', async () => {
    const file = write(root, 'one.py');
    write(root, 'two.txt');
    const discovery = new FileDiscovery();

    expect(await discovery.collectFiles(file, ['.py'])).toEqual([file]);
    expect(await discovery.collectFiles(path.join(root, 'two.txt'), ['.py'])).toEqual([]);
  });

  it('checks denylisted segments from the same base for file and directory targets', async () => {
    const loose = write(root, 'build/gen.py');
    const discovery = new FileDiscovery();

    expect(await discovery.collectFiles(loose, ['.py'])).toEqual([loose]);
    expect(await discovery.collectFiles(path.join(root, 'build'), ['.py'])).toEqual([loose]);

    fs.mkdirSync(path.join(root, '.git'));
    expect(await discovery.collectFiles(loose, ['.py'])).toEqual([]);
    expect(await discovery.collectFiles(path.join(root, 'build'), ['.py'])).toEqual([]);
  });

  it('drops git-ignored files in fixed-size batches', async () => {
    fs.mkdirSync(path.join(root, '.git'));
    for (const name of ['a', 'b', 'c', 'd', 'e']) write(root, `src/${name}.py`);
    const oracle = new FakeIgnoreOracle(['src/b.py', 'src/e.py']);

    const files = await new FileDiscovery({ ignoreOracle: oracle, checkIgnoreBatchSize: 2 }).collectFiles(root, ['.py']);

    expect(files).toEqual([
      path.join(root, 'src/a.py'),
      path.join(root, 'src/c.py'),
      path.join(root, 'src/d.py'),
    ]);
    expect(oracle.batches).toEqual([['src/a.py', 'src/b.py'], ['src/c.py', 'src/d.py'], ['src/e.py']]);
  });

  it('sends repo-relative paths when the target is a subdirectory', async () => {
    fs.mkdirSync(path.join(root, '.git'));
    write(root, 'pkg/mod/x.py');
    const oracle = new FakeIgnoreOracle(['pkg/mod/x.py']);

    const files = await new FileDiscovery({ ignoreOracle: oracle }).collectFiles(path.join(root, 'pkg'), ['.py']);

    expect(files).toEqual([]);
    expect(oracle.batches).toEqual([['pkg/mod/x.py']]);
  });

  it('keeps every file when the ignore query fails', async () => {
    fs.mkdirSync(path.join(root, '.git'));
    write(root, 'a.py');
    write(root, 'b.py');
    const oracle = new FakeIgnoreOracle(['a.py']);
    oracle.failWith = new Error('git exploded');

    const files = await new FileDiscovery({ ignoreOracle: oracle }).collectFiles(root, ['.py']);

    expect(files).toEqual([path.join(root, 'a.py'), path.join(root, 'b.py')]);
  });

  it('does not consult git outside a repository', async () => {
    write(root, 'a.py');
    const oracle = new FakeIgnoreOracle(['a.py']);

    const files = await new FileDiscovery({ ignoreOracle: oracle }).collectFiles(root, ['.py']);

    expect(files).toEqual([path.join(root, 'a.py')]);
    expect(oracle.batches).toEqual([]);
  });

  it('applies the project ignore file and built-in patterns', async () => {
    fs.mkdirSync(path.join(root, '.git'));
    write(root, '.docfactsignore', '# generated code\n/generated/\n*.gen.js\n!keep.gen.js\n');
    write(root, 'generated/a.js');
    write(root, 'src/generated/b.js');
    write(root, 'src/x.gen.js');
    write(root, 'src/keep.gen.js');
    write(root, 'src/app.js');
    write(root, 'static/jquery.min.js');
    write(root, '.venv311/lib/tool.js');

    const files = await new FileDiscovery().collectFiles(root, ['.js']);

    expect(files).toEqual([
      path.join(root, 'src/app.js'),
      path.join(root, 'src/generated/b.js'),
      path.join(root, 'src/keep.gen.js'),
    ]);
  });

  it('can turn built-in patterns off', async () => {
    write(root, 'static/jquery.min.js');
    const files = await new FileDiscovery({ useBuiltinIgnore: false }).collectFiles(root, ['.js']);
    expect(files).toEqual([path.join(root, 'static/jquery.min.js')]);
  });

  it('honours extra excluded directory names', async () => {
    write(root, 'generated/a.py');
    write(root, 'src/a.py');
    const files = await new FileDiscovery({ extraExcludeDirs: ['generated'] }).collectFiles(root, ['.py']);
    expect(files).toEqual([path.join(root, 'src/a.py')]);
  });
});

describe('findRepositoryRoot', () => {
  it('walks up to the directory holding .git', async () => {
    const root = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'docfacts-root-')));
    fs.mkdirSync(path.join(root, '.git'));
    fs.mkdirSync(path.join(root, 'a', 'b'), { recursive: true });

    await expect(findRepositoryRoot(path.join(root, 'a', 'b'))).resolves.toBe(root);

    fs.rmSync(root, { recursive: true, force: true });
  });
});
