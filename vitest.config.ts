import { mkdirSync } from 'node:fs';
import { defineConfig } from 'vitest/config';

// Stable temp directory for vitest internals and test fixtures.
const fallbackTmpDir = '/tmp';
const resolvedTmpDir =
  process.env.TMPDIR && process.env.TMPDIR.trim().length > 0
    ? process.env.TMPDIR
    : fallbackTmpDir;
process.env.TMPDIR = resolvedTmpDir;
process.env.TMP = resolvedTmpDir;
process.env.TEMP = resolvedTmpDir;
mkdirSync(resolvedTmpDir, { recursive: true });

/**
 * Vitest configuration for docfacts.
 *
 * Parser-backed suites load native tree-sitter grammars, so tests run in
 * forked workers. Override the worker count with DOCFACTS_TEST_WORKERS.
 */
export default defineConfig(() => {
  const envWorkers = parseInt(process.env.DOCFACTS_TEST_WORKERS ?? '', 10);
  const maxWorkers = !isNaN(envWorkers) && envWorkers > 0 ? envWorkers : 2;

  return {
    test: {
      globals: false,
      environment: 'node',
      include: ['src/**/__tests__/**/*.test.ts'],
      setupFiles: ['./vitest.setup.ts'],
      testTimeout: 30000,
      hookTimeout: 10000,
      pool: 'forks' as const,
      poolOptions: {
        forks: {
          maxForks: maxWorkers,
          minForks: 1,
          isolate: true,
        },
      },
    },
  };
});
