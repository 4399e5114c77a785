import { mkdirSync } from 'node:fs';
import { defineConfig } from 'vitest/config';

// Ensure a stable, writable temp directory for vitest internals and the
// fixture directories tests create with mkdtemp.
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
 * Vitest Configuration for the workbench
 *
 * Every suite runs in process: external analysis tools are replaced by fake
 * ToolRunner implementations and SQLite stores are opened in memory.
 * Override the worker count with WORKBENCH_TEST_WORKERS.
 */
const envWorkers = parseInt(process.env.WORKBENCH_TEST_WORKERS ?? '', 10);
const maxWorkers = !isNaN(envWorkers) && envWorkers > 0 ? envWorkers : 2;

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/__tests__/**/*.test.ts'],
    setupFiles: ['./vitest.setup.ts'],
    testTimeout: 30000,
    hookTimeout: 10000,
    pool: 'forks',
    poolOptions: {
      forks: {
        maxForks: maxWorkers,
        minForks: 1,
        isolate: true,
      },
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/',
        'dist/',
        '**/*.test.ts',
        'vitest.config.ts',
        'vitest.setup.ts',
      ],
    },
  },
});
