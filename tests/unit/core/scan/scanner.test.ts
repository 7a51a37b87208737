/**
 * Tests for batch scanning.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, mkdir, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { computeStats, runScan, scanFiles } from '../../../../src/core/scan/scanner.js';
import { clearConfigMemo } from '../../../../src/core/config/loader.js';
import { Logger, MemorySink } from '../../../../src/utils/logger.js';
import { makeInvariant } from '../rules/helpers.js';

const INVARIANTS = [
  makeInvariant({
    id: 'routes-no-db',
    type: 'boundary',
    severity: 'error',
    description: 'Routes must not touch the database',
    source_glob: 'src/routes/**',
    forbidden_imports: ['src/db/**'],
  }),
  makeInvariant({
    id: 'no-console',
    type: 'pattern',
    description: 'No console logging',
    scope_glob: 'src/**',
    forbidden_pattern: 'console\\.log',
  }),
];

const EXPECTED_VIOLATIONS = [
  {
    rule: 'routes-no-db',
    severity: 'error',
    message: 'Routes must not touch the database',
    file: 'src/routes/users.ts',
    import: '../db/client',
  },
  {
    rule: 'no-console',
    severity: 'warning',
    message: 'No console logging',
    file: 'src/routes/users.ts',
    line: 2,
  },
];

describe('scanner', () => {
  let root: string;
  const logger = new Logger({ level: 'silent' });

  beforeEach(async () => {
    clearConfigMemo();
    root = await mkdtemp(join(tmpdir(), 'archwarden-scan-'));
    await mkdir(join(root, 'src/routes'), { recursive: true });
    await mkdir(join(root, 'src/db'), { recursive: true });
    await writeFile(
      join(root, 'src/routes/users.ts'),
      "import { query } from '../db/client';\nconsole.log(query);\n"
    );
    await writeFile(join(root, 'src/db/client.ts'), 'export const query = 1;\n');
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  describe('runScan', () => {
    it('should report violations across discovered files', async () => {
      const result = await runScan(root, { invariants: INVARIANTS, logger });

      expect(result.scope).toBe('');
      expect(result.filesChecked).toBe(2);
      expect(result.violations).toEqual(EXPECTED_VIOLATIONS);
      expect(result.stats).toEqual({ total: 2, errors: 1, warnings: 1 });
      expect(result.error).toBeUndefined();
    });

    it('should produce identical results on repeated runs', async () => {
      const first = await runScan(root, { invariants: INVARIANTS, logger });
      const second = await runScan(root, { invariants: INVARIANTS, logger });
      expect(second).toEqual(first);
    });

    it('should load invariants from the configuration file', async () => {
      await mkdir(join(root, '.archwarden'), { recursive: true });
      await writeFile(
        join(root, '.archwarden/invariants.yml'),
        [
          'invariants:',
          '  - id: routes-no-db',
          '    type: boundary',
          '    severity: error',
          '    description: Routes must not touch the database',
          '    source_glob: "src/routes/**"',
          '    forbidden_imports: ["src/db/**"]',
          '',
        ].join('\n')
      );

      const result = await runScan(root, { logger, useCache: false });
      expect(result.violations).toEqual([EXPECTED_VIOLATIONS[0]]);
    });

    it('should return a structured error when the configuration is missing', async () => {
      const sink = new MemorySink();
      const result = await runScan(root, { logger: new Logger({ sink }) });

      expect(result.error?.code).toBe('C001');
      expect(result.filesChecked).toBe(0);
      expect(result.violations).toEqual([]);
      expect(result.stats).toEqual({ total: 0, errors: 0, warnings: 0 });
      expect(sink.lines).toHaveLength(1);
    });

    it('should limit discovery to the scope', async () => {
      const result = await runScan(root, { invariants: INVARIANTS, logger, scope: './src/db/' });

      expect(result.scope).toBe('src/db');
      expect(result.filesChecked).toBe(1);
      expect(result.violations).toEqual([]);
    });

    it('should deduplicate an explicit file list', async () => {
      const result = await runScan(root, {
        invariants: INVARIANTS,
        logger,
        files: ['src/routes/users.ts', 'src/routes/users.ts'],
      });

      expect(result.filesChecked).toBe(1);
      expect(result.violations).toEqual(EXPECTED_VIOLATIONS);
    });
  });

  describe('scanFiles', () => {
    it('should count missing files without reporting them', async () => {
      const result = await scanFiles(root, ['src/routes/gone.ts', 'src/routes/users.ts'], INVARIANTS, { logger });

      expect(result.filesChecked).toBe(2);
      expect(result.violations).toEqual(EXPECTED_VIOLATIONS);
    });

    it('should skip files above the size cap', async () => {
      const result = await scanFiles(root, ['src/routes/users.ts'], INVARIANTS, { logger, maxFileBytes: 10 });

      expect(result.filesChecked).toBe(1);
      expect(result.violations).toEqual([]);
    });

    it('should scan every file when the cap is disabled', async () => {
      const result = await scanFiles(root, ['src/routes/users.ts'], INVARIANTS, { logger, maxFileBytes: 0 });
      expect(result.violations).toHaveLength(2);
    });

    it('should warn once for a rule that cannot be evaluated', async () => {
      const sink = new MemorySink();
      const broken = makeInvariant({ id: 'broken', type: 'pattern', forbidden_pattern: '(' });

      const result = await scanFiles(root, ['src/db/client.ts', 'src/routes/users.ts'], [broken], {
        logger: new Logger({ sink }),
        concurrency: 1,
      });

      expect(result.violations).toEqual([]);
      expect(sink.lines).toHaveLength(1);
      expect(sink.lines[0]).toContain('rule skipped');
    });
  });

  describe('computeStats', () => {
    it('should count info violations only in the total', () => {
      expect(
        computeStats([
          { rule: 'a', severity: 'info', message: '', file: 'x' },
          { rule: 'b', severity: 'error', message: '', file: 'x' },
        ])
      ).toEqual({ total: 2, errors: 1, warnings: 0 });
    });
  });
});
