/**
 * Tests for the human-readable scan formatter.
 */
import { describe, it, expect } from 'vitest';
import { HumanFormatter } from '../../../../src/cli/formatters/human.js';
import { JsonFormatter } from '../../../../src/cli/formatters/json.js';
import type { ScanResult } from '../../../../src/core/scan/types.js';

const RESULT: ScanResult = {
  scope: 'src',
  filesChecked: 3,
  violations: [
    {
      rule: 'routes-no-db',
      severity: 'error',
      message: 'Routes must not touch the database',
      file: 'src/routes/users.ts',
      import: '../db/client',
    },
    { rule: 'no-console', severity: 'warning', message: 'No console logging', file: 'src/routes/users.ts', line: 2 },
    { rule: 'pinned-orm', severity: 'info', message: 'ORM outside data layer', file: 'src/app.ts', package: 'prisma' },
  ],
  stats: { total: 3, errors: 1, warnings: 1 },
};

describe('HumanFormatter', () => {
  it('should group violations by file and summarise', () => {
    const output = new HumanFormatter({ colors: false }).formatScan(RESULT);

    expect(output.split('\n')).toEqual([
      'src/routes/users.ts',
      '  ✗ routes-no-db: Routes must not touch the database (import ../db/client)',
      '  ⚠ no-console:2: No console logging',
      '',
      'src/app.ts',
      '  ℹ pinned-orm: ORM outside data layer (package prisma)',
      '',
      'Checked 3 files in src: 1 error, 1 warning, 1 info',
    ]);
  });

  it('should report a clean scan', () => {
    const output = new HumanFormatter({ colors: false }).formatScan({
      scope: '',
      filesChecked: 1,
      violations: [],
      stats: { total: 0, errors: 0, warnings: 0 },
    });
    expect(output).toBe('Checked 1 file: no violations');
  });

  it('should report configuration errors', () => {
    const output = new HumanFormatter({ colors: false }).formatScan({
      scope: '',
      filesChecked: 0,
      violations: [],
      stats: { total: 0, errors: 0, warnings: 0 },
      error: { code: 'C001', message: 'No invariant configuration found' },
    });
    expect(output).toBe('✗ Configuration error [C001]: No invariant configuration found');
  });
});

describe('JsonFormatter', () => {
  it('should print the snake_case payload', () => {
    const parsed: unknown = JSON.parse(new JsonFormatter().formatScan(RESULT));
    expect(parsed).toMatchObject({ scope: 'src', files_checked: 3, stats: { total: 3, errors: 1, warnings: 1 } });
  });
});
