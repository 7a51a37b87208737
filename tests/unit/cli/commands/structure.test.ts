/**
 * Tests for the structure command.
 */
import { describe, it, expect, afterEach } from 'vitest';
import { runCli } from './helpers.js';
import { LAYERED_SOURCES, createProject, removeProject } from './project.js';

describe('structure command', () => {
  let root = '';

  afterEach(async () => {
    if (root) await removeProject(root);
    root = '';
  });

  it('should print the structure profile and log the test gaps', async () => {
    root = await createProject(LAYERED_SOURCES);

    const run = await runCli(['--cwd', root, 'structure']);

    expect(run.exitCode).toBe(0);
    expect(JSON.parse(run.stdout[0])).toEqual({
      raw_structure: ['src', 'src/db', 'src/routes'],
      detected_layers: ['routes', 'db'],
      naming_patterns: [],
      test_gaps: ['src/db/client.ts', 'src/routes/users.ts'],
      file_counts: [{ dir: 'src', count: 2 }],
    });
    expect(run.logs.some((line) => line.includes('2 source files have no test'))).toBe(true);
  });

  it('should not log when every source file has a test', async () => {
    root = await createProject({
      'src/db/client.ts': 'export const query = 1;\n',
      'src/db/client.test.ts': "import { query } from './client';\n",
    });

    const run = await runCli(['--cwd', root, 'structure']);

    expect(run.exitCode).toBe(0);
    expect(run.logs).toEqual([]);
    expect(JSON.parse(run.stdout[0])).toMatchObject({ test_gaps: [], naming_patterns: ['.test.ts'] });
  });
});
