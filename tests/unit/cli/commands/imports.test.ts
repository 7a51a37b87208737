/**
 * Tests for the imports command.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { runCli } from './helpers.js';
import { createProject, removeProject } from './project.js';

describe('imports command', () => {
  let root: string;

  beforeEach(async () => {
    root = await createProject({
      'src/app.ts': "import fs from 'node:fs';\n// import x from 'commented';\nimport { db } from './db';\n",
      'notes.txt': 'import nothing\n',
    });
  });

  afterEach(async () => {
    await removeProject(root);
  });

  it('should print one specifier per line', async () => {
    const run = await runCli(['--cwd', root, 'imports', 'src/app.ts']);
    expect(run.stdout).toEqual(['node:fs\n./db']);
  });

  it('should print a JSON array', async () => {
    const run = await runCli(['--cwd', root, 'imports', 'src/app.ts', '--json']);
    expect(run.stdout).toEqual(['["node:fs","./db"]']);
  });

  it('should warn about unsupported files', async () => {
    const run = await runCli(['--cwd', root, 'imports', 'notes.txt', '--json']);

    expect(run.stdout).toEqual(['[]']);
    expect(run.logs.some((line) => line.includes('Unsupported file type: notes.txt'))).toBe(true);
  });
});
