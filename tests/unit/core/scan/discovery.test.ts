/**
 * Tests for project file discovery.
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, mkdir, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { discoverSourceFiles, listChangedFiles, normalizeScope } from '../../../../src/core/scan/discovery.js';
import { getChangedFiles } from '../../../../src/utils/git.js';

vi.mock('../../../../src/utils/git.js', () => ({
  getChangedFiles: vi.fn(),
}));

async function touch(root: string, file: string, content = ''): Promise<void> {
  const parts = file.split('/');
  await mkdir(join(root, ...parts.slice(0, -1)), { recursive: true });
  await writeFile(join(root, ...parts), content);
}

describe('discovery', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'archwarden-discovery-'));
    await touch(root, 'src/app.ts');
    await touch(root, 'src/generated/schema.ts');
    await touch(root, 'scripts/run.py');
    await touch(root, 'README.md');
    await touch(root, 'node_modules/pkg/index.js');
    await touch(root, 'dist/app.js');
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  describe('discoverSourceFiles', () => {
    it('should list supported files outside ignored directories', async () => {
      expect(await discoverSourceFiles(root)).toEqual([
        'scripts/run.py',
        'src/app.ts',
        'src/generated/schema.ts',
      ]);
    });

    it('should honour the ignore file and extra exclusions', async () => {
      await writeFile(join(root, '.archwardenignore'), '# generated code\nsrc/generated/\n');

      expect(await discoverSourceFiles(root, { exclude: ['scripts/'] })).toEqual(['src/app.ts']);
    });

    it('should prefix results with the scope', async () => {
      expect(await discoverSourceFiles(root, { scope: 'src' })).toEqual([
        'src/app.ts',
        'src/generated/schema.ts',
      ]);
    });
  });

  describe('normalizeScope', () => {
    it('should strip leading ./ and trailing slashes', () => {
      expect(normalizeScope(root, './src/routes/')).toBe('src/routes');
      expect(normalizeScope(root, '.')).toBe('');
      expect(normalizeScope(root, undefined)).toBe('');
    });

    it('should make absolute paths inside the project relative', () => {
      expect(normalizeScope(root, join(root, 'src'))).toBe('src');
    });
  });

  describe('listChangedFiles', () => {
    it('should filter changed files by scope without checking extensions', async () => {
      vi.mocked(getChangedFiles).mockResolvedValue(['src/b.ts', 'docs/x.md', 'src/a.md']);

      expect(await listChangedFiles(root, 'src')).toEqual(['src/a.md', 'src/b.ts']);
      expect(await listChangedFiles(root)).toEqual(['docs/x.md', 'src/a.md', 'src/b.ts']);
    });
  });
});
