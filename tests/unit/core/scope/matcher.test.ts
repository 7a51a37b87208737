/**
 * Tests for scope glob matching.
 */
import { describe, it, expect } from 'vitest';
import { fileInScope, globToMatcher, globToRegExp, pathMatches } from '../../../../src/core/scope/matcher.js';
import { resolveImportPath } from '../../../../src/core/scope/resolve.js';
import { makeInvariant } from '../rules/helpers.js';

describe('globToRegExp', () => {
  it('should translate ** before *', () => {
    const regex = globToRegExp('src/**/*.ts');

    expect(regex.test('src/a/b/c.ts')).toBe(true);
    expect(regex.test('src/c.ts')).toBe(false);
  });

  it('should anchor at both ends', () => {
    expect(pathMatches('lib/src/a.ts', 'src/**')).toBe(false);
    expect(pathMatches('src/a.tsx', 'src/*.ts')).toBe(false);
  });
});

describe('pathMatches', () => {
  it('should match across separators with **', () => {
    expect(pathMatches('src/routes/users.ts', 'src/routes/**')).toBe(true);
    expect(pathMatches('src/routes/admin/users.ts', 'src/routes/**')).toBe(true);
    expect(pathMatches('anything/at/all', '**')).toBe(true);
  });

  it('should keep * within one segment', () => {
    expect(pathMatches('src/a.ts', 'src/*')).toBe(true);
    expect(pathMatches('src/nested/a.ts', 'src/*')).toBe(false);
  });

  it('should treat dots and other regex characters literally', () => {
    expect(pathMatches('srcXts', 'src.ts')).toBe(false);
    expect(pathMatches('a+b.ts', 'a+b.ts')).toBe(true);
    expect(pathMatches('(group)/x', '(group)/*')).toBe(true);
  });

  it('should build reusable predicates', () => {
    const isRoute = globToMatcher('src/routes/**');
    expect(isRoute('src/routes/x.ts')).toBe(true);
    expect(isRoute('src/db/x.ts')).toBe(false);
  });
});

describe('fileInScope', () => {
  it('should include every file when no scope is declared', () => {
    expect(fileInScope('any/file.ts', makeInvariant({ id: 'r', type: 'pattern' }))).toBe(true);
  });

  it('should prefer source_glob over scope_glob', () => {
    const invariant = makeInvariant({ id: 'r', type: 'pattern', source_glob: 'src/**', scope_glob: 'lib/**' });

    expect(fileInScope('src/a.ts', invariant)).toBe(true);
    expect(fileInScope('lib/a.ts', invariant)).toBe(false);
  });

  it('should fall back to scope_glob', () => {
    const invariant = makeInvariant({ id: 'r', type: 'pattern', scope_glob: 'lib/**' });

    expect(fileInScope('lib/a.ts', invariant)).toBe(true);
  });

  it('should apply exclusions', () => {
    const invariant = makeInvariant({
      id: 'r',
      type: 'pattern',
      source_glob: 'src/**',
      scope_glob_exclude: ['src/generated/**'],
    });

    expect(fileInScope('src/app.ts', invariant)).toBe(true);
    expect(fileInScope('src/generated/api.ts', invariant)).toBe(false);
  });
});

describe('resolveImportPath', () => {
  it('should resolve relative specifiers against the source directory', () => {
    expect(resolveImportPath('src/routes/users.ts', '../db/client')).toBe('src/db/client');
    expect(resolveImportPath('src/routes/users.ts', './helpers')).toBe('src/routes/helpers');
    expect(resolveImportPath('main.ts', './lib/')).toBe('lib');
  });

  it('should leave package specifiers alone', () => {
    expect(resolveImportPath('src/a.ts', 'react')).toBe('react');
    expect(resolveImportPath('src/a.ts', 'std::io')).toBe('std::io');
  });
});
