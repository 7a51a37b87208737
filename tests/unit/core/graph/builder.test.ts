/**
 * Tests for module adjacency graph construction.
 */
import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import {
  AdjacencyGraphBuilder,
  buildAdjacencyGraph,
  buildViolationIndex,
  moduleIdForPath,
  stripExtension,
  violationKey,
} from '../../../../src/core/graph/builder.js';
import type { ImportEntry } from '../../../../src/core/graph/types.js';
import { Logger, MemorySink } from '../../../../src/utils/logger.js';

const ENTRIES: ImportEntry[] = [
  { file: 'src/routes/users.ts', imports: ['../db/client', 'express', './helpers'] },
  { file: 'src/routes/helpers.ts', imports: ['../db/client'] },
  { file: 'src/db/client.ts', imports: ['pg'] },
];

describe('moduleIdForPath', () => {
  it('should take the first two segments of nested paths', () => {
    expect(moduleIdForPath('src/routes/users.ts')).toBe('src/routes');
    expect(moduleIdForPath('lib/foo/bar/baz.ts')).toBe('lib/foo');
  });

  it('should take the directory of a file one level deep', () => {
    expect(moduleIdForPath('src/utils.ts')).toBe('src');
  });

  it('should strip the extension of a bare file', () => {
    expect(moduleIdForPath('main.py')).toBe('main');
    expect(moduleIdForPath('express')).toBe('express');
  });

  it('should accept backslash separators', () => {
    expect(moduleIdForPath('src\\db\\client.ts')).toBe('src/db');
  });

  it('should always return a prefix of at most two segments', () => {
    const segment = fc.stringMatching(/^[a-z][a-z0-9_]{0,7}$/);
    fc.assert(
      fc.property(fc.array(segment, { minLength: 2, maxLength: 6 }), (parts) => {
        const id = moduleIdForPath(parts.join('/'));
        expect(id.split('/').length).toBeLessThanOrEqual(2);
        expect(parts.join('/').startsWith(id)).toBe(true);
      })
    );
  });
});

describe('stripExtension', () => {
  it('should drop only the last extension', () => {
    expect(stripExtension('index.test.ts')).toBe('index.test');
    expect(stripExtension('__init__.py')).toBe('__init__');
  });

  it('should keep leading-dot names intact', () => {
    expect(stripExtension('.eslintrc')).toBe('.eslintrc');
  });
});

describe('buildViolationIndex', () => {
  it('should key violations by file and resolved import', () => {
    const index = buildViolationIndex([
      { file: 'src/routes/users.ts', rule: 'routes-no-db', import: '../db/client' },
      { file: 'src/routes/users.ts', rule: 'routes-no-db', import: '../db/client' },
      { file: 'src/routes/users.ts', rule: 'no-console' },
    ]);

    expect([...index.keys()]).toEqual([violationKey('src/routes/users.ts', 'src/db/client')]);
    expect(index.get(violationKey('src/routes/users.ts', 'src/db/client'))).toEqual(['routes-no-db']);
  });
});

describe('buildAdjacencyGraph', () => {
  it('should sort modules and register import targets as modules', () => {
    const graph = buildAdjacencyGraph(ENTRIES);

    expect(graph.modules.map((module) => module.id)).toEqual(['express', 'pg', 'src/db', 'src/routes']);
    const routes = graph.modules.find((module) => module.id === 'src/routes');
    expect(routes?.files).toEqual(['src/routes/helpers.ts', 'src/routes/users.ts']);
    expect(routes?.fileCount).toBe(2);
    expect(graph.modules.find((module) => module.id === 'pg')?.fileCount).toBe(0);
  });

  it('should sort edges and skip imports within a module', () => {
    const graph = buildAdjacencyGraph(ENTRIES);

    expect(graph.edges.map((edge) => [edge.from, edge.to])).toEqual([
      ['src/db', 'pg'],
      ['src/routes', 'express'],
      ['src/routes', 'src/db'],
    ]);
    const routesToDb = graph.edges[2];
    expect(routesToDb.imports).toEqual([
      { source: 'src/routes/users.ts', target: '../db/client' },
      { source: 'src/routes/helpers.ts', target: '../db/client' },
    ]);
    expect(routesToDb.violation).toBe(false);
    expect(routesToDb.ruleIds).toEqual([]);
  });

  it('should mark edges carrying indexed violations', () => {
    const violationIndex = buildViolationIndex([
      { file: 'src/routes/users.ts', rule: 'routes-no-db', import: '../db/client' },
      { file: 'src/routes/helpers.ts', rule: 'layering', import: '../db/client' },
    ]);
    const graph = buildAdjacencyGraph(ENTRIES, { violationIndex });

    const routesToDb = graph.edges.find((edge) => edge.from === 'src/routes' && edge.to === 'src/db');
    expect(routesToDb?.violation).toBe(true);
    expect(routesToDb?.ruleIds).toEqual(['layering', 'routes-no-db']);
    expect(graph.modules.find((module) => module.id === 'src/routes')?.violations).toBe(2);
    expect(graph.modules.find((module) => module.id === 'src/db')?.violations).toBe(0);
  });

  it('should produce identical graphs regardless of input order', () => {
    const forward = buildAdjacencyGraph(ENTRIES);
    const reversed = buildAdjacencyGraph([...ENTRIES].reverse());

    expect(reversed.modules).toEqual(forward.modules);
    expect(reversed.edges.map((edge) => [edge.from, edge.to])).toEqual(
      forward.edges.map((edge) => [edge.from, edge.to])
    );
  });

  it('should return an empty graph for no entries', () => {
    expect(buildAdjacencyGraph([])).toEqual({ modules: [], edges: [] });
  });

  it('should ignore entries without a file and empty specifiers', () => {
    const builder = new AdjacencyGraphBuilder({ logger: new Logger({ sink: new MemorySink() }) });
    builder.add({ file: '', imports: ['x'] });
    builder.add({ file: 'app/main.ts', imports: [''] });

    expect(builder.build()).toEqual({
      modules: [{ id: 'app', files: ['app/main.ts'], fileCount: 1, violations: 0 }],
      edges: [],
    });
  });
});
