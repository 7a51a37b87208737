/**
 * Tests for graph renderings.
 */
import { describe, it, expect } from 'vitest';
import { formatDot, formatGraph, formatMermaid } from '../../../../src/core/graph/format.js';
import type { AdjacencyGraph } from '../../../../src/core/graph/types.js';

const GRAPH: AdjacencyGraph = {
  modules: [
    { id: 'src/db', files: ['src/db/client.ts'], fileCount: 1, violations: 0 },
    { id: 'src/routes', files: ['src/routes/a.ts', 'src/routes/b.ts'], fileCount: 2, violations: 1 },
  ],
  edges: [
    {
      from: 'src/routes',
      to: 'src/db',
      imports: [
        { source: 'src/routes/a.ts', target: '../db/client' },
        { source: 'src/routes/b.ts', target: '../db/client' },
      ],
      violation: true,
      ruleIds: ['routes-no-db'],
    },
  ],
};

describe('formatMermaid', () => {
  it('should render nodes, counted edges and violation styling', () => {
    expect(formatMermaid(GRAPH).split('\n')).toEqual([
      'graph LR',
      '    m_src_db["src/db (1 file)"]',
      '    m_src_routes["src/routes (2 files)"]',
      '    m_src_routes -->|2| m_src_db',
      '    linkStyle 0 stroke:#d32f2f,stroke-width:2px',
    ]);
  });

  it('should omit link styling when nothing violates', () => {
    const clean: AdjacencyGraph = {
      modules: GRAPH.modules,
      edges: GRAPH.edges.map((edge) => ({ ...edge, violation: false, ruleIds: [] })),
    };
    expect(formatMermaid(clean)).not.toContain('linkStyle');
  });
});

describe('formatDot', () => {
  it('should render a digraph with labelled edges', () => {
    const lines = formatDot(GRAPH).split('\n');

    expect(lines[0]).toBe('digraph modules {');
    expect(lines).toContain('    "src/db" [label="src/db\\n(1 file)"];');
    expect(lines).toContain(
      '    "src/routes" -> "src/db" [label="2", color="#d32f2f", tooltip="routes-no-db"];'
    );
    expect(lines[lines.length - 1]).toBe('}');
  });
});

describe('formatGraph', () => {
  it('should render json with snake_case fields', () => {
    const parsed: unknown = JSON.parse(formatGraph(GRAPH, 'json'));
    expect(parsed).toEqual({
      modules: [
        { id: 'src/db', files: ['src/db/client.ts'], file_count: 1, violations: 0 },
        { id: 'src/routes', files: ['src/routes/a.ts', 'src/routes/b.ts'], file_count: 2, violations: 1 },
      ],
      edges: [
        {
          from: 'src/routes',
          to: 'src/db',
          imports: GRAPH.edges[0].imports,
          violation: true,
          rule_ids: ['routes-no-db'],
        },
      ],
    });
  });
});
