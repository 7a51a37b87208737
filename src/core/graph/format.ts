/**
 * Text renderings of the adjacency graph.
 */
import type { AdjacencyGraph, GraphFormat } from './types.js';
import { toGraphPayload } from './payload.js';

const VIOLATION_COLOR = '#d32f2f';

export function formatGraph(graph: AdjacencyGraph, format: GraphFormat): string {
  switch (format) {
    case 'mermaid':
      return formatMermaid(graph);
    case 'dot':
      return formatDot(graph);
    case 'json':
      return JSON.stringify(toGraphPayload(graph), null, 2);
  }
}

/**
 * Sanitize a module id for use as a Mermaid node id.
 */
function mermaidId(id: string): string {
  return `m_${id.replace(/[^A-Za-z0-9_]/g, '_')}`;
}

function fileLabel(count: number): string {
  return count === 1 ? '1 file' : `${count} files`;
}

/**
 * Mermaid flowchart. Edge labels carry the import count; violating edges
 * are drawn in red.
 */
export function formatMermaid(graph: AdjacencyGraph): string {
  const lines: string[] = ['graph LR'];

  for (const module of graph.modules) {
    lines.push(`    ${mermaidId(module.id)}["${module.id} (${fileLabel(module.fileCount)})"]`);
  }

  const violating: number[] = [];
  graph.edges.forEach((edge, index) => {
    lines.push(`    ${mermaidId(edge.from)} -->|${edge.imports.length}| ${mermaidId(edge.to)}`);
    if (edge.violation) violating.push(index);
  });

  if (violating.length > 0) {
    lines.push(`    linkStyle ${violating.join(',')} stroke:${VIOLATION_COLOR},stroke-width:2px`);
  }

  return lines.join('\n');
}

function dotString(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

/**
 * Graphviz DOT.
 */
export function formatDot(graph: AdjacencyGraph): string {
  const lines: string[] = [
    'digraph modules {',
    '    rankdir=LR;',
    '    node [shape=box, style=filled, fillcolor="#f3e5f5"];',
    '',
  ];

  for (const module of graph.modules) {
    lines.push(`    ${dotString(module.id)} [label="${module.id}\\n(${fileLabel(module.fileCount)})"];`);
  }

  lines.push('');

  for (const edge of graph.edges) {
    const attributes = [`label="${edge.imports.length}"`];
    if (edge.violation) {
      attributes.push(`color="${VIOLATION_COLOR}"`, `tooltip="${edge.ruleIds.join(', ')}"`);
    }
    lines.push(`    ${dotString(edge.from)} -> ${dotString(edge.to)} [${attributes.join(', ')}];`);
  }

  lines.push('}');
  return lines.join('\n');
}
