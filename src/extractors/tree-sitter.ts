/**
 * Shared tree-sitter helpers for parser-backed extractors.
 */
import Parser from 'tree-sitter';
import Python from 'tree-sitter-python';

/**
 * Creates a Python parser instance.
 *
 * The assertion `as unknown as Parser.Language` is needed because
 * tree-sitter-python's declarations do not extend tree-sitter's Language
 * type.
 */
export function createPythonParser(): Parser {
  const parser = new Parser();
  parser.setLanguage(Python as unknown as Parser.Language);
  return parser;
}

/**
 * Gets the source text of a syntax node.
 */
export function getNodeText(node: Parser.SyntaxNode, sourceCode: string): string {
  return sourceCode.slice(node.startIndex, node.endIndex);
}

/**
 * Walks the tree depth-first in document order.
 */
export function walkTree(
  node: Parser.SyntaxNode,
  callback: (node: Parser.SyntaxNode) => void
): void {
  callback(node);
  for (const child of node.children) {
    walkTree(child, callback);
  }
}

/**
 * Finds all descendant nodes matching the given types, in document order.
 */
export function findNodesOfType(
  root: Parser.SyntaxNode,
  types: readonly string[]
): Parser.SyntaxNode[] {
  const typeSet = new Set(types);
  const results: Parser.SyntaxNode[] = [];
  walkTree(root, (node) => {
    if (typeSet.has(node.type)) {
      results.push(node);
    }
  });
  return results;
}
