/**
 * Python import extractor backed by tree-sitter.
 *
 * `import a.b, c as d` yields `a.b` and `c`; `from ..pkg.mod import x` yields
 * `pkg.mod` (leading dots dropped); `from . import x` names no module and
 * yields nothing. A file with any syntax error, including a token the parser had to
 * insert or a Python 2 `print`/`exec` statement, yields no imports.
 */
import type Parser from 'tree-sitter';
import { dedupe } from './recognize.js';
import { createPythonParser, findNodesOfType, getNodeText } from './tree-sitter.js';
import type { ILanguageExtractor, ImportSpecifier } from './types.js';

/** Python tree-sitter node types used for imports */
const PyImportNodes = {
  IMPORT_STATEMENT: 'import_statement',
  IMPORT_FROM_STATEMENT: 'import_from_statement',
  FUTURE_IMPORT_STATEMENT: 'future_import_statement',
  ALIASED_IMPORT: 'aliased_import',
  DOTTED_NAME: 'dotted_name',
  RELATIVE_IMPORT: 'relative_import',
  IMPORT_PREFIX: 'import_prefix',
} as const;

/** Python 2 statements the grammar still accepts but Python 3 rejects */
const LEGACY_STATEMENTS = ['print_statement', 'exec_statement'] as const;

const DEFAULT_BUFFER_SIZE = 32 * 1024;

export class PythonExtractor implements ILanguageExtractor {
  readonly language = 'python' as const;
  private parser: Parser | null = null;

  extract(source: string): ImportSpecifier[] {
    const tree = this.parse(source);
    if (!tree) return [];
    const root = tree.rootNode;

    if (root.hasError || findNodesOfType(root, LEGACY_STATEMENTS).length > 0) {
      return [];
    }

    const statements = findNodesOfType(root, [
      PyImportNodes.IMPORT_STATEMENT,
      PyImportNodes.IMPORT_FROM_STATEMENT,
      PyImportNodes.FUTURE_IMPORT_STATEMENT,
    ]);

    const specifiers: ImportSpecifier[] = [];
    for (const statement of statements) {
      if (statement.type === PyImportNodes.IMPORT_STATEMENT) {
        specifiers.push(...this.importedModules(statement, source));
      } else if (statement.type === PyImportNodes.FUTURE_IMPORT_STATEMENT) {
        specifiers.push('__future__');
      } else {
        const module = this.fromModule(statement, source);
        if (module) specifiers.push(module);
      }
    }
    return dedupe(specifiers);
  }

  /**
   * Module names of `import a.b, c as d`.
   */
  private importedModules(statement: Parser.SyntaxNode, source: string): string[] {
    const modules: string[] = [];
    for (const child of statement.namedChildren) {
      if (child.type === PyImportNodes.DOTTED_NAME) {
        modules.push(getNodeText(child, source));
      } else if (child.type === PyImportNodes.ALIASED_IMPORT) {
        const name = child.namedChildren.find(c => c.type === PyImportNodes.DOTTED_NAME);
        if (name) modules.push(getNodeText(name, source));
      }
    }
    return modules;
  }

  /**
   * Module of `from X import ...` without leading dots, or null for a bare
   * relative `from . import x`.
   */
  private fromModule(statement: Parser.SyntaxNode, source: string): string | null {
    const module = statement.childForFieldName('module_name');
    if (!module) return null;
    if (module.type === PyImportNodes.DOTTED_NAME) {
      return getNodeText(module, source);
    }
    if (module.type === PyImportNodes.RELATIVE_IMPORT) {
      const name = module.namedChildren.find(c => c.type === PyImportNodes.DOTTED_NAME);
      return name ? getNodeText(name, source) : null;
    }
    return null;
  }

  /**
   * Parse, or null when tree-sitter rejects the input. The buffer is sized
   * to the source so large files are not cut at the default 32 KiB.
   */
  private parse(source: string): Parser.Tree | null {
    try {
      return this.getParser().parse(source, undefined, {
        bufferSize: Math.max(DEFAULT_BUFFER_SIZE, source.length * 2 + 1),
      });
    } catch {
      return null;
    }
  }

  private getParser(): Parser {
    if (!this.parser) {
      this.parser = createPythonParser();
    }
    return this.parser;
  }
}
