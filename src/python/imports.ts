import type { PythonSyntax, SyntaxNode } from './syntax';

/** `a.b` or `a.b as c` inside an import statement. */
export type ImportBinding = {
  name: string;
  alias?: string;
};

type ImportPosition = {
  /** 0-based line of the statement start. */
  line: number;
  /** 0-based column of the statement start (its indentation depth). */
  column: number;
  /** Character offsets of the statement within the file text. */
  start: number;
  end: number;
  /** Start of the first statement of the enclosing block; absent at module level. */
  blockStart?: number;
};

/** `import a.b, c as d` */
export type PlainImport = ImportPosition & {
  kind: 'import';
  modules: ImportBinding[];
};

/** `from m import x, y as z`, `from m import *`, `from .m import x` */
export type FromImport = ImportPosition & {
  kind: 'from';
  module: string;
  /** Number of leading dots; 0 for absolute references. */
  level: number;
  names: ImportBinding[] | '*';
};

export type ImportReference = PlainImport | FromImport;

export type ParsedImports = {
  imports: ImportReference[];
  hasSyntaxErrors: boolean;
  /** Where module-level code begins: past comments and the docstring. */
  preambleEnd: number;
};

const IMPORT_NODE_TYPES = ['import_statement', 'import_from_statement', 'future_import_statement'];
const BINDING_NODE_TYPES = new Set(['dotted_name', 'aliased_import']);

function dotted(node: SyntaxNode): string {
  return node.text.replace(/\s+/g, '');
}

function bindingOf(node: SyntaxNode): ImportBinding {
  if (node.type === 'aliased_import') {
    const name = node.childForFieldName('name');
    const alias = node.childForFieldName('alias');
    return { name: name ? dotted(name) : '', alias: alias?.text };
  }
  return { name: dotted(node) };
}

function statementsOf(node: SyntaxNode): SyntaxNode[] {
  return node.namedChildren.filter((c) => c.type !== 'comment');
}

function positionOf(node: SyntaxNode): ImportPosition {
  const pos: ImportPosition = {
    line: node.startPosition.row,
    column: node.startPosition.column,
    start: node.startIndex,
    end: node.endIndex,
  };
  const parent = node.parent;
  if (parent && parent.type === 'block') {
    const [first] = statementsOf(parent);
    if (first) pos.blockStart = first.startIndex;
  }
  return pos;
}

/** Bound modules or names of a statement; the `from` module itself is skipped. */
function bindingsOf(node: SyntaxNode, moduleNode: SyntaxNode | null): ImportBinding[] {
  return node.namedChildren
    .filter((c) => BINDING_NODE_TYPES.has(c.type) && c.startIndex !== moduleNode?.startIndex)
    .map(bindingOf);
}

function isDocstring(node: SyntaxNode): boolean {
  if (node.type !== 'expression_statement') return false;
  const parts = node.namedChildren;
  return parts.length === 1 && (parts[0].type === 'string' || parts[0].type === 'concatenated_string');
}

function preambleEndOf(root: SyntaxNode, text: string): number {
  const statements = statementsOf(root);
  const first = statements[0] && isDocstring(statements[0]) ? statements[1] : statements[0];
  if (!first) return text.length;
  const lineStart = text.lastIndexOf('\n', first.startIndex - 1) + 1;
  return text.slice(lineStart, first.startIndex).trim() === '' ? lineStart : first.startIndex;
}

function toReference(node: SyntaxNode): ImportReference | null {
  const pos = positionOf(node);

  if (node.type === 'import_statement') {
    return { kind: 'import', ...pos, modules: bindingsOf(node, null) };
  }

  if (node.type === 'future_import_statement') {
    return { kind: 'from', ...pos, module: '__future__', level: 0, names: bindingsOf(node, null) };
  }

  const moduleNode = node.childForFieldName('module_name');
  if (!moduleNode) return null;
  const names = bindingsOf(node, moduleNode);

  let module = '';
  let level = 0;
  if (moduleNode.type === 'relative_import') {
    for (const child of moduleNode.namedChildren) {
      if (child.type === 'import_prefix') level = child.text.trim().length;
      else if (child.type === 'dotted_name') module = dotted(child);
    }
  } else {
    module = dotted(moduleNode);
  }

  const wildcard = node.namedChildren.some((c) => c.type === 'wildcard_import');
  return { kind: 'from', ...pos, module, level, names: wildcard ? '*' : names };
}

function containsError(node: SyntaxNode): boolean {
  if (node.type === 'ERROR') return true;
  return node.children.some(containsError);
}

export function bindingKey(b: ImportBinding): string {
  return b.alias ? `${b.name} as ${b.alias}` : b.name;
}

/**
 * Parses `text` and returns every import statement it contains, nested ones included,
 * in ascending (line, column) order. The tree is released before returning.
 */
export function extractImports(syntax: PythonSyntax, text: string): ParsedImports {
  const tree = syntax.parse(text);
  try {
    const root = tree.rootNode;
    const imports: ImportReference[] = [];
    for (const node of root.descendantsOfType(IMPORT_NODE_TYPES)) {
      const ref = toReference(node);
      if (ref) imports.push(ref);
    }
    imports.sort((a, b) => a.line - b.line || a.column - b.column);
    return { imports, hasSyntaxErrors: containsError(root), preambleEnd: preambleEndOf(root, text) };
  } finally {
    tree.delete();
  }
}
