import path from 'node:path';
import Parser from 'web-tree-sitter';

export type SyntaxNode = Parser.SyntaxNode;
export type SyntaxTree = Parser.Tree;

/**
 * Parses Python source into a tree-sitter tree. Loading is async (WASM), parsing is not,
 * so callers load once and then parse synchronously.
 */
export type PythonSyntax = {
  parse(text: string): SyntaxTree;
};

const PYTHON_WASM = 'tree-sitter-python.wasm';

let loading: Promise<PythonSyntax> | undefined;

function grammarPath(): string {
  // tree-sitter-wasms ships prebuilt grammars under out/
  const pkgJson = require.resolve('tree-sitter-wasms/package.json');
  return path.join(path.dirname(pkgJson), 'out', PYTHON_WASM);
}

async function createPythonSyntax(): Promise<PythonSyntax> {
  await Parser.init();
  const language = await Parser.Language.load(grammarPath());
  const parser = new Parser();
  parser.setLanguage(language);
  return {
    parse: (text) => parser.parse(text),
  };
}

/** Loads the Python grammar once per process; a failed load is retried on the next call. */
export function loadPythonSyntax(): Promise<PythonSyntax> {
  if (!loading) {
    loading = createPythonSyntax().catch((e: unknown) => {
      loading = undefined;
      throw e;
    });
  }
  return loading;
}
