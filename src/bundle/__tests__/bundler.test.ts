import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { bundle, bundlePythonFile } from '../bundler';
import { loadPythonSyntax, PythonSyntax } from '../../python/syntax';
import { UnsupportedPackageImportError, UnsupportedRelativeImportError } from '../../errors';
import { createEmptyReport } from '../../report/bundleReport';

function writeFile(p: string, content: string) {
  fs.mkdirSync(path.dirname(p), { recursive: true });
  fs.writeFileSync(p, content, 'utf8');
}

function makeTempProject(files: Record<string, string>): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'pyinline-bundle-'));
  for (const [rel, content] of Object.entries(files)) writeFile(path.join(dir, rel), content);
  return dir;
}

let syntax: PythonSyntax;

beforeAll(async () => {
  syntax = await loadPythonSyntax();
});

function bundleText(root: string, entry = 'main.py', roots: string[] = [root]): string {
  return bundle(path.join(root, entry), roots, { syntax }).toString('utf8');
}

describe('bundle', () => {
  test('replaces a top-level import with the module body in place', () => {
    const root = makeTempProject({
      'a.py': 'value = 1\n',
      'main.py': 'import a\nprint(a.value)\n',
    });

    expect(bundleText(root)).toBe('value = 1\nprint(a.value)\n');
  });

  test('inlines a module imported twice at top level only once', () => {
    const root = makeTempProject({
      'a.py': 'value = 1\n',
      'main.py': 'import a\nimport a\nprint(a.value)\n',
    });

    expect(bundleText(root)).toBe('value = 1\nprint(a.value)\n');
  });

  test('inlines transitive imports, including from-imports of local modules', () => {
    const root = makeTempProject({
      'b.py': 'def helper():\n    return 1\n',
      'a.py': 'from b import helper\nVALUE = helper()\n',
      'main.py': 'from a import VALUE\nprint(VALUE)\n',
    });

    expect(bundleText(root)).toBe('def helper():\n    return 1\nVALUE = helper()\nprint(VALUE)\n');
  });

  test('resolves dotted module names to nested files', () => {
    const root = makeTempProject({
      'pkg/util.py': 'UTIL = True\n',
      'main.py': 'import pkg.util\nprint(UTIL)\n',
    });

    expect(bundleText(root)).toBe('UTIL = True\nprint(UTIL)\n');
  });

  test('probes search roots in order and takes the first match', () => {
    const first = makeTempProject({
      'a.py': 'A = 1\n',
      'main.py': 'import a\nimport b\n',
    });
    const second = makeTempProject({
      'a.py': 'A = 2\n',
      'b.py': 'B = 2\n',
    });

    expect(bundleText(first, 'main.py', [first, second])).toBe('A = 1\nB = 2\n');
  });

  test('elides an external import already covered by a wider top-level import', () => {
    const root = makeTempProject({
      'main.py': 'import os, sys\nimport os\nprint(os.sep)\n',
    });

    expect(bundleText(root)).toBe('import os, sys\nprint(os.sep)\n');
  });

  test('elides a from-import whose names were all imported before', () => {
    const root = makeTempProject({
      'main.py': 'from collections import deque, OrderedDict\nfrom collections import deque\nx = deque()\n',
    });

    expect(bundleText(root)).toBe('from collections import deque, OrderedDict\nx = deque()\n');
  });

  test('keeps a from-import that adds new names', () => {
    const source = 'from math import pi\nfrom math import pi, tau\n';
    const root = makeTempProject({ 'main.py': source });

    expect(bundleText(root)).toBe(source);
  });

  test('treats aliased imports as distinct from bare ones', () => {
    const source = 'import numpy as np\nimport numpy\n';
    const root = makeTempProject({ 'main.py': source });

    expect(bundleText(root)).toBe(source);
  });

  test('splits a statement mixing local and external modules', () => {
    const root = makeTempProject({
      'a.py': 'value = 1\n',
      'main.py': 'import a, os\nimport os\nx = 1\n',
    });

    expect(bundleText(root)).toBe('import os\nvalue = 1\nx = 1\n');
  });

  test('terminates on mutually recursive imports without re-inlining the entry', () => {
    const root = makeTempProject({
      'x.py': 'import y\nX = 1\n',
      'y.py': 'import x\nY = 2\n',
    });

    expect(bundleText(root, 'x.py')).toBe('Y = 2\nX = 1\n');
  });

  test('replaces a nested import of an already inlined module with pass', () => {
    const root = makeTempProject({
      'a.py': 'value = 1\n',
      'main.py': 'import a\ndef f():\n    import a\n    return a\n',
    });

    expect(bundleText(root)).toBe('value = 1\ndef f():\n    pass\n    return a\n');
  });

  test('inlines a nested import locally, re-indented, without claiming the module', () => {
    const root = makeTempProject({
      'a.py': 'value = 1\nother = 2\n',
      'main.py': 'def f():\n    import a\n    return value\nimport a\n',
    });

    expect(bundleText(root)).toBe(
      'def f():\n    value = 1\n    other = 2\n    return value\nvalue = 1\nother = 2\n',
    );
  });

  test('does not let nested external imports satisfy later top-level ones', () => {
    const source = 'def f():\n    import os\nimport os\n';
    const root = makeTempProject({ 'main.py': source });

    expect(bundleText(root)).toBe(source);
  });

  test('replaces a nested external import covered at top level with pass', () => {
    const root = makeTempProject({
      'main.py': 'import os\nif True:\n    import os\n',
    });

    expect(bundleText(root)).toBe('import os\nif True:\n    pass\n');
  });

  test('drops an elided import together with its semicolon', () => {
    const root = makeTempProject({
      'a.py': 'value = 1\n',
      'main.py': 'import a\nimport a; x = 1\n',
    });

    expect(bundleText(root)).toBe('value = 1\nx = 1\n');
  });

  test('moves a module inlined into a one-line block below its header', () => {
    const root = makeTempProject({
      'a.py': 'def f():\n    return 1\ng = f()\n',
      'main.py': 'if True: import a\n',
    });

    expect(bundleText(root)).toBe('if True:\n    def f():\n        return 1\n    g = f()\n');
  });

  test('elides a repeated wildcard import', () => {
    const root = makeTempProject({
      'main.py': 'from m import *\nfrom m import *\nx = 1\n',
    });

    expect(bundleText(root)).toBe('from m import *\nx = 1\n');
  });

  test('hoists __future__ imports of inlined modules to the top of the output', () => {
    const root = makeTempProject({
      'a.py': '"""A."""\nfrom __future__ import division\nA = 1\n',
      'main.py': 'from __future__ import annotations\nimport a\nx: int = 1\n',
    });

    expect(bundleText(root)).toBe('from __future__ import annotations, division\n"""A."""\nA = 1\nx: int = 1\n');
  });

  test('puts hoisted __future__ imports after the entry docstring', () => {
    const root = makeTempProject({
      'a.py': 'from __future__ import annotations\nA = 1\n',
      'main.py': '"""Entry."""\nimport a\n',
    });

    expect(bundleText(root)).toBe('"""Entry."""\nfrom __future__ import annotations\nA = 1\n');
  });

  test('produces byte-identical output on repeated runs', () => {
    const root = makeTempProject({
      'a.py': 'from b import g\nA = g()\n',
      'b.py': 'import os\ndef g():\n    return os.sep\n',
      'main.py': 'import os\nimport a\nprint(a.A)\n',
    });

    const first = bundle(path.join(root, 'main.py'), [root], { syntax });
    const second = bundle(path.join(root, 'main.py'), [root], { syntax });
    expect(first.equals(second)).toBe(true);
  });

  test('fails on a package (directory) import', () => {
    const root = makeTempProject({
      'pkg/util.py': 'UTIL = True\n',
      'main.py': 'import pkg\n',
    });

    expect(() => bundleText(root)).toThrow(UnsupportedPackageImportError);
  });

  test('fails on a from-import of a package', () => {
    const root = makeTempProject({
      'pkg/util.py': 'UTIL = True\n',
      'main.py': 'from pkg import util\n',
    });

    expect(() => bundleText(root)).toThrow(UnsupportedPackageImportError);
  });

  test('fails on a relative import anywhere in the closure', () => {
    const root = makeTempProject({
      'a.py': 'from . import b\n',
      'b.py': 'B = 1\n',
      'main.py': 'import a\n',
    });

    expect(() => bundleText(root)).toThrow(UnsupportedRelativeImportError);
    expect(() => bundleText(root)).toThrow(`Relative imports are not supported: '.' (imported at ${path.join(root, 'a.py')}:1)`);
  });

  test('records actions and findings in the report', () => {
    const root = makeTempProject({
      'a.py': 'A = 1\n',
      'main.py': 'import os\nimport os\nimport a\n',
    });
    const report = createEmptyReport({ toolName: 'pyinline', toolVersion: 'test', entry: 'main.py', baseDir: root });

    const out = bundle(path.join(root, 'main.py'), [root], { syntax, report }).toString('utf8');

    expect(out).toBe('import os\nA = 1\n');
    expect(report.filesProcessed).toBe(2);
    expect(report.counts.importsByAction).toEqual({ passThrough: 1, elide: 1, inline: 1 });
    expect(report.findings.map((f) => [f.kind, f.location])).toEqual([
      ['unresolvedImport', { file: 'main.py', line: 1, column: 1 }],
      ['elidedImport', { file: 'main.py', line: 2, column: 1 }],
    ]);
  });

  test('bundlePythonFile searches basedir before include paths', async () => {
    const lib = makeTempProject({ 'helpers.py': 'def h():\n    return 2\n' });
    const root = makeTempProject({ 'main.py': 'from helpers import h\nprint(h())\n' });

    const out = await bundlePythonFile(path.join(root, 'main.py'), { basedir: root, includePaths: [lib] });
    expect(out.toString('utf8')).toBe('def h():\n    return 2\nprint(h())\n');
  });
});
