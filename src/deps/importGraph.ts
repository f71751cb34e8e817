import fs from 'node:fs/promises';
import path from 'node:path';
import { PACKAGE_INIT, PYTHON_EXTENSION } from '../python/classify';
import { extractImports, ImportReference } from '../python/imports';
import type { PythonSyntax } from '../python/syntax';
import { isStrictlyInside } from '../util/paths';
import type { Checkpoint } from './deadline';

export type ImportGraph = {
  entry: string;
  /** Every visited file mapped to the local files it imports. */
  edges: Map<string, string[]>;
};

export type ImportGraphOptions = {
  syntax: PythonSyntax;
  checkpoint: Checkpoint;
};

function isMissingPathError(e: unknown): boolean {
  return typeof e === 'object' && e !== null && 'code' in e && (e.code === 'ENOENT' || e.code === 'ENOTDIR');
}

async function isFile(p: string): Promise<boolean> {
  try {
    return (await fs.stat(p)).isFile();
  } catch (e: unknown) {
    if (isMissingPathError(e)) return false;
    throw e;
  }
}

/**
 * A package is already initializing while one of its own modules runs, so importing it from
 * inside does not load its `__init__.py` again.
 */
function isOwnPackageInit(target: string, fromFile: string): boolean {
  return path.basename(target) === PACKAGE_INIT && isStrictlyInside(path.dirname(target), fromFile);
}

/** `dir/a/b.py`, else `dir/a/b/__init__.py`. */
async function moduleFile(dir: string, parts: string[]): Promise<string | null> {
  const base = path.join(dir, ...parts);
  if (await isFile(base + PYTHON_EXTENSION)) return base + PYTHON_EXTENSION;
  const init = path.join(base, PACKAGE_INIT);
  if (await isFile(init)) return init;
  return null;
}

/** `__init__.py` of every enclosing package of `parts` (not of the module itself). */
async function packageInits(dir: string, parts: string[]): Promise<string[]> {
  const out: string[] = [];
  for (let i = 1; i < parts.length; i++) {
    const init = path.join(dir, ...parts.slice(0, i), PACKAGE_INIT);
    if (await isFile(init)) out.push(init);
  }
  return out;
}

function split(dottedName: string): string[] {
  return dottedName.split('.').filter((p) => p !== '');
}

/** Local files an import statement loads, following Python's package rules. */
async function importTargets(ref: ImportReference, fromFile: string, baseDir: string): Promise<string[]> {
  const out: string[] = [];
  const push = (p: string | null) => {
    if (p) out.push(p);
  };

  if (ref.kind === 'import') {
    for (const b of ref.modules) {
      const parts = split(b.name);
      out.push(...(await packageInits(baseDir, parts)));
      push(await moduleFile(baseDir, parts));
    }
    return out;
  }

  if (ref.level === 0 && ref.module === '__future__') return out;

  let root = baseDir;
  if (ref.level > 0) {
    root = path.dirname(fromFile);
    for (let i = 1; i < ref.level; i++) root = path.dirname(root);
  }

  const parts = split(ref.module);
  if (ref.level === 0) out.push(...(await packageInits(root, parts)));
  if (parts.length > 0) push(await moduleFile(root, parts));
  else if (await isFile(path.join(root, PACKAGE_INIT))) out.push(path.join(root, PACKAGE_INIT));

  if (ref.names !== '*') {
    for (const b of ref.names) push(await moduleFile(root, [...parts, ...split(b.name)]));
  }
  return out;
}

/**
 * Walks the imports of `entry` breadth-first, keeping only files strictly under `baseDir`.
 * Calls `checkpoint` before each file so a deadline can stop the walk.
 */
export async function buildImportGraph(entry: string, baseDir: string, opts: ImportGraphOptions): Promise<ImportGraph> {
  const edges = new Map<string, string[]>();
  const queue: string[] = [entry];

  for (let i = 0; i < queue.length; i++) {
    opts.checkpoint();
    const file = queue[i];
    if (edges.has(file)) continue;

    const text = await fs.readFile(file, 'utf8');
    const { imports } = extractImports(opts.syntax, text);
    const deps = new Set<string>();
    for (const ref of imports) {
      for (const target of await importTargets(ref, file, baseDir)) {
        if (isStrictlyInside(baseDir, target) && !isOwnPackageInit(target, file)) deps.add(target);
      }
    }

    edges.set(file, [...deps]);
    for (const d of deps) if (!edges.has(d)) queue.push(d);
  }

  return { entry, edges };
}

/**
 * First import cycle between distinct files (a strongly connected component with more
 * than one member), sorted; null when the graph is acyclic. Self-imports are ignored.
 */
export function findImportCycle(graph: ImportGraph): string[] | null {
  const index = new Map<string, number>();
  const lowlink = new Map<string, number>();
  const onStack = new Set<string>();
  const stack: string[] = [];
  let counter = 0;
  const cycles: string[][] = [];

  const strongConnect = (v: string): void => {
    index.set(v, counter);
    lowlink.set(v, counter);
    counter++;
    stack.push(v);
    onStack.add(v);

    for (const w of graph.edges.get(v) ?? []) {
      if (w === v) continue;
      if (!index.has(w)) {
        strongConnect(w);
        lowlink.set(v, Math.min(lowlink.get(v) ?? 0, lowlink.get(w) ?? 0));
      } else if (onStack.has(w)) {
        lowlink.set(v, Math.min(lowlink.get(v) ?? 0, index.get(w) ?? 0));
      }
    }

    if (lowlink.get(v) === index.get(v)) {
      const component: string[] = [];
      let w: string | undefined;
      do {
        w = stack.pop();
        if (w === undefined) break;
        onStack.delete(w);
        component.push(w);
      } while (w !== v);
      if (component.length > 1) cycles.push(component.sort());
    }
  };

  for (const v of graph.edges.keys()) {
    if (!index.has(v)) strongConnect(v);
    if (cycles.length > 0) return cycles[0];
  }
  return null;
}
