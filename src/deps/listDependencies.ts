import path from 'node:path';
import { CircularImportError, DependencyGraphTimeoutError } from '../errors';
import { isBuiltinModule, PACKAGE_INIT } from '../python/classify';
import { loadPythonSyntax } from '../python/syntax';
import { isStrictlyInside } from '../util/paths';
import { withDeadline } from './deadline';
import { buildImportGraph, findImportCycle } from './importGraph';

export type ListDependenciesOptions = {
  /** Deadline for graph construction; defaults to {@link defaultGraphTimeoutMs}. */
  timeoutMs?: number;
};

/** 1s everywhere except Windows, where CI runners need 5s. */
export function defaultGraphTimeoutMs(platform: NodeJS.Platform = process.platform): number {
  return platform === 'win32' ? 5000 : 1000;
}

// Sources are treated as immutable for the lifetime of the process: entries are never invalidated.
const cache = new Map<string, Promise<ReadonlySet<string>>>();

async function computeDependencies(entry: string, baseDir: string, timeoutMs: number): Promise<ReadonlySet<string>> {
  const syntax = await loadPythonSyntax();
  const graph = await withDeadline(
    timeoutMs,
    (checkpoint) => buildImportGraph(entry, baseDir, { syntax, checkpoint }),
    () => new DependencyGraphTimeoutError(entry, timeoutMs),
  );

  const cycle = findImportCycle(graph);
  if (cycle) throw new CircularImportError(entry, cycle);

  const deps = new Set<string>([entry]);
  for (const file of graph.edges.keys()) {
    if (!isStrictlyInside(baseDir, file)) continue;
    if (path.basename(file) === PACKAGE_INIT) continue;
    if (isBuiltinModule(path.parse(file).name)) continue;
    deps.add(file);
  }
  return deps;
}

/**
 * Absolute paths of the local Python files `entryPath` depends on, itself included.
 * Memoized per (entryPath, baseDir); a failed computation is not cached.
 */
export function listDependencies(
  entryPath: string,
  baseDir: string,
  options: ListDependenciesOptions = {},
): Promise<ReadonlySet<string>> {
  const entry = path.resolve(entryPath);
  const base = path.resolve(baseDir);
  const key = `${entry}\0${base}`;

  const cached = cache.get(key);
  if (cached) return cached;

  const pending = computeDependencies(entry, base, options.timeoutMs ?? defaultGraphTimeoutMs());
  cache.set(key, pending);
  void pending.catch(() => {
    cache.delete(key);
  });
  return pending;
}
