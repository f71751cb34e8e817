import fs from 'node:fs';
import path from 'node:path';
import { ImportSite, UnsupportedPackageImportError, UnsupportedRelativeImportError } from '../errors';
import { PYTHON_EXTENSION } from '../python/classify';

export type ResolvedModule =
  | { kind: 'local'; path: string }
  | { kind: 'unresolved'; specifier: string };

export type ResolveContext = {
  /** Leading dots of a `from` reference; anything above 0 is relative to the importing file. */
  level?: number;
  /** Where the reference was written, for error messages. */
  site?: ImportSite;
};

function statOrNull(p: string): fs.Stats | null {
  return fs.statSync(p, { throwIfNoEntry: false }) ?? null;
}

/**
 * Maps dotted module references to `.py` files under an ordered list of search roots.
 * The first root holding `a/b/c.py` wins; a directory standing in for the module is rejected.
 */
export class ModuleResolver {
  readonly searchRoots: readonly string[];
  private readonly cache = new Map<string, ResolvedModule>();

  constructor(searchRoots: readonly string[]) {
    this.searchRoots = searchRoots.map((r) => path.resolve(r));
  }

  resolve(specifier: string, context: ResolveContext = {}): ResolvedModule {
    const level = context.level ?? 0;
    if (level > 0) {
      const written = '.'.repeat(level) + specifier;
      throw new UnsupportedRelativeImportError(written, context.site);
    }

    const cached = this.cache.get(specifier);
    if (cached) return cached;

    const resolved = this.probe(specifier, context.site);
    this.cache.set(specifier, resolved);
    return resolved;
  }

  private probe(specifier: string, site: ImportSite | undefined): ResolvedModule {
    const parts = specifier.split('.').filter((p) => p !== '');
    if (parts.length === 0) return { kind: 'unresolved', specifier };

    for (const root of this.searchRoots) {
      const base = path.join(root, ...parts);
      const file = base + PYTHON_EXTENSION;
      if (statOrNull(file)?.isFile()) return { kind: 'local', path: file };
      if (statOrNull(base)?.isDirectory()) throw new UnsupportedPackageImportError(specifier, base, site);
    }
    return { kind: 'unresolved', specifier };
  }
}
