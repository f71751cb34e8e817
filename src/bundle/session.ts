/**
 * Mutable state of one `bundle` call. It is created per call and passed explicitly through
 * every recursive step; nothing in it outlives the call.
 */
export type BundlerSession = {
  /** Files whose processing has started (cycle guard). */
  processed: Set<string>;
  /** Processed text per file, set once processing finishes. */
  processedText: Map<string, string>;
  /** Local modules inlined by a column-0 import anywhere in the session. */
  inlinedAtTopLevel: Set<string>;
  /** `name` / `name as alias` keys of external `import x` bindings emitted at column 0. */
  seenModules: Set<string>;
  /** Bound-name keys of external `from m import ...` statements emitted at column 0, per module. */
  seenFromNames: Map<string, Set<string>>;
  /** `__future__` features collected from column-0 statements, in first-seen order. */
  futureFeatures: Set<string>;
};

export function createBundlerSession(): BundlerSession {
  return {
    processed: new Set(),
    processedText: new Map(),
    inlinedAtTopLevel: new Set(),
    seenModules: new Set(),
    seenFromNames: new Map(),
    futureFeatures: new Set(),
  };
}

/** True when adding `keys` to `seen` would not grow it. */
export function isSubsumed(seen: ReadonlySet<string> | undefined, keys: readonly string[]): boolean {
  if (!seen) return keys.length === 0;
  const union = new Set(seen);
  for (const k of keys) union.add(k);
  return union.size === seen.size;
}

export function rememberFromNames(session: BundlerSession, module: string, keys: readonly string[]): void {
  let seen = session.seenFromNames.get(module);
  if (!seen) {
    seen = new Set();
    session.seenFromNames.set(module, seen);
  }
  for (const k of keys) seen.add(k);
}
