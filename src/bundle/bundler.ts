import fs from 'node:fs';
import path from 'node:path';
import type { ImportSite } from '../errors';
import { bindingKey, extractImports, FromImport, ImportBinding, ImportReference, PlainImport } from '../python/imports';
import { loadPythonSyntax, PythonSyntax } from '../python/syntax';
import type { BundleReport, ImportAction } from '../report/bundleReport';
import { addFinding, countImport, reportLocation } from '../report/reportBuilder';
import { ModuleResolver } from '../resolve/moduleResolver';
import { BundlerSession, createBundlerSession, isSubsumed, rememberFromNames } from './session';
import { applyEdits, SpliceEdit, stripTrailingNewline } from './splice';

export type SourceUnit = {
  path: string;
  text: string;
  imports: ImportReference[];
  preambleEnd: number;
};

export type BundleOptions = {
  syntax: PythonSyntax;
  /** Optional report collector for findings & counts. */
  report?: BundleReport;
};

type BundleContext = {
  entry: string;
  /** Offset in the entry text where hoisted `__future__` imports go. */
  entryPreambleEnd: number;
  session: BundlerSession;
  resolver: ModuleResolver;
  syntax: PythonSyntax;
  report?: BundleReport;
};

type PlannedImport = {
  action: ImportAction;
  edit?: SpliceEdit;
};

function loadSourceUnit(file: string, ctx: BundleContext): SourceUnit {
  const text = fs.readFileSync(file, 'utf8');
  const parsed = extractImports(ctx.syntax, text);
  if (ctx.report) {
    ctx.report.filesProcessed += 1;
    if (parsed.hasSyntaxErrors) {
      addFinding(ctx.report, {
        kind: 'syntaxError',
        severity: 'warning',
        message: `Syntax errors in ${path.basename(file)}; imports inside them may be missed`,
        location: reportLocation(ctx.report, file),
      });
    }
  }
  return { path: file, text, imports: parsed.imports, preambleEnd: parsed.preambleEnd };
}

function siteOf(unit: SourceUnit, ref: ImportReference): ImportSite {
  return { file: unit.path, line: ref.line + 1 };
}

function editFor(ref: ImportReference, replacement: string): SpliceEdit {
  return { start: ref.start, end: ref.end, column: ref.column, blockStart: ref.blockStart, replacement };
}

function noteExternal(ctx: BundleContext, unit: SourceUnit, ref: ImportReference, specifier: string): void {
  if (!ctx.report) return;
  addFinding(ctx.report, {
    kind: 'unresolvedImport',
    severity: 'info',
    message: `External module '${specifier}' left as an import`,
    location: reportLocation(ctx.report, unit.path, ref.line + 1, ref.column + 1),
    tags: { specifier },
  });
}

function noteElided(ctx: BundleContext, unit: SourceUnit, ref: ImportReference, specifier: string): void {
  if (!ctx.report) return;
  addFinding(ctx.report, {
    kind: 'elidedImport',
    severity: 'info',
    message: `Duplicate import of '${specifier}' elided`,
    location: reportLocation(ctx.report, unit.path, ref.line + 1, ref.column + 1),
    tags: { specifier },
  });
}

/**
 * Processed text of a local module for one import occurrence, or '' when a column-0 import
 * already inlined it. A column-0 occurrence claims the module for the rest of the session.
 */
function inlineModule(target: string, ref: ImportReference, ctx: BundleContext): string {
  if (ctx.session.inlinedAtTopLevel.has(target)) return '';
  const body = processFile(target, ctx);
  if (ref.column === 0) ctx.session.inlinedAtTopLevel.add(target);
  return stripTrailingNewline(body);
}

function planPlainImport(ref: PlainImport, unit: SourceUnit, ctx: BundleContext): PlannedImport {
  const site = siteOf(unit, ref);
  const externals: ImportBinding[] = [];
  const bodies: string[] = [];
  let inlinedAny = false;

  for (const binding of ref.modules) {
    const resolved = ctx.resolver.resolve(binding.name, { site });
    if (resolved.kind === 'unresolved') {
      externals.push(binding);
      continue;
    }
    const wasInlined = ctx.session.inlinedAtTopLevel.has(resolved.path);
    const body = inlineModule(resolved.path, ref, ctx);
    if (wasInlined) noteElided(ctx, unit, ref, binding.name);
    else inlinedAny = true;
    if (body !== '') bodies.push(body);
  }

  let importLine = '';
  if (externals.length > 0) {
    const keys = externals.map(bindingKey);
    if (isSubsumed(ctx.session.seenModules, keys)) {
      for (const b of externals) noteElided(ctx, unit, ref, b.name);
    } else {
      if (ref.column === 0) for (const k of keys) ctx.session.seenModules.add(k);
      for (const b of externals) noteExternal(ctx, unit, ref, b.name);
      if (externals.length === ref.modules.length) return { action: 'passThrough' };
      importLine = `import ${keys.join(', ')}`;
    }
  }

  const replacement = [importLine, ...bodies].filter((s) => s !== '').join('\n');
  let action: ImportAction = 'elide';
  if (importLine !== '') action = 'rewrite';
  else if (inlinedAny) action = 'inline';
  return { action, edit: editFor(ref, replacement) };
}

function isHoistableFuture(ref: FromImport): ref is FromImport & { names: ImportBinding[] } {
  return ref.level === 0 && ref.module === '__future__' && ref.column === 0 && ref.names !== '*';
}

function planFromImport(ref: FromImport, unit: SourceUnit, ctx: BundleContext): PlannedImport {
  if (isHoistableFuture(ref)) {
    for (const b of ref.names) ctx.session.futureFeatures.add(bindingKey(b));
    return { action: 'hoist', edit: editFor(ref, '') };
  }

  const resolved = ctx.resolver.resolve(ref.module, { level: ref.level, site: siteOf(unit, ref) });

  if (resolved.kind === 'local') {
    const wasInlined = ctx.session.inlinedAtTopLevel.has(resolved.path);
    const body = inlineModule(resolved.path, ref, ctx);
    if (wasInlined) noteElided(ctx, unit, ref, ref.module);
    return { action: wasInlined ? 'elide' : 'inline', edit: editFor(ref, body) };
  }

  const keys = ref.names === '*' ? ['*'] : ref.names.map(bindingKey);
  if (isSubsumed(ctx.session.seenFromNames.get(ref.module), keys)) {
    noteElided(ctx, unit, ref, ref.module);
    return { action: 'elide', edit: editFor(ref, '') };
  }
  if (ref.column === 0) rememberFromNames(ctx.session, ref.module, keys);
  noteExternal(ctx, unit, ref, ref.module);
  return { action: 'passThrough' };
}

/**
 * Processed text of `file`: its source with every import statement replaced by what it
 * resolves to. Computed once per session; re-entering a file that is still being processed
 * (an import cycle) yields ''.
 */
function processFile(file: string, ctx: BundleContext): string {
  const memo = ctx.session.processedText.get(file);
  if (memo !== undefined) return memo;
  if (ctx.session.processed.has(file)) return '';
  ctx.session.processed.add(file);

  const unit = loadSourceUnit(file, ctx);
  if (file === ctx.entry) ctx.entryPreambleEnd = unit.preambleEnd;
  const edits: SpliceEdit[] = [];
  for (const ref of unit.imports) {
    const planned = ref.kind === 'import' ? planPlainImport(ref, unit, ctx) : planFromImport(ref, unit, ctx);
    if (ctx.report) countImport(ctx.report, planned.action);
    if (planned.edit) edits.push(planned.edit);
  }

  const text = applyEdits(unit.text, edits);
  ctx.session.processedText.set(file, text);
  return text;
}

/** Puts one `from __future__ import ...` line, covering every feature seen, ahead of the entry's code. */
function withFutureImports(text: string, at: number, features: ReadonlySet<string>): string {
  if (features.size === 0) return text;
  const before = text.slice(0, at);
  const sep = before === '' || before.endsWith('\n') ? '' : '\n';
  return `${before}${sep}from __future__ import ${[...features].join(', ')}\n${text.slice(at)}`;
}

/**
 * Bundles `entryPath` into one source text by inlining every import that resolves to a
 * `.py` file under `searchRoots` (first root wins). Throws on relative or package imports
 * anywhere in the closure; nothing is returned in that case.
 */
export function bundle(entryPath: string, searchRoots: readonly string[], options: BundleOptions): Buffer {
  const entry = path.resolve(entryPath);
  const ctx: BundleContext = {
    entry,
    entryPreambleEnd: 0,
    session: createBundlerSession(),
    resolver: new ModuleResolver(searchRoots),
    syntax: options.syntax,
    report: options.report,
  };
  const text = processFile(entry, ctx);
  return Buffer.from(withFutureImports(text, ctx.entryPreambleEnd, ctx.session.futureFeatures), 'utf8');
}

export type BundleFileOptions = {
  basedir: string;
  /** Extra search roots, probed after `basedir`. */
  includePaths?: string[];
  report?: BundleReport;
};

/** Loads the Python grammar and bundles `entryPath` with `[basedir, ...includePaths]` as search roots. */
export async function bundlePythonFile(entryPath: string, opts: BundleFileOptions): Promise<Buffer> {
  const syntax = await loadPythonSyntax();
  return bundle(entryPath, [opts.basedir, ...(opts.includePaths ?? [])], { syntax, report: opts.report });
}
