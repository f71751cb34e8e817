export type PyInlineErrorCode =
  | 'UnsupportedRelativeImport'
  | 'UnsupportedPackageImport'
  | 'DependencyGraphTimeout'
  | 'CircularImportDetected'
  | 'InvalidConfig';

/** Base class for every fatal condition raised by the bundler and the dependency lister. */
export class PyInlineError extends Error {
  readonly code: PyInlineErrorCode;

  constructor(code: PyInlineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export type ImportSite = {
  /** Absolute path of the importing file. */
  file: string;
  /** 1-based line number. */
  line: number;
};

function fmtSite(site: ImportSite): string {
  return `${site.file}:${site.line}`;
}

export class UnsupportedRelativeImportError extends PyInlineError {
  constructor(readonly specifier: string, readonly site?: ImportSite) {
    super(
      'UnsupportedRelativeImport',
      `Relative imports are not supported: '${specifier}'` + (site ? ` (imported at ${fmtSite(site)})` : ''),
    );
  }
}

export class UnsupportedPackageImportError extends PyInlineError {
  constructor(readonly specifier: string, readonly packageDir: string, readonly site?: ImportSite) {
    super(
      'UnsupportedPackageImport',
      `Package imports are not supported: '${specifier}' resolves to directory ${packageDir}` +
        (site ? ` (imported at ${fmtSite(site)})` : ''),
    );
  }
}

export class DependencyGraphTimeoutError extends PyInlineError {
  constructor(readonly entryPath: string, readonly timeoutMs: number) {
    super('DependencyGraphTimeout', `Failed to analyze the dependency graph (timeout after ${timeoutMs}ms): ${entryPath}`);
  }
}

export class CircularImportError extends PyInlineError {
  constructor(readonly entryPath: string, readonly cycle: string[]) {
    super('CircularImportDetected', `Failed to analyze the dependency graph (circular imports): ${entryPath}`);
  }
}

export class ConfigError extends PyInlineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('InvalidConfig', message, options);
  }
}
