import path from 'node:path';
import builtinModuleNames from './builtinModules.json';

export const PYTHON_EXTENSION = '.py';
export const VERIFICATION_MARKER = '.test.py';
export const PACKAGE_INIT = '__init__.py';

const BUILTIN_MODULES: ReadonlySet<string> = new Set(builtinModuleNames);

/** A runnable check: its file name carries the `.test.py` marker. */
export function isVerificationFile(file: string): boolean {
  return path.basename(file).includes(VERIFICATION_MARKER);
}

/** Public library code: not private (`_` prefix), not a verification file, and a Python source. */
export function isLibraryFile(file: string): boolean {
  const name = path.basename(file);
  if (!name || name[0] === '_') return false;
  if (name.includes(VERIFICATION_MARKER)) return false;
  return name.includes(PYTHON_EXTENSION);
}

/** Modules compiled into the interpreter; a local file shadowing one of these is never a dependency. */
export function isBuiltinModule(moduleName: string): boolean {
  return BUILTIN_MODULES.has(moduleName);
}
