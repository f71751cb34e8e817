import fs from 'node:fs/promises';
import path from 'node:path';
import { DEFAULT_PYTHON } from '../config/loadBundlerConfig';

export const LAUNCHER_FILE_NAME = 'compiled.py';

export type LauncherOptions = {
  basedir: string;
  tempdir: string;
  /** Interpreter named in the shebang and in the execute command. */
  python?: string;
};

/** JSON string literals are valid Python string literals for any path. */
function pyStr(s: string): string {
  return JSON.stringify(s);
}

/**
 * Source of a launcher that prepends `basedir` to PYTHONPATH and replaces itself with the
 * interpreter running `artifactPath`, so no parent process stays behind.
 */
export function renderLauncher(artifactPath: string, opts: LauncherOptions): string {
  const target = path.resolve(artifactPath);
  const basedir = path.resolve(opts.basedir);
  return [
    `#!/usr/bin/env ${opts.python ?? DEFAULT_PYTHON}`,
    `"""Runs ${path.basename(target)} with the base directory on PYTHONPATH."""`,
    '',
    'import os',
    'import sys',
    '',
    `path = ${pyStr(target)}`,
    `basedir = ${pyStr(basedir)}`,
    '',
    'env = dict(os.environ)',
    'if "PYTHONPATH" in env:',
    '    env["PYTHONPATH"] = basedir + os.pathsep + env["PYTHONPATH"]',
    'else:',
    '    env["PYTHONPATH"] = basedir',
    'os.execve(sys.executable, [sys.executable, path], env)',
    '',
  ].join('\n');
}

/** Writes `<tempdir>/compiled.py` and returns its path. */
export async function writeLauncher(artifactPath: string, opts: LauncherOptions): Promise<string> {
  const out = path.join(path.resolve(opts.tempdir), LAUNCHER_FILE_NAME);
  await fs.mkdir(path.dirname(out), { recursive: true });
  await fs.writeFile(out, renderLauncher(artifactPath, opts), { encoding: 'utf8', mode: 0o755 });
  return out;
}

export function getExecuteCommand(opts: Pick<LauncherOptions, 'tempdir' | 'python'>): string[] {
  return [opts.python ?? DEFAULT_PYTHON, path.join(path.resolve(opts.tempdir), LAUNCHER_FILE_NAME)];
}
