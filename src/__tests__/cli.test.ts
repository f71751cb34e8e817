import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { main, runBundle, runDeps, runScan } from '../cli';

function writeFile(p: string, content: string) {
  fs.mkdirSync(path.dirname(p), { recursive: true });
  fs.writeFileSync(p, content, 'utf8');
}

function makeTempProject(files: Record<string, string>): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'pyinline-cli-'));
  for (const [rel, content] of Object.entries(files)) writeFile(path.join(dir, rel), content);
  return dir;
}

describe('CLI', () => {
  afterEach(() => {
    jest.restoreAllMocks();
    process.exitCode = undefined;
  });

  test('bundle writes the merged source and a JSON report', async () => {
    const dir = makeTempProject({
      'lib/helpers.py': 'def h():\n    return 1\n',
      'main.py': 'import sys\nfrom helpers import h\nprint(h())\n',
      'pyinline.config.json': JSON.stringify({ includePaths: ['lib'] }),
    });
    const out = path.join(dir, 'dist', 'bundled.py');
    const report = path.join(dir, 'dist', 'report.json');

    const code = await runBundle({
      entry: path.join(dir, 'main.py'),
      basedir: dir,
      include: [],
      out,
      report,
      verbose: false,
    });

    expect(code).toBe(0);
    expect(fs.readFileSync(out, 'utf8')).toBe('import sys\ndef h():\n    return 1\nprint(h())\n');
    const parsed = JSON.parse(fs.readFileSync(report, 'utf8'));
    expect(parsed.schema).toBe('bundle-report-v1');
    expect(parsed.counts.importsByAction).toEqual({ passThrough: 1, inline: 1 });
  });

  test('verbose status goes to stderr so stdout carries only the bundle', async () => {
    const dir = makeTempProject({ 'main.py': 'x = 1\n' });
    const entry = path.join(dir, 'main.py');
    const stdout = jest.spyOn(process.stdout, 'write').mockImplementation(() => true);
    const stderr = jest.spyOn(console, 'error').mockImplementation(() => undefined);

    const code = await runBundle({ entry, basedir: dir, include: [], verbose: true });

    expect(code).toBe(0);
    expect(stdout).toHaveBeenCalledWith(Buffer.from('x = 1\n', 'utf8'));
    expect(stdout.mock.calls.some(([chunk]) => String(chunk).includes('Bundled'))).toBe(false);
    expect(stderr).toHaveBeenCalledWith(`Bundled ${entry} (6 bytes). Wrote: (stdout)`);
  });

  test('deps writes sorted absolute paths', async () => {
    const dir = makeTempProject({
      'main.py': 'import b\nimport a\n',
      'a.py': '',
      'b.py': '',
    });
    const out = path.join(dir, 'deps.json');

    const code = await runDeps({ entry: path.join(dir, 'main.py'), basedir: dir, out, verbose: false });

    expect(code).toBe(0);
    expect(JSON.parse(fs.readFileSync(out, 'utf8'))).toEqual({
      entry: path.join(dir, 'main.py'),
      baseDir: dir,
      dependencies: [path.join(dir, 'a.py'), path.join(dir, 'b.py'), path.join(dir, 'main.py')],
    });
  });

  test('scan writes the inventory, honouring config excludes', async () => {
    const dir = makeTempProject({
      'lib/a.py': '',
      'vendor/v.py': '',
      'tests/a.test.py': '',
      'pyinline.config.json': JSON.stringify({ exclude: ['vendor/**'] }),
    });
    const out = path.join(dir, 'inventory.json');

    expect(await runScan({ source: dir, out, exclude: [], verbose: false })).toBe(0);
    const inv = JSON.parse(fs.readFileSync(out, 'utf8'));
    expect(inv.libraryFiles).toEqual(['lib/a.py']);
    expect(inv.verificationFiles).toEqual(['tests/a.test.py']);
  });

  test('returns exit code 2 and prints the message on a fatal bundling error', async () => {
    const dir = makeTempProject({ 'main.py': 'from .a import b\n' });
    const errors: string[] = [];
    jest.spyOn(console, 'error').mockImplementation((msg: unknown) => {
      errors.push(String(msg));
    });

    const code = await main(['node', 'pyinline', 'bundle', path.join(dir, 'main.py'), '--basedir', dir, '--out', path.join(dir, 'out.py')]);

    expect(code).toBe(2);
    expect(errors).toEqual([
      `Relative imports are not supported: '.a' (imported at ${path.join(dir, 'main.py')}:1)`,
    ]);
    expect(fs.existsSync(path.join(dir, 'out.py'))).toBe(false);
  });
});
