import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { scanSourceFiles } from '../sourceScanner';

async function mkFile(p: string, content = 'x = 1\n'): Promise<void> {
  await fs.mkdir(path.dirname(p), { recursive: true });
  await fs.writeFile(p, content, 'utf8');
}

async function mkTempDir(): Promise<string> {
  return await fs.mkdtemp(path.join(os.tmpdir(), 'pyinline-scan-'));
}

describe('scanSourceFiles', () => {
  test('returns stable sorted results across runs', async () => {
    const dir = await mkTempDir();
    await mkFile(path.join(dir, 'lib/b.py'));
    await mkFile(path.join(dir, 'lib/a.py'));
    await mkFile(path.join(dir, 'tests/a.test.py'));
    await mkFile(path.join(dir, 'README.md'), '# readme');

    const r1 = await scanSourceFiles({ sourceRoot: dir });
    const r2 = await scanSourceFiles({ sourceRoot: dir });

    expect(r1).toEqual(r2);
    expect(r1).toEqual(['lib/a.py', 'lib/b.py', 'tests/a.test.py']);
  });

  test('default excludes remove caches and virtual environments', async () => {
    const dir = await mkTempDir();
    await mkFile(path.join(dir, 'app.py'));
    await mkFile(path.join(dir, '__pycache__/app.py'));
    await mkFile(path.join(dir, '.venv/lib/site.py'));

    expect(await scanSourceFiles({ sourceRoot: dir })).toEqual(['app.py']);
  });

  test('additional excludes and maxFiles are applied', async () => {
    const dir = await mkTempDir();
    await mkFile(path.join(dir, 'a.py'));
    await mkFile(path.join(dir, 'b.py'));
    await mkFile(path.join(dir, 'vendor/c.py'));

    expect(await scanSourceFiles({ sourceRoot: dir, excludeGlobs: ['vendor/**'] })).toEqual(['a.py', 'b.py']);
    expect(await scanSourceFiles({ sourceRoot: dir, maxFiles: 1 })).toEqual(['a.py']);
  });
});
