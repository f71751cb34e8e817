#!/usr/bin/env node

import { Command } from 'commander';
import fs from 'node:fs/promises';
import path from 'node:path';
import { VERSION } from './index';
import { bundlePythonFile } from './bundle/bundler';
import { optionalString, parseIntish, stringList } from './cli/args';
import { loadBundlerConfig } from './config/loadBundlerConfig';
import { listDependencies } from './deps/listDependencies';
import { getExecuteCommand, writeLauncher } from './launch/launcher';
import { createEmptyReport, finalizeReport } from './report/bundleReport';
import { reportFormatForFile, writeReportFile } from './report/writeReport';
import { buildFileInventory, writeFileInventoryFile } from './scan/inventory';
import { stableStringify } from './util/deterministicJson';

const TOOL_NAME = 'pyinline';

async function writeOutput(out: string | undefined, content: string | Buffer): Promise<void> {
  if (!out) {
    process.stdout.write(content);
    return;
  }
  await fs.mkdir(path.dirname(path.resolve(out)), { recursive: true });
  await fs.writeFile(out, content);
}

// Status lines go to stderr: stdout may carry the bundle itself.
function info(verbose: boolean, message: string): void {
  // eslint-disable-next-line no-console
  if (verbose) console.error(message);
}

export type BundleCommandOptions = {
  entry: string;
  basedir: string;
  include: string[];
  out?: string;
  report?: string;
  config?: string;
  verbose: boolean;
};

export async function runBundle(opts: BundleCommandOptions): Promise<number> {
  const config = loadBundlerConfig(opts.basedir, opts.config);
  const includePaths = [...opts.include.map((p) => path.resolve(p)), ...config.includePaths];
  const report = opts.report
    ? createEmptyReport({ toolName: TOOL_NAME, toolVersion: VERSION, entry: path.resolve(opts.entry), baseDir: config.basedir })
    : undefined;

  const bytes = await bundlePythonFile(opts.entry, { basedir: config.basedir, includePaths, report });
  await writeOutput(opts.out, bytes);

  if (report && opts.report) {
    await writeReportFile(opts.report, finalizeReport(report), reportFormatForFile(opts.report));
    info(opts.verbose, `Wrote report: ${opts.report} (files processed: ${report.filesProcessed})`);
  }
  info(opts.verbose, `Bundled ${opts.entry} (${bytes.length} bytes). Wrote: ${opts.out ?? '(stdout)'}`);
  return 0;
}

export type DepsCommandOptions = {
  entry: string;
  basedir: string;
  timeoutMs?: number;
  out?: string;
  config?: string;
  verbose: boolean;
};

export async function runDeps(opts: DepsCommandOptions): Promise<number> {
  const config = loadBundlerConfig(opts.basedir, opts.config);
  const deps = await listDependencies(opts.entry, config.basedir, {
    timeoutMs: opts.timeoutMs ?? config.dependencyTimeoutMs,
  });
  const dependencies = [...deps].sort((a, b) => a.localeCompare(b));
  await writeOutput(
    opts.out,
    stableStringify({ entry: path.resolve(opts.entry), baseDir: config.basedir, dependencies }),
  );
  info(opts.verbose, `Found ${dependencies.length} local file(s) for ${opts.entry}.`);
  return 0;
}

export type ScanCommandOptions = {
  source: string;
  out?: string;
  exclude: string[];
  maxFiles?: number;
  verbose: boolean;
};

export async function runScan(opts: ScanCommandOptions): Promise<number> {
  const config = loadBundlerConfig(opts.source);
  const inv = await buildFileInventory({
    sourceRoot: config.basedir,
    excludeGlobs: [...config.exclude, ...opts.exclude],
    maxFiles: opts.maxFiles,
  });
  if (opts.out) await writeFileInventoryFile(opts.out, inv);
  else process.stdout.write(stableStringify(inv));
  info(
    opts.verbose,
    `Scanned ${inv.libraryFiles.length} library and ${inv.verificationFiles.length} verification file(s).`,
  );
  return 0;
}

export type LaunchCommandOptions = {
  artifact: string;
  basedir: string;
  tempdir: string;
  python?: string;
  config?: string;
  verbose: boolean;
};

export async function runLaunch(opts: LaunchCommandOptions): Promise<number> {
  const config = loadBundlerConfig(opts.basedir, opts.config);
  const python = opts.python ?? config.python;
  const launcher = await writeLauncher(opts.artifact, { basedir: config.basedir, tempdir: opts.tempdir, python });
  process.stdout.write(JSON.stringify(getExecuteCommand({ tempdir: opts.tempdir, python })) + '\n');
  info(opts.verbose, `Wrote launcher: ${launcher}`);
  return 0;
}

type CommonRaw = { basedir?: unknown; config?: unknown; out?: unknown; verbose?: unknown };

export async function main(argv: string[]): Promise<number> {
  const program = new Command();

  program
    .name(TOOL_NAME)
    .description('Inline local Python imports into one self-contained file and list local dependencies')
    .version(VERSION);

  program
    .command('bundle')
    .description('Bundle an entry file and the local modules it imports into one source file.')
    .argument('<entry>', 'Entry .py file')
    .option('--basedir <path>', 'First search root (default: current directory)', '.')
    .option('--include <dir...>', 'Additional search roots, probed after --basedir', [])
    .option('--out <file>', 'Output file (default: stdout)')
    .option('--report <file>', 'Optional report path (.json or Markdown)')
    .option('--config <file>', `Config file (default: <basedir>/pyinline.config.json)`)
    .option('-v, --verbose', 'Verbose logging', false)
    .action(async (entry: string, raw: CommonRaw & { include?: unknown; report?: unknown }) => {
      process.exitCode = await runBundle({
        entry,
        basedir: optionalString(raw.basedir) ?? '.',
        include: stringList(raw.include),
        out: optionalString(raw.out),
        report: optionalString(raw.report),
        config: optionalString(raw.config),
        verbose: Boolean(raw.verbose),
      });
    });

  program
    .command('deps')
    .description('List the local files an entry file depends on (itself included) as JSON.')
    .argument('<entry>', 'Entry .py file')
    .option('--basedir <path>', 'Only files under this directory are listed', '.')
    .option('--timeout <ms>', 'Deadline for building the import graph')
    .option('--out <file>', 'Output JSON file (default: stdout)')
    .option('--config <file>', `Config file (default: <basedir>/pyinline.config.json)`)
    .option('-v, --verbose', 'Verbose logging', false)
    .action(async (entry: string, raw: CommonRaw & { timeout?: unknown }) => {
      process.exitCode = await runDeps({
        entry,
        basedir: optionalString(raw.basedir) ?? '.',
        timeoutMs: parseIntish(raw.timeout),
        out: optionalString(raw.out),
        config: optionalString(raw.config),
        verbose: Boolean(raw.verbose),
      });
    });

  program
    .command('scan')
    .description('Emit a deterministic inventory of library and verification files.')
    .requiredOption('--source <path>', 'Root directory to scan')
    .option('--out <file>', 'Output JSON file (default: stdout)')
    .option('--exclude <glob...>', 'Additional exclude glob(s).', [])
    .option('--max-files <n>', 'Safety cap (default no cap)')
    .option('-v, --verbose', 'Verbose logging', false)
    .action(async (raw: CommonRaw & { source?: unknown; exclude?: unknown; maxFiles?: unknown }) => {
      process.exitCode = await runScan({
        source: optionalString(raw.source) ?? '.',
        out: optionalString(raw.out),
        exclude: stringList(raw.exclude),
        maxFiles: parseIntish(raw.maxFiles),
        verbose: Boolean(raw.verbose),
      });
    });

  program
    .command('launch')
    .description('Write a launcher that runs an artifact with the base directory on PYTHONPATH.')
    .argument('<artifact>', 'Python file to run')
    .requiredOption('--tempdir <dir>', 'Directory that receives compiled.py')
    .option('--basedir <path>', 'Directory prepended to PYTHONPATH', '.')
    .option('--python <exe>', 'Interpreter for the shebang and the execute command')
    .option('--config <file>', `Config file (default: <basedir>/pyinline.config.json)`)
    .option('-v, --verbose', 'Verbose logging', false)
    .action(async (artifact: string, raw: CommonRaw & { tempdir?: unknown; python?: unknown }) => {
      process.exitCode = await runLaunch({
        artifact,
        basedir: optionalString(raw.basedir) ?? '.',
        tempdir: optionalString(raw.tempdir) ?? '.',
        python: optionalString(raw.python),
        config: optionalString(raw.config),
        verbose: Boolean(raw.verbose),
      });
    });

  try {
    await program.parseAsync(argv);
    return Number(process.exitCode ?? 0);
  } catch (e: unknown) {
    // eslint-disable-next-line no-console
    console.error(e instanceof Error ? e.message : String(e));
    return 2;
  }
}

// Run CLI only when executed directly (not when imported in tests)
if (require.main === module) {
  void main(process.argv).then((code) => {
    process.exitCode = code;
  });
}
