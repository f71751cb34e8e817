import { stableStringify } from '../util/deterministicJson';

export type ReportSeverity = 'info' | 'warning' | 'error';

export type ReportLocation = {
  /** File path (posix), relative to the report's base directory when inside it. */
  file: string;
  /** 1-based line number. */
  line?: number;
  /** 1-based column number. */
  column?: number;
};

export type ReportFindingKind = 'unresolvedImport' | 'elidedImport' | 'syntaxError' | 'note';

export type ReportFinding = {
  kind: ReportFindingKind;
  severity: ReportSeverity;
  message: string;
  location?: ReportLocation;
  tags?: Record<string, string>;
};

/** What the bundler did with one import statement. */
export type ImportAction = 'inline' | 'elide' | 'passThrough' | 'rewrite' | 'hoist';

export type BundleReport = {
  schema: 'bundle-report-v1';
  tool: { name: string; version: string };
  entry: string;
  baseDir: string;
  startedAtIso: string;
  finishedAtIso: string;
  filesProcessed: number;
  counts: {
    importsByAction: Record<string, number>;
  };
  findings: ReportFinding[];
};

export function createEmptyReport(args: {
  toolName: string;
  toolVersion: string;
  entry: string;
  baseDir: string;
  startedAtIso?: string;
}): BundleReport {
  const now = args.startedAtIso ?? new Date().toISOString();
  return {
    schema: 'bundle-report-v1',
    tool: { name: args.toolName, version: args.toolVersion },
    entry: args.entry,
    baseDir: args.baseDir,
    startedAtIso: now,
    finishedAtIso: now,
    filesProcessed: 0,
    counts: { importsByAction: {} },
    findings: [],
  };
}

export function finalizeReport(report: BundleReport, finishedAtIso?: string): BundleReport {
  report.finishedAtIso = finishedAtIso ?? new Date().toISOString();
  return report;
}

export function serializeReport(report: BundleReport): string {
  // Keep it deterministic for tests and CI diffs.
  return stableStringify(report);
}
