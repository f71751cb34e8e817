import path from 'node:path';
import { isStrictlyInside, toPosixPath } from '../util/paths';
import type { BundleReport, ImportAction, ReportFinding, ReportLocation } from './bundleReport';

export function addFinding(report: BundleReport, finding: ReportFinding): void {
  report.findings.push(finding);
}

export function incCount(map: Record<string, number>, key: string, amount = 1): void {
  map[key] = (map[key] ?? 0) + amount;
}

export function countImport(report: BundleReport, action: ImportAction): void {
  incCount(report.counts.importsByAction, action);
}

/** Location of `absFile` relative to the report's base directory (absolute when outside it). */
export function reportLocation(report: BundleReport, absFile: string, line?: number, column?: number): ReportLocation {
  const file = isStrictlyInside(report.baseDir, absFile) ? path.relative(report.baseDir, absFile) : absFile;
  return { file: toPosixPath(file), line, column };
}
