import fs from 'node:fs/promises';
import path from 'node:path';
import { BundleReport, serializeReport } from './bundleReport';
import { reportToMarkdown } from './markdownReport';

export type ReportFormat = 'json' | 'md';

/** Format follows the extension: `.json` writes JSON, anything else Markdown. */
export function reportFormatForFile(outFile: string): ReportFormat {
  return path.extname(outFile).toLowerCase() === '.json' ? 'json' : 'md';
}

export async function writeReportFile(outFile: string, report: BundleReport, format: ReportFormat = 'md'): Promise<void> {
  await fs.mkdir(path.dirname(outFile), { recursive: true });
  const content = format === 'json' ? serializeReport(report) : reportToMarkdown(report);
  await fs.writeFile(outFile, content, 'utf8');
}
