import { BundleReport, ReportFinding } from './bundleReport';

function fmtLoc(f: ReportFinding): string {
  if (!f.location) return '';
  const { file, line, column } = f.location;
  if (line && column) return `${file}:${line}:${column}`;
  if (line) return `${file}:${line}`;
  return file;
}

function countByKind(findings: ReportFinding[]): Record<string, number> {
  const out: Record<string, number> = {};
  for (const f of findings) out[f.kind] = (out[f.kind] ?? 0) + 1;
  return out;
}

function topMessages(findings: ReportFinding[], kind: string, limit = 20): Array<{ message: string; count: number }> {
  const m = new Map<string, number>();
  for (const f of findings) {
    if (f.kind !== kind) continue;
    m.set(f.message, (m.get(f.message) ?? 0) + 1);
  }
  const arr = Array.from(m.entries()).map(([message, count]) => ({ message, count }));
  arr.sort((a, b) => (b.count - a.count) || a.message.localeCompare(b.message));
  return arr.slice(0, limit);
}

function escapeCell(s: string): string {
  return s.replace(/\|/g, '\\|');
}

function pushCountTable(lines: string[], counts: Record<string, number>): void {
  lines.push(`| Kind | Count |`);
  lines.push(`|---|---:|`);
  const keys = Object.keys(counts).sort((a, b) => a.localeCompare(b));
  for (const k of keys) lines.push(`| ${k} | ${counts[k]} |`);
  if (keys.length === 0) lines.push(`| (none) | 0 |`);
  lines.push('');
}

export function reportToMarkdown(report: BundleReport): string {
  const lines: string[] = [];
  const unresolved = report.findings.filter((f) => f.kind === 'unresolvedImport');

  lines.push(`# Bundle report`);
  lines.push('');
  lines.push(`- Tool: **${report.tool.name}** ${report.tool.version}`);
  lines.push(`- Entry: \`${report.entry}\``);
  lines.push(`- Base directory: \`${report.baseDir}\``);
  lines.push(`- Started: ${report.startedAtIso}`);
  lines.push(`- Finished: ${report.finishedAtIso}`);
  lines.push(`- Files processed: **${report.filesProcessed}**`);
  lines.push(`- Findings: **${report.findings.length}** (external imports: **${unresolved.length}**)`);
  lines.push('');

  lines.push(`## Imports by action`);
  lines.push('');
  pushCountTable(lines, report.counts.importsByAction);

  lines.push(`## Findings summary`);
  lines.push('');
  pushCountTable(lines, countByKind(report.findings));

  const top = topMessages(unresolved, 'unresolvedImport', 20);
  if (top.length > 0) {
    lines.push(`## External modules`);
    lines.push('');
    lines.push(`| Count | Message |`);
    lines.push(`|---:|---|`);
    for (const t of top) lines.push(`| ${t.count} | ${escapeCell(t.message)} |`);
    lines.push('');
  }

  lines.push(`## All findings`);
  lines.push('');
  lines.push(`| Severity | Kind | Location | Message |`);
  lines.push(`|---|---|---|---|`);
  const all = [...report.findings];
  all.sort((a, b) => {
    const ak = a.kind.localeCompare(b.kind);
    if (ak !== 0) return ak;
    const al = fmtLoc(a).localeCompare(fmtLoc(b));
    if (al !== 0) return al;
    return a.message.localeCompare(b.message);
  });
  for (const f of all) {
    lines.push(`| ${f.severity} | ${f.kind} | ${fmtLoc(f)} | ${escapeCell(f.message)} |`);
  }
  if (all.length === 0) lines.push(`| (none) | (none) |  |  |`);
  lines.push('');
  return lines.join('\n');
}
