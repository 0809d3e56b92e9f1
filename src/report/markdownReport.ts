import type { ReductionReport, ReportFinding } from './reductionReport';

function fmtLoc(f: ReportFinding): string {
  return f.location?.file ?? '';
}

function escapeCell(s: string): string {
  return s.replace(/\|/g, '\\|');
}

function countByKind(findings: ReportFinding[]): Record<string, number> {
  const out: Record<string, number> = {};
  for (const f of findings) out[f.kind] = (out[f.kind] ?? 0) + 1;
  return out;
}

export function reportToMarkdown(report: ReductionReport): string {
  const lines: string[] = [];
  const errors = report.findings.filter((f) => f.severity === 'error');
  const removedTotal = report.files.reduce((n, f) => n + f.removed.length, 0);

  lines.push(`# Reduction report`);
  lines.push('');
  lines.push(`- Tool: **${report.tool.name}** ${report.tool.version}`);
  lines.push(`- FMU directory: \`${report.fmuDir}\``);
  lines.push(`- Output directory: \`${report.outputDir}\``);
  lines.push(`- Started: ${report.startedAtIso}`);
  lines.push(`- Finished: ${report.finishedAtIso}`);
  lines.push(`- Files scanned: **${report.filesScanned}**`);
  lines.push(`- Files processed: **${report.filesProcessed}**`);
  lines.push(`- Variables removed: **${removedTotal}**`);
  lines.push(`- Findings: **${report.findings.length}** (errors: **${errors.length}**)`);
  lines.push('');

  lines.push(`## Files`);
  lines.push('');
  lines.push(`| File | Removed | Remaining | Output |`);
  lines.push(`|---|---:|---:|---|`);
  const files = [...report.files].sort((a, b) => a.file.localeCompare(b.file));
  for (const f of files) {
    lines.push(`| ${escapeCell(f.file)} | ${f.removed.length} | ${f.remaining} | \`${f.output}\` |`);
  }
  if (files.length === 0) lines.push(`| (none) | 0 | 0 |  |`);
  lines.push('');

  const withRemovals = files.filter((f) => f.removed.length > 0);
  if (withRemovals.length > 0) {
    lines.push(`## Removed variables`);
    lines.push('');
    for (const f of withRemovals) {
      lines.push(`### ${f.file}`);
      lines.push('');
      for (const name of f.removed) lines.push(`- \`${name}\``);
      lines.push('');
    }
  }

  lines.push(`## Findings summary`);
  lines.push('');
  lines.push(`| Kind | Count |`);
  lines.push(`|---|---:|`);
  const byKind = countByKind(report.findings);
  const fk = Object.keys(byKind).sort((a, b) => a.localeCompare(b));
  for (const k of fk) lines.push(`| ${k} | ${byKind[k]} |`);
  if (fk.length === 0) lines.push(`| (none) | 0 |`);
  lines.push('');

  lines.push(`## All findings`);
  lines.push('');
  lines.push(`| Severity | Kind | File | Message |`);
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
    lines.push(`| ${f.severity} | ${f.kind} | ${escapeCell(fmtLoc(f))} | ${escapeCell(f.message)} |`);
  }
  if (all.length === 0) lines.push(`| (none) | (none) |  |  |`);
  lines.push('');
  return lines.join('\n');
}
