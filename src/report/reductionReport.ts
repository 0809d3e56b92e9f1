import type { FmuErrorCode } from '../errors';
import { stableStringify } from '../util/deterministicJson';

export type ReportSeverity = 'info' | 'warning' | 'error';

export type ReportLocation = {
  /** FMU file name relative to the processed directory. */
  file: string;
};

/** Failures are keyed by the error code that caused them. */
export type ReportFindingKind = FmuErrorCode | 'note';

export type ReportFinding = {
  kind: ReportFindingKind;
  severity: ReportSeverity;
  message: string;
  location?: ReportLocation;
};

export type FileReduction = {
  file: string;
  /** Absolute path of the written archive. */
  output: string;
  removed: string[];
  remaining: number;
};

export type ReductionReport = {
  schema: 'reduction-report-v1';
  tool: { name: string; version: string };
  fmuDir: string;
  outputDir: string;
  startedAtIso: string;
  finishedAtIso: string;
  filesScanned: number;
  filesProcessed: number;
  files: FileReduction[];
  findings: ReportFinding[];
};

export function createEmptyReport(args: {
  toolName: string;
  toolVersion: string;
  fmuDir: string;
  outputDir?: string;
  startedAtIso?: string;
}): ReductionReport {
  const now = args.startedAtIso ?? new Date().toISOString();
  return {
    schema: 'reduction-report-v1',
    tool: { name: args.toolName, version: args.toolVersion },
    fmuDir: args.fmuDir,
    outputDir: args.outputDir ?? args.fmuDir,
    startedAtIso: now,
    finishedAtIso: now,
    filesScanned: 0,
    filesProcessed: 0,
    files: [],
    findings: [],
  };
}

export function addFinding(report: ReductionReport, finding: ReportFinding): void {
  report.findings.push(finding);
}

export function finalizeReport(report: ReductionReport, finishedAtIso?: string): ReductionReport {
  report.finishedAtIso = finishedAtIso ?? new Date().toISOString();
  return report;
}

export function failedFiles(report: ReductionReport): string[] {
  const out = new Set<string>();
  for (const f of report.findings) {
    if (f.severity === 'error' && f.location) out.add(f.location.file);
  }
  return Array.from(out).sort((a, b) => a.localeCompare(b));
}

export function serializeReport(report: ReductionReport): string {
  // Keep it deterministic for tests and CI diffs.
  return stableStringify(report);
}
