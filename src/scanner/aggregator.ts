import {
  SEVERITY_ORDER,
  Severity,
  type Finding,
  type ScanDiagnostic,
  type Verdict,
} from "./types.js";

export interface SeverityCounts {
  readonly critical: number;
  readonly warning: number;
  readonly total: number;
}

export interface AggregateResult {
  readonly findings: readonly Finding[];
  readonly bySeverity: Readonly<Record<Severity, readonly Finding[]>>;
  readonly counts: SeverityCounts;
  readonly ruleCounts: Readonly<Record<string, number>>;
  readonly diagnostics: readonly ScanDiagnostic[];
  readonly filesScanned: number;
}

export interface AggregateInput {
  readonly filesScanned: number;
  readonly diagnostics?: readonly ScanDiagnostic[];
}

export function aggregateFindings(
  findings: readonly Finding[],
  input: AggregateInput,
): AggregateResult {
  const sorted = sortFindings(findings);
  const critical = sorted.filter(
    (finding) => finding.severity === Severity.Critical,
  );
  const warning = sorted.filter(
    (finding) => finding.severity === Severity.Warning,
  );

  const ruleCounts: Record<string, number> = {};
  for (const finding of sorted) {
    ruleCounts[finding.rule_id] = (ruleCounts[finding.rule_id] ?? 0) + 1;
  }

  return {
    findings: sorted,
    bySeverity: {
      [Severity.Critical]: critical,
      [Severity.Warning]: warning,
    },
    counts: {
      critical: critical.length,
      warning: warning.length,
      total: sorted.length,
    },
    ruleCounts,
    diagnostics: [...(input.diagnostics ?? [])].sort(compareDiagnostics),
    filesScanned: input.filesScanned,
  };
}

/**
 * FAIL on any CRITICAL finding. In strict mode a WARNING fails too.
 */
export function computeVerdict(
  result: Pick<AggregateResult, "counts">,
  strict: boolean,
): Verdict {
  if (result.counts.critical > 0) {
    return "FAIL";
  }
  if (strict && result.counts.warning > 0) {
    return "FAIL";
  }
  return "PASS";
}

export function sortFindings(findings: readonly Finding[]): Finding[] {
  return [...findings].sort(compareFindings);
}

function compareFindings(a: Finding, b: Finding): number {
  return (
    SEVERITY_ORDER.indexOf(a.severity) - SEVERITY_ORDER.indexOf(b.severity) ||
    compareText(a.evidence.path, b.evidence.path) ||
    a.evidence.line - b.evidence.line ||
    compareText(a.rule_id, b.rule_id) ||
    compareText(a.evidence.match, b.evidence.match)
  );
}

function compareDiagnostics(a: ScanDiagnostic, b: ScanDiagnostic): number {
  return (
    compareText(a.path, b.path) ||
    compareText(a.kind, b.kind) ||
    compareText(a.message, b.message)
  );
}

function compareText(a: string, b: string): number {
  if (a < b) {
    return -1;
  }
  return a > b ? 1 : 0;
}
