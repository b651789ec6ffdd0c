import { computeVerdict } from "../scanner/aggregator.js";
import type { ReportInput, ScanReport } from "./types.js";

export function buildJsonReport(input: ReportInput): ScanReport {
  const { aggregate } = input;
  const report: ScanReport = {
    tool: { name: "fakedata-guard", version: input.toolVersion },
    target: {
      inputs: [...input.targets],
      files_scanned: aggregate.filesScanned,
      ...(input.staged ? { staged: true } : {}),
    },
    summary: {
      verdict: computeVerdict(aggregate, input.strict),
      strict: input.strict,
      counts: { ...aggregate.counts },
      rule_counts: sortKeys(aggregate.ruleCounts),
      risk_index: input.riskIndex,
    },
    findings: aggregate.findings,
    diagnostics: aggregate.diagnostics,
  };
  return input.scanMetadata
    ? { ...report, scan_metadata: input.scanMetadata }
    : report;
}

export function renderJsonReport(report: ScanReport): string {
  return JSON.stringify(report, null, 2);
}

function sortKeys(
  record: Readonly<Record<string, number>>,
): Record<string, number> {
  return Object.fromEntries(
    Object.entries(record).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)),
  );
}
