import { Severity } from "../scanner/types.js";
import type { ScanReport } from "./types.js";

export function renderGithubAnnotations(report: ScanReport): string {
  const lines: string[] = [];

  for (const finding of report.findings) {
    const command = finding.severity === Severity.Critical ? "error" : "warning";
    const properties = formatProperties({
      file: finding.evidence.path,
      line: String(finding.evidence.line),
      endLine: String(finding.evidence.end_line),
      title: `${finding.rule_id} ${finding.title}`,
    });
    lines.push(`::${command} ${properties}::${escapeData(finding.message)}`);
  }

  for (const diagnostic of report.diagnostics) {
    const properties = formatProperties({
      file: diagnostic.path,
      title: diagnostic.kind,
    });
    lines.push(`::warning ${properties}::${escapeData(diagnostic.message)}`);
  }

  const { counts, verdict, strict } = report.summary;
  lines.push(
    `::notice title=fakedata-guard::${escapeData(
      `${verdict}: ${counts.critical} critical, ${counts.warning} warning across ${report.target.files_scanned} files${strict ? " (strict)" : ""}`,
    )}`,
  );
  return lines.join("\n");
}

export function escapeData(value: string): string {
  return value.replace(/%/g, "%25").replace(/\r/g, "%0D").replace(/\n/g, "%0A");
}

export function escapeProperty(value: string): string {
  return escapeData(value).replace(/:/g, "%3A").replace(/,/g, "%2C");
}

function formatProperties(properties: Record<string, string>): string {
  return Object.entries(properties)
    .map(([key, value]) => `${key}=${escapeProperty(value)}`)
    .join(",");
}
