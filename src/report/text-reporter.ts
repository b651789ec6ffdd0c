import pc from "picocolors";
import { Severity } from "../scanner/types.js";
import {
  applyFindingLimit,
  formatLocation,
  truncateText,
} from "./report-utils.js";
import type { ScanReport } from "./types.js";

type Palette = ReturnType<typeof pc.createColors>;
type Style = (text: string) => string;

export interface TextRenderOptions {
  readonly color?: boolean;
  readonly maxFindings?: number;
  readonly showRemediation?: boolean;
  readonly messageWidth?: number;
}

export function renderTextReport(
  report: ScanReport,
  options: TextRenderOptions = {},
): string {
  const colors = pc.createColors(options.color ?? false);
  const messageWidth = options.messageWidth ?? 80;
  const { summary } = report;
  const lines: string[] = [];

  lines.push(
    renderAsciiBox([
      ["Fake Data Scan Report", colors.bold],
      [`Verdict: ${summary.verdict}`, verdictStyle(colors, summary.verdict)],
      [`Mode: ${summary.strict ? "strict" : "default"}`],
      [`Targets: ${report.target.inputs.join(", ")}`],
      [`Files scanned: ${report.target.files_scanned}`],
      [`Risk index: ${summary.risk_index.toFixed(2)}`],
    ]),
  );
  lines.push("");
  lines.push(
    renderAsciiTable(
      ["Severity", "Count"],
      [
        [Severity.Critical, String(summary.counts.critical)],
        [Severity.Warning, String(summary.counts.warning)],
      ],
      severityStyles(colors),
    ),
  );

  const ruleRows = Object.entries(summary.rule_counts).map(
    ([ruleId, count]) => [ruleId, String(count)],
  );
  if (ruleRows.length > 0) {
    lines.push("");
    lines.push(renderAsciiTable(["Rule", "Findings"], ruleRows));
  }

  lines.push("");
  const findings = applyFindingLimit(report.findings, options.maxFindings);
  if (report.findings.length === 0) {
    lines.push("No findings detected.");
  } else {
    lines.push("Findings");
    lines.push(
      renderAsciiTable(
        ["Severity", "Rule", "Location", "Message"],
        findings.map((finding) => [
          finding.severity,
          finding.rule_id,
          formatLocation(finding.evidence.path, finding.evidence.line),
          truncateText(finding.message, messageWidth),
        ]),
        severityStyles(colors),
      ),
    );
    if (report.findings.length > findings.length) {
      lines.push(
        `Showing ${findings.length} of ${report.findings.length} findings. Use --max-findings to adjust.`,
      );
    }
  }

  if (options.showRemediation && findings.length > 0) {
    lines.push("");
    lines.push("Remediation");
    for (const finding of findings) {
      const location = formatLocation(
        finding.evidence.path,
        finding.evidence.line,
      );
      lines.push(`- ${finding.rule_id} (${location}): ${finding.remediation}`);
    }
  }

  if (report.diagnostics.length > 0) {
    lines.push("");
    lines.push("Diagnostics");
    for (const diagnostic of report.diagnostics) {
      lines.push(
        `- ${colors.yellow(diagnostic.kind)} ${diagnostic.path}: ${diagnostic.message}`,
      );
    }
  }

  return lines.join("\n");
}

function verdictStyle(colors: Palette, verdict: string): Style {
  return verdict === "FAIL"
    ? (text) => colors.bold(colors.red(text))
    : (text) => colors.bold(colors.green(text));
}

function severityStyles(colors: Palette): Record<string, Style> {
  return {
    [Severity.Critical]: colors.red,
    [Severity.Warning]: colors.yellow,
  };
}

function renderAsciiBox(
  content: ReadonlyArray<readonly [string, Style?]>,
): string {
  const width = Math.max(...content.map(([line]) => line.length));
  const border = `+${"-".repeat(width + 2)}+`;
  const body = content.map(([line, style]) => {
    const padded = line.padEnd(width);
    return `| ${style ? style(padded) : padded} |`;
  });
  return [border, ...body, border].join("\n");
}

function renderAsciiTable(
  headers: readonly string[],
  rows: readonly (readonly string[])[],
  cellStyles: Readonly<Record<string, Style>> = {},
): string {
  const widths = headers.map((header, index) =>
    Math.max(header.length, ...rows.map((row) => row[index]?.length ?? 0)),
  );
  const border = `+${widths.map((w) => "-".repeat(w + 2)).join("+")}+`;
  const headerLine = `| ${headers
    .map((header, index) => header.padEnd(widths[index] ?? 0))
    .join(" | ")} |`;
  const body = rows.map(
    (row) =>
      `| ${row
        .map((cell, index) => {
          const padded = cell.padEnd(widths[index] ?? 0);
          const style = cellStyles[cell];
          return style ? style(padded) : padded;
        })
        .join(" | ")} |`,
  );
  return [border, headerLine, border, ...body, border].join("\n");
}
