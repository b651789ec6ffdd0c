import { Severity, type Finding } from "../scanner/types.js";
import type { ScanReport } from "./types.js";

type SarifLevel = "error" | "warning";

interface SarifRule {
  readonly id: string;
  readonly name: string;
  readonly shortDescription: { readonly text: string };
  readonly help?: { readonly text: string };
  readonly defaultConfiguration: { readonly level: SarifLevel };
  readonly properties: Record<string, string>;
}

interface SarifResult {
  readonly ruleId: string;
  readonly level: SarifLevel;
  readonly message: { readonly text: string };
  readonly locations: readonly {
    readonly physicalLocation: {
      readonly artifactLocation: { readonly uri: string };
      readonly region: {
        readonly startLine: number;
        readonly endLine: number;
        readonly snippet?: { readonly text: string };
      };
    };
  }[];
  readonly partialFingerprints: { readonly findingId: string };
}

interface SarifNotification {
  readonly level: "warning";
  readonly message: { readonly text: string };
  readonly locations: readonly {
    readonly physicalLocation: {
      readonly artifactLocation: { readonly uri: string };
    };
  }[];
}

interface SarifLog {
  readonly version: "2.1.0";
  readonly $schema: string;
  readonly runs: readonly {
    readonly tool: {
      readonly driver: {
        readonly name: string;
        readonly version: string;
        readonly rules: readonly SarifRule[];
      };
    };
    readonly results: readonly SarifResult[];
    readonly invocations: readonly {
      readonly executionSuccessful: boolean;
      readonly toolExecutionNotifications: readonly SarifNotification[];
    }[];
  }[];
}

export function renderSarifReport(report: ScanReport): string {
  const { rules, results } = toSarif(report.findings);
  const sarif: SarifLog = {
    version: "2.1.0",
    $schema: "https://json.schemastore.org/sarif-2.1.0.json",
    runs: [
      {
        tool: {
          driver: {
            name: report.tool.name,
            version: report.tool.version,
            rules,
          },
        },
        results,
        invocations: [
          {
            executionSuccessful: true,
            toolExecutionNotifications: report.diagnostics.map(
              (diagnostic) => ({
                level: "warning",
                message: { text: `${diagnostic.kind}: ${diagnostic.message}` },
                locations: [
                  {
                    physicalLocation: {
                      artifactLocation: { uri: diagnostic.path },
                    },
                  },
                ],
              }),
            ),
          },
        ],
      },
    ],
  };
  return JSON.stringify(sarif, null, 2);
}

function toSarif(findings: readonly Finding[]): {
  readonly rules: SarifRule[];
  readonly results: SarifResult[];
} {
  const rules: SarifRule[] = [];
  const seen = new Set<string>();
  const results = findings.map((finding) => {
    if (!seen.has(finding.rule_id)) {
      seen.add(finding.rule_id);
      rules.push(buildRule(finding));
    }
    return buildResult(finding);
  });
  rules.sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
  return { rules, results };
}

function buildRule(finding: Finding): SarifRule {
  return {
    id: finding.rule_id,
    name: finding.title,
    shortDescription: { text: finding.title },
    help: finding.remediation ? { text: finding.remediation } : undefined,
    defaultConfiguration: { level: toSarifLevel(finding.severity) },
    properties: {
      category: finding.category,
      severity: finding.severity,
    },
  };
}

function buildResult(finding: Finding): SarifResult {
  return {
    ruleId: finding.rule_id,
    level: toSarifLevel(finding.severity),
    message: { text: finding.message },
    locations: [
      {
        physicalLocation: {
          artifactLocation: { uri: finding.evidence.path },
          region: {
            startLine: finding.evidence.line,
            endLine: finding.evidence.end_line,
            snippet: finding.evidence.snippet
              ? { text: finding.evidence.snippet }
              : undefined,
          },
        },
      },
    ],
    partialFingerprints: { findingId: finding.id },
  };
}

function toSarifLevel(severity: Severity): SarifLevel {
  return severity === Severity.Critical ? "error" : "warning";
}
