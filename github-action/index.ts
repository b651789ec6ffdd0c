import * as core from "@actions/core";
import { runScanCommand } from "../src/cli/scan-command.js";
import { loadToolVersion } from "../src/cli/runtime-paths.js";
import { Severity } from "../src/scanner/types.js";

async function run(): Promise<void> {
  const paths = core
    .getInput("paths")
    .split(/[\s,]+/)
    .filter((entry) => entry.length > 0);
  const strict = core.getBooleanInput("strict");
  const featurePatterns = core.getInput("feature-patterns") || undefined;
  const exclude = core.getInput("exclude") || undefined;

  const result = await runScanCommand(
    {
      paths,
      format: "json",
      strict: strict || undefined,
      featurePatterns,
      exclude,
      env: process.env,
    },
    await loadToolVersion(),
  );
  const { report } = result;

  for (const finding of report.findings) {
    const annotate =
      finding.severity === Severity.Critical ? core.error : core.warning;
    annotate(finding.message, {
      title: `${finding.rule_id} ${finding.title}`,
      file: finding.evidence.path,
      startLine: finding.evidence.line,
      endLine: finding.evidence.end_line,
    });
  }
  for (const diagnostic of report.diagnostics) {
    core.warning(`${diagnostic.kind}: ${diagnostic.message}`, {
      file: diagnostic.path,
    });
  }

  core.setOutput("verdict", result.verdict);
  core.setOutput("critical-count", report.summary.counts.critical);
  core.setOutput("warning-count", report.summary.counts.warning);

  if (result.verdict === "FAIL") {
    core.setFailed(
      `fakedata-guard: ${report.summary.counts.critical} critical and ${report.summary.counts.warning} warning findings`,
    );
  }
}

run().catch((error: unknown) => {
  core.setFailed(error instanceof Error ? error.message : String(error));
});
