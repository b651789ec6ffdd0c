import fs from "node:fs/promises";
import path from "node:path";
import {
  resolveConfig,
  type Environment,
  type ScanConfig,
} from "../config/config.js";
import { ConfigurationError } from "../config/errors.js";
import { walkTargets } from "../ingest/file-discovery.js";
import { listStagedFiles } from "../ingest/staged-files.js";
import { aggregateFindings } from "../scanner/aggregator.js";
import { ContextClassifier } from "../scanner/context-classifier.js";
import { scanFiles } from "../scanner/rule-engine.js";
import { loadRulesWithOverrides } from "../scanner/rule-loader.js";
import { buildRuleSet } from "../scanner/rules/index.js";
import type { RuleMeta, ScanDiagnostic, Verdict } from "../scanner/types.js";
import { calculateRiskIndex } from "../scoring/score-calculator.js";
import { renderGithubAnnotations } from "../report/github-reporter.js";
import { buildJsonReport, renderJsonReport } from "../report/json-reporter.js";
import { exitCodeForVerdict } from "../report/report-utils.js";
import { renderSarifReport } from "../report/sarif-reporter.js";
import { renderTextReport } from "../report/text-reporter.js";
import type { ReportFormat, ScanReport } from "../report/types.js";
import { resolveRulesDirectory } from "./runtime-paths.js";

export interface ScanCommandOptions {
  readonly paths: readonly string[];
  readonly format?: ReportFormat;
  readonly ci?: boolean;
  readonly strict?: boolean;
  readonly featurePatterns?: string;
  readonly exclude?: string;
  readonly rulesDir?: string;
  readonly staged?: boolean;
  readonly cwd?: string;
  readonly out?: string;
  readonly maxFindings?: number;
  readonly concurrency?: number;
  readonly color?: boolean;
  readonly showRemediation?: boolean;
  readonly env?: Environment;
}

export interface ScanCommandResult {
  readonly report: ScanReport;
  readonly output: string;
  readonly verdict: Verdict;
  readonly exitCode: number;
  readonly diagnostics: readonly ScanDiagnostic[];
}

export async function runScanCommand(
  options: ScanCommandOptions,
  toolVersion: string,
): Promise<ScanCommandResult> {
  const targets = await resolveTargets(options);
  const config = resolveConfig({
    targets,
    env: options.env ?? {},
    overrides: {
      featurePatterns: options.featurePatterns,
      exclude: options.exclude,
      strict: options.strict,
      ci: options.ci,
      concurrency: options.concurrency,
      rulesDir: options.rulesDir,
    },
  });

  const { rules: definitions, meta } = await loadRulesWithOverrides({
    baseDir: await resolveRulesDirectory(),
    overrideDir: config.rulesDir,
  });
  const classifier = new ContextClassifier(meta);
  const ruleSet = buildRuleSet(definitions, {
    featurePatterns: config.featurePatterns,
  });

  const outcome = await scanFiles(
    walkTargets(config.targets, {
      extensions: sourceExtensions(meta),
      excludePatterns: [...meta.default_excludes, ...config.excludePaths],
      cwd: options.cwd,
    }),
    ruleSet,
    classifier,
    { concurrency: config.concurrency },
  );
  if (
    config.targets.length > 0 &&
    outcome.missingTargets.length === config.targets.length
  ) {
    throw new ConfigurationError(
      `No scan target exists: ${config.targets.join(", ")}`,
    );
  }

  const aggregate = aggregateFindings(outcome.findings, {
    filesScanned: outcome.filesScanned,
    diagnostics: outcome.diagnostics,
  });
  const riskIndex = calculateRiskIndex(
    aggregate.findings,
    aggregate.filesScanned,
  );
  const report = buildJsonReport({
    toolVersion,
    targets: config.targets,
    staged: options.staged,
    aggregate,
    strict: config.strict,
    riskIndex,
    scanMetadata: {
      rules_loaded: definitions.length,
      rules_version: meta.rule_format_version,
    },
  });

  const output = buildOutput(report, config, options);
  if (options.out) {
    await fs.writeFile(options.out, output, "utf8");
  }

  const verdict = report.summary.verdict;
  return {
    report,
    output,
    verdict,
    exitCode: exitCodeForVerdict(verdict),
    diagnostics: report.diagnostics,
  };
}

async function resolveTargets(
  options: ScanCommandOptions,
): Promise<string[]> {
  const targets = [...options.paths];
  if (options.staged) {
    const cwd = options.cwd ?? process.cwd();
    const staged = await listStagedFiles(cwd);
    const inProcessCwd = path.resolve(cwd) === process.cwd();
    targets.push(
      ...staged.map((file) => (inProcessCwd ? file : path.join(cwd, file))),
    );
    return targets;
  }
  return targets.length > 0 ? targets : ["."];
}

function sourceExtensions(meta: RuleMeta): string[] {
  return Array.from(
    new Set(Object.values(meta.file_type_extensions).flat()),
  ).sort();
}

function buildOutput(
  report: ScanReport,
  config: ScanConfig,
  options: ScanCommandOptions,
): string {
  if (config.ci) {
    return renderGithubAnnotations(report);
  }
  switch (options.format ?? "text") {
    case "json":
      return renderJsonReport(report);
    case "sarif":
      return renderSarifReport(report);
    case "text":
      return renderTextReport(report, {
        color: options.color ?? false,
        maxFindings: options.maxFindings,
        showRemediation: options.showRemediation,
      });
  }
}
