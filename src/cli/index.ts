#!/usr/bin/env node
import { Command } from "commander";
import { ConfigurationError } from "../config/errors.js";
import type { ReportFormat } from "../report/types.js";
import { loadToolVersion } from "./runtime-paths.js";
import { runScanCommand } from "./scan-command.js";

const INTERNAL_ERROR_EXIT_CODE = 2;

interface CliOptions {
  readonly strict?: boolean;
  readonly ci?: boolean;
  readonly format: string;
  readonly featurePatterns?: string;
  readonly exclude?: string;
  readonly rules?: string;
  readonly staged?: boolean;
  readonly out?: string;
  readonly maxFindings?: string;
  readonly concurrency?: string;
  readonly color: boolean;
  readonly remediation?: boolean;
  readonly quiet?: boolean;
  readonly verbose?: boolean;
}

const program = new Command();
const toolVersion = await loadToolVersion();

program
  .name("fakedata-guard")
  .description("Block synthetic and fabricated data in Python feature code")
  .version(toolVersion)
  .argument("[paths...]", "Files or directories to scan (default: .)")
  .option("--strict", "Fail on WARNING findings too")
  .option("--ci", "Emit GitHub Actions annotations")
  .option("--format <format>", "Output format (text|json|sarif)", "text")
  .option(
    "--feature-patterns <list>",
    "Comma-separated feature name patterns (overrides FAKE_DATA_FEATURE_PATTERNS)",
  )
  .option(
    "--exclude <list>",
    "Comma-separated exclude globs (overrides FAKE_DATA_EXCLUDE_PATHS)",
  )
  .option(
    "--rules <path>",
    "Custom rules directory merged over the built-in one",
  )
  .option("--staged", "Scan files staged in the git index")
  .option("--out <file>", "Write report to file")
  .option("--max-findings <number>", "Limit findings in text output")
  .option("--concurrency <number>", "Files scanned in parallel")
  .option("--remediation", "Show remediation advice in text output")
  .option("--no-color", "Disable colored output")
  .option("--quiet", "Suppress diagnostics on stderr")
  .option("--verbose", "Log diagnostics and timing to stderr")
  .action(async (paths: string[], options: CliOptions) => {
    const startedAt = Date.now();
    try {
      const result = await runScanCommand(
        {
          paths,
          format: parseFormat(options.format),
          ci: options.ci,
          strict: options.strict,
          featurePatterns: options.featurePatterns,
          exclude: options.exclude,
          rulesDir: options.rules,
          staged: options.staged,
          out: options.out,
          maxFindings: parseCount("--max-findings", options.maxFindings),
          concurrency: parseCount("--concurrency", options.concurrency),
          color: options.color && Boolean(process.stdout.isTTY),
          showRemediation: options.remediation,
          env: process.env,
        },
        toolVersion,
      );

      if (!options.out) {
        await writeStdout(result.output + "\n");
      }
      if (!options.quiet) {
        for (const diagnostic of result.diagnostics) {
          await writeError(
            `warning: ${diagnostic.path}: ${diagnostic.message}`,
          );
        }
      }
      if (options.verbose) {
        const { counts } = result.report.summary;
        await writeError(
          `scanned ${result.report.target.files_scanned} files in ${Date.now() - startedAt}ms: ${counts.critical} critical, ${counts.warning} warning, verdict ${result.verdict}`,
        );
      }
      process.exitCode = result.exitCode;
    } catch (error) {
      await writeError(describeError(error));
      process.exitCode =
        error instanceof ConfigurationError
          ? error.exitCode
          : INTERNAL_ERROR_EXIT_CODE;
    }
  });

function parseFormat(value: string): ReportFormat {
  if (value === "text" || value === "json" || value === "sarif") {
    return value;
  }
  throw new ConfigurationError(`Unsupported format: ${value}`);
}

function parseCount(flag: string, value?: string): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new ConfigurationError(
      `${flag} must be a positive integer, got ${value}`,
    );
  }
  return parsed;
}

async function writeStdout(message: string): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    process.stdout.write(message, (error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}

async function writeError(message: string): Promise<void> {
  await new Promise<void>((resolve) => {
    process.stderr.write(message + "\n", () => resolve());
  });
}

function describeError(error: unknown): string {
  if (error instanceof ConfigurationError) {
    return `configuration error: ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}

const argv = [...process.argv];
const separatorIndex = argv.indexOf("--");
if (separatorIndex !== -1) {
  argv.splice(separatorIndex, 1);
}

await program.parseAsync(argv);
