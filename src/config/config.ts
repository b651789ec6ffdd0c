import os from "node:os";
import { ConfigurationError } from "./errors.js";

export const DEFAULT_FEATURE_PATTERNS: readonly string[] = [
  "feature",
  "program",
  "arbitrage",
];

export const ENV_FEATURE_PATTERNS = "FAKE_DATA_FEATURE_PATTERNS";
export const ENV_EXCLUDE_PATHS = "FAKE_DATA_EXCLUDE_PATHS";
export const ENV_STRICT = "FAKE_DATA_STRICT";

const MAX_DEFAULT_CONCURRENCY = 8;

export type Environment = Readonly<Record<string, string | undefined>>;

export interface ScanConfig {
  readonly targets: readonly string[];
  readonly featurePatternSources: readonly string[];
  readonly featurePatterns: readonly RegExp[];
  readonly excludePaths: readonly string[];
  readonly strict: boolean;
  readonly ci: boolean;
  readonly concurrency: number;
  readonly rulesDir?: string;
}

export interface ConfigOverrides {
  readonly featurePatterns?: string;
  readonly exclude?: string;
  readonly strict?: boolean;
  readonly ci?: boolean;
  readonly concurrency?: number;
  readonly rulesDir?: string;
}

export interface ResolveConfigInput {
  readonly targets: readonly string[];
  readonly env?: Environment;
  readonly overrides?: ConfigOverrides;
}

/**
 * Resolve the scan configuration: defaults, then environment, then overrides.
 */
export function resolveConfig(input: ResolveConfigInput): ScanConfig {
  const env = input.env ?? {};
  const overrides = input.overrides ?? {};
  const errors: string[] = [];

  const patternSources = resolvePatternSources(
    overrides.featurePatterns ?? env[ENV_FEATURE_PATTERNS],
  );
  const featurePatterns = compileFeaturePatterns(patternSources, errors);
  const excludePaths = splitList(overrides.exclude ?? env[ENV_EXCLUDE_PATHS]);
  const strict = overrides.strict ?? parseFlag(env[ENV_STRICT]);
  const concurrency = overrides.concurrency ?? defaultConcurrency();

  if (!Number.isInteger(concurrency) || concurrency < 1) {
    errors.push(`concurrency must be a positive integer, got ${concurrency}`);
  }

  if (errors.length > 0) {
    throw new ConfigurationError(`Invalid configuration: ${errors.join("; ")}`);
  }

  const config: ScanConfig = {
    targets: Object.freeze([...input.targets]),
    featurePatternSources: Object.freeze(patternSources),
    featurePatterns: Object.freeze(featurePatterns),
    excludePaths: Object.freeze(excludePaths),
    strict,
    ci: overrides.ci ?? false,
    concurrency,
    ...(overrides.rulesDir ? { rulesDir: overrides.rulesDir } : {}),
  };
  return Object.freeze(config);
}

export function splitList(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  return value
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

function resolvePatternSources(value: string | undefined): string[] {
  const sources = splitList(value);
  return sources.length > 0 ? sources : [...DEFAULT_FEATURE_PATTERNS];
}

function compileFeaturePatterns(
  sources: readonly string[],
  errors: string[],
): RegExp[] {
  const patterns: RegExp[] = [];
  for (const source of sources) {
    try {
      patterns.push(new RegExp(source, "i"));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      errors.push(`feature pattern "${source}" is not a valid regex (${reason})`);
    }
  }
  return patterns;
}

function parseFlag(value: string | undefined): boolean {
  if (!value) {
    return false;
  }
  const normalized = value.trim().toLowerCase();
  return normalized === "1" || normalized === "true" || normalized === "yes";
}

function defaultConcurrency(): number {
  return Math.max(
    1,
    Math.min(os.availableParallelism(), MAX_DEFAULT_CONCURRENCY),
  );
}
