import fs from "node:fs/promises";
import type { Dirent } from "node:fs";
import path from "node:path";
import yaml from "js-yaml";
import { ConfigurationError } from "../config/errors.js";
import {
  Severity,
  type ExemptionMeta,
  type RuleDefinition,
  type RuleMeta,
  type RulePattern,
} from "./types.js";

export interface LoadedRules {
  readonly rules: RuleDefinition[];
  readonly meta: RuleMeta;
}

export interface LoadRulesOptions {
  readonly baseDir: string;
  readonly overrideDir?: string;
}

const SEVERITIES = new Set<string>([Severity.Critical, Severity.Warning]);

export async function loadRulesWithOverrides(
  options: LoadRulesOptions,
): Promise<LoadedRules> {
  const base = await loadRules(options.baseDir);
  if (!options.overrideDir) {
    return base;
  }

  const override = await loadRuleDirectory(options.overrideDir, false);
  return {
    rules: mergeRules(base.rules, override.rules),
    meta: override.meta ? mergeMeta(base.meta, override.meta) : base.meta,
  };
}

export async function loadRules(rulesDir: string): Promise<LoadedRules> {
  const loaded = await loadRuleDirectory(rulesDir, true);
  if (!loaded.meta) {
    throw new ConfigurationError(`Missing _meta.yaml in ${rulesDir}`);
  }
  return { rules: loaded.rules, meta: loaded.meta };
}

export function compileRulePatterns(
  rule: RuleDefinition,
  flags = "i",
): RegExp[] {
  return rule.patterns.map((pattern) => new RegExp(pattern.regex, flags));
}

async function loadRuleDirectory(
  rulesDir: string,
  requireMeta: boolean,
): Promise<{ rules: RuleDefinition[]; meta: RuleMeta | null }> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(rulesDir, { withFileTypes: true });
  } catch (error) {
    throw new ConfigurationError(
      `Unable to read rules directory ${rulesDir}: ${describeError(error)}`,
    );
  }

  const metaPath = path.join(rulesDir, "_meta.yaml");
  const hasMeta = entries.some(
    (entry) => entry.isFile() && entry.name === "_meta.yaml",
  );
  if (!hasMeta && requireMeta) {
    throw new ConfigurationError(`Missing _meta.yaml in ${rulesDir}`);
  }
  const meta = hasMeta ? parseMeta(await loadYaml(metaPath), metaPath) : null;

  const rules: RuleDefinition[] = [];
  const fileNames = entries
    .filter((entry) => entry.isFile())
    .map((entry) => entry.name)
    .filter((name) => name.endsWith(".yaml") && name !== "_meta.yaml")
    .sort();

  for (const fileName of fileNames) {
    const filePath = path.join(rulesDir, fileName);
    const doc = await loadYaml(filePath);
    if (!isRecord(doc)) {
      throw new ConfigurationError(`Invalid rule file format: ${filePath}`);
    }
    const ruleList = doc.rules ?? [];
    if (!Array.isArray(ruleList)) {
      throw new ConfigurationError(`"rules" must be a list in ${filePath}`);
    }
    for (const entry of ruleList) {
      rules.push(parseRule(entry, filePath));
    }
  }

  rules.sort((a, b) => a.id.localeCompare(b.id));
  return { rules, meta };
}

async function loadYaml(filePath: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (error) {
    throw new ConfigurationError(
      `Unable to read ${filePath}: ${describeError(error)}`,
    );
  }
  try {
    return yaml.load(raw);
  } catch (error) {
    throw new ConfigurationError(
      `Invalid YAML in ${filePath}: ${describeError(error)}`,
    );
  }
}

function parseRule(input: unknown, filePath: string): RuleDefinition {
  if (!isRecord(input)) {
    throw new ConfigurationError(`Rule entry must be a mapping in ${filePath}`);
  }
  const { id, title, description, severity, category, remediation } = input;
  if (
    typeof id !== "string" ||
    typeof title !== "string" ||
    typeof description !== "string"
  ) {
    throw new ConfigurationError(`Rule missing required fields in ${filePath}`);
  }
  if (typeof severity !== "string" || !isSeverity(severity)) {
    throw new ConfigurationError(
      `Rule ${id} has invalid severity in ${filePath}; expected CRITICAL or WARNING`,
    );
  }
  const patterns = parsePatterns(input.patterns, `rule ${id}`, filePath);
  if (patterns.length === 0) {
    throw new ConfigurationError(`Rule ${id} patterns missing in ${filePath}`);
  }

  return {
    id,
    title,
    description,
    severity,
    category: typeof category === "string" ? category : "custom",
    remediation: typeof remediation === "string" ? remediation : "",
    patterns,
  };
}

function parseMeta(input: unknown, metaPath: string): RuleMeta {
  if (!isRecord(input)) {
    throw new ConfigurationError(`Invalid rules meta format: ${metaPath}`);
  }
  const version = input.rule_format_version;
  if (typeof version !== "string" || !version) {
    throw new ConfigurationError(`Missing rule_format_version in ${metaPath}`);
  }
  const extensions = input.file_type_extensions;
  if (!isRecord(extensions)) {
    throw new ConfigurationError(`Missing file_type_extensions in ${metaPath}`);
  }

  const fileTypeExtensions: Record<string, readonly string[]> = {};
  for (const [type, values] of Object.entries(extensions)) {
    fileTypeExtensions[type] = parseStringList(
      values,
      `file_type_extensions.${type}`,
      metaPath,
    );
  }

  return {
    rule_format_version: version,
    file_type_extensions: fileTypeExtensions,
    default_excludes: parseStringList(
      input.default_excludes ?? [],
      "default_excludes",
      metaPath,
    ),
    test_files: parseStringList(
      input.test_files ?? [],
      "test_files",
      metaPath,
    ),
    exemptions: parseExemptions(input.exemptions, metaPath),
  };
}

function parseExemptions(input: unknown, metaPath: string): ExemptionMeta {
  const record = isRecord(input) ? input : {};
  return {
    seed: parsePatterns(record.seed ?? [], "exemptions.seed", metaPath),
    shuffle: parsePatterns(
      record.shuffle ?? [],
      "exemptions.shuffle",
      metaPath,
    ),
  };
}

function parsePatterns(
  input: unknown,
  label: string,
  filePath: string,
): RulePattern[] {
  if (!Array.isArray(input)) {
    throw new ConfigurationError(`${label} must be a list in ${filePath}`);
  }
  return input.map((entry) => {
    if (
      !isRecord(entry) ||
      typeof entry.regex !== "string" ||
      typeof entry.description !== "string"
    ) {
      throw new ConfigurationError(
        `${label} pattern missing regex/description in ${filePath}`,
      );
    }
    try {
      new RegExp(entry.regex);
    } catch (error) {
      throw new ConfigurationError(
        `${label} has an invalid regex in ${filePath}: ${describeError(error)}`,
      );
    }
    return { regex: entry.regex, description: entry.description };
  });
}

function parseStringList(
  input: unknown,
  label: string,
  filePath: string,
): string[] {
  if (
    !Array.isArray(input) ||
    !input.every((value): value is string => typeof value === "string")
  ) {
    throw new ConfigurationError(
      `${label} must be a list of strings in ${filePath}`,
    );
  }
  return [...input];
}

function mergeRules(
  baseRules: readonly RuleDefinition[],
  overrideRules: readonly RuleDefinition[],
): RuleDefinition[] {
  const merged = new Map<string, RuleDefinition>();
  for (const rule of baseRules) {
    merged.set(rule.id, rule);
  }
  for (const rule of overrideRules) {
    merged.set(rule.id, rule);
  }
  return Array.from(merged.values()).sort((a, b) => a.id.localeCompare(b.id));
}

function mergeMeta(base: RuleMeta, override: RuleMeta): RuleMeta {
  return {
    rule_format_version: override.rule_format_version,
    file_type_extensions: {
      ...base.file_type_extensions,
      ...override.file_type_extensions,
    },
    default_excludes: union(base.default_excludes, override.default_excludes),
    test_files: union(base.test_files, override.test_files),
    exemptions: {
      seed: [...base.exemptions.seed, ...override.exemptions.seed],
      shuffle: [...base.exemptions.shuffle, ...override.exemptions.shuffle],
    },
  };
}

function union(
  base: readonly string[],
  override: readonly string[],
): string[] {
  return Array.from(new Set([...base, ...override]));
}

function isSeverity(value: string): value is Severity {
  return SEVERITIES.has(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
