export const enum Severity {
  Critical = "CRITICAL",
  Warning = "WARNING",
}

export const SEVERITY_ORDER: readonly Severity[] = [
  Severity.Critical,
  Severity.Warning,
];

export interface RulePattern {
  readonly regex: string;
  readonly description: string;
}

export interface RuleDefinition {
  readonly id: string;
  readonly title: string;
  readonly description: string;
  readonly severity: Severity;
  readonly category: string;
  readonly remediation: string;
  readonly patterns: readonly RulePattern[];
}

export interface ExemptionMeta {
  readonly seed: readonly RulePattern[];
  readonly shuffle: readonly RulePattern[];
}

export interface RuleMeta {
  readonly rule_format_version: string;
  readonly file_type_extensions: Record<string, readonly string[]>;
  readonly default_excludes: readonly string[];
  readonly test_files: readonly string[];
  readonly exemptions: ExemptionMeta;
}

export interface Evidence {
  readonly path: string;
  readonly line: number;
  readonly end_line: number;
  readonly snippet: string;
  readonly match: string;
}

export interface Finding {
  readonly id: string;
  readonly rule_id: string;
  readonly severity: Severity;
  readonly category: string;
  readonly title: string;
  readonly message: string;
  readonly remediation: string;
  readonly evidence: Evidence;
}

export type DiagnosticKind = "missing-target" | "read-error" | "decode-error";

export interface ScanDiagnostic {
  readonly path: string;
  readonly kind: DiagnosticKind;
  readonly message: string;
}

export interface LogicalLine {
  readonly line: number;
  readonly endLine: number;
  readonly indent: number;
  readonly text: string;
  readonly code: string;
  readonly masked: string;
  readonly comment: string;
}

export interface RuleContext {
  readonly filePath: string;
  readonly line: LogicalLine;
  readonly index: number;
  readonly lines: readonly LogicalLine[];
}

export interface LineRule {
  readonly definition: RuleDefinition;
  evaluate(context: RuleContext): Finding[];
}

export type Verdict = "PASS" | "FAIL";
