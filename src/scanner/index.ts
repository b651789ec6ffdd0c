export {
  compileRulePatterns,
  loadRules,
  loadRulesWithOverrides,
} from "./rule-loader.js";
export type { LoadedRules, LoadRulesOptions } from "./rule-loader.js";
export { scanFile, scanFiles, scanSource } from "./rule-engine.js";
export type {
  FileScanResult,
  ScanOptions,
  ScanOutcome,
  SourceScanOptions,
} from "./rule-engine.js";
export {
  aggregateFindings,
  computeVerdict,
  sortFindings,
} from "./aggregator.js";
export type {
  AggregateInput,
  AggregateResult,
  SeverityCounts,
} from "./aggregator.js";
export { ContextClassifier } from "./context-classifier.js";
export type { ExemptionReason } from "./context-classifier.js";
export { readSource, stringLiterals, STRING_MASK } from "./source-lines.js";
export { extractEvidence } from "./evidence.js";
export { createFinding, createFindingId } from "./finding-factory.js";
export { BUILT_IN_RULES, buildRuleSet } from "./rules/index.js";
export type { RuleSettings } from "./rules/index.js";
export type {
  DiagnosticKind,
  Evidence,
  Finding,
  LineRule,
  LogicalLine,
  RuleContext,
  RuleDefinition,
  RuleMeta,
  RulePattern,
  ScanDiagnostic,
  Verdict,
} from "./types.js";
export { SEVERITY_ORDER, Severity } from "./types.js";
