import type { AggregateResult } from "../scanner/aggregator.js";
import type { Finding, ScanDiagnostic, Verdict } from "../scanner/types.js";

export interface ToolInfo {
  readonly name: "fakedata-guard";
  readonly version: string;
}

export interface TargetInfo {
  readonly inputs: readonly string[];
  readonly files_scanned: number;
  readonly staged?: boolean;
}

export interface SummaryCounts {
  readonly critical: number;
  readonly warning: number;
  readonly total: number;
}

export interface SummaryInfo {
  readonly verdict: Verdict;
  readonly strict: boolean;
  readonly counts: SummaryCounts;
  readonly rule_counts: Readonly<Record<string, number>>;
  readonly risk_index: number;
}

export interface ScanMetadata {
  readonly rules_loaded?: number;
  readonly rules_version?: string;
}

export interface ScanReport {
  readonly tool: ToolInfo;
  readonly target: TargetInfo;
  readonly summary: SummaryInfo;
  readonly findings: readonly Finding[];
  readonly diagnostics: readonly ScanDiagnostic[];
  readonly scan_metadata?: ScanMetadata;
}

export interface ReportInput {
  readonly toolVersion: string;
  readonly targets: readonly string[];
  readonly staged?: boolean;
  readonly aggregate: AggregateResult;
  readonly strict: boolean;
  readonly riskIndex: number;
  readonly scanMetadata?: ScanMetadata;
}

export type ReportFormat = "text" | "json" | "sarif";
