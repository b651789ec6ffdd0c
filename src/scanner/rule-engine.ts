import fs from "node:fs/promises";
import type { FileEntry, WalkItem } from "../ingest/types.js";
import type { ContextClassifier } from "./context-classifier.js";
import { readSource } from "./source-lines.js";
import type { Finding, LineRule, ScanDiagnostic } from "./types.js";

export interface ScanOptions {
  readonly concurrency?: number;
}

export interface ScanOutcome {
  readonly findings: Finding[];
  readonly diagnostics: ScanDiagnostic[];
  readonly filesScanned: number;
  readonly missingTargets: string[];
}

export interface SourceScanOptions {
  readonly classifyAs?: string;
}

export interface FileScanResult {
  readonly findings: Finding[];
  readonly diagnostic?: ScanDiagnostic;
}

interface WorkerResult {
  findings: Finding[];
  diagnostics: ScanDiagnostic[];
  filesScanned: number;
  missingTargets: string[];
}

/**
 * Scan a walker stream with up to `concurrency` workers sharing one iterator.
 */
export async function scanFiles(
  items: AsyncIterable<WalkItem>,
  rules: readonly LineRule[],
  classifier: ContextClassifier,
  options: ScanOptions = {},
): Promise<ScanOutcome> {
  const iterator = items[Symbol.asyncIterator]();
  const workerCount = Math.max(1, options.concurrency ?? 1);

  const worker = async (): Promise<WorkerResult> => {
    const local: WorkerResult = {
      findings: [],
      diagnostics: [],
      filesScanned: 0,
      missingTargets: [],
    };
    for (;;) {
      const next = await iterator.next();
      if (next.done) {
        return local;
      }
      const item = next.value;
      if (item.kind === "missing") {
        local.missingTargets.push(item.target);
        local.diagnostics.push({
          path: item.target,
          kind: "missing-target",
          message: "target does not exist",
        });
        continue;
      }
      if (item.kind === "error") {
        local.diagnostics.push({
          path: item.path,
          kind: "read-error",
          message: item.message,
        });
        continue;
      }

      const result = await scanFile(item.file, rules, classifier);
      if (result.diagnostic) {
        local.diagnostics.push(result.diagnostic);
      } else {
        local.filesScanned += 1;
      }
      local.findings.push(...result.findings);
    }
  };

  const results = await Promise.all(
    Array.from({ length: workerCount }, () => worker()),
  );

  const findings: Finding[] = [];
  const seenIds = new Set<string>();
  const diagnostics: ScanDiagnostic[] = [];
  const missingTargets: string[] = [];
  let filesScanned = 0;
  for (const result of results) {
    for (const finding of result.findings) {
      if (seenIds.has(finding.id)) {
        continue;
      }
      seenIds.add(finding.id);
      findings.push(finding);
    }
    diagnostics.push(...result.diagnostics);
    missingTargets.push(...result.missingTargets);
    filesScanned += result.filesScanned;
  }

  return { findings, diagnostics, filesScanned, missingTargets };
}

export async function scanFile(
  file: FileEntry,
  rules: readonly LineRule[],
  classifier: ContextClassifier,
): Promise<FileScanResult> {
  if (classifier.isTestFile(file.relativePath)) {
    return { findings: [] };
  }

  let buffer: Buffer;
  try {
    buffer = await fs.readFile(file.absolutePath);
  } catch (error) {
    return {
      findings: [],
      diagnostic: {
        path: file.displayPath,
        kind: "read-error",
        message: describeError(error),
      },
    };
  }

  let source: string;
  try {
    source = new TextDecoder("utf-8", { fatal: true }).decode(buffer);
  } catch {
    return {
      findings: [],
      diagnostic: {
        path: file.displayPath,
        kind: "decode-error",
        message: "file is not valid UTF-8",
      },
    };
  }

  return {
    findings: scanSource(file.displayPath, source, rules, classifier, {
      classifyAs: file.relativePath,
    }),
  };
}

// `classifyAs` is the path test-file globs see; defaults to `filePath`.
export function scanSource(
  filePath: string,
  source: string,
  rules: readonly LineRule[],
  classifier: ContextClassifier,
  options: SourceScanOptions = {},
): Finding[] {
  if (classifier.isTestFile(options.classifyAs ?? filePath)) {
    return [];
  }

  const lines = readSource(source);
  const findings: Finding[] = [];
  lines.forEach((line, index) => {
    if (classifier.lineExemption(line)) {
      return;
    }
    for (const rule of rules) {
      findings.push(...rule.evaluate({ filePath, line, index, lines }));
    }
  });
  return findings;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
