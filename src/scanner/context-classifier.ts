import {
  compilePathPatterns,
  isPathExcluded,
  type PathPattern,
} from "../ingest/path-patterns.js";
import { readSource } from "./source-lines.js";
import type { LogicalLine, RuleMeta, RulePattern } from "./types.js";

export type ExemptionReason = "test-file" | "seed" | "shuffle";

export class ContextClassifier {
  private readonly testFilePatterns: readonly PathPattern[];
  private readonly seedPatterns: readonly RegExp[];
  private readonly shufflePatterns: readonly RegExp[];

  constructor(meta: RuleMeta) {
    this.testFilePatterns = compilePathPatterns(meta.test_files);
    this.seedPatterns = compile(meta.exemptions.seed);
    this.shufflePatterns = compile(meta.exemptions.shuffle);
  }

  isTestFile(filePath: string): boolean {
    return isPathExcluded(filePath, this.testFilePatterns);
  }

  lineExemption(line: LogicalLine): ExemptionReason | null {
    if (this.seedPatterns.some((pattern) => pattern.test(line.masked))) {
      return "seed";
    }
    if (this.shufflePatterns.some((pattern) => pattern.test(line.masked))) {
      return "shuffle";
    }
    return null;
  }

  exemptionFor(filePath: string, lineText: string): ExemptionReason | null {
    if (this.isTestFile(filePath)) {
      return "test-file";
    }
    for (const line of readSource(lineText)) {
      const reason = this.lineExemption(line);
      if (reason) {
        return reason;
      }
    }
    return null;
  }

  isExempt(filePath: string, lineText: string): boolean {
    return this.exemptionFor(filePath, lineText) !== null;
  }
}

function compile(patterns: readonly RulePattern[]): RegExp[] {
  return patterns.map((pattern) => new RegExp(pattern.regex));
}
