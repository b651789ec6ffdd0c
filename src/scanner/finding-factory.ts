import crypto from "node:crypto";
import { extractEvidence } from "./evidence.js";
import type { Finding, LogicalLine, RuleDefinition } from "./types.js";

export function createFinding(
  rule: RuleDefinition,
  filePath: string,
  line: LogicalLine,
  matchText: string,
  message: string,
): Finding {
  const evidence = extractEvidence(filePath, line, matchText);
  const id = createFindingId(
    rule.id,
    evidence.path,
    evidence.line,
    evidence.match,
  );
  return Object.freeze({
    id,
    rule_id: rule.id,
    severity: rule.severity,
    category: rule.category,
    title: rule.title,
    message,
    remediation: rule.remediation,
    evidence: Object.freeze(evidence),
  });
}

export function createFindingId(
  ruleId: string,
  relativePath: string,
  line: number,
  matchedText: string,
): string {
  const input = `${ruleId}:${relativePath}:${line}:${matchedText}`;
  const hash = crypto.createHash("sha256").update(input).digest("hex");
  return hash.slice(0, 12);
}
