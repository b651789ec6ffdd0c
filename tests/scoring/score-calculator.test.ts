import { describe, expect, it } from "vitest";
import { calculateRiskIndex } from "../../src/scoring/index.js";
import { Severity } from "../../src/scanner/types.js";
import type { Finding } from "../../src/scanner/types.js";

const baseFinding: Finding = {
  id: "abc123",
  rule_id: "FD-MAGIC-001",
  severity: Severity.Warning,
  category: "heuristics",
  title: "Magic-number feature weighting",
  message: "Test",
  remediation: "Test",
  evidence: {
    path: "model.py",
    line: 1,
    end_line: 1,
    snippet: "feature_score = 0.6 * raw",
    match: "0.6",
  },
};

describe("risk index", () => {
  it("returns zero for an empty scan", () => {
    expect(calculateRiskIndex([], 0)).toBe(0);
  });

  it("weights severities and averages over scanned files", () => {
    const findings: Finding[] = [
      {
        ...baseFinding,
        id: "1",
        rule_id: "FD-FEATURE-001",
        severity: Severity.Critical,
        category: "synthetic-data",
      },
      { ...baseFinding, id: "2" },
    ];

    expect(calculateRiskIndex(findings, 3)).toBe(4.33);
  });

  it("treats zero scanned files as one", () => {
    expect(calculateRiskIndex([baseFinding, baseFinding], 0)).toBe(6);
  });
});
