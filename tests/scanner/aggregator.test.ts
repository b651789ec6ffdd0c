import { describe, expect, it } from "vitest";
import {
  aggregateFindings,
  computeVerdict,
  Severity,
  sortFindings,
  type Finding,
} from "../../src/scanner/index.js";

const baseFinding: Finding = {
  id: "abc123",
  rule_id: "FD-MAGIC-001",
  severity: Severity.Warning,
  category: "heuristics",
  title: "Magic-number feature weighting",
  message: "coefficient",
  remediation: "",
  evidence: {
    path: "a.py",
    line: 1,
    end_line: 1,
    snippet: "feature = 2 * x",
    match: "2",
  },
};

function finding(
  id: string,
  overrides: Partial<Omit<Finding, "evidence">>,
  evidence: Partial<Finding["evidence"]> = {},
): Finding {
  return {
    ...baseFinding,
    ...overrides,
    id,
    evidence: { ...baseFinding.evidence, ...evidence },
  };
}

describe("finding aggregator", () => {
  it("orders by severity, path, line, rule and match", () => {
    const findings = [
      finding("w-b", {}, { path: "b.py" }),
      finding("w-a-2", {}, { line: 2 }),
      finding("c-z", { rule_id: "FD-EXC-001", severity: Severity.Critical }, {
        path: "z.py",
      }),
      finding("w-a-1-success", { rule_id: "FD-SUCCESS-001" }),
      finding("w-a-1-magic-3", {}, { match: "3" }),
      finding("w-a-1-magic-2", {}),
    ];

    expect(sortFindings(findings).map((item) => item.id)).toEqual([
      "c-z",
      "w-a-1-magic-2",
      "w-a-1-magic-3",
      "w-a-1-success",
      "w-a-2",
      "w-b",
    ]);
  });

  it("partitions and counts findings", () => {
    const result = aggregateFindings(
      [
        finding("1", {}),
        finding("2", { rule_id: "FD-EXC-001", severity: Severity.Critical }),
        finding("3", {}, { line: 4 }),
      ],
      {
        filesScanned: 2,
        diagnostics: [
          { path: "z.py", kind: "read-error", message: "denied" },
          { path: "m.py", kind: "decode-error", message: "bad bytes" },
        ],
      },
    );

    expect(result.counts).toEqual({ critical: 1, warning: 2, total: 3 });
    expect(result.bySeverity[Severity.Critical].map((item) => item.id)).toEqual(
      ["2"],
    );
    expect(result.bySeverity[Severity.Warning].map((item) => item.id)).toEqual([
      "1",
      "3",
    ]);
    expect(result.ruleCounts).toEqual({ "FD-EXC-001": 1, "FD-MAGIC-001": 2 });
    expect(result.diagnostics.map((item) => item.path)).toEqual([
      "m.py",
      "z.py",
    ]);
    expect(result.filesScanned).toBe(2);
  });

  it("passes an empty scan", () => {
    const result = aggregateFindings([], { filesScanned: 0 });

    expect(result.findings).toEqual([]);
    expect(computeVerdict(result, false)).toBe("PASS");
    expect(computeVerdict(result, true)).toBe("PASS");
  });

  it("fails on critical findings and on warnings only in strict mode", () => {
    const critical = aggregateFindings(
      [finding("1", { severity: Severity.Critical })],
      { filesScanned: 1 },
    );
    const warning = aggregateFindings([finding("2", {})], { filesScanned: 1 });

    expect(computeVerdict(critical, false)).toBe("FAIL");
    expect(computeVerdict(warning, false)).toBe("PASS");
    expect(computeVerdict(warning, true)).toBe("FAIL");
  });
});
