import path from "node:path";
import { beforeAll, describe, expect, it } from "vitest";
import { ContextClassifier } from "../../src/scanner/context-classifier.js";
import { scanSource } from "../../src/scanner/rule-engine.js";
import { loadRules } from "../../src/scanner/rule-loader.js";
import {
  buildRuleSet,
  createPatternRule,
} from "../../src/scanner/rules/index.js";
import { readSource } from "../../src/scanner/source-lines.js";
import {
  Severity,
  type Finding,
  type LineRule,
  type RuleDefinition,
} from "../../src/scanner/types.js";

const FEATURE_PATTERNS = [/feature/i, /program/i, /arbitrage/i];

let definitions: RuleDefinition[];
let classifier: ContextClassifier;
let ruleSet: LineRule[];

beforeAll(async () => {
  const loaded = await loadRules(path.join(process.cwd(), "rules"));
  definitions = loaded.rules;
  classifier = new ContextClassifier(loaded.meta);
  ruleSet = buildRuleSet(definitions, { featurePatterns: FEATURE_PATTERNS });
});

function scan(source: string, filePath = "src/model.py"): Finding[] {
  return scanSource(filePath, source, ruleSet, classifier);
}

function summarize(
  findings: readonly Finding[],
): Array<[string, number, string]> {
  return findings.map((finding) => [
    finding.rule_id,
    finding.evidence.line,
    finding.evidence.match,
  ]);
}

describe("synthetic feature rule", () => {
  it("flags a random call assigned to a feature variable", () => {
    const findings = scan("feature_x = np.random.uniform(0, 1, 100)\n");

    expect(findings).toHaveLength(1);
    expect(findings[0]).toMatchObject({
      rule_id: "FD-FEATURE-001",
      severity: Severity.Critical,
      message: 'Random call np.random.uniform produces feature "feature_x"',
      evidence: {
        path: "src/model.py",
        line: 1,
        end_line: 1,
        snippet: "feature_x = np.random.uniform(0, 1, 100)",
        match: "np.random.uniform",
      },
    });
  });

  it("flags keyword arguments, dict keys and subscript keys", () => {
    const source = [
      "df = pd.DataFrame(dict(feature_a=np.random.rand(10)))",
      'row = {"feature_b": random.gauss(0, 1)}',
      'df["feature_c"] = torch.randn(5)',
    ].join("\n");

    expect(summarize(scan(source))).toEqual([
      ["FD-FEATURE-001", 1, "np.random.rand"],
      ["FD-FEATURE-001", 2, "random.gauss"],
      ["FD-FEATURE-001", 3, "torch.randn"],
    ]);
  });

  it("flags integer, choice and generator sampling calls", () => {
    const source = [
      "feature_a = np.random.randint(0, 10, 100)",
      "feature_b = np.random.choice(values, 100)",
      "feature_c = random.randint(1, 6)",
      "feature_d = np.random.default_rng().normal(0, 1, 100)",
      "feature_e = np.random.exponential(2.0, 100)",
      "feature_f = rng.integers(0, 5, size=10)",
      "feature_g = torch.randint(0, 3, (4,))",
    ].join("\n");

    expect(summarize(scan(source))).toEqual([
      ["FD-FEATURE-001", 1, "np.random.randint"],
      ["FD-FEATURE-001", 2, "np.random.choice"],
      ["FD-FEATURE-001", 3, "random.randint"],
      ["FD-FEATURE-001", 4, "np.random.default_rng().normal"],
      ["FD-FEATURE-001", 5, "np.random.exponential"],
      ["FD-FEATURE-001", 6, "rng.integers"],
      ["FD-FEATURE-001", 7, "torch.randint"],
    ]);
  });

  it("does not flag building a generator without sampling", () => {
    expect(scan("feature_rng = np.random.default_rng(seed)\n")).toEqual([]);
  });

  it("reports a multi-line statement at its first line", () => {
    const source = [
      "def build():",
      "    program_score = np.random.normal(",
      "        0,",
      "        1,",
      "    )",
    ].join("\n");
    const findings = scan(source);

    expect(summarize(findings)).toEqual([
      ["FD-FEATURE-001", 2, "np.random.normal"],
    ]);
    expect(findings[0]?.evidence.end_line).toBe(5);
  });

  it("ignores random values that do not feed a feature", () => {
    const source = [
      "noise = np.random.normal(0, 1, 10)",
      'label = "feature_x = np.random.rand()"',
      "# feature_y = np.random.rand()",
    ].join("\n");

    expect(scan(source)).toEqual([]);
  });

  it("uses the configured feature patterns", () => {
    const custom = buildRuleSet(definitions, { featurePatterns: [/signal/i] });
    const source =
      "signal_strength = np.random.rand()\nfeature_x = np.random.rand()\n";
    const findings = scanSource("src/model.py", source, custom, classifier);

    expect(summarize(findings)).toEqual([
      ["FD-FEATURE-001", 1, "np.random.rand"],
    ]);
  });
});

describe("exemptions", () => {
  it("produces nothing for test files", () => {
    const source = "feature_x = np.random.uniform(0, 1, 100)\n";

    expect(scan(source, "test_foo.py")).toEqual([]);
    expect(scan(source, "pkg/tests/helpers.py")).toEqual([]);
    expect(scan(source, "model_test.py")).toEqual([]);
  });

  it("skips seeding and shuffling lines", () => {
    const source = [
      "feature_seed = 1",
      "np.random.seed(42)",
      "rng = np.random.default_rng(42)",
      "feature_split = train_test_split(x, shuffle=True, random_state=42)",
      "feature_order = np.random.permutation(np.random.rand(10))",
    ].join("\n");

    expect(scan(source)).toEqual([]);
  });

  it("does not exempt a line because a comment mentions seeding", () => {
    const findings = scan("feature_x = np.random.rand(3)  # seed(1)\n");

    expect(summarize(findings)).toEqual([
      ["FD-FEATURE-001", 1, "np.random.rand"],
    ]);
  });
});

describe("exception hiding rule", () => {
  it("flags an inline bare except with pass", () => {
    const findings = scan("try: compute() except: pass\n");

    expect(findings).toHaveLength(1);
    expect(findings[0]).toMatchObject({
      rule_id: "FD-EXC-001",
      severity: Severity.Critical,
      message: 'Broad exception handler discards errors with "pass"',
      evidence: { line: 1, match: "except: pass" },
    });
  });

  it("flags a broad handler block whose only statement is pass", () => {
    const source = [
      "try:",
      "    compute()",
      "except Exception as exc:",
      "    pass",
    ].join("\n");

    expect(summarize(scan(source))).toEqual([
      ["FD-EXC-001", 3, "except Exception as exc: pass"],
    ]);
  });

  it("flags a tuple containing Exception with an ellipsis body", () => {
    const findings = scan(
      "try:\n    x()\nexcept (ValueError, Exception): ...\n",
    );

    expect(summarize(findings)).toEqual([
      ["FD-EXC-001", 3, "except (ValueError, Exception): ..."],
    ]);
  });

  it("ignores narrow handlers and handlers that do something", () => {
    const source = [
      "try:",
      "    compute()",
      "except ValueError:",
      "    pass",
      "try:",
      "    compute()",
      "except Exception:",
      '    logger.exception("compute failed")',
      "    raise",
    ].join("\n");

    expect(scan(source)).toEqual([]);
  });
});

describe("magic number rule", () => {
  it("flags a coefficient in a feature assignment", () => {
    const findings = scan("feature_score = 0.6 * raw_value\n");

    expect(findings).toHaveLength(1);
    expect(findings[0]).toMatchObject({
      rule_id: "FD-MAGIC-001",
      severity: Severity.Warning,
      message: 'Feature "feature_score" uses hardcoded coefficient 0.6',
      evidence: { match: "0.6" },
    });
  });

  it("flags augmented and annotated assignments", () => {
    const source = "feature_score *= 0.9\nfeature_w: float = 2.5 * x\n";

    expect(summarize(scan(source))).toEqual([
      ["FD-MAGIC-001", 1, "0.9"],
      ["FD-MAGIC-001", 2, "2.5"],
    ]);
  });

  it("ignores identity values, arguments, exponents and non-features", () => {
    const source = [
      "feature_count = feature_count + 1",
      "feature_ratio = compute(0.5)",
      "feature_sq = raw ** 2",
      "feature_neg = -0.5",
      "threshold = 0.6 * raw",
      'feature_label = "0.6 * x"',
    ].join("\n");

    expect(scan(source)).toEqual([]);
  });
});

describe("fake success rule", () => {
  it("flags unconditional success output", () => {
    const source = [
      'print("Training done")',
      'logger.info("Export completed")',
      'print("학습 완료")',
    ].join("\n");
    const findings = scan(source);

    expect(summarize(findings)).toEqual([
      ["FD-SUCCESS-001", 1, "Training done"],
      ["FD-SUCCESS-001", 2, "Export completed"],
      ["FD-SUCCESS-001", 3, "학습 완료"],
    ]);
    expect(findings[0]?.message).toBe(
      'Success message "Training done" is not backed by a result check',
    );
  });

  it("accepts messages behind a check", () => {
    const source = [
      "if result.ok:",
      '    print("Training done")',
      "assert model is not None",
      'print("saved successfully")',
      'print("done") if ok else None',
    ].join("\n");

    expect(scan(source)).toEqual([]);
  });

  it("flags messages inside loops", () => {
    const source = 'for batch in loader:\n    print("batch done")\n';

    expect(summarize(scan(source))).toEqual([
      ["FD-SUCCESS-001", 2, "batch done"],
    ]);
  });

  it("ignores output without a success phrase", () => {
    const source = 'print(status)\nprint("Loss: 0.3")\nprint("abandoned")\n';

    expect(scan(source)).toEqual([]);
  });
});

describe("supplementary rules", () => {
  it("flags a TODO stub", () => {
    const source = "def load_features():\n    pass  # TODO implement\n";

    expect(summarize(scan(source))).toEqual([["FD-TODO-001", 2, "pass"]]);
  });

  it("flags Faker outside tests", () => {
    const findings = scan("fake = Faker()\n");

    expect(findings).toHaveLength(1);
    expect(findings[0]).toMatchObject({
      rule_id: "FD-FAKER-001",
      severity: Severity.Warning,
      message: "Synthetic data library: Faker instantiation",
      evidence: { match: "Faker(" },
    });
  });

  it("runs custom rules from their patterns", () => {
    const rule = createPatternRule({
      id: "CUSTOM-001",
      title: "Pickled features",
      description: "Features are loaded from an opaque pickle",
      severity: Severity.Warning,
      category: "custom",
      remediation: "",
      patterns: [
        { regex: "\\bpickle\\.load\\s*\\(", description: "Unpickling" },
      ],
    });
    const lines = readSource('f = pickle.load(open("x.pkl", "rb"))');
    const [line] = lines;
    if (!line) {
      throw new Error("expected a logical line");
    }

    const findings = rule.evaluate({
      filePath: "a.py",
      line,
      index: 0,
      lines,
    });

    expect(findings.map((finding) => finding.message)).toEqual([
      "Pickled features: Unpickling",
    ]);
    expect(findings[0]?.evidence.match).toBe("pickle.load(");
  });
});
