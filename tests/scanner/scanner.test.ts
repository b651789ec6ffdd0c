import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeAll, beforeEach, describe, expect, it } from "vitest";
import { walkTargets } from "../../src/ingest/file-discovery.js";
import { aggregateFindings } from "../../src/scanner/aggregator.js";
import { ContextClassifier } from "../../src/scanner/context-classifier.js";
import { createFindingId } from "../../src/scanner/finding-factory.js";
import { scanFile, scanFiles } from "../../src/scanner/rule-engine.js";
import { loadRules } from "../../src/scanner/rule-loader.js";
import { buildRuleSet } from "../../src/scanner/rules/index.js";
import type { LineRule, RuleMeta } from "../../src/scanner/types.js";

let tempDir: string;
let meta: RuleMeta;
let classifier: ContextClassifier;
let ruleSet: LineRule[];

beforeAll(async () => {
  const loaded = await loadRules(path.join(process.cwd(), "rules"));
  meta = loaded.meta;
  classifier = new ContextClassifier(meta);
  ruleSet = buildRuleSet(loaded.rules, { featurePatterns: [/feature/i] });
});

beforeEach(async () => {
  tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "fakedata-guard-scan-"));
});

afterEach(async () => {
  if (tempDir) {
    await fs.rm(tempDir, { recursive: true, force: true });
  }
});

function walk(targets: readonly string[]) {
  return walkTargets(targets, {
    extensions: [".py"],
    excludePatterns: meta.default_excludes,
  });
}

describe("rule engine", () => {
  it("scans a tree and skips test files", async () => {
    await writeText(
      path.join(tempDir, "src", "features.py"),
      "feature_x = np.random.uniform(0, 1, 100)\n",
    );
    await writeText(
      path.join(tempDir, "src", "weights.py"),
      "feature_score = 0.6 * raw_value\n",
    );
    await writeText(
      path.join(tempDir, "tests", "test_features.py"),
      "feature_x = np.random.uniform(0, 1, 100)\n",
    );

    const outcome = await scanFiles(walk([tempDir]), ruleSet, classifier, {
      concurrency: 4,
    });
    const aggregate = aggregateFindings(outcome.findings, outcome);

    expect(outcome.filesScanned).toBe(3);
    expect(outcome.diagnostics).toEqual([]);
    expect(
      aggregate.findings.map((finding) => [
        finding.rule_id,
        finding.evidence.path,
      ]),
    ).toEqual([
      ["FD-FEATURE-001", `${tempDir}/src/features.py`],
      ["FD-MAGIC-001", `${tempDir}/src/weights.py`],
    ]);
  });

  it("records missing targets as diagnostics", async () => {
    const missing = path.join(tempDir, "nope");

    const outcome = await scanFiles(walk([missing]), ruleSet, classifier);

    expect(outcome.missingTargets).toEqual([missing]);
    expect(outcome.diagnostics).toEqual([
      {
        path: missing,
        kind: "missing-target",
        message: "target does not exist",
      },
    ]);
    expect(outcome.filesScanned).toBe(0);
  });

  it("turns undecodable files into diagnostics and keeps scanning", async () => {
    await fs.writeFile(
      path.join(tempDir, "bad.py"),
      Buffer.from([0x66, 0x3d, 0xff]),
    );
    await writeText(
      path.join(tempDir, "good.py"),
      "try: compute() except: pass\n",
    );

    const outcome = await scanFiles(walk([tempDir]), ruleSet, classifier, {
      concurrency: 2,
    });

    expect(outcome.diagnostics).toEqual([
      {
        path: `${tempDir}/bad.py`,
        kind: "decode-error",
        message: "file is not valid UTF-8",
      },
    ]);
    expect(outcome.filesScanned).toBe(1);
    expect(outcome.findings.map((finding) => finding.rule_id)).toEqual([
      "FD-EXC-001",
    ]);
  });

  it("classifies test files on the path below the scan root", async () => {
    const absolutePath = path.join(tempDir, "model.py");
    await writeText(absolutePath, "feature_x = torch.rand(3)\n");

    const underTestsAncestor = await scanFile(
      {
        absolutePath,
        relativePath: "src/model.py",
        displayPath: "/work/tests/repo/src/model.py",
      },
      ruleSet,
      classifier,
    );
    const insideTests = await scanFile(
      {
        absolutePath,
        relativePath: "tests/model.py",
        displayPath: "repo/tests/model.py",
      },
      ruleSet,
      classifier,
    );

    expect(underTestsAncestor.findings.map((f) => f.evidence.path)).toEqual([
      "/work/tests/repo/src/model.py",
    ]);
    expect(insideTests.findings).toEqual([]);
  });

  it("scans a single file entry with stable finding ids", async () => {
    const absolutePath = path.join(tempDir, "model.py");
    await writeText(absolutePath, "\n\nfeature_x = torch.rand(3)\n");

    const result = await scanFile(
      {
        absolutePath,
        relativePath: "model.py",
        displayPath: "pkg/model.py",
      },
      ruleSet,
      classifier,
    );

    expect(result.diagnostic).toBeUndefined();
    expect(result.findings).toHaveLength(1);
    expect(result.findings[0]?.id).toBe(
      createFindingId("FD-FEATURE-001", "pkg/model.py", 3, "torch.rand"),
    );
  });

  it("is deterministic across runs and concurrency levels", async () => {
    for (let i = 0; i < 6; i += 1) {
      await writeText(
        path.join(tempDir, `mod_${i}.py`),
        [
          `feature_${i} = np.random.rand(${i + 2})`,
          `feature_w${i} = ${i + 2}.5 * raw`,
          'print("done")',
        ].join("\n"),
      );
    }

    const sequential = await scanFiles(walk([tempDir]), ruleSet, classifier, {
      concurrency: 1,
    });
    const parallel = await scanFiles(walk([tempDir]), ruleSet, classifier, {
      concurrency: 4,
    });

    const first = aggregateFindings(sequential.findings, sequential);
    const second = aggregateFindings(parallel.findings, parallel);
    expect(first.findings).toHaveLength(18);
    expect(second.findings).toEqual(first.findings);
  });
});

async function writeText(filePath: string, content: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, content, "utf8");
}
