import { createFinding } from "../finding-factory.js";
import { compileRulePatterns } from "../rule-loader.js";
import type { Finding, LineRule, RuleDefinition } from "../types.js";

const PASS_STATEMENT = /(?:^|:)\s*pass$/;

export function createTodoStubRule(definition: RuleDefinition): LineRule {
  const markers = compileRulePatterns(definition, "");

  return {
    definition,
    evaluate({ filePath, line }): Finding[] {
      if (!PASS_STATEMENT.test(line.masked.trim())) {
        return [];
      }
      if (!markers.some((pattern) => pattern.test(line.comment))) {
        return [];
      }
      return [
        createFinding(
          definition,
          filePath,
          line,
          "pass",
          "TODO stub ships as a silent no-op",
        ),
      ];
    },
  };
}
