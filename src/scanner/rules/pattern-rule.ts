import { createFinding } from "../finding-factory.js";
import { compileRulePatterns } from "../rule-loader.js";
import type { Finding, LineRule, RuleDefinition } from "../types.js";

export function createPatternRule(definition: RuleDefinition): LineRule {
  const patterns = compileRulePatterns(definition);

  return {
    definition,
    evaluate({ filePath, line }): Finding[] {
      for (const [index, pattern] of patterns.entries()) {
        const match = pattern.exec(line.masked);
        if (!match) {
          continue;
        }
        const description =
          definition.patterns[index]?.description ?? definition.title;
        return [
          createFinding(
            definition,
            filePath,
            line,
            line.code.slice(match.index, match.index + match[0].length),
            `${definition.title}: ${description}`,
          ),
        ];
      }
      return [];
    },
  };
}
