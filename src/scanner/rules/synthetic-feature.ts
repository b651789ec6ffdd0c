import { createFinding } from "../finding-factory.js";
import { compileRulePatterns } from "../rule-loader.js";
import type { Finding, LineRule, RuleDefinition } from "../types.js";
import {
  findFeatureName,
  isFeatureName,
  parseAssignment,
} from "./assignment.js";
import { callName, findMatches, type PatternMatch } from "./matching.js";
import type { RuleSettings } from "./settings.js";

// `feature_x=` keyword argument or `"feature_x":` dict key right before a call.
const ARGUMENT_NAME =
  /(?:\b([A-Za-z_]\w*)\s*=|(["'])([^"'\n]*)\2\s*:)\s*$/;

export function createSyntheticFeatureRule(
  definition: RuleDefinition,
  settings: RuleSettings,
): LineRule {
  const calls = compileRulePatterns(definition, "gi");

  return {
    definition,
    evaluate({ filePath, line }): Finding[] {
      const matches = findMatches(line.masked, calls);
      if (matches.length === 0) {
        return [];
      }

      const report = (name: string, match: PatternMatch): Finding[] => {
        const call = callName(match.text);
        return [
          createFinding(
            definition,
            filePath,
            line,
            call,
            `Random call ${call} produces feature "${name}"`,
          ),
        ];
      };

      const assignment = parseAssignment(line);
      if (assignment) {
        const name = findFeatureName(
          assignment.targetNames,
          settings.featurePatterns,
        );
        const call = matches.find(
          (match) => match.index >= assignment.valueStart,
        );
        if (name && call) {
          return report(name, call);
        }
      }

      for (const match of matches) {
        const argument = ARGUMENT_NAME.exec(line.code.slice(0, match.index));
        const name = argument?.[1] ?? argument?.[3];
        if (name && isFeatureName(name, settings.featurePatterns)) {
          return report(name, match);
        }
      }
      return [];
    },
  };
}
