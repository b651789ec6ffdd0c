import { createFinding } from "../finding-factory.js";
import { compileRulePatterns } from "../rule-loader.js";
import type { Finding, LineRule, RuleDefinition } from "../types.js";
import { findFeatureName, parseAssignment } from "./assignment.js";
import { findMatches } from "./matching.js";
import type { RuleSettings } from "./settings.js";

const ARITHMETIC = "*/+-";
const UNARY_CONTEXT = "=([{,:*/+-%<>";
const IGNORED_VALUES = new Set([0, 1]);

export function createMagicNumberRule(
  definition: RuleDefinition,
  settings: RuleSettings,
): LineRule {
  const literals = compileRulePatterns(definition, "gi");

  return {
    definition,
    evaluate({ filePath, line }): Finding[] {
      const assignment = parseAssignment(line);
      if (!assignment) {
        return [];
      }
      const name = findFeatureName(
        assignment.targetNames,
        settings.featurePatterns,
      );
      if (!name) {
        return [];
      }

      const coefficient = findMatches(line.masked, literals).find(
        (match) =>
          match.index >= assignment.valueStart &&
          !IGNORED_VALUES.has(Number(match.text)) &&
          isArithmeticOperand(
            line.masked,
            match.index,
            match.index + match.text.length,
          ),
      );
      if (!coefficient) {
        return [];
      }

      return [
        createFinding(
          definition,
          filePath,
          line,
          coefficient.text,
          `Feature "${name}" uses hardcoded coefficient ${coefficient.text}`,
        ),
      ];
    },
  };
}

function isArithmeticOperand(
  masked: string,
  start: number,
  end: number,
): boolean {
  let before = previousNonSpace(masked, start);
  // Unary sign: look past it to the operator in front.
  if (
    (masked.charAt(before) === "-" || masked.charAt(before) === "+") &&
    isUnary(masked, before)
  ) {
    before = previousNonSpace(masked, before);
  }
  const after = nextNonSpace(masked, end);

  const prev = masked.charAt(before);
  const next = masked.charAt(after);
  if (prev === "*" && masked.charAt(before - 1) === "*") {
    return false;
  }
  if (next === "*" && masked.charAt(after + 1) === "*") {
    return false;
  }

  if (isArithmetic(next) || isArithmetic(prev)) {
    return true;
  }
  if (prev === "=") {
    const operator = masked.charAt(before - 1);
    return isArithmetic(operator) && masked.charAt(before - 2) !== operator;
  }
  return false;
}

function isUnary(masked: string, signIndex: number): boolean {
  const before = masked.charAt(previousNonSpace(masked, signIndex));
  return before === "" || UNARY_CONTEXT.includes(before);
}

function isArithmetic(char: string): boolean {
  return char !== "" && ARITHMETIC.includes(char);
}

function previousNonSpace(text: string, index: number): number {
  let i = index - 1;
  while (i >= 0 && /\s/.test(text.charAt(i))) {
    i -= 1;
  }
  return i;
}

function nextNonSpace(text: string, index: number): number {
  let i = index;
  while (i < text.length && /\s/.test(text.charAt(i))) {
    i += 1;
  }
  return i;
}
