import { createFinding } from "../finding-factory.js";
import { compileRulePatterns } from "../rule-loader.js";
import { findClosingBracket, stringLiterals } from "../source-lines.js";
import type {
  Finding,
  LineRule,
  RuleContext,
  RuleDefinition,
} from "../types.js";

const OUTPUT_CALL =
  /\b(?:print|(?:logger|logging|log)\.(?:info|debug|warning|success))\s*\(/g;
const INLINE_CONDITION = /\bif\b/;
const CONDITIONAL_HEADER = /^\s*(?:if|elif|else)\b/;
const GUARD_STATEMENT = /^\s*(?:assert|if)\b/;
const GUARD_LOOKBACK = 3;

export function createFakeSuccessRule(definition: RuleDefinition): LineRule {
  const phrases = compileRulePatterns(definition);

  return {
    definition,
    evaluate(context: RuleContext): Finding[] {
      const { filePath, line } = context;
      for (const call of line.masked.matchAll(OUTPUT_CALL)) {
        const open = (call.index ?? 0) + call[0].length - 1;
        const close = findClosingBracket(line.masked, open);
        const message = stringLiterals(line, open, close).find((literal) =>
          phrases.some((pattern) => pattern.test(literal)),
        );
        if (message === undefined) {
          continue;
        }
        if (isChecked(context)) {
          return [];
        }
        return [
          createFinding(
            definition,
            filePath,
            line,
            message,
            `Success message "${message.trim()}" is not backed by a result check`,
          ),
        ];
      }
      return [];
    },
  };
}

// Checked: inline `if`, an enclosing `if`/`elif`/`else`, or an `assert`/`if`
// among the preceding statements at the same indent.
function isChecked({ line, index, lines }: RuleContext): boolean {
  if (INLINE_CONDITION.test(line.masked)) {
    return true;
  }

  let seen = 0;
  for (let i = index - 1; i >= 0; i -= 1) {
    const previous = lines[i];
    if (!previous) {
      break;
    }
    if (previous.indent < line.indent) {
      return CONDITIONAL_HEADER.test(previous.masked);
    }
    if (seen >= GUARD_LOOKBACK && line.indent === 0) {
      break;
    }
    if (previous.indent > line.indent || seen >= GUARD_LOOKBACK) {
      continue;
    }
    if (GUARD_STATEMENT.test(previous.masked)) {
      return true;
    }
    seen += 1;
  }
  return false;
}
