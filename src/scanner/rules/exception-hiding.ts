import { createFinding } from "../finding-factory.js";
import { compileRulePatterns } from "../rule-loader.js";
import type {
  Finding,
  LineRule,
  LogicalLine,
  RuleContext,
  RuleDefinition,
} from "../types.js";

const EXCEPT_CLAUSE = /\bexcept\b([^:]*):(.*)$/s;
const BROAD_EXCEPTIONS = new Set(["Exception", "BaseException"]);

export function createExceptionHidingRule(
  definition: RuleDefinition,
): LineRule {
  const noops = compileRulePatterns(definition);

  const isNoop = (body: string): boolean =>
    noops.some((pattern) => pattern.test(body.trim()));

  return {
    definition,
    evaluate(context: RuleContext): Finding[] {
      const { filePath, line } = context;
      const clause = EXCEPT_CLAUSE.exec(line.masked);
      if (!clause || !isBroad(clause[1] ?? "")) {
        return [];
      }

      const inlineBody = (clause[2] ?? "").trim();
      const body = inlineBody || singleBlockStatement(context);
      if (body === null || !isNoop(body)) {
        return [];
      }

      const handler = line.code
        .slice(clause.index)
        .replace(/\s+/g, " ")
        .trim();
      const match = inlineBody ? handler : `${handler} ${body.trim()}`;
      return [
        createFinding(
          definition,
          filePath,
          line,
          match,
          `Broad exception handler discards errors with "${body.trim()}"`,
        ),
      ];
    },
  };
}

function isBroad(clause: string): boolean {
  const types = clause
    .replace(/\bas\s+[A-Za-z_]\w*\s*$/, "")
    .replace(/[()]/g, "")
    .split(",")
    .map((value) => value.trim())
    .filter((value) => value.length > 0);
  return (
    types.length === 0 || types.some((value) => BROAD_EXCEPTIONS.has(value))
  );
}

function singleBlockStatement({
  line,
  index,
  lines,
}: RuleContext): string | null {
  const first: LogicalLine | undefined = lines[index + 1];
  if (!first || first.indent <= line.indent) {
    return null;
  }
  const second = lines[index + 2];
  if (second && second.indent >= first.indent) {
    return null;
  }
  return first.masked;
}
