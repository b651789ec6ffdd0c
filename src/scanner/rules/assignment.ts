import { stringLiterals } from "../source-lines.js";
import type { LogicalLine } from "../types.js";

export interface Assignment {
  readonly targetNames: readonly string[];
  readonly valueStart: number;
}

interface Operator {
  readonly start: number;
  readonly end: number;
}

const OPEN_BRACKETS = "([{";
const CLOSE_BRACKETS = ")]}";
const AUGMENTED_PREFIXES = "+-*/%@&|^";
const DOUBLED_PREFIXES = new Set(["**", "//", ">>", "<<"]);
const COMPOUND_HEADER =
  /^\s*(?:if|elif|else|for|while|with|try|except|finally|def|class)\b/;
const IDENTIFIER = /[A-Za-z_]\w*/g;
const PYTHON_KEYWORDS = new Set([
  "and",
  "as",
  "del",
  "elif",
  "else",
  "for",
  "if",
  "in",
  "is",
  "not",
  "or",
  "while",
  "with",
]);

export function parseAssignment(line: LogicalLine): Assignment | null {
  const operators = topLevelOperators(line.masked);
  const last = operators[operators.length - 1];
  if (!last) {
    return null;
  }

  const names: string[] = [];
  let segmentStart = 0;
  for (const operator of operators) {
    const start = targetStart(line.masked, segmentStart, operator.start);
    const end = annotationEnd(line.masked, start, operator.start);
    names.push(...namesIn(line, start, end));
    segmentStart = operator.end;
  }

  return { targetNames: names, valueStart: last.end };
}

export function findFeatureName(
  names: readonly string[],
  patterns: readonly RegExp[],
): string | undefined {
  return names.find((name) => isFeatureName(name, patterns));
}

export function isFeatureName(
  name: string,
  patterns: readonly RegExp[],
): boolean {
  return patterns.some((pattern) => pattern.test(name));
}

function topLevelOperators(masked: string): Operator[] {
  const operators: Operator[] = [];
  let depth = 0;
  let segmentStart = 0;

  for (let i = 0; i < masked.length; i += 1) {
    const char = masked.charAt(i);
    if (OPEN_BRACKETS.includes(char)) {
      depth += 1;
      continue;
    }
    if (CLOSE_BRACKETS.includes(char)) {
      depth = Math.max(0, depth - 1);
      continue;
    }
    if (char !== "=" || depth > 0) {
      continue;
    }
    if (masked.charAt(i + 1) === "=") {
      i += 1;
      continue;
    }
    if (/\blambda\b/.test(masked.slice(segmentStart, i))) {
      break;
    }

    const prev = masked.charAt(i - 1);
    const pair = masked.slice(Math.max(0, i - 2), i);
    let start = i;
    if (DOUBLED_PREFIXES.has(pair)) {
      start = i - 2;
    } else if (prev === "!" || prev === "<" || prev === ">" || prev === ":") {
      continue;
    } else if (prev !== "" && AUGMENTED_PREFIXES.includes(prev)) {
      start = i - 1;
    }

    operators.push({ start, end: i + 1 });
    segmentStart = i + 1;
  }

  return operators;
}

function targetStart(masked: string, from: number, to: number): number {
  const segment = masked.slice(from, to);
  if (!COMPOUND_HEADER.test(segment)) {
    return from;
  }
  const colon = lastTopLevelColon(segment);
  return colon < 0 ? from : from + colon + 1;
}

function annotationEnd(masked: string, from: number, to: number): number {
  const colon = firstTopLevelColon(masked.slice(from, to));
  return colon < 0 ? to : from + colon;
}

function firstTopLevelColon(segment: string): number {
  const colons = topLevelColons(segment);
  return colons[0] ?? -1;
}

function lastTopLevelColon(segment: string): number {
  const colons = topLevelColons(segment);
  return colons[colons.length - 1] ?? -1;
}

function topLevelColons(segment: string): number[] {
  const colons: number[] = [];
  let depth = 0;
  for (let i = 0; i < segment.length; i += 1) {
    const char = segment.charAt(i);
    if (OPEN_BRACKETS.includes(char)) {
      depth += 1;
    } else if (CLOSE_BRACKETS.includes(char)) {
      depth = Math.max(0, depth - 1);
    } else if (char === ":" && depth === 0) {
      colons.push(i);
    }
  }
  return colons;
}

function namesIn(line: LogicalLine, start: number, end: number): string[] {
  const names: string[] = [];
  const segment = line.masked.slice(start, end);
  for (const match of segment.matchAll(IDENTIFIER)) {
    if (!PYTHON_KEYWORDS.has(match[0])) {
      names.push(match[0]);
    }
  }
  names.push(...stringLiterals(line, start, end));
  return names;
}
