import type { LogicalLine } from "./types.js";

export const STRING_MASK = "\u0000";

const OPEN_BRACKETS = "([{";
const CLOSE_BRACKETS = ")]}";
const TAB_WIDTH = 8;

interface PhysicalLine {
  readonly text: string;
  readonly code: string;
  readonly masked: string;
  readonly comment: string;
  readonly continues: boolean;
}

/**
 * Split Python source into logical lines.
 */
export function readSource(source: string): LogicalLine[] {
  const physical = scanPhysicalLines(source.replace(/\r\n?/g, "\n"));
  const logical: LogicalLine[] = [];

  let start = 0;
  while (start < physical.length) {
    let end = start;
    while (end < physical.length - 1 && physical[end]?.continues) {
      end += 1;
    }

    const group = physical.slice(start, end + 1);
    const code = group.map((line) => line.code).join("\n");
    if (code.trim().length > 0) {
      const first = group[0]?.text ?? "";
      logical.push({
        line: start + 1,
        endLine: end + 1,
        indent: measureIndent(first),
        text: group.map((line) => line.text).join("\n"),
        code,
        masked: group.map((line) => line.masked).join("\n"),
        comment: group
          .map((line) => line.comment)
          .filter((comment) => comment.length > 0)
          .join(" "),
      });
    }
    start = end + 1;
  }

  return logical;
}

export function stringLiterals(
  line: LogicalLine,
  start = 0,
  end = line.masked.length,
): string[] {
  const literals: string[] = [];
  let current: string | null = null;
  for (let i = start; i < end; i += 1) {
    if (line.masked[i] === STRING_MASK) {
      current = (current ?? "") + (line.code[i] ?? "");
    } else if (current !== null) {
      literals.push(current);
      current = null;
    }
  }
  if (current !== null) {
    literals.push(current);
  }
  return literals;
}

export function findClosingBracket(masked: string, openIndex: number): number {
  let depth = 0;
  for (let i = openIndex; i < masked.length; i += 1) {
    const char = masked.charAt(i);
    if (OPEN_BRACKETS.includes(char)) {
      depth += 1;
    } else if (CLOSE_BRACKETS.includes(char)) {
      depth -= 1;
      if (depth === 0) {
        return i;
      }
    }
  }
  return masked.length;
}

function scanPhysicalLines(text: string): PhysicalLine[] {
  const lines: PhysicalLine[] = [];
  let raw = "";
  let code = "";
  let masked = "";
  let comment = "";
  let quote: string | null = null;
  let triple = false;
  let inComment = false;
  let depth = 0;
  let continuation = false;

  for (let i = 0; i < text.length; i += 1) {
    const char = text.charAt(i);

    if (char === "\n") {
      lines.push({
        text: raw,
        code,
        masked,
        comment,
        continues: depth > 0 || (quote !== null && triple) || continuation,
      });
      if (quote !== null && !triple && !continuation) {
        quote = null;
      }
      raw = "";
      code = "";
      masked = "";
      comment = "";
      inComment = false;
      continuation = false;
      continue;
    }

    raw += char;

    if (inComment) {
      code += " ";
      masked += " ";
      comment += char;
      continue;
    }

    if (quote !== null) {
      const closing = triple ? quote.repeat(3) : quote;
      if (char === "\\") {
        const next = text.charAt(i + 1);
        code += char;
        masked += STRING_MASK;
        if (next === "\n") {
          continuation = true;
        } else if (next) {
          raw += next;
          code += next;
          masked += STRING_MASK;
          i += 1;
        }
        continue;
      }
      if (text.startsWith(closing, i)) {
        raw += closing.slice(1);
        code += closing;
        masked += closing;
        i += closing.length - 1;
        quote = null;
        continue;
      }
      code += char;
      masked += STRING_MASK;
      continue;
    }

    if (char === "#") {
      inComment = true;
      code += " ";
      masked += " ";
      comment += char;
      continue;
    }

    if (char === "'" || char === '"') {
      triple = text.startsWith(char.repeat(3), i);
      quote = char;
      const opening = triple ? char.repeat(3) : char;
      raw += opening.slice(1);
      code += opening;
      masked += opening;
      i += opening.length - 1;
      continue;
    }

    if (char === "\\" && text.charAt(i + 1) === "\n") {
      continuation = true;
    } else if (OPEN_BRACKETS.includes(char)) {
      depth += 1;
    } else if (CLOSE_BRACKETS.includes(char)) {
      depth = Math.max(0, depth - 1);
    }
    code += char;
    masked += char;
  }

  lines.push({ text: raw, code, masked, comment, continues: false });
  return lines;
}

function measureIndent(text: string): number {
  let width = 0;
  for (const char of text) {
    if (char === " ") {
      width += 1;
    } else if (char === "\t") {
      width += TAB_WIDTH - (width % TAB_WIDTH);
    } else {
      break;
    }
  }
  return width;
}
