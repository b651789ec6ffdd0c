import type { Evidence, LogicalLine } from "./types.js";

const MAX_SNIPPET_LINES = 6;

export function extractEvidence(
  filePath: string,
  line: LogicalLine,
  matchText: string,
): Evidence {
  const statementLines = line.text.split("\n");
  const snippet =
    statementLines.length > MAX_SNIPPET_LINES
      ? [...statementLines.slice(0, MAX_SNIPPET_LINES), "..."].join("\n")
      : line.text;

  return {
    path: filePath,
    line: line.line,
    end_line: line.endLine,
    snippet: dedent(snippet),
    match: matchText.trim(),
  };
}

function dedent(snippet: string): string {
  const lines = snippet.split("\n");
  const indents = lines
    .filter((line) => line.trim().length > 0)
    .map((line) => line.length - line.trimStart().length);
  const common = indents.length > 0 ? Math.min(...indents) : 0;
  return lines.map((line) => line.slice(common)).join("\n").trimEnd();
}
