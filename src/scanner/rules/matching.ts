export interface PatternMatch {
  readonly index: number;
  readonly text: string;
}

export function findMatches(
  text: string,
  patterns: readonly RegExp[],
): PatternMatch[] {
  const matches: PatternMatch[] = [];
  for (const pattern of patterns) {
    for (const match of text.matchAll(pattern)) {
      matches.push({ index: match.index ?? 0, text: match[0] });
    }
  }
  return matches.sort((a, b) => a.index - b.index);
}

export function callName(matchText: string): string {
  return matchText.replace(/\s*\($/, "");
}
