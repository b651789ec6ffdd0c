import type { Verdict } from "../scanner/types.js";

export const EXIT_PASS = 0;
export const EXIT_FAIL = 1;

export function exitCodeForVerdict(verdict: Verdict): number {
  return verdict === "FAIL" ? EXIT_FAIL : EXIT_PASS;
}

export function formatLocation(path: string, line: number): string {
  return `${path}:${line}`;
}

export function truncateText(input: string, max: number): string {
  if (input.length <= max) {
    return input;
  }
  return `${input.slice(0, Math.max(0, max - 3))}...`;
}

export function applyFindingLimit<T>(items: readonly T[], limit?: number): T[] {
  if (!limit || limit <= 0) {
    return [...items];
  }
  return items.slice(0, limit);
}
