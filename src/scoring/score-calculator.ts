import type { Finding } from "../scanner/types.js";
import { SEVERITY_POINTS } from "./weights.js";

export function calculateRiskIndex(
  findings: readonly Finding[],
  filesScanned: number,
): number {
  const points = findings.reduce(
    (total, finding) => total + SEVERITY_POINTS[finding.severity],
    0,
  );
  return roundTo(points / Math.max(filesScanned, 1), 2);
}

function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}
