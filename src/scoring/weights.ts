import { Severity } from "../scanner/types.js";

export const SEVERITY_POINTS: Readonly<Record<Severity, number>> = {
  [Severity.Critical]: 10,
  [Severity.Warning]: 3,
};
