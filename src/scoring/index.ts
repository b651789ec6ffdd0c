export { calculateRiskIndex } from "./score-calculator.js";
export { SEVERITY_POINTS } from "./weights.js";
