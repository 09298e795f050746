export {
  aggregateFindings,
  compareFindings,
  dedupKey,
  deduplicateFindings,
  emptyCategoryCounts,
  emptySeverityCounts,
  sortFindings,
} from "./aggregator.js";
export type { Aggregate } from "./aggregator.js";
export {
  calculateScore,
  compareGrades,
  gradeFor,
  gradeForScore,
} from "./score-calculator.js";
export { GRADES } from "./types.js";
export type { CategoryCounts, Grade, ScoreResult, SeverityCounts } from "./types.js";
export { CRITICAL_GRADE_CAP, GRADE_THRESHOLDS, SEVERITY_PENALTIES } from "./weights.js";
