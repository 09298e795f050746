import { SEVERITIES } from "../scanner/types.js";
import { GRADES, type Grade, type ScoreResult, type SeverityCounts } from "./types.js";
import { CRITICAL_GRADE_CAP, GRADE_THRESHOLDS, SEVERITY_PENALTIES } from "./weights.js";

/** Score (0..100) and letter grade for a set of severity counts. */
export function calculateScore(counts: SeverityCounts): ScoreResult {
  let penalty = 0;
  for (const severity of SEVERITIES) {
    penalty += Math.max(0, counts[severity]) * SEVERITY_PENALTIES[severity];
  }

  const score = Math.max(0, 100 - penalty);
  let grade = gradeForScore(score);
  if (counts.critical > 0 && compareGrades(grade, CRITICAL_GRADE_CAP) > 0) {
    grade = CRITICAL_GRADE_CAP;
  }

  return { score, grade, penalty };
}

export function gradeFor(counts: SeverityCounts): Grade {
  return calculateScore(counts).grade;
}

export function gradeForScore(score: number): Grade {
  for (const [grade, minimum] of GRADE_THRESHOLDS) {
    if (score >= minimum) {
      return grade;
    }
  }
  return "F";
}

/** Positive when `a` is a better grade than `b`. */
export function compareGrades(a: Grade, b: Grade): number {
  return GRADES.indexOf(b) - GRADES.indexOf(a);
}
