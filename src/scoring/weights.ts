import type { Severity } from "../scanner/types.js";
import type { Grade } from "./types.js";

/** Points deducted from 100 per finding of each severity. */
export const SEVERITY_PENALTIES: Readonly<Record<Severity, number>> = {
  critical: 25,
  high: 10,
  medium: 4,
  low: 1,
  info: 0,
};

/** Minimum score per grade, best first; anything lower is an F. */
export const GRADE_THRESHOLDS: ReadonlyArray<readonly [Grade, number]> = [
  ["A+", 100],
  ["A", 95],
  ["A-", 90],
  ["B+", 87],
  ["B", 83],
  ["B-", 80],
  ["C+", 77],
  ["C", 73],
  ["C-", 70],
  ["D", 60],
];

/** Best grade a result with at least one critical finding can reach. */
export const CRITICAL_GRADE_CAP: Grade = "C";
