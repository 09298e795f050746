import type { Category, Severity } from "../scanner/types.js";

export type SeverityCounts = Record<Severity, number>;

export type CategoryCounts = Record<Category, number>;

export const GRADES = ["A+", "A", "A-", "B+", "B", "B-", "C+", "C", "C-", "D", "F"] as const;
export type Grade = (typeof GRADES)[number];

export interface ScoreResult {
  readonly score: number;
  readonly grade: Grade;
  readonly penalty: number;
}
