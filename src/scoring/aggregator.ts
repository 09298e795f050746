import { AggregationError } from "../errors.js";
import {
  CONFIDENCES,
  isCategory,
  isConfidence,
  isSeverity,
  type Confidence,
  type Finding,
} from "../scanner/types.js";
import type { CategoryCounts, SeverityCounts } from "./types.js";

export interface Aggregate {
  readonly findings: readonly Finding[];
  readonly countsBySeverity: SeverityCounts;
  readonly countsByCategory: CategoryCounts;
}

export function dedupKey(finding: Pick<Finding, "rule_id" | "file" | "line">): string {
  return `${finding.rule_id}\u0000${finding.file}\u0000${finding.line}`;
}

/**
 * Collapse candidates sharing `(rule_id, file, line)` into one finding, keeping
 * the most confident one (then the leftmost, then the first seen).
 * Different rules on the same line stay separate.
 */
export function deduplicateFindings(findings: readonly Finding[]): Finding[] {
  const merged = new Map<string, Finding>();
  for (const finding of findings) {
    const key = dedupKey(finding);
    const current = merged.get(key);
    if (!current || preferOver(finding, current)) {
      merged.set(key, finding);
    }
  }
  return [...merged.values()];
}

/** Deterministic report order: file, line, column, rule id. */
export function sortFindings(findings: readonly Finding[]): Finding[] {
  return [...findings].sort(compareFindings);
}

export function compareFindings(a: Finding, b: Finding): number {
  if (a.file !== b.file) {
    return a.file < b.file ? -1 : 1;
  }
  if (a.line !== b.line) {
    return a.line - b.line;
  }
  const columnDelta = (a.column ?? 0) - (b.column ?? 0);
  if (columnDelta !== 0) {
    return columnDelta;
  }
  if (a.rule_id !== b.rule_id) {
    return a.rule_id < b.rule_id ? -1 : 1;
  }
  return 0;
}

/**
 * Validate, deduplicate, order and count in one pass over the merged list.
 * Throws AggregationError if any finding breaks the Finding invariants.
 */
export function aggregateFindings(candidates: readonly Finding[]): Aggregate {
  for (const candidate of candidates) {
    assertFinding(candidate);
  }

  const findings = sortFindings(deduplicateFindings(candidates));
  const countsBySeverity = emptySeverityCounts();
  const countsByCategory = emptyCategoryCounts();
  for (const finding of findings) {
    countsBySeverity[finding.severity] += 1;
    countsByCategory[finding.category] += 1;
  }

  return {
    findings: Object.freeze(findings),
    countsBySeverity,
    countsByCategory,
  };
}

export function emptySeverityCounts(): SeverityCounts {
  return { critical: 0, high: 0, medium: 0, low: 0, info: 0 };
}

export function emptyCategoryCounts(): CategoryCounts {
  return { security: 0, quality: 0 };
}

function preferOver(candidate: Finding, current: Finding): boolean {
  const rankDelta = confidenceRank(candidate.confidence) - confidenceRank(current.confidence);
  if (rankDelta !== 0) {
    return rankDelta > 0;
  }
  return (candidate.column ?? 0) < (current.column ?? 0);
}

function confidenceRank(confidence: Confidence): number {
  return CONFIDENCES.length - CONFIDENCES.indexOf(confidence);
}

function assertFinding(finding: Finding): void {
  const problems: string[] = [];
  if (!finding.rule_id) {
    problems.push("rule_id is empty");
  }
  if (!finding.file) {
    problems.push("file is empty");
  }
  if (!Number.isInteger(finding.line) || finding.line < 1) {
    problems.push(`line ${String(finding.line)} is not a positive integer`);
  }
  if (finding.column !== undefined && (!Number.isInteger(finding.column) || finding.column < 1)) {
    problems.push(`column ${String(finding.column)} is not a positive integer`);
  }
  if (!isSeverity(finding.severity)) {
    problems.push(`severity "${String(finding.severity)}" is unknown`);
  }
  if (!isConfidence(finding.confidence)) {
    problems.push(`confidence "${String(finding.confidence)}" is unknown`);
  }
  if (!isCategory(finding.category)) {
    problems.push(`category "${String(finding.category)}" is unknown`);
  }
  if (!finding.message) {
    problems.push("message is empty");
  }

  if (problems.length > 0) {
    throw new AggregationError(
      `Invalid finding for ${finding.rule_id || "<no rule>"} at ${finding.file || "<no file>"}:${String(finding.line)}: ${problems.join("; ")}`,
    );
  }
}
