import type { AnalysisResult } from "./types.js";

/** Full-fidelity JSON, keys in a stable order so identical runs diff cleanly. */
export function renderJsonReport(result: AnalysisResult): string {
  const ordered = {
    findings: result.findings,
    counts_by_severity: result.counts_by_severity,
    counts_by_category: result.counts_by_category,
    score: result.score,
    grade: result.grade,
    metadata: result.metadata,
  };
  return `${JSON.stringify(ordered, null, 2)}\n`;
}
