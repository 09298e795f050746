import type { Finding, ScanWarning } from "../scanner/types.js";
import type { CategoryCounts, Grade, SeverityCounts } from "../scoring/types.js";

export const REPORT_FORMATS = ["json", "markdown", "html", "sarif"] as const;
export type ReportFormat = (typeof REPORT_FORMATS)[number];

export interface AnalysisMetadata {
  readonly root: string;
  readonly files_scanned: number;
  /** Files that could not be read or were above the size limit. */
  readonly files_skipped: number;
  readonly binary_files_skipped: number;
  readonly rule_evaluations_skipped: number;
  readonly rules_loaded: number;
  readonly rules_version: string;
  readonly warnings: readonly ScanWarning[];
  /** The run was cancelled before every file was processed. */
  readonly partial: boolean;
  readonly started_at: string;
  readonly completed_at: string;
  readonly duration_ms: number;
  readonly tool_version: string;
}

export interface AnalysisResult {
  readonly findings: readonly Finding[];
  readonly counts_by_severity: Readonly<SeverityCounts>;
  readonly counts_by_category: Readonly<CategoryCounts>;
  readonly score: number;
  readonly grade: Grade;
  readonly metadata: AnalysisMetadata;
}
