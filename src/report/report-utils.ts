import { SEVERITIES, type Finding, type Severity } from "../scanner/types.js";

const SEVERITY_RANK: ReadonlyMap<Severity, number> = new Map(
  SEVERITIES.map((severity, index): [Severity, number] => [severity, index]),
);

/** Most severe first, keeping the report order within a tier. */
export function topFindings(findings: readonly Finding[], limit: number): Finding[] {
  return findings
    .map((finding, index) => ({ finding, index }))
    .sort((a, b) => {
      const delta =
        (SEVERITY_RANK.get(a.finding.severity) ?? SEVERITIES.length) -
        (SEVERITY_RANK.get(b.finding.severity) ?? SEVERITIES.length);
      return delta !== 0 ? delta : a.index - b.index;
    })
    .slice(0, Math.max(0, limit))
    .map((entry) => entry.finding);
}

export function formatLocation(finding: Finding): string {
  return finding.column !== undefined
    ? `${finding.file}:${finding.line}:${finding.column}`
    : `${finding.file}:${finding.line}`;
}

export function truncateText(input: string, max: number): string {
  if (input.length <= max) {
    return input;
  }
  return `${input.slice(0, Math.max(0, max - 3))}...`;
}

export function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

/** One sentence per kind of incompleteness; empty when the run saw everything. */
export function completenessNotes(metadata: {
  readonly files_skipped: number;
  readonly binary_files_skipped: number;
  readonly rule_evaluations_skipped: number;
  readonly partial: boolean;
}): string[] {
  const notes: string[] = [];
  if (metadata.partial) {
    notes.push("The run was cancelled; results cover only the files processed before cancellation.");
  }
  if (metadata.files_skipped > 0) {
    notes.push(`${metadata.files_skipped} file(s) were skipped (unreadable or above the size limit).`);
  }
  if (metadata.binary_files_skipped > 0) {
    notes.push(`${metadata.binary_files_skipped} binary file(s) were not scanned.`);
  }
  if (metadata.rule_evaluations_skipped > 0) {
    notes.push(
      `${metadata.rule_evaluations_skipped} rule evaluation(s) were skipped after a pattern timeout or fault.`,
    );
  }
  return notes;
}
