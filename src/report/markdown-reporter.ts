import { CATEGORIES, SEVERITIES } from "../scanner/types.js";
import {
  capitalize,
  completenessNotes,
  formatLocation,
  topFindings,
  truncateText,
} from "./report-utils.js";
import type { AnalysisResult } from "./types.js";

export interface MarkdownRenderOptions {
  readonly showSummary?: boolean;
  readonly showFindings?: boolean;
  /** How many of the most severe findings to list. */
  readonly maxFindings?: number;
  readonly showEvidence?: boolean;
  readonly messageWidth?: number;
}

const DEFAULT_MAX_FINDINGS = 20;

export function renderMarkdownReport(
  result: AnalysisResult,
  options: MarkdownRenderOptions = {},
): string {
  const showSummary = options.showSummary ?? true;
  const showFindings = options.showFindings ?? true;
  const maxFindings = options.maxFindings ?? DEFAULT_MAX_FINDINGS;
  const showEvidence = options.showEvidence ?? false;
  const messageWidth = options.messageWidth ?? 80;
  const lines: string[] = [];

  if (showSummary) {
    lines.push("```text");
    lines.push(renderHeaderBlock(result));
    lines.push("");
    lines.push(
      renderAsciiTable(
        SEVERITIES.map((severity) => [
          capitalize(severity),
          String(result.counts_by_severity[severity]),
        ]),
        ["Severity", "Findings"],
      ),
    );
    lines.push("");
    lines.push(
      renderAsciiTable(
        CATEGORIES.map((category) => [
          capitalize(category),
          String(result.counts_by_category[category]),
        ]),
        ["Category", "Findings"],
      ),
    );
    lines.push("```");

    const notes = completenessNotes(result.metadata);
    if (notes.length > 0) {
      lines.push("");
      lines.push("### Completeness");
      lines.push("");
      for (const note of notes) {
        lines.push(`- ${note}`);
      }
    }
  }

  if (!showFindings) {
    return `${lines.join("\n")}\n`;
  }

  lines.push("");
  lines.push("### Top Findings");
  lines.push("");
  const findings = topFindings(result.findings, maxFindings);
  if (findings.length === 0) {
    lines.push("No findings detected.");
    return `${lines.join("\n")}\n`;
  }

  lines.push("| Severity | Rule | Location | Message |");
  lines.push("| --- | --- | --- | --- |");
  for (const finding of findings) {
    lines.push(
      `| ${capitalize(finding.severity)} | ${escapeCell(finding.rule_id)} | \`${escapeCell(
        formatLocation(finding),
      )}\` | ${escapeCell(truncateText(finding.message, messageWidth))} |`,
    );
  }

  if (result.findings.length > findings.length) {
    lines.push("");
    lines.push(`Showing ${findings.length} of ${result.findings.length} findings.`);
  }

  if (showEvidence) {
    lines.push("");
    lines.push("### Evidence");
    lines.push("");
    for (const finding of findings) {
      lines.push(`- ${finding.rule_id} (${formatLocation(finding)})`);
      lines.push("```text");
      lines.push(finding.snippet);
      lines.push("```");
    }
  }

  return `${lines.join("\n")}\n`;
}

function renderHeaderBlock(result: AnalysisResult): string {
  return renderAsciiBox([
    "Codesweep Analysis Report",
    `Grade: ${result.grade}`,
    `Score: ${result.score}/100`,
    `Findings: ${result.findings.length}`,
    `Files scanned: ${result.metadata.files_scanned}`,
    `Root: ${result.metadata.root}`,
  ]);
}

function renderAsciiBox(content: readonly string[]): string {
  const width = Math.max(...content.map((line) => line.length));
  const border = `+${"-".repeat(width + 2)}+`;
  const body = content.map((line) => `| ${line.padEnd(width)} |`);
  return [border, ...body, border].join("\n");
}

function renderAsciiTable(
  rows: readonly string[][],
  headers: readonly string[],
): string {
  const widths = headers.map((header, index) =>
    Math.max(header.length, ...rows.map((row) => row[index]?.length ?? 0)),
  );
  const border = `+${widths.map((w) => "-".repeat(w + 2)).join("+")}+`;
  const headerLine = `| ${headers
    .map((header, index) => header.padEnd(widths[index] ?? 0))
    .join(" | ")} |`;
  const body = rows.map(
    (row) =>
      `| ${row.map((cell, index) => cell.padEnd(widths[index] ?? 0)).join(" | ")} |`,
  );
  return [border, headerLine, border, ...body, border].join("\n");
}

function escapeCell(value: string): string {
  return value.replace(/\|/g, "\\|").replace(/\r?\n/g, " ");
}
