import { CATEGORIES, SEVERITIES } from "../scanner/types.js";
import { capitalize, completenessNotes, formatLocation } from "./report-utils.js";
import type { AnalysisResult } from "./types.js";

const HTML_ESCAPES: Readonly<Record<string, string>> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

const STYLE = `body{font-family:system-ui,sans-serif;margin:2rem;color:#1f2328}
table{border-collapse:collapse;margin:1rem 0}
th,td{border:1px solid #d0d7de;padding:.35rem .6rem;text-align:left;vertical-align:top}
pre{margin:0;white-space:pre-wrap}
.sev-critical{color:#a40e26}.sev-high{color:#bc4c00}.sev-medium{color:#9a6700}
.sev-low{color:#1a7f37}.sev-info{color:#57606a}`;

/** Self-contained static page: no scripts, no external assets. */
export function renderHtmlReport(result: AnalysisResult): string {
  const parts: string[] = [];
  parts.push("<!DOCTYPE html>");
  parts.push('<html lang="en">');
  parts.push("<head>");
  parts.push('<meta charset="utf-8">');
  parts.push(`<title>Codesweep report: ${escapeHtml(result.metadata.root)}</title>`);
  parts.push(`<style>${STYLE}</style>`);
  parts.push("</head>");
  parts.push("<body>");
  parts.push("<h1>Codesweep Analysis Report</h1>");
  parts.push(
    `<p>Grade <strong>${escapeHtml(result.grade)}</strong>, score ${result.score}/100, ` +
      `${result.findings.length} finding(s) in ${result.metadata.files_scanned} file(s).</p>`,
  );

  parts.push("<h2>Summary</h2>");
  parts.push(
    renderTable(
      ["Severity", "Findings"],
      SEVERITIES.map((severity) => [
        escapeHtml(capitalize(severity)),
        String(result.counts_by_severity[severity]),
      ]),
    ),
  );
  parts.push(
    renderTable(
      ["Category", "Findings"],
      CATEGORIES.map((category) => [
        escapeHtml(capitalize(category)),
        String(result.counts_by_category[category]),
      ]),
    ),
  );

  const notes = completenessNotes(result.metadata);
  if (notes.length > 0) {
    parts.push("<h2>Completeness</h2>");
    parts.push(`<ul>${notes.map((note) => `<li>${escapeHtml(note)}</li>`).join("")}</ul>`);
  }

  parts.push("<h2>Findings</h2>");
  if (result.findings.length === 0) {
    parts.push("<p>No findings detected.</p>");
  } else {
    parts.push(
      renderTable(
        ["Severity", "Rule", "Location", "Message", "Remediation", "Snippet"],
        result.findings.map((finding) => [
          `<span class="sev-${finding.severity}">${escapeHtml(capitalize(finding.severity))}</span>`,
          escapeHtml(finding.rule_id),
          `<code>${escapeHtml(formatLocation(finding))}</code>`,
          escapeHtml(finding.message),
          escapeHtml(finding.remediation),
          `<pre>${escapeHtml(finding.snippet)}</pre>`,
        ]),
      ),
    );
  }

  parts.push(
    `<footer><small>Generated ${escapeHtml(result.metadata.completed_at)} by Codesweep ${escapeHtml(
      result.metadata.tool_version,
    )}</small></footer>`,
  );
  parts.push("</body>");
  parts.push("</html>");
  return `${parts.join("\n")}\n`;
}

/** Cells are expected to be escaped already. */
function renderTable(headers: readonly string[], rows: readonly string[][]): string {
  const head = `<tr>${headers.map((header) => `<th>${escapeHtml(header)}</th>`).join("")}</tr>`;
  const body = rows
    .map((row) => `<tr>${row.map((cell) => `<td>${cell}</td>`).join("")}</tr>`)
    .join("\n");
  return `<table>\n<thead>${head}</thead>\n<tbody>\n${body}\n</tbody>\n</table>`;
}
