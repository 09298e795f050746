import { renderHtmlReport } from "./html-reporter.js";
import { renderJsonReport } from "./json-reporter.js";
import { renderMarkdownReport } from "./markdown-reporter.js";
import { renderSarifReport } from "./sarif-reporter.js";
import type { AnalysisResult, ReportFormat } from "./types.js";

/** Serialize a finished result. Never touches the scanned files. */
export function exportResult(result: AnalysisResult, format: ReportFormat): Buffer {
  return Buffer.from(renderReport(result, format), "utf8");
}

export function renderReport(result: AnalysisResult, format: ReportFormat): string {
  switch (format) {
    case "json":
      return renderJsonReport(result);
    case "markdown":
      return renderMarkdownReport(result);
    case "html":
      return renderHtmlReport(result);
    case "sarif":
      return renderSarifReport(result);
  }
}

export { escapeHtml, renderHtmlReport } from "./html-reporter.js";
export { renderJsonReport } from "./json-reporter.js";
export { renderMarkdownReport } from "./markdown-reporter.js";
export type { MarkdownRenderOptions } from "./markdown-reporter.js";
export { buildSarifLog, renderSarifReport, toSarifLevel } from "./sarif-reporter.js";
export type { SarifLevel, SarifLog } from "./sarif-reporter.js";
export { REPORT_FORMATS } from "./types.js";
export type { AnalysisMetadata, AnalysisResult, ReportFormat } from "./types.js";
