import type { Finding, Severity } from "../scanner/types.js";
import type { AnalysisResult } from "./types.js";

export const SARIF_SCHEMA = "https://json.schemastore.org/sarif-2.1.0.json";
export const SARIF_TOOL_NAME = "Codesweep";

export type SarifLevel = "error" | "warning" | "note";

interface SarifRule {
  readonly id: string;
  readonly name: string;
  readonly shortDescription: { readonly text: string };
  readonly help?: { readonly text: string };
  readonly properties?: Readonly<Record<string, string | readonly string[]>>;
}

interface SarifResult {
  readonly ruleId: string;
  readonly ruleIndex: number;
  readonly level: SarifLevel;
  readonly message: { readonly text: string };
  readonly locations: readonly {
    readonly physicalLocation: {
      readonly artifactLocation: { readonly uri: string };
      readonly region: {
        readonly startLine: number;
        readonly startColumn?: number;
        readonly snippet?: { readonly text: string };
      };
    };
  }[];
  readonly properties?: Readonly<Record<string, string>>;
}

export interface SarifLog {
  readonly version: "2.1.0";
  readonly $schema: string;
  readonly runs: readonly {
    readonly tool: {
      readonly driver: {
        readonly name: string;
        readonly version: string;
        readonly rules: readonly SarifRule[];
      };
    };
    readonly results: readonly SarifResult[];
  }[];
}

export function buildSarifLog(result: AnalysisResult): SarifLog {
  const { rules, results } = toSarif(result.findings);
  return {
    version: "2.1.0",
    $schema: SARIF_SCHEMA,
    runs: [
      {
        tool: {
          driver: {
            name: SARIF_TOOL_NAME,
            version: result.metadata.tool_version,
            rules,
          },
        },
        results,
      },
    ],
  };
}

export function renderSarifReport(result: AnalysisResult): string {
  return `${JSON.stringify(buildSarifLog(result), null, 2)}\n`;
}

export function toSarifLevel(severity: Severity): SarifLevel {
  switch (severity) {
    case "critical":
    case "high":
      return "error";
    case "medium":
      return "warning";
    case "low":
    case "info":
      return "note";
  }
}

function toSarif(findings: readonly Finding[]): {
  readonly rules: SarifRule[];
  readonly results: SarifResult[];
} {
  const rules: SarifRule[] = [];
  const ruleIndex = new Map<string, number>();
  const results = findings.map((finding) => {
    let index = ruleIndex.get(finding.rule_id);
    if (index === undefined) {
      index = rules.length;
      ruleIndex.set(finding.rule_id, index);
      rules.push(buildRule(finding));
    }
    return buildResult(finding, index);
  });
  return { rules, results };
}

function buildRule(finding: Finding): SarifRule {
  const tags = new Set<string>([finding.category, ...finding.tags]);
  if (finding.cwe) {
    tags.add(`CWE-${finding.cwe.replace(/^CWE-/i, "")}`);
  }
  if (finding.owasp) {
    tags.add(`OWASP-${finding.owasp}`);
  }
  return {
    id: finding.rule_id,
    name: finding.rule_name,
    shortDescription: { text: finding.rule_name },
    help: finding.remediation ? { text: finding.remediation } : undefined,
    properties: {
      category: finding.category,
      severity: finding.severity,
      tags: [...tags],
    },
  };
}

function buildResult(finding: Finding, ruleIndex: number): SarifResult {
  return {
    ruleId: finding.rule_id,
    ruleIndex,
    level: toSarifLevel(finding.severity),
    message: { text: finding.message },
    locations: [
      {
        physicalLocation: {
          artifactLocation: { uri: finding.file },
          region: {
            startLine: finding.line,
            startColumn: finding.column,
            snippet: finding.snippet ? { text: finding.snippet } : undefined,
          },
        },
      },
    ],
    properties: {
      severity: finding.severity,
      confidence: finding.confidence,
      language: finding.language,
    },
  };
}
