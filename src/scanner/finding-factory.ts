import type { CompiledRule, Confidence, Finding, RawMatch } from "./types.js";

export const SANITIZER_ADJUSTMENT = "sanitizer-nearby";

const PLACEHOLDER_PATTERN = /\{\{\s*(\w+)\s*\}\}/g;
const MAX_MESSAGE_MATCH_LENGTH = 80;

const LOWER_CONFIDENCE: Readonly<Record<Confidence, Confidence>> = {
  high: "medium",
  medium: "low",
  low: "low",
};

export interface FindingContext {
  readonly file: string;
  readonly language: string;
  /** Apply the sanitizer-nearby confidence adjustment. */
  readonly adjustConfidence?: boolean;
}

export function createFinding(
  rule: CompiledRule,
  match: RawMatch,
  context: FindingContext,
): Finding {
  const adjustments: string[] = [];
  let confidence = rule.confidence;

  if ((context.adjustConfidence ?? true) && match.sanitizerNearby) {
    confidence = LOWER_CONFIDENCE[confidence];
    adjustments.push(SANITIZER_ADJUSTMENT);
  }

  return Object.freeze({
    rule_id: rule.id,
    rule_name: rule.name,
    file: context.file,
    line: match.line,
    column: match.column,
    snippet: match.snippet,
    severity: rule.severity,
    confidence,
    category: rule.category,
    language: context.language,
    message: renderMessage(rule.message, {
      match: truncate(firstLine(match.text), MAX_MESSAGE_MATCH_LENGTH),
      file: context.file,
      line: String(match.line),
      rule_id: rule.id,
      language: context.language,
    }),
    remediation: rule.remediation,
    ...(rule.cwe !== undefined ? { cwe: rule.cwe } : {}),
    ...(rule.owasp !== undefined ? { owasp: rule.owasp } : {}),
    effort_minutes: rule.effort_minutes,
    tags: rule.tags,
    adjustments: Object.freeze(adjustments),
  });
}

export function renderMessage(
  template: string,
  values: Readonly<Record<string, string>>,
): string {
  return template.replace(PLACEHOLDER_PATTERN, (placeholder, key: string) =>
    Object.hasOwn(values, key) ? (values[key] ?? "") : placeholder,
  );
}

function firstLine(text: string): string {
  const newline = text.search(/\r?\n/);
  return newline === -1 ? text : text.slice(0, newline);
}

function truncate(input: string, max: number): string {
  if (input.length <= max) {
    return input;
  }
  return `${input.slice(0, Math.max(0, max - 3))}...`;
}
