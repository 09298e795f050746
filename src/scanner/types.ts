export const SEVERITIES = ["critical", "high", "medium", "low", "info"] as const;
export type Severity = (typeof SEVERITIES)[number];

export const CONFIDENCES = ["high", "medium", "low"] as const;
export type Confidence = (typeof CONFIDENCES)[number];

export const CATEGORIES = ["security", "quality"] as const;
export type Category = (typeof CATEGORIES)[number];

export const UNKNOWN_LANGUAGE = "unknown";

export interface Rule {
  readonly id: string;
  readonly name: string;
  readonly category: Category;
  readonly severity: Severity;
  readonly confidence: Confidence;
  readonly languages: readonly string[];
  readonly patterns: readonly string[];
  readonly message: string;
  readonly remediation: string;
  readonly cwe?: string;
  readonly owasp?: string;
  readonly sanitizers: readonly string[];
  readonly case_sensitive: boolean;
  readonly effort_minutes: number;
  readonly tags: readonly string[];
}

export interface CompiledRule extends Rule {
  readonly source: string;
  readonly compiled: readonly RegExp[];
  readonly compiledSanitizers: readonly RegExp[];
}

export interface RuleDocument {
  readonly source: string;
  readonly body: unknown;
}

export interface RuleMeta {
  readonly rule_format_version: string;
  readonly language_extensions: Readonly<Record<string, readonly string[]>>;
  readonly language_filenames: Readonly<Record<string, readonly string[]>>;
  readonly language_interpreters: Readonly<Record<string, readonly string[]>>;
}

/** One occurrence of one rule pattern inside a file, before synthesis. */
export interface RawMatch {
  readonly ruleId: string;
  readonly patternIndex: number;
  readonly offset: number;
  readonly line: number;
  readonly column: number;
  readonly text: string;
  readonly snippet: string;
  /** A sanitizer of the rule occurs on the match line or next to it. */
  readonly sanitizerNearby: boolean;
}

export interface Finding {
  readonly rule_id: string;
  readonly rule_name: string;
  readonly file: string;
  readonly line: number;
  readonly column?: number;
  readonly snippet: string;
  readonly severity: Severity;
  readonly confidence: Confidence;
  readonly category: Category;
  readonly language: string;
  readonly message: string;
  readonly remediation: string;
  readonly cwe?: string;
  readonly owasp?: string;
  readonly effort_minutes: number;
  readonly tags: readonly string[];
  readonly adjustments: readonly string[];
}

export type WarningKind = "io" | "pattern" | "oversize";

export interface ScanWarning {
  readonly kind: WarningKind;
  readonly file: string;
  readonly rule_id?: string;
  readonly message: string;
}

export function isSeverity(value: unknown): value is Severity {
  return SEVERITIES.some((severity) => severity === value);
}

export function isConfidence(value: unknown): value is Confidence {
  return CONFIDENCES.some((confidence) => confidence === value);
}

export function isCategory(value: unknown): value is Category {
  return CATEGORIES.some((category) => category === value);
}
