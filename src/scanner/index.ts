export { LineIndex } from "./evidence.js";
export type { Position } from "./evidence.js";
export {
  createFinding,
  renderMessage,
  SANITIZER_ADJUSTMENT,
} from "./finding-factory.js";
export type { FindingContext } from "./finding-factory.js";
export {
  DEFAULT_EVALUATION_TIMEOUT_MS,
  evaluateRule,
  hasAdjacentSanitizer,
} from "./pattern-evaluator.js";
export type { EvaluateOptions } from "./pattern-evaluator.js";
export { scanContent, scanFile } from "./rule-engine.js";
export type { FileScanOptions, FileScanResult } from "./rule-engine.js";
export {
  loadRegistry,
  loadRuleDocuments,
  loadRuleMeta,
  parseRuleDocument,
} from "./rule-loader.js";
export type { InlineRuleSource, LoadRegistryOptions, RuleSource } from "./rule-loader.js";
export { buildRegistry, compileRule, RuleRegistry } from "./rule-registry.js";
export {
  CATEGORIES,
  CONFIDENCES,
  isCategory,
  isConfidence,
  isSeverity,
  SEVERITIES,
  UNKNOWN_LANGUAGE,
} from "./types.js";
export type {
  Category,
  CompiledRule,
  Confidence,
  Finding,
  RawMatch,
  Rule,
  RuleDocument,
  RuleMeta,
  ScanWarning,
  Severity,
  WarningKind,
} from "./types.js";
