import fs from "node:fs/promises";
import { IOError, PatternError } from "../errors.js";
import type { FileEntry, LanguageClassifier } from "../ingest/types.js";
import type { Logger } from "../logging/logger.js";
import { LineIndex } from "./evidence.js";
import { createFinding } from "./finding-factory.js";
import { evaluateRule } from "./pattern-evaluator.js";
import type { RuleRegistry } from "./rule-registry.js";
import type {
  Category,
  CompiledRule,
  Finding,
  RawMatch,
  ScanWarning,
} from "./types.js";

export interface FileScanOptions {
  readonly classify: LanguageClassifier;
  readonly categories?: readonly Category[];
  readonly patternTimeoutMs?: number;
  readonly adjustConfidence?: boolean;
  readonly logger?: Logger;
}

/** Everything one worker learned about one file. */
export interface FileScanResult {
  readonly file: string;
  readonly language: string;
  readonly findings: readonly Finding[];
  readonly warnings: readonly ScanWarning[];
  /** The file could not be read at all. */
  readonly skipped: boolean;
  readonly ruleEvaluationsSkipped: number;
}

export async function scanFile(
  file: FileEntry,
  registry: RuleRegistry,
  options: FileScanOptions,
): Promise<FileScanResult> {
  let content: string;
  try {
    content = await fs.readFile(file.absolutePath, "utf8");
  } catch (error) {
    const ioError = new IOError(file.relativePath, error);
    options.logger?.warn({ file: file.relativePath, code: ioError.code }, ioError.message);
    return {
      file: file.relativePath,
      language: options.classify(file.relativePath),
      findings: [],
      warnings: [{ kind: "io", file: file.relativePath, message: ioError.message }],
      skipped: true,
      ruleEvaluationsSkipped: 0,
    };
  }

  return scanContent(file.relativePath, content, registry, options);
}

/** Classify, evaluate every applicable rule and synthesize findings for one file. */
export function scanContent(
  relativePath: string,
  content: string,
  registry: RuleRegistry,
  options: FileScanOptions,
): FileScanResult {
  const language = options.classify(relativePath, content);
  const lineIndex = new LineIndex(content);
  const findings: Finding[] = [];
  const warnings: ScanWarning[] = [];
  let ruleEvaluationsSkipped = 0;

  for (const rule of applicableRules(registry, language, options.categories)) {
    let matches: RawMatch[];
    try {
      matches = evaluateRule(content, rule, {
        filePath: relativePath,
        timeoutMs: options.patternTimeoutMs,
        lineIndex,
        checkSanitizers: options.adjustConfidence ?? true,
      });
    } catch (error) {
      if (!(error instanceof PatternError)) {
        throw error;
      }
      ruleEvaluationsSkipped += 1;
      warnings.push({
        kind: "pattern",
        file: relativePath,
        rule_id: rule.id,
        message: error.message,
      });
      options.logger?.warn(
        { file: relativePath, ruleId: rule.id, reason: error.reason },
        "Skipped rule evaluation",
      );
      continue;
    }

    for (const match of matches) {
      findings.push(
        createFinding(rule, match, {
          file: relativePath,
          language,
          adjustConfidence: options.adjustConfidence,
        }),
      );
    }
  }

  return {
    file: relativePath,
    language,
    findings,
    warnings,
    skipped: false,
    ruleEvaluationsSkipped,
  };
}

function applicableRules(
  registry: RuleRegistry,
  language: string,
  categories?: readonly Category[],
): readonly CompiledRule[] {
  if (!categories || categories.length === 0) {
    return registry.rulesFor(language);
  }
  if (categories.length === 1 && categories[0]) {
    return registry.rulesFor(language, categories[0]);
  }
  return registry
    .rulesFor(language)
    .filter((rule) => categories.includes(rule.category));
}
