import { z } from "zod";
import { formatIssues } from "../config/schema.js";
import { ConfigError, describeError } from "../errors.js";
import {
  CATEGORIES,
  CONFIDENCES,
  SEVERITIES,
  UNKNOWN_LANGUAGE,
  type Category,
  type CompiledRule,
  type Rule,
  type RuleDocument,
  type RuleMeta,
} from "./types.js";

const DEFAULT_SECURITY_EFFORT_MINUTES = 30;
const DEFAULT_QUALITY_EFFORT_MINUTES = 15;
const ANY_CATEGORY = "*";

const identifier = z.union([z.string().min(1), z.number()]).transform(String);

const ruleSchema = z
  .object({
    id: z.string().min(1),
    name: z.string().min(1).optional(),
    category: z.enum(CATEGORIES),
    severity: z.enum(SEVERITIES),
    confidence: z.enum(CONFIDENCES),
    languages: z.array(z.string().min(1)).default([]),
    patterns: z.array(z.string().min(1)).min(1),
    message: z.string().min(1),
    remediation: z.string().min(1),
    cwe: identifier.optional(),
    owasp: identifier.optional(),
    sanitizers: z.array(z.string().min(1)).default([]),
    case_sensitive: z.boolean().default(false),
    effort_minutes: z.number().int().positive().optional(),
    tags: z.array(z.string().min(1)).default([]),
  })
  .strict();

const documentSchema = z.object({
  rules: z.array(z.unknown()),
});

/**
 * Immutable, validated rule set indexed by `(language, category)`. Built once
 * per run and shared read-only by every worker.
 */
export class RuleRegistry {
  readonly formatVersion: string;
  readonly meta: RuleMeta;
  private readonly byId: ReadonlyMap<string, CompiledRule>;
  private readonly ordered: readonly CompiledRule[];
  private readonly index: ReadonlyMap<string, readonly CompiledRule[]>;
  private readonly universal: ReadonlyMap<string, readonly CompiledRule[]>;

  constructor(rules: readonly CompiledRule[], meta: RuleMeta) {
    this.meta = meta;
    this.formatVersion = meta.rule_format_version;
    this.ordered = Object.freeze(
      [...rules].sort((a, b) => a.id.localeCompare(b.id)),
    );
    this.byId = new Map(this.ordered.map((rule): [string, CompiledRule] => [rule.id, rule]));

    const universal = new Map<string, readonly CompiledRule[]>();
    for (const category of [...CATEGORIES, ANY_CATEGORY]) {
      universal.set(
        category,
        Object.freeze(
          this.ordered.filter(
            (rule) =>
              rule.languages.length === 0 &&
              (category === ANY_CATEGORY || rule.category === category),
          ),
        ),
      );
    }
    this.universal = universal;

    const index = new Map<string, readonly CompiledRule[]>();
    for (const language of this.collectLanguages()) {
      for (const category of [...CATEGORIES, ANY_CATEGORY]) {
        index.set(
          indexKey(language, category),
          Object.freeze(
            this.ordered.filter(
              (rule) =>
                (rule.languages.length === 0 ||
                  rule.languages.includes(language)) &&
                (category === ANY_CATEGORY || rule.category === category),
            ),
          ),
        );
      }
    }
    this.index = index;
    Object.freeze(this);
  }

  get size(): number {
    return this.ordered.length;
  }

  get languages(): readonly string[] {
    return this.collectLanguages();
  }

  all(): readonly CompiledRule[] {
    return this.ordered;
  }

  get(id: string): CompiledRule | undefined {
    return this.byId.get(id);
  }

  /** Rules applicable to a language; languages nobody declared get the universal rules. */
  rulesFor(language: string, category?: Category): readonly CompiledRule[] {
    const bucket = category ?? ANY_CATEGORY;
    return (
      this.index.get(indexKey(language.toLowerCase(), bucket)) ??
      this.universal.get(bucket) ??
      []
    );
  }

  private collectLanguages(): string[] {
    const languages = new Set<string>(Object.keys(this.meta.language_extensions));
    for (const key of Object.keys(this.meta.language_filenames)) {
      languages.add(key);
    }
    for (const key of Object.keys(this.meta.language_interpreters)) {
      languages.add(key);
    }
    for (const rule of this.ordered) {
      for (const language of rule.languages) {
        languages.add(language);
      }
    }
    languages.delete(UNKNOWN_LANGUAGE);
    return [...languages].sort((a, b) => a.localeCompare(b));
  }
}

export function buildRegistry(
  documents: readonly RuleDocument[],
  meta: RuleMeta,
): RuleRegistry {
  const seen = new Map<string, string>();
  const compiled: CompiledRule[] = [];

  for (const document of documents) {
    const parsed = documentSchema.safeParse(document.body);
    if (!parsed.success) {
      throw new ConfigError(
        `Invalid rule document ${document.source}: ${formatIssues(parsed.error)}`,
        { source: document.source },
      );
    }

    parsed.data.rules.forEach((raw, index) => {
      const rule = validateRule(raw, index, document.source);
      const firstSource = seen.get(rule.id);
      if (firstSource !== undefined) {
        throw new ConfigError(
          `Duplicate rule id "${rule.id}" in ${document.source} (first defined in ${firstSource})`,
          { ruleId: rule.id, source: document.source },
        );
      }
      seen.set(rule.id, document.source);
      compiled.push(compileRule(rule, document.source));
    });
  }

  return new RuleRegistry(compiled, meta);
}

export function compileRule(rule: Rule, source: string): CompiledRule {
  const flags = rule.case_sensitive ? "gm" : "gim";
  const compiled = rule.patterns.map((pattern, index) =>
    compilePattern(rule.id, source, pattern, flags, `pattern ${index + 1}`),
  );
  const compiledSanitizers = rule.sanitizers.map((pattern, index) =>
    compilePattern(rule.id, source, pattern, flags, `sanitizer ${index + 1}`),
  );

  return Object.freeze({
    ...rule,
    languages: Object.freeze([...rule.languages]),
    patterns: Object.freeze([...rule.patterns]),
    sanitizers: Object.freeze([...rule.sanitizers]),
    tags: Object.freeze([...rule.tags]),
    source,
    compiled: Object.freeze(compiled),
    compiledSanitizers: Object.freeze(compiledSanitizers),
  });
}

function validateRule(raw: unknown, index: number, source: string): Rule {
  const parsed = ruleSchema.safeParse(raw);
  if (!parsed.success) {
    const ruleId = peekRuleId(raw);
    const label = ruleId ? `Rule "${ruleId}"` : `Rule #${index + 1}`;
    throw new ConfigError(
      `${label} in ${source} is invalid: ${formatIssues(parsed.error)}`,
      { ruleId, source },
    );
  }

  const data = parsed.data;
  return {
    id: data.id,
    name: data.name ?? data.id,
    category: data.category,
    severity: data.severity,
    confidence: data.confidence,
    languages: data.languages.map((language) => language.toLowerCase()),
    patterns: data.patterns,
    message: data.message,
    remediation: data.remediation,
    cwe: data.cwe,
    owasp: data.owasp,
    sanitizers: data.sanitizers,
    case_sensitive: data.case_sensitive,
    effort_minutes:
      data.effort_minutes ??
      (data.category === "security"
        ? DEFAULT_SECURITY_EFFORT_MINUTES
        : DEFAULT_QUALITY_EFFORT_MINUTES),
    tags: data.tags,
  };
}

function compilePattern(
  ruleId: string,
  source: string,
  pattern: string,
  flags: string,
  label: string,
): RegExp {
  try {
    return new RegExp(pattern, flags);
  } catch (error) {
    throw new ConfigError(
      `Rule "${ruleId}" in ${source}: ${label} does not compile: ${describeError(error)}`,
      { ruleId, source },
    );
  }
}

function peekRuleId(raw: unknown): string | undefined {
  if (raw && typeof raw === "object" && "id" in raw && typeof raw.id === "string") {
    return raw.id;
  }
  return undefined;
}

function indexKey(language: string, category: string): string {
  return `${language}\u0000${category}`;
}
