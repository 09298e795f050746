import fs from "node:fs/promises";
import path from "node:path";
import yaml from "js-yaml";
import { z } from "zod";
import { resolveMetaPath, resolveRulesDirectory, META_FILE_NAME } from "../config/runtime-paths.js";
import { formatIssues } from "../config/schema.js";
import { ConfigError, describeError } from "../errors.js";
import { buildRegistry, type RuleRegistry } from "./rule-registry.js";
import type { RuleDocument, RuleMeta } from "./types.js";

/** A rule document given inline rather than read from disk. */
export interface InlineRuleSource {
  readonly name: string;
  readonly content: string;
}

/** A path to a rule file or a directory of rule files, or an inline document. */
export type RuleSource = string | InlineRuleSource;

export interface LoadRegistryOptions {
  readonly sources?: readonly RuleSource[];
  readonly metaPath?: string;
}

const RULE_FILE_PATTERN = /\.ya?ml$/i;

const stringList = z.array(z.string().min(1)).default([]);

const metaSchema = z.object({
  rule_format_version: z.union([z.string(), z.number()]).transform(String),
  language_extensions: z.record(z.array(z.string().min(1))),
  language_filenames: z.record(stringList).default({}),
  language_interpreters: z.record(stringList).default({}),
});

export async function loadRegistry(
  options: LoadRegistryOptions = {},
): Promise<RuleRegistry> {
  const sources = options.sources ?? [await resolveRulesDirectory()];
  const metaPath = options.metaPath ?? (await resolveMetaPath());
  const [documents, meta] = await Promise.all([
    loadRuleDocuments(sources),
    loadRuleMeta(metaPath),
  ]);
  return buildRegistry(documents, meta);
}

export async function loadRuleDocuments(
  sources: readonly RuleSource[],
): Promise<RuleDocument[]> {
  if (sources.length === 0) {
    throw new ConfigError("At least one rule source is required");
  }

  const documents: RuleDocument[] = [];
  for (const source of sources) {
    if (typeof source !== "string") {
      documents.push(parseRuleDocument(source.name, source.content));
      continue;
    }

    const resolved = path.resolve(source);
    for (const filePath of await expandSource(resolved)) {
      const raw = await readSource(filePath);
      documents.push(parseRuleDocument(filePath, raw));
    }
  }
  return documents;
}

export async function loadRuleMeta(metaPath: string): Promise<RuleMeta> {
  const raw = await readSource(metaPath);
  const parsed = metaSchema.safeParse(parseYaml(metaPath, raw));
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid rules meta in ${metaPath}: ${formatIssues(parsed.error)}`,
      { source: metaPath },
    );
  }
  return parsed.data;
}

export function parseRuleDocument(source: string, raw: string): RuleDocument {
  return { source, body: parseYaml(source, raw) };
}

async function expandSource(sourcePath: string): Promise<string[]> {
  let stats: Awaited<ReturnType<typeof fs.stat>>;
  try {
    stats = await fs.stat(sourcePath);
  } catch (error) {
    throw new ConfigError(
      `Rule source does not exist: ${sourcePath} (${describeError(error)})`,
      { source: sourcePath },
    );
  }

  if (!stats.isDirectory()) {
    return [sourcePath];
  }

  const entries = await fs.readdir(sourcePath, { withFileTypes: true });
  return entries
    .filter(
      (entry) =>
        entry.isFile() &&
        RULE_FILE_PATTERN.test(entry.name) &&
        entry.name !== META_FILE_NAME,
    )
    .map((entry) => entry.name)
    .sort((a, b) => a.localeCompare(b))
    .map((name) => path.join(sourcePath, name));
}

async function readSource(filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath, "utf8");
  } catch (error) {
    throw new ConfigError(
      `Unable to read rule source ${filePath}: ${describeError(error)}`,
      { source: filePath },
    );
  }
}

function parseYaml(source: string, raw: string): unknown {
  try {
    return yaml.load(raw);
  } catch (error) {
    throw new ConfigError(
      `Invalid YAML in ${source}: ${describeError(error)}`,
      { source },
    );
  }
}
