import { z } from "zod";
import { ConfigError } from "../errors.js";
import { CATEGORIES } from "../scanner/types.js";

export const DEFAULT_MAX_FILE_SIZE_BYTES = 1_000_000;
export const DEFAULT_CONCURRENCY = 4;
export const DEFAULT_PATTERN_TIMEOUT_MS = 250;
export const DEFAULT_IGNORE_FILES = [".gitignore", ".codesweepignore"] as const;

const inlineRuleSourceSchema = z.object({
  name: z.string().min(1),
  content: z.string(),
});

const ruleSourceSchema = z.union([z.string().min(1), inlineRuleSourceSchema]);

const scanSettingsShape = {
  include: z.array(z.string().min(1)).default([]),
  exclude: z.array(z.string().min(1)).default([]),
  ruleSources: z.array(ruleSourceSchema).optional(),
  categories: z.array(z.enum(CATEGORIES)).optional(),
  maxFileSizeBytes: z.number().int().positive().default(DEFAULT_MAX_FILE_SIZE_BYTES),
  concurrency: z.number().int().min(1).max(64).default(DEFAULT_CONCURRENCY),
  patternTimeoutMs: z.number().int().positive().default(DEFAULT_PATTERN_TIMEOUT_MS),
  runTimeoutMs: z.number().int().positive().optional(),
  ignoreFileNames: z.array(z.string().min(1)).default([...DEFAULT_IGNORE_FILES]),
  adjustConfidence: z.boolean().default(true),
};

/** Settings a `.codesweep.yml` file may carry; everything but the root. */
export const scanSettingsSchema = z.object(scanSettingsShape).strict();

export const scanOptionsSchema = z
  .object({
    root: z.string().min(1),
    ...scanSettingsShape,
  })
  .strict();

export type ScanSettingsInput = z.input<typeof scanSettingsSchema>;
export type ScanSettings = z.output<typeof scanSettingsSchema>;
export type ScanOptionsInput = z.input<typeof scanOptionsSchema>;
export type ScanOptions = z.output<typeof scanOptionsSchema>;

export function parseScanOptions(raw: unknown): ScanOptions {
  const result = scanOptionsSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Invalid scan options: ${formatIssues(result.error)}`);
  }
  return result.data;
}

export function parseScanSettings(raw: unknown, source: string): ScanSettings {
  const result = scanSettingsSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigError(`Invalid configuration in ${source}: ${formatIssues(result.error)}`, {
      source,
    });
  }
  return result.data;
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${where}: ${issue.message}`;
    })
    .join("; ");
}
