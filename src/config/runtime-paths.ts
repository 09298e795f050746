import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { ConfigError } from "../errors.js";

export const META_FILE_NAME = "_meta.yaml";

/**
 * Locate the built-in rules directory: beside the package first (works from
 * both `src/` and `dist/`), then under the working directory.
 */
export async function resolveRulesDirectory(
  customRulesDir?: string,
): Promise<string> {
  if (customRulesDir) {
    return path.resolve(customRulesDir);
  }

  const moduleDir = path.dirname(fileURLToPath(import.meta.url));
  const bundledRulesDir = path.resolve(moduleDir, "..", "..", "rules");
  if (await existsDirectory(bundledRulesDir)) {
    return bundledRulesDir;
  }

  const cwdRulesDir = path.resolve(process.cwd(), "rules");
  if (await existsDirectory(cwdRulesDir)) {
    return cwdRulesDir;
  }

  throw new ConfigError(
    "Unable to find the built-in rules directory. Pass ruleSources explicitly.",
  );
}

export async function resolveMetaPath(customRulesDir?: string): Promise<string> {
  const rulesDir = await resolveRulesDirectory(customRulesDir);
  return path.join(rulesDir, META_FILE_NAME);
}

async function existsDirectory(targetPath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(targetPath);
    return stats.isDirectory();
  } catch {
    return false;
  }
}

const packageManifestSchema = z.object({ version: z.string().min(1) });

let cachedToolVersion: Promise<string> | undefined;

/** Version from the package manifest next to `src/` or `dist/`. */
export function loadToolVersion(): Promise<string> {
  cachedToolVersion ??= readToolVersion();
  return cachedToolVersion;
}

async function readToolVersion(): Promise<string> {
  const moduleDir = path.dirname(fileURLToPath(import.meta.url));
  const manifestPath = path.resolve(moduleDir, "..", "..", "package.json");
  let raw: string;
  try {
    raw = await fs.readFile(manifestPath, "utf8");
  } catch {
    return "0.0.0";
  }
  const parsed = packageManifestSchema.safeParse(JSON.parse(raw));
  return parsed.success ? parsed.data.version : "0.0.0";
}
