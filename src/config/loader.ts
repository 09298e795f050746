import fs from "node:fs/promises";
import path from "node:path";
import yaml from "js-yaml";
import { ConfigError, describeError, errorCode } from "../errors.js";
import { parseScanSettings, type ScanSettings } from "./schema.js";

export const CONFIG_FILE_NAME = ".codesweep.yml";

const ENV_PATTERN = /\$\{env:([A-Z_][A-Z0-9_]*)\}/g;

export function substituteEnv(
  raw: string,
  env: NodeJS.ProcessEnv = process.env,
): string {
  return raw.replace(ENV_PATTERN, (match, varName: string) => {
    const value = env[varName];
    if (value === undefined) {
      throw new ConfigError(
        `Missing environment variable: ${varName} (referenced as ${match})`,
      );
    }
    return value;
  });
}

/**
 * Read scan settings from a YAML file. A missing file yields the defaults;
 * relative rule source paths resolve against the file's directory.
 */
export async function loadConfigFile(
  configPath: string = CONFIG_FILE_NAME,
  env: NodeJS.ProcessEnv = process.env,
): Promise<ScanSettings> {
  const resolved = path.resolve(configPath);

  let content: string;
  try {
    content = await fs.readFile(resolved, "utf8");
  } catch (error) {
    if (errorCode(error) === "ENOENT") {
      return parseScanSettings({}, resolved);
    }
    throw new ConfigError(`Unable to read ${resolved}: ${describeError(error)}`, {
      source: resolved,
    });
  }

  let raw: unknown;
  try {
    raw = yaml.load(substituteEnv(content, env));
  } catch (error) {
    if (error instanceof ConfigError) {
      throw error;
    }
    throw new ConfigError(`Invalid YAML in ${resolved}: ${describeError(error)}`, {
      source: resolved,
    });
  }

  const settings = parseScanSettings(raw, resolved);
  if (!settings.ruleSources) {
    return settings;
  }
  const baseDir = path.dirname(resolved);
  return {
    ...settings,
    ruleSources: settings.ruleSources.map((source) =>
      typeof source === "string" ? path.resolve(baseDir, source) : source,
    ),
  };
}
