import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { loadConfigFile, substituteEnv } from "../../src/config/loader.js";
import { parseScanOptions } from "../../src/config/schema.js";
import { ConfigError } from "../../src/errors.js";

let tempDir: string;

beforeEach(async () => {
  tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "codesweep-config-"));
});

afterEach(async () => {
  if (tempDir) {
    await fs.rm(tempDir, { recursive: true, force: true });
  }
});

describe("config loader", () => {
  it("returns defaults when the file is missing", async () => {
    const settings = await loadConfigFile(path.join(tempDir, ".codesweep.yml"));

    expect(settings).toEqual({
      include: [],
      exclude: [],
      maxFileSizeBytes: 1_000_000,
      concurrency: 4,
      patternTimeoutMs: 250,
      ignoreFileNames: [".gitignore", ".codesweepignore"],
      adjustConfidence: true,
    });
  });

  it("reads YAML, substitutes env values and resolves rule paths", async () => {
    const configPath = path.join(tempDir, ".codesweep.yml");
    await fs.writeFile(
      configPath,
      [
        "exclude:",
        '  - "${env:CODESWEEP_TEST_EXCLUDE}"',
        "concurrency: 2",
        "categories: [security]",
        "ruleSources:",
        "  - rules/custom.yaml",
      ].join("\n"),
    );

    const settings = await loadConfigFile(configPath, { CODESWEEP_TEST_EXCLUDE: "dist/" });

    expect(settings.exclude).toEqual(["dist/"]);
    expect(settings.concurrency).toBe(2);
    expect(settings.categories).toEqual(["security"]);
    expect(settings.ruleSources).toEqual([path.join(tempDir, "rules", "custom.yaml")]);
  });

  it("rejects unknown keys", async () => {
    const configPath = path.join(tempDir, "bad.yml");
    await fs.writeFile(configPath, "colour: blue\n");

    await expect(loadConfigFile(configPath)).rejects.toThrow(ConfigError);
    await expect(loadConfigFile(configPath)).rejects.toThrow(/Invalid configuration in .*bad\.yml/);
  });

  it("fails on a missing environment variable", () => {
    expect(() => substituteEnv("token: ${env:CODESWEEP_UNSET_VALUE}", {})).toThrow(
      "Missing environment variable: CODESWEEP_UNSET_VALUE (referenced as ${env:CODESWEEP_UNSET_VALUE})",
    );
  });
});

describe("scan options", () => {
  it("requires a root", () => {
    expect(() => parseScanOptions({})).toThrow("Invalid scan options: root: Required");
  });

  it("bounds the worker count", () => {
    expect(() => parseScanOptions({ root: ".", concurrency: 65 })).toThrow(ConfigError);
    expect(parseScanOptions({ root: ".", concurrency: 64 }).concurrency).toBe(64);
  });
});
