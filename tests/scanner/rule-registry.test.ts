import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigError } from "../../src/errors.js";
import {
  loadRegistry,
  loadRuleDocuments,
  parseRuleDocument,
} from "../../src/scanner/rule-loader.js";
import { buildRegistry } from "../../src/scanner/rule-registry.js";
import { registryOf, ruleBody, rulesYaml, testMeta } from "../helpers/rules.js";

let tempDir: string;

beforeEach(async () => {
  tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "codesweep-rules-"));
});

afterEach(async () => {
  if (tempDir) {
    await fs.rm(tempDir, { recursive: true, force: true });
  }
});

describe("rule registry", () => {
  it("compiles rules with defaults filled in", () => {
    const registry = registryOf({
      id: "quality-rule",
      category: "quality",
      severity: "low",
      patterns: ["foo"],
    });

    const rule = registry.get("quality-rule");
    expect(rule?.name).toBe("quality-rule");
    expect(rule?.effort_minutes).toBe(15);
    expect(rule?.case_sensitive).toBe(false);
    expect(rule?.compiled[0]?.flags).toBe("gim");
    expect(rule?.source).toBe("inline.yaml");
    expect(registry.size).toBe(1);
    expect(registry.formatVersion).toBe("1.0");
  });

  it("uses case-sensitive flags when asked", () => {
    const registry = registryOf({ id: "cs", patterns: ["Foo"], case_sensitive: true });
    expect(registry.get("cs")?.compiled[0]?.flags).toBe("gm");
  });

  it("rejects an uncompilable pattern naming the rule id", () => {
    const build = () => registryOf({ id: "broken-rule", patterns: ["ok", "(unclosed"] });

    expect(build).toThrow(ConfigError);
    expect(build).toThrow(/Rule "broken-rule" in inline\.yaml: pattern 2 does not compile/);
    try {
      build();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      expect(error instanceof ConfigError ? error.ruleId : undefined).toBe("broken-rule");
    }
  });

  it("rejects a rule with an unknown severity", () => {
    expect(() =>
      buildRegistry(
        [
          {
            source: "bad.yaml",
            body: { rules: [{ ...ruleBody({ id: "bad-severity", patterns: ["x"] }), severity: "urgent" }] },
          },
        ],
        testMeta,
      ),
    ).toThrow(/Rule "bad-severity" in bad\.yaml is invalid: severity/);
  });

  it("rejects a document without a rules list", () => {
    expect(() => buildRegistry([{ source: "empty.yaml", body: { other: [] } }], testMeta)).toThrow(
      /Invalid rule document empty\.yaml: rules/,
    );
  });

  it("rejects duplicate ids across documents before anything is scanned", () => {
    const rule = ruleBody({ id: "sql-injection-1", patterns: ["SELECT"] });
    const build = () =>
      buildRegistry(
        [
          { source: "first.yaml", body: { rules: [rule] } },
          { source: "second.yaml", body: { rules: [rule] } },
        ],
        testMeta,
      );

    expect(build).toThrow(ConfigError);
    expect(build).toThrow(
      'Duplicate rule id "sql-injection-1" in second.yaml (first defined in first.yaml)',
    );
  });

  it("indexes rules by language and category", () => {
    const registry = registryOf(
      { id: "py-only", languages: ["Python"], patterns: ["a"] },
      { id: "everywhere", patterns: ["b"] },
      { id: "js-quality", languages: ["javascript"], category: "quality", patterns: ["c"] },
    );

    expect(registry.rulesFor("python").map((rule) => rule.id)).toEqual(["everywhere", "py-only"]);
    expect(registry.rulesFor("javascript", "quality").map((rule) => rule.id)).toEqual([
      "js-quality",
    ]);
    expect(registry.rulesFor("javascript", "security").map((rule) => rule.id)).toEqual([
      "everywhere",
    ]);
    expect(registry.rulesFor("unknown").map((rule) => rule.id)).toEqual(["everywhere"]);
    expect(registry.rulesFor("cobol").map((rule) => rule.id)).toEqual(["everywhere"]);
    expect(registry.languages).toContain("python");
    expect(Object.isFrozen(registry)).toBe(true);
    expect(Object.isFrozen(registry.all())).toBe(true);
  });

  it("normalizes numeric cwe identifiers to strings", () => {
    const registry = buildRegistry(
      [
        {
          source: "cwe.yaml",
          body: { rules: [{ ...ruleBody({ id: "numeric-cwe", patterns: ["x"] }), cwe: 798 }] },
        },
      ],
      testMeta,
    );
    expect(registry.get("numeric-cwe")?.cwe).toBe("798");
  });
});

describe("rule loader", () => {
  it("reads rule files from a directory in name order, skipping the meta file", async () => {
    await fs.writeFile(path.join(tempDir, "b.yml"), rulesYaml({ id: "rule-b", patterns: ["b"] }));
    await fs.writeFile(path.join(tempDir, "a.yaml"), rulesYaml({ id: "rule-a", patterns: ["a"] }));
    await fs.writeFile(path.join(tempDir, "_meta.yaml"), "rule_format_version: 1\n");
    await fs.writeFile(path.join(tempDir, "notes.txt"), "not rules");

    const documents = await loadRuleDocuments([tempDir]);

    expect(documents.map((document) => path.basename(document.source))).toEqual([
      "a.yaml",
      "b.yml",
    ]);
  });

  it("accepts inline documents", async () => {
    const documents = await loadRuleDocuments([
      { name: "inline", content: rulesYaml({ id: "inline-rule", patterns: ["x"] }) },
    ]);
    expect(documents).toHaveLength(1);
    expect(documents[0]?.source).toBe("inline");
  });

  it("reports malformed YAML as a ConfigError", () => {
    expect(() => parseRuleDocument("broken.yaml", "rules: [\n  - id: x\n")).toThrow(
      /Invalid YAML in broken\.yaml/,
    );
  });

  it("fails on a missing rule source", async () => {
    await expect(loadRuleDocuments([path.join(tempDir, "missing.yaml")])).rejects.toThrow(
      ConfigError,
    );
  });

  it("loads the built-in packs", async () => {
    const registry = await loadRegistry();

    expect(registry.get("hardcoded-secret")?.category).toBe("security");
    expect(registry.get("dangerous-eval")?.category).toBe("security");
    expect(registry.get("todo-comment")?.category).toBe("quality");
    expect(registry.meta.language_extensions["python"]).toContain(".py");
  });
});
