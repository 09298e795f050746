import { describe, expect, it } from "vitest";
import { createLanguageClassifier } from "../../src/ingest/file-classifier.js";
import {
  compileGlob,
  compileGlobs,
  includesFile,
  isIgnored,
  matchesAny,
} from "../../src/ingest/glob.js";
import { testMeta } from "../helpers/rules.js";

const classify = createLanguageClassifier(testMeta);

describe("language classifier", () => {
  it("classifies by extension, case-insensitively", () => {
    expect(classify("src/app.py")).toBe("python");
    expect(classify("web/Main.JS")).toBe("javascript");
    expect(classify("lib/index.ts")).toBe("typescript");
  });

  it("classifies well-known file names before extensions", () => {
    expect(classify("docker/Dockerfile")).toBe("dockerfile");
  });

  it("falls back to the shebang interpreter", () => {
    expect(classify("bin/tool", "#!/usr/bin/env python3\nprint(1)\n")).toBe("python");
    expect(classify("bin/setup", "#!/bin/bash\necho hi\n")).toBe("shell");
  });

  it("returns unknown instead of failing", () => {
    expect(classify("notes.txt")).toBe("unknown");
    expect(classify("bin/tool", "#!/usr/bin/env perl\n")).toBe("unknown");
    expect(classify("LICENSE")).toBe("unknown");
  });
});

describe("globs", () => {
  it("matches base names at any depth when the pattern has no slash", () => {
    const matcher = compileGlob("*.min.js");
    expect(matcher?.matches("a/b/lib.min.js", false)).toBe(true);
    expect(matcher?.matches("lib.js", false)).toBe(false);
  });

  it("anchors patterns that contain a slash", () => {
    const matcher = compileGlob("src/*.py");
    expect(matcher?.matches("src/app.py", false)).toBe(true);
    expect(matcher?.matches("lib/src/app.py", false)).toBe(false);
  });

  it("supports braces, classes and globstars", () => {
    const matchers = compileGlobs(["**/test_[ab].{py,js}"]);
    expect(matchesAny(matchers, "deep/dir/test_a.js", false)).toBe(true);
    expect(matchesAny(matchers, "test_b.py", false)).toBe(true);
    expect(matchesAny(matchers, "test_c.py", false)).toBe(false);
  });

  it("includes files beneath a matching directory", () => {
    const matchers = compileGlobs(["vendor/", "/docs/"]);
    expect(includesFile(matchers, "vendor/lib.js")).toBe(true);
    expect(includesFile(matchers, "pkg/vendor/deep/lib.js")).toBe(true);
    expect(includesFile(matchers, "docs/guide.md")).toBe(true);
    expect(includesFile(matchers, "pkg/docs/guide.md")).toBe(false);
    expect(includesFile(matchers, "vendor")).toBe(false);
  });

  it("restricts trailing-slash patterns to directories", () => {
    const matcher = compileGlob("vendor/");
    expect(matcher?.matches("vendor", true)).toBe(true);
    expect(matcher?.matches("vendor", false)).toBe(false);
  });

  it("lets the last matching ignore pattern decide", () => {
    const matchers = compileGlobs(["*.log", "!keep.log"]);
    expect(isIgnored(matchers, "debug.log", false)).toBe(true);
    expect(isIgnored(matchers, "keep.log", false)).toBe(false);
  });

  it("drops empty patterns", () => {
    expect(compileGlob("   ")).toBeNull();
    expect(compileGlob("/")).toBeNull();
  });
});
