import { describe, expect, it } from "vitest";
import { PatternError } from "../../src/errors.js";
import { LineIndex } from "../../src/scanner/evidence.js";
import { evaluateRule } from "../../src/scanner/pattern-evaluator.js";
import { registryOf } from "../helpers/rules.js";

function compiledRule(patterns: string[], caseSensitive = false) {
  const registry = registryOf({ id: "probe", patterns, case_sensitive: caseSensitive });
  const rule = registry.get("probe");
  if (!rule) {
    throw new Error("probe rule missing");
  }
  return rule;
}

describe("pattern evaluator", () => {
  it("reports every non-overlapping match", () => {
    const matches = evaluateRule("aaaa", compiledRule(["aa"]));

    expect(matches.map((match) => match.offset)).toEqual([0, 2]);
  });

  it("resolves line and column of each match", () => {
    const matches = evaluateRule("const a = 1;\n  eval(input)\n", compiledRule(["eval\\("]));

    expect(matches).toHaveLength(1);
    expect(matches[0]).toMatchObject({ line: 2, column: 3, text: "eval(", patternIndex: 0 });
  });

  it("reports the start line of a multi-line match", () => {
    const matches = evaluateRule(
      "x\nBEGIN\nmiddle\nEND\n",
      compiledRule(["BEGIN[\\s\\S]*?END"]),
    );

    expect(matches).toHaveLength(1);
    expect(matches[0]?.line).toBe(2);
    expect(matches[0]?.text).toBe("BEGIN\nmiddle\nEND");
  });

  it("advances past zero-length matches", () => {
    const matches = evaluateRule("a\nb\nc", compiledRule(["^"]));

    expect(matches.map((match) => match.line)).toEqual([1, 2, 3]);
  });

  it("tags matches with the index of the pattern that produced them", () => {
    const matches = evaluateRule("foo bar", compiledRule(["bar", "foo"]));

    expect(matches.map((match) => [match.patternIndex, match.text])).toEqual([
      [0, "bar"],
      [1, "foo"],
    ]);
  });

  it("matches case-insensitively unless the rule says otherwise", () => {
    expect(evaluateRule("Eval(x)", compiledRule(["eval\\("]))).toHaveLength(1);
    expect(evaluateRule("Eval(x)", compiledRule(["eval\\("], true))).toHaveLength(0);
  });

  it("leaves the shared compiled expression untouched", () => {
    const rule = compiledRule(["x"]);
    evaluateRule("x x x", rule);

    expect(rule.compiled[0]?.lastIndex).toBe(0);
    expect(evaluateRule("x x x", rule)).toHaveLength(3);
  });

  it("captures the matched line with one line of context", () => {
    const matches = evaluateRule("one\ntwo\nthree\nfour", compiledRule(["three"]));

    expect(matches[0]?.snippet).toBe("two\nthree\nfour");
  });

  it("raises a timeout PatternError when the deadline passes between matches", () => {
    let tick = 0;
    const now = () => {
      tick += 1000;
      return tick;
    };

    const evaluate = () =>
      evaluateRule("x x x", compiledRule(["x"]), { filePath: "a.py", timeoutMs: 250, now });

    expect(evaluate).toThrow(PatternError);
    expect(evaluate).toThrow("Rule probe failed on a.py (timeout): exceeded 250ms deadline");
  });

  it("interrupts catastrophic backtracking", () => {
    const rule = compiledRule(["^(a+)+$"]);
    const content = `${"a".repeat(32)}!`;

    let caught: unknown;
    try {
      evaluateRule(content, rule, { filePath: "slow.txt", timeoutMs: 50 });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(PatternError);
    expect(caught instanceof PatternError ? caught.reason : undefined).toBe("timeout");
  });

  it("flags matches with a sanitizer on the same or an adjacent line", () => {
    const registry = registryOf({ id: "guarded", patterns: ["run\\("], sanitizers: ["quote\\("] });
    const rule = registry.get("guarded");
    if (!rule) {
      throw new Error("guarded rule missing");
    }
    const content = ["x = quote(arg)", "run(x)", "", "", "run(y)"].join("\n");

    const matches = evaluateRule(content, rule);

    expect(matches.map((match) => [match.line, match.sanitizerNearby])).toEqual([
      [2, true],
      [5, false],
    ]);
    expect(evaluateRule(content, rule, { checkSanitizers: false })[0]?.sanitizerNearby).toBe(false);
  });
});

describe("line index", () => {
  it("maps offsets to 1-based positions", () => {
    const index = new LineIndex("ab\ncd\n\nef");

    expect(index.positionAt(0)).toEqual({ line: 1, column: 1 });
    expect(index.positionAt(4)).toEqual({ line: 2, column: 2 });
    expect(index.positionAt(6)).toEqual({ line: 3, column: 1 });
    expect(index.positionAt(8)).toEqual({ line: 4, column: 2 });
    expect(index.lineCount).toBe(4);
  });

  it("cuts long snippet lines", () => {
    const index = new LineIndex("x".repeat(300));
    const snippet = index.snippetAround(1);

    expect(snippet).toHaveLength(240);
    expect(snippet.endsWith("...")).toBe(true);
  });

  it("handles CRLF line endings", () => {
    const index = new LineIndex("one\r\ntwo");

    expect(index.lineText(1)).toBe("one");
    expect(index.positionAt(5)).toEqual({ line: 2, column: 1 });
  });
});
