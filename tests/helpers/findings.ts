import type { Finding } from "../../src/scanner/types.js";

export function makeFinding(overrides: Partial<Finding> = {}): Finding {
  return {
    rule_id: "rule-a",
    rule_name: "Rule A",
    file: "src/app.py",
    line: 1,
    column: 1,
    snippet: "x = 1",
    severity: "medium",
    confidence: "high",
    category: "security",
    language: "python",
    message: "Something matched",
    remediation: "Fix it.",
    effort_minutes: 30,
    tags: [],
    adjustments: [],
    ...overrides,
  };
}
