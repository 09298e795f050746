import vm from "node:vm";
import { describeError, errorCode, PatternError } from "../errors.js";
import { LineIndex } from "./evidence.js";
import type { CompiledRule, RawMatch } from "./types.js";

export const DEFAULT_EVALUATION_TIMEOUT_MS = 250;

const SCRIPT_TIMEOUT_CODE = "ERR_SCRIPT_EXECUTION_TIMEOUT";

export interface EvaluateOptions {
  /** Path reported in PatternError messages. */
  readonly filePath?: string;
  readonly timeoutMs?: number;
  /** Reuse a line index already built for this content. */
  readonly lineIndex?: LineIndex;
  /** Look for the rule's sanitizers around each match (default true). */
  readonly checkSanitizers?: boolean;
  readonly now?: () => number;
}

interface EvaluationSlot {
  task: () => void;
}

// One shared context: evaluations are synchronous, so the slot is never
// observed by two tasks at once.
const slot: EvaluationSlot = { task: () => undefined };
const evaluationContext = vm.createContext(slot);
const runner = new vm.Script("task()", { filename: "codesweep-pattern-evaluation" });

/**
 * Every non-overlapping occurrence of every pattern of `rule` in `content`.
 *
 * The whole (file, rule) evaluation, sanitizer lookups included, runs under a
 * hard watchdog so a catastrophically backtracking expression is interrupted;
 * the deadline is also checked between matches. Either way the failure
 * surfaces as a PatternError for this rule and file only.
 */
export function evaluateRule(
  content: string,
  rule: CompiledRule,
  options: EvaluateOptions = {},
): RawMatch[] {
  const filePath = options.filePath ?? "<memory>";
  const timeoutMs = options.timeoutMs ?? DEFAULT_EVALUATION_TIMEOUT_MS;
  const now = options.now ?? Date.now;
  const deadline = now() + timeoutMs;
  const lineIndex = options.lineIndex ?? new LineIndex(content);
  const checkSanitizers = options.checkSanitizers ?? true;
  const matches: RawMatch[] = [];

  slot.task = () => {
    collectMatches(content, rule, lineIndex, matches, checkSanitizers, () => {
      if (now() > deadline) {
        throw new PatternError(
          rule.id,
          filePath,
          "timeout",
          `exceeded ${timeoutMs}ms deadline`,
        );
      }
    });
  };

  try {
    runner.runInContext(evaluationContext, { timeout: timeoutMs });
  } catch (error) {
    if (error instanceof PatternError) {
      throw error;
    }
    if (errorCode(error) === SCRIPT_TIMEOUT_CODE) {
      throw new PatternError(
        rule.id,
        filePath,
        "timeout",
        `exceeded ${timeoutMs}ms deadline`,
      );
    }
    throw new PatternError(rule.id, filePath, "runtime", describeError(error));
  } finally {
    slot.task = () => undefined;
  }

  return matches;
}

function collectMatches(
  content: string,
  rule: CompiledRule,
  lineIndex: LineIndex,
  matches: RawMatch[],
  checkSanitizers: boolean,
  checkDeadline: () => void,
): void {
  const sanitizedLines = new Map<number, boolean>();
  const sanitizerNearby = (line: number): boolean => {
    if (!checkSanitizers) {
      return false;
    }
    let found = sanitizedLines.get(line);
    if (found === undefined) {
      found = hasAdjacentSanitizer(rule, line, lineIndex, checkDeadline);
      sanitizedLines.set(line, found);
    }
    return found;
  };

  rule.compiled.forEach((compiled, patternIndex) => {
    // a private copy keeps `lastIndex` off the shared registry
    const regex = new RegExp(compiled.source, compiled.flags);
    let match = regex.exec(content);
    while (match) {
      checkDeadline();
      const text = match[0];
      const position = lineIndex.positionAt(match.index);
      matches.push({
        ruleId: rule.id,
        patternIndex,
        offset: match.index,
        line: position.line,
        column: position.column,
        text,
        snippet: lineIndex.snippetAround(position.line),
        sanitizerNearby: sanitizerNearby(position.line),
      });
      if (text.length === 0) {
        regex.lastIndex += 1;
      }
      match = regex.exec(content);
    }
  });
}

/**
 * True when one of the rule's sanitizer patterns occurs on `line` or on the
 * line directly above or below it.
 */
export function hasAdjacentSanitizer(
  rule: CompiledRule,
  line: number,
  lineIndex: LineIndex,
  checkDeadline: () => void = () => undefined,
): boolean {
  if (rule.compiledSanitizers.length === 0) {
    return false;
  }

  const first = Math.max(1, line - 1);
  const last = Math.min(lineIndex.lineCount, line + 1);
  for (let current = first; current <= last; current += 1) {
    const text = lineIndex.lineText(current);
    for (const sanitizer of rule.compiledSanitizers) {
      checkDeadline();
      const regex = new RegExp(sanitizer.source, sanitizer.flags);
      if (regex.test(text)) {
        return true;
      }
    }
  }
  return false;
}
