import type { AnalysisResult } from "./report/types.js";

export class CodesweepError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CodesweepError";
  }
}

/**
 * Malformed rule document, duplicate rule id, uncompilable pattern or invalid
 * scan options. Raised before any file is scanned.
 */
export class ConfigError extends CodesweepError {
  readonly ruleId?: string;
  readonly source?: string;

  constructor(message: string, details: { ruleId?: string; source?: string } = {}) {
    super(message);
    this.name = "ConfigError";
    this.ruleId = details.ruleId;
    this.source = details.source;
  }
}

export class IOError extends CodesweepError {
  readonly path: string;
  readonly code?: string;

  constructor(filePath: string, cause: unknown) {
    super(`Unable to read ${filePath}: ${describeError(cause)}`);
    this.name = "IOError";
    this.path = filePath;
    this.code = errorCode(cause);
  }
}

export type PatternFailure = "timeout" | "runtime";

export class PatternError extends CodesweepError {
  readonly ruleId: string;
  readonly path: string;
  readonly reason: PatternFailure;

  constructor(ruleId: string, filePath: string, reason: PatternFailure, detail: string) {
    super(`Rule ${ruleId} failed on ${filePath} (${reason}): ${detail}`);
    this.name = "PatternError";
    this.ruleId = ruleId;
    this.path = filePath;
    this.reason = reason;
  }
}

/** An internal invariant broke while merging findings. Not user-correctable. */
export class AggregationError extends CodesweepError {
  constructor(message: string) {
    super(message);
    this.name = "AggregationError";
  }
}

export class AnalysisCancelledError extends CodesweepError {
  readonly partialResult: AnalysisResult;

  constructor(reason: string, partialResult: AnalysisResult) {
    super(`Analysis cancelled: ${reason}`);
    this.name = "AnalysisCancelledError";
    this.partialResult = partialResult;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}
