import path from "node:path";
import { loadToolVersion } from "../config/runtime-paths.js";
import { parseScanOptions, type ScanOptions, type ScanOptionsInput } from "../config/schema.js";
import { AnalysisCancelledError, describeError } from "../errors.js";
import { createLanguageClassifier } from "../ingest/file-classifier.js";
import { resolveScanRoot, walkFiles } from "../ingest/file-discovery.js";
import { createSilentLogger, type Logger } from "../logging/logger.js";
import type { AnalysisResult } from "../report/types.js";
import { loadRegistry } from "../scanner/rule-loader.js";
import { scanFile, type FileScanResult } from "../scanner/rule-engine.js";
import type { RuleRegistry } from "../scanner/rule-registry.js";
import type { Finding, ScanWarning } from "../scanner/types.js";
import { aggregateFindings } from "../scoring/aggregator.js";
import { calculateScore } from "../scoring/score-calculator.js";
import { ScanStateMachine, type StateTransition } from "./scan-state.js";
import { runWorkerPool } from "./worker-pool.js";

export interface AnalyzeDependencies {
  /** Use an already-built registry instead of loading `ruleSources`. */
  readonly registry?: RuleRegistry;
  readonly logger?: Logger;
  /** External cancellation; combined with `runTimeoutMs`. */
  readonly signal?: AbortSignal;
  readonly onStateChange?: (transition: StateTransition) => void;
  readonly clock?: () => Date;
}

interface RunCollector {
  readonly fileResults: FileScanResult[];
  readonly walkWarnings: ScanWarning[];
  binaryFilesSkipped: number;
}

/**
 * Run one analysis: load rules, walk the tree with a bounded worker pool,
 * then aggregate, score and assemble an immutable result.
 *
 * Throws ConfigError before any file is read when the options or rules are
 * invalid, AggregationError on a broken finding, and AnalysisCancelledError
 * (carrying the partial result) when the signal or run deadline fires.
 */
export async function analyze(
  input: ScanOptionsInput,
  deps: AnalyzeDependencies = {},
): Promise<AnalysisResult> {
  const logger = (deps.logger ?? createSilentLogger()).child({ component: "analyzer" });
  const clock = deps.clock ?? (() => new Date());
  const machine = new ScanStateMachine((transition) => {
    logger.debug({ from: transition.from, to: transition.to }, "Scan state changed");
    deps.onStateChange?.(transition);
  }, clock);
  const startedAt = clock();

  const cancellation = linkCancellation(deps.signal);
  try {
    const options = parseScanOptions(input);
    await resolveScanRoot(options.root);
    const registry =
      deps.registry ?? (await loadRegistry({ sources: options.ruleSources }));
    const toolVersion = await loadToolVersion();
    logger.info(
      { root: options.root, rules: registry.size, concurrency: options.concurrency },
      "Starting analysis",
    );

    if (options.runTimeoutMs !== undefined) {
      cancellation.deadline(options.runTimeoutMs);
    }

    machine.transition("scanning");
    const collector = await scanTree(options, registry, cancellation.signal, logger);

    if (cancellation.signal.aborted) {
      const reason = describeAbort(cancellation.signal);
      const partial = assemble(collector, options, registry, toolVersion, {
        startedAt,
        completedAt: clock(),
        partial: true,
      });
      logger.warn({ reason, filesScanned: partial.metadata.files_scanned }, "Analysis cancelled");
      machine.fail();
      throw new AnalysisCancelledError(reason, partial);
    }

    machine.transition("aggregating");
    const aggregated = assemble(collector, options, registry, toolVersion, {
      startedAt,
      completedAt: clock(),
      partial: false,
    });

    machine.transition("reporting");
    logger.info(
      {
        findings: aggregated.findings.length,
        grade: aggregated.grade,
        score: aggregated.score,
        filesScanned: aggregated.metadata.files_scanned,
        warnings: aggregated.metadata.warnings.length,
      },
      "Analysis complete",
    );
    machine.transition("done");
    return aggregated;
  } catch (error) {
    if (!machine.isTerminal) {
      logger.error({ err: error }, "Analysis failed");
      machine.fail();
    }
    throw error;
  } finally {
    cancellation.dispose();
  }
}

async function scanTree(
  options: ScanOptions,
  registry: RuleRegistry,
  signal: AbortSignal,
  logger: Logger,
): Promise<RunCollector> {
  const collector: RunCollector = { fileResults: [], walkWarnings: [], binaryFilesSkipped: 0 };
  const scanLogger = logger.child({ component: "scanner" });
  const classify = createLanguageClassifier(registry.meta);

  const files = walkFiles(options.root, {
    include: options.include,
    exclude: options.exclude,
    maxFileSizeBytes: options.maxFileSizeBytes,
    ignoreFileNames: options.ignoreFileNames,
    observer: {
      onWarning: (warning) => {
        scanLogger.warn({ file: warning.file, kind: warning.kind }, warning.message);
        collector.walkWarnings.push(warning);
      },
      onBinarySkipped: (relativePath) => {
        scanLogger.debug({ file: relativePath }, "Skipped binary file");
        collector.binaryFilesSkipped += 1;
      },
    },
  });

  const outcome = await runWorkerPool(
    files,
    async (file) => {
      const result = await scanFile(file, registry, {
        classify,
        categories: options.categories,
        patternTimeoutMs: options.patternTimeoutMs,
        adjustConfidence: options.adjustConfidence,
        logger: scanLogger,
      });
      collector.fileResults.push(result);
    },
    { concurrency: options.concurrency, signal },
  );
  scanLogger.debug({ processed: outcome.processed, aborted: outcome.aborted }, "Worker pool drained");
  return collector;
}

interface RunTiming {
  readonly startedAt: Date;
  readonly completedAt: Date;
  readonly partial: boolean;
}

function assemble(
  collector: RunCollector,
  options: ScanOptions,
  registry: RuleRegistry,
  toolVersion: string,
  timing: RunTiming,
): AnalysisResult {
  const candidates: Finding[] = [];
  const warnings: ScanWarning[] = [...collector.walkWarnings];
  let filesScanned = 0;
  let filesSkipped = collector.walkWarnings.filter(
    (warning) => warning.kind === "io" || warning.kind === "oversize",
  ).length;
  let ruleEvaluationsSkipped = 0;

  for (const fileResult of collector.fileResults) {
    candidates.push(...fileResult.findings);
    warnings.push(...fileResult.warnings);
    ruleEvaluationsSkipped += fileResult.ruleEvaluationsSkipped;
    if (fileResult.skipped) {
      filesSkipped += 1;
    } else {
      filesScanned += 1;
    }
  }

  const { findings, countsBySeverity, countsByCategory } = aggregateFindings(candidates);
  const { score, grade } = calculateScore(countsBySeverity);

  return deepFreeze({
    findings,
    counts_by_severity: countsBySeverity,
    counts_by_category: countsByCategory,
    score,
    grade,
    metadata: {
      root: path.resolve(options.root),
      files_scanned: filesScanned,
      files_skipped: filesSkipped,
      binary_files_skipped: collector.binaryFilesSkipped,
      rule_evaluations_skipped: ruleEvaluationsSkipped,
      rules_loaded: registry.size,
      rules_version: registry.formatVersion,
      warnings: warnings.sort(compareWarnings),
      partial: timing.partial,
      started_at: timing.startedAt.toISOString(),
      completed_at: timing.completedAt.toISOString(),
      duration_ms: Math.max(0, timing.completedAt.getTime() - timing.startedAt.getTime()),
      tool_version: toolVersion,
    },
  });
}

function compareWarnings(a: ScanWarning, b: ScanWarning): number {
  return (
    compareText(a.file, b.file) ||
    compareText(a.kind, b.kind) ||
    compareText(a.rule_id ?? "", b.rule_id ?? "") ||
    compareText(a.message, b.message)
  );
}

function compareText(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

interface Cancellation {
  readonly signal: AbortSignal;
  deadline(ms: number): void;
  dispose(): void;
}

function linkCancellation(external?: AbortSignal): Cancellation {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const onExternalAbort = (): void => {
    controller.abort(external?.reason ?? new Error("aborted by caller"));
  };

  if (external?.aborted) {
    onExternalAbort();
  } else {
    external?.addEventListener("abort", onExternalAbort, { once: true });
  }

  return {
    signal: controller.signal,
    deadline(ms: number) {
      timer = setTimeout(() => {
        controller.abort(new Error(`run deadline of ${ms}ms exceeded`));
      }, ms);
    },
    dispose() {
      if (timer) {
        clearTimeout(timer);
      }
      external?.removeEventListener("abort", onExternalAbort);
    },
  };
}

function describeAbort(signal: AbortSignal): string {
  const reason: unknown = signal.reason;
  return reason === undefined ? "aborted" : describeError(reason);
}
