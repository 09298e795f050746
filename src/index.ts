export { loadConfigFile, substituteEnv, CONFIG_FILE_NAME } from "./config/loader.js";
export { loadToolVersion, resolveRulesDirectory } from "./config/runtime-paths.js";
export {
  DEFAULT_CONCURRENCY,
  DEFAULT_IGNORE_FILES,
  DEFAULT_MAX_FILE_SIZE_BYTES,
  DEFAULT_PATTERN_TIMEOUT_MS,
  parseScanOptions,
} from "./config/schema.js";
export type {
  ScanOptions,
  ScanOptionsInput,
  ScanSettings,
  ScanSettingsInput,
} from "./config/schema.js";
export * from "./engine/index.js";
export {
  AggregationError,
  AnalysisCancelledError,
  CodesweepError,
  ConfigError,
  IOError,
  PatternError,
} from "./errors.js";
export type { PatternFailure } from "./errors.js";
export * from "./ingest/index.js";
export { createLogger, createSilentLogger } from "./logging/logger.js";
export type { Logger, LoggingConfig, LogLevel } from "./logging/logger.js";
export * from "./report/index.js";
export * from "./scanner/index.js";
export * from "./scoring/index.js";
