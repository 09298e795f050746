export { createLanguageClassifier } from "./file-classifier.js";
export { isExcluded, looksBinary, resolveScanRoot, walkFiles } from "./file-discovery.js";
export {
  compileGlob,
  compileGlobs,
  includesFile,
  isIgnored,
  matchesAny,
  toPosix,
} from "./glob.js";
export type { GlobMatcher } from "./glob.js";
export type {
  FileEntry,
  LanguageClassifier,
  LanguageTable,
  WalkObserver,
  WalkOptions,
} from "./types.js";
