import type { Dirent, Stats } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import { DEFAULT_IGNORE_FILES, DEFAULT_MAX_FILE_SIZE_BYTES } from "../config/schema.js";
import { ConfigError, describeError } from "../errors.js";
import {
  compileGlob,
  compileGlobs,
  isIgnored,
  includesFile,
  matchesAny,
  type GlobMatcher,
} from "./glob.js";
import type { FileEntry, WalkObserver, WalkOptions } from "./types.js";

const DEFAULT_EXCLUDES = [".git/", "node_modules/"] as const;
const SNIFF_BYTES = 8192;
const BINARY_CONTROL_RATIO = 0.3;

interface WalkContext {
  readonly rootPath: string;
  readonly ignorePatterns: readonly GlobMatcher[];
  readonly excludes: readonly GlobMatcher[];
  readonly includes: readonly GlobMatcher[];
  readonly maxFileSize: number;
  readonly observer: WalkObserver;
  readonly visitedDirs: Set<string>;
  readonly visitedFiles: Set<string>;
}

/**
 * Lazily enumerate scannable files under `rootPath` in a stable depth-first,
 * name-sorted order. Each call starts a fresh traversal.
 */
export async function* walkFiles(
  rootPath: string,
  options: WalkOptions = {},
): AsyncGenerator<FileEntry, void, undefined> {
  const realRoot = await resolveScanRoot(rootPath);
  const ignoreFileNames = options.ignoreFileNames ?? DEFAULT_IGNORE_FILES;
  const context: WalkContext = {
    rootPath: realRoot,
    ignorePatterns: await loadIgnorePatterns(realRoot, ignoreFileNames),
    excludes: compileGlobs([...DEFAULT_EXCLUDES, ...(options.exclude ?? [])]),
    includes: compileGlobs(options.include ?? []),
    maxFileSize: options.maxFileSizeBytes ?? DEFAULT_MAX_FILE_SIZE_BYTES,
    observer: options.observer ?? {},
    visitedDirs: new Set<string>(),
    visitedFiles: new Set<string>(),
  };

  yield* walkDirectory(realRoot, context);
}

/** Exclude globs and ignore files win over include globs. */
export function isExcluded(
  relativePath: string,
  isDirectory: boolean,
  excludes: readonly GlobMatcher[],
  ignorePatterns: readonly GlobMatcher[],
): boolean {
  return (
    matchesAny(excludes, relativePath, isDirectory) ||
    isIgnored(ignorePatterns, relativePath, isDirectory)
  );
}

export function looksBinary(sample: Uint8Array): boolean {
  if (sample.length === 0) {
    return false;
  }

  let controlBytes = 0;
  for (const byte of sample) {
    if (byte === 0) {
      return true;
    }
    const isWhitespace = byte >= 8 && byte <= 13;
    if (byte < 32 && !isWhitespace) {
      controlBytes += 1;
    }
  }
  return controlBytes / sample.length > BINARY_CONTROL_RATIO;
}

async function* walkDirectory(
  currentPath: string,
  context: WalkContext,
): AsyncGenerator<FileEntry, void, undefined> {
  const realCurrent = await safeRealpath(currentPath);
  if (!realCurrent || context.visitedDirs.has(realCurrent)) {
    return;
  }
  context.visitedDirs.add(realCurrent);

  let dirEntries: Dirent[];
  try {
    dirEntries = await fs.readdir(currentPath, { withFileTypes: true });
  } catch (error) {
    warn(context, "io", currentPath, `Unable to read directory: ${describeError(error)}`);
    return;
  }
  dirEntries.sort((a, b) => a.name.localeCompare(b.name));

  for (const dirent of dirEntries) {
    const absolutePath = path.join(currentPath, dirent.name);

    if (dirent.isSymbolicLink()) {
      const resolved = await safeRealpath(absolutePath);
      if (!resolved || !isWithinRoot(context.rootPath, resolved)) {
        continue;
      }
      const stats = await safeStat(resolved);
      if (stats?.isDirectory()) {
        if (!excludedPath(context, resolved, true)) {
          yield* walkDirectory(resolved, context);
        }
      } else if (stats?.isFile()) {
        const entry = await admitFile(resolved, stats.size, context);
        if (entry) {
          yield entry;
        }
      }
      continue;
    }

    if (dirent.isDirectory()) {
      if (!excludedPath(context, absolutePath, true)) {
        yield* walkDirectory(absolutePath, context);
      }
      continue;
    }

    if (dirent.isFile()) {
      const stats = await safeStat(absolutePath);
      if (!stats) {
        warn(context, "io", absolutePath, "Unable to stat file");
        continue;
      }
      const entry = await admitFile(absolutePath, stats.size, context);
      if (entry) {
        yield entry;
      }
    }
  }
}

async function admitFile(
  absolutePath: string,
  sizeBytes: number,
  context: WalkContext,
): Promise<FileEntry | null> {
  const relativePath = toRelativePosix(context.rootPath, absolutePath);
  if (excludedPath(context, absolutePath, false)) {
    return null;
  }
  if (context.includes.length > 0 && !includesFile(context.includes, relativePath)) {
    return null;
  }
  if (context.visitedFiles.has(absolutePath)) {
    return null;
  }
  context.visitedFiles.add(absolutePath);

  if (sizeBytes > context.maxFileSize) {
    warn(
      context,
      "oversize",
      absolutePath,
      `File is ${sizeBytes} bytes, above the ${context.maxFileSize} byte limit`,
    );
    return null;
  }

  let sample: Uint8Array;
  try {
    sample = await readHead(absolutePath);
  } catch (error) {
    warn(context, "io", absolutePath, describeError(error));
    return null;
  }
  if (looksBinary(sample)) {
    context.observer.onBinarySkipped?.(relativePath);
    return null;
  }

  return { absolutePath, relativePath, sizeBytes };
}

function excludedPath(
  context: WalkContext,
  absolutePath: string,
  isDirectory: boolean,
): boolean {
  const relativePath = toRelativePosix(context.rootPath, absolutePath);
  return isExcluded(relativePath, isDirectory, context.excludes, context.ignorePatterns);
}

async function readHead(filePath: string): Promise<Uint8Array> {
  const handle = await fs.open(filePath, "r");
  try {
    const buffer = Buffer.alloc(SNIFF_BYTES);
    const { bytesRead } = await handle.read(buffer, 0, SNIFF_BYTES, 0);
    return buffer.subarray(0, bytesRead);
  } finally {
    await handle.close();
  }
}

/** Real path of the scan root; ConfigError when it is missing or not a directory. */
export async function resolveScanRoot(rootPath: string): Promise<string> {
  const resolved = path.resolve(rootPath);
  const realRoot = await safeRealpath(resolved);
  if (!realRoot) {
    throw new ConfigError(`Scan root does not exist: ${resolved}`);
  }
  const stats = await safeStat(realRoot);
  if (!stats?.isDirectory()) {
    throw new ConfigError(`Scan root must be a directory: ${resolved}`);
  }
  return realRoot;
}

async function loadIgnorePatterns(
  rootPath: string,
  ignoreFileNames: readonly string[],
): Promise<GlobMatcher[]> {
  const patterns: GlobMatcher[] = [];

  for (const ignoreFileName of ignoreFileNames) {
    let contents: string;
    try {
      contents = await fs.readFile(path.join(rootPath, ignoreFileName), "utf8");
    } catch {
      // absent ignore files are the common case
      continue;
    }

    for (const rawLine of contents.split(/\r?\n/)) {
      const line = rawLine.trim();
      if (!line || line.startsWith("#")) {
        continue;
      }
      const parsed = compileGlob(line);
      if (parsed) {
        patterns.push(parsed);
      }
    }
  }

  return patterns;
}

function warn(
  context: WalkContext,
  kind: "io" | "oversize",
  absolutePath: string,
  message: string,
): void {
  context.observer.onWarning?.({
    kind,
    file: toRelativePosix(context.rootPath, absolutePath) || ".",
    message,
  });
}

function toRelativePosix(rootPath: string, absolutePath: string): string {
  const relative = path.relative(rootPath, absolutePath);
  return relative.split(path.sep).join(path.posix.sep);
}

function isWithinRoot(rootPath: string, targetPath: string): boolean {
  const relative = path.relative(rootPath, targetPath);
  return !relative.startsWith("..") && !path.isAbsolute(relative);
}

async function safeRealpath(targetPath: string): Promise<string | null> {
  try {
    return await fs.realpath(targetPath);
  } catch {
    return null;
  }
}

async function safeStat(targetPath: string): Promise<Stats | null> {
  try {
    return await fs.stat(targetPath);
  } catch {
    return null;
  }
}
