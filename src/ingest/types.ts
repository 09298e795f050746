import type { ScanWarning } from "../scanner/types.js";

export interface FileEntry {
  readonly absolutePath: string;
  readonly relativePath: string;
  readonly sizeBytes: number;
}

export interface WalkObserver {
  onWarning?(warning: ScanWarning): void;
  onBinarySkipped?(relativePath: string): void;
}

export interface WalkOptions {
  readonly include?: readonly string[];
  readonly exclude?: readonly string[];
  readonly maxFileSizeBytes?: number;
  readonly ignoreFileNames?: readonly string[];
  readonly observer?: WalkObserver;
}

export interface LanguageTable {
  readonly language_extensions: Readonly<Record<string, readonly string[]>>;
  readonly language_filenames: Readonly<Record<string, readonly string[]>>;
  readonly language_interpreters: Readonly<Record<string, readonly string[]>>;
}

export type LanguageClassifier = (relativePath: string, content?: string) => string;
