import path from "node:path";
import { UNKNOWN_LANGUAGE } from "../scanner/types.js";
import { toPosix } from "./glob.js";
import type { LanguageClassifier, LanguageTable } from "./types.js";

const SHEBANG_PATTERN = /^#!\s*(\S+)(?:\s+(\S+))?/;

/**
 * Build a classifier from a language table: exact file name first, then
 * extension, then the `#!` interpreter on the first line.
 */
export function createLanguageClassifier(table: LanguageTable): LanguageClassifier {
  const byFilename = invert(table.language_filenames);
  const byExtension = invert(table.language_extensions);
  const byInterpreter = invert(table.language_interpreters);

  return (relativePath: string, content?: string): string => {
    const base = path.posix.basename(toPosix(relativePath)).toLowerCase();

    const named = byFilename.get(base);
    if (named) {
      return named;
    }

    const extension = path.posix.extname(base);
    const extended = extension ? byExtension.get(extension) : undefined;
    if (extended) {
      return extended;
    }

    const interpreter = content ? interpreterOf(content) : null;
    if (interpreter) {
      return byInterpreter.get(interpreter) ?? UNKNOWN_LANGUAGE;
    }

    return UNKNOWN_LANGUAGE;
  };
}

function interpreterOf(content: string): string | null {
  const newline = content.indexOf("\n");
  const firstLine = newline === -1 ? content : content.slice(0, newline);
  const match = SHEBANG_PATTERN.exec(firstLine);
  if (!match) {
    return null;
  }
  const program = path.posix.basename(match[1] ?? "");
  const target = program === "env" ? match[2] : program;
  if (!target) {
    return null;
  }
  return target.replace(/[\d.]+$/, "").toLowerCase();
}

function invert(
  table: Readonly<Record<string, readonly string[]>>,
): Map<string, string> {
  const inverted = new Map<string, string>();
  for (const language of Object.keys(table).sort((a, b) => a.localeCompare(b))) {
    for (const key of table[language] ?? []) {
      const normalized = key.toLowerCase();
      if (!inverted.has(normalized)) {
        inverted.set(normalized, language.toLowerCase());
      }
    }
  }
  return inverted;
}
