const CONTEXT_LINES = 1;
const MAX_SNIPPET_LINE_LENGTH = 240;

export interface Position {
  readonly line: number;
  readonly column: number;
}

/**
 * Offsets of every line start in a file, so positions resolve in
 * O(log lines) instead of rescanning the content per match.
 */
export class LineIndex {
  private readonly starts: number[];
  private readonly lines: readonly string[];

  constructor(content: string) {
    this.lines = content.split(/\r?\n/);
    this.starts = [0];
    for (let i = 0; i < content.length; i += 1) {
      if (content.charCodeAt(i) === 10) {
        this.starts.push(i + 1);
      }
    }
  }

  get lineCount(): number {
    return this.lines.length;
  }

  positionAt(offset: number): Position {
    let low = 0;
    let high = this.starts.length - 1;
    while (low < high) {
      const mid = (low + high + 1) >> 1;
      if ((this.starts[mid] ?? 0) <= offset) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }
    const lineStart = this.starts[low] ?? 0;
    return { line: low + 1, column: offset - lineStart + 1 };
  }

  lineText(line: number): string {
    return this.lines[line - 1] ?? "";
  }

  /** The given line with at most one line of context on either side. */
  snippetAround(line: number): string {
    const first = Math.max(1, line - CONTEXT_LINES);
    const last = Math.min(this.lines.length, line + CONTEXT_LINES);
    const out: string[] = [];
    for (let current = first; current <= last; current += 1) {
      out.push(truncateLine(this.lineText(current)));
    }
    return out.join("\n");
  }
}

function truncateLine(line: string): string {
  if (line.length <= MAX_SNIPPET_LINE_LENGTH) {
    return line;
  }
  return `${line.slice(0, MAX_SNIPPET_LINE_LENGTH - 3)}...`;
}
