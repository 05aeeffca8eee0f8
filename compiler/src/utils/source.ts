import { location, type SourceLocation } from "../errors/diagnostic.ts";

export interface LineColumn {
  line: number;
  column: number;
}

const LINE_BREAK = /\r\n|\r|\n/g;

/** Offsets at which each line starts; `\r\n`, `\r` and `\n` all end a line. */
function lineStarts(text: string): number[] {
  const starts = [0];
  for (const match of text.matchAll(LINE_BREAK)) {
    starts.push((match.index ?? 0) + match[0].length);
  }
  return starts;
}

/** Index of the last entry in sorted `starts` that is <= `offset`. */
function lineIndexOf(starts: readonly number[], offset: number): number {
  let lo = 0;
  let hi = starts.length - 1;
  while (lo < hi) {
    const mid = (lo + hi + 1) >> 1;
    if ((starts[mid] ?? 0) <= offset) lo = mid;
    else hi = mid - 1;
  }
  return lo;
}

/** Source text of one file, used to map offsets and to quote lines in diagnostics. */
export class SourceFile {
  private readonly starts: number[];

  constructor(
    readonly filename: string,
    readonly content: string,
  ) {
    this.starts = lineStarts(content);
  }

  /** 1-based line and column of a character offset. */
  lineCol(offset: number): LineColumn {
    const index = lineIndexOf(this.starts, offset);
    return { line: index + 1, column: offset - (this.starts[index] ?? 0) + 1 };
  }

  locationAt(offset: number): SourceLocation {
    const { line, column } = this.lineCol(offset);
    return location(this.filename, line, column, offset);
  }

  /** Text of a 1-based line without its terminator, or `undefined` when out of range. */
  lineText(line: number): string | undefined {
    const start = this.starts[line - 1];
    if (start === undefined) return undefined;
    const end = this.starts[line] ?? this.content.length;
    return this.content.slice(start, end).replace(/\r?\n$|\r$/, "");
  }

  get lineCount(): number {
    return this.starts.length;
  }
}
