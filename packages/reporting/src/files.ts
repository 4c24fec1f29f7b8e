/**
 * Source file support for diagnostic reporting.
 *
 * All offsets are UTF-8 byte offsets into the file's source, matching what
 * most compilers and linters record in their spans.
 */

export interface ByteRange {
  start: number;
  end: number;
}

export interface Line {
  /** 0-based line index. */
  index: number;
  /** 1-based line number, for display. */
  number: number;
  /** Byte range of the line, line terminator included. */
  range: ByteRange;
  /** Text of the line, line terminator included. */
  source: string;
}

/**
 * A read-only table of source files. Each query returns `undefined` when the
 * table does not know the file, offset or line asked for.
 */
export interface Files<FileId> {
  origin(id: FileId): string | undefined;
  line(id: FileId, lineIndex: number): Line | undefined;
  lineIndex(id: FileId, byteIndex: number): number | undefined;
  source(id: FileId): string | undefined;
}

export function byteLength(text: string): number {
  return Buffer.byteLength(text, "utf8");
}

export function lineStarts(source: string): number[] {
  const bytes = Buffer.from(source, "utf8");
  const starts = [0];
  for (let i = 0; i < bytes.length; i++) {
    if (bytes[i] === 0x0a) {
      starts.push(i + 1);
    }
  }
  return starts;
}

/**
 * Number of characters in `lineSource` before `byteIndex`.
 *
 * Returns `0` when `byteIndex` is before the line, and the full character count
 * when it is at or past the line end. An offset inside a multi-byte character
 * counts as the boundary that precedes it.
 */
export function columnIndex(lineSource: string, lineStart: number, byteIndex: number): number {
  if (byteIndex < lineStart) {
    return 0;
  }

  const relativeIndex = byteIndex - lineStart;
  let offset = 0;
  let count = 0;
  for (const char of lineSource) {
    if (offset >= relativeIndex) {
      break;
    }
    count++;
    offset += byteLength(char);
  }

  if (relativeIndex >= byteLength(lineSource) || offset === relativeIndex) {
    return count;
  }
  return count - 1;
}

export function columnNumber(lineSource: string, lineStart: number, byteIndex: number): number {
  return columnIndex(lineSource, lineStart, byteIndex) + 1;
}

/**
 * A single source file. The file id passed to its {@link Files} methods is
 * ignored, so any value (usually `undefined`) will do.
 */
export class SimpleFile implements Files<unknown> {
  private readonly bytes: Buffer;
  private readonly starts: number[];

  constructor(
    readonly name: string,
    readonly text: string
  ) {
    this.bytes = Buffer.from(text, "utf8");
    this.starts = lineStarts(text);
  }

  get lineCount(): number {
    return this.starts.length;
  }

  origin(): string {
    return this.name;
  }

  source(): string {
    return this.text;
  }

  lineIndex(_id: unknown, byteIndex: number): number | undefined {
    if (!Number.isInteger(byteIndex) || byteIndex < 0 || byteIndex > this.bytes.length) {
      return undefined;
    }

    let low = 0;
    let high = this.starts.length - 1;
    while (low <= high) {
      const mid = (low + high) >>> 1;
      const start = this.starts[mid];
      if (start === byteIndex) {
        return mid;
      }
      if (start < byteIndex) {
        low = mid + 1;
      } else {
        high = mid - 1;
      }
    }
    return low - 1;
  }

  line(_id: unknown, lineIndex: number): Line | undefined {
    const start = this.lineStart(lineIndex);
    const end = this.lineStart(lineIndex + 1);
    if (start === undefined || end === undefined) {
      return undefined;
    }

    return {
      index: lineIndex,
      number: lineIndex + 1,
      range: { start, end },
      source: this.bytes.toString("utf8", start, end)
    };
  }

  private lineStart(lineIndex: number): number | undefined {
    if (!Number.isInteger(lineIndex) || lineIndex < 0 || lineIndex > this.starts.length) {
      return undefined;
    }
    if (lineIndex === this.starts.length) {
      return this.bytes.length;
    }
    return this.starts[lineIndex];
  }
}

/**
 * A growable table of source files, addressed by the numeric id returned from
 * {@link SimpleFiles.add}.
 */
export class SimpleFiles implements Files<number> {
  private readonly files: SimpleFile[] = [];

  add(name: string, source: string): number {
    this.files.push(new SimpleFile(name, source));
    return this.files.length - 1;
  }

  get(id: number): SimpleFile | undefined {
    return this.files[id];
  }

  origin(id: number): string | undefined {
    return this.get(id)?.origin();
  }

  source(id: number): string | undefined {
    return this.get(id)?.source();
  }

  lineIndex(id: number, byteIndex: number): number | undefined {
    return this.get(id)?.lineIndex(id, byteIndex);
  }

  line(id: number, lineIndex: number): Line | undefined {
    return this.get(id)?.line(id, lineIndex);
  }
}
