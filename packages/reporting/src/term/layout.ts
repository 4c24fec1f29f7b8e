import type { Diagnostic, Label, Severity } from "../diagnostics";
import { ResolutionError } from "../errors";
import { columnIndex, columnNumber, type Files, type Line } from "../files";
import type { Entry, HeaderEntry, Locus, Mark, MarkSeverity, SourceLineEntry } from "./display-list";

/**
 * Wraps a {@link Files} table so that every query either answers or throws a
 * {@link ResolutionError}.
 */
export class Resolver<FileId> {
  constructor(private readonly files: Files<FileId>) {}

  origin(fileId: FileId): string {
    const origin = this.files.origin(fileId);
    if (origin === undefined) {
      throw new ResolutionError("origin", fileId);
    }
    return origin;
  }

  lineIndex(fileId: FileId, byteIndex: number): number {
    const index = this.files.lineIndex(fileId, byteIndex);
    if (index === undefined) {
      throw new ResolutionError("lineIndex", fileId, byteIndex);
    }
    return index;
  }

  line(fileId: FileId, lineIndex: number): Line {
    const line = this.files.line(fileId, lineIndex);
    if (line === undefined) {
      throw new ResolutionError("line", fileId, lineIndex);
    }
    return line;
  }

  lineAt(fileId: FileId, byteIndex: number): Line {
    return this.line(fileId, this.lineIndex(fileId, byteIndex));
  }

  locus(fileId: FileId, byteIndex: number): Locus {
    const line = this.lineAt(fileId, byteIndex);
    return {
      origin: this.origin(fileId),
      lineNumber: line.number,
      columnNumber: columnNumber(line.source, line.range.start, byteIndex)
    };
  }
}

/**
 * Groups labels by file, keeping files in the order their first label appears
 * and sorting each file's labels by `(start, end)`.
 */
export function groupLabels<FileId>(labels: readonly Label<FileId>[]): Map<FileId, Label<FileId>[]> {
  const groups = new Map<FileId, Label<FileId>[]>();
  for (const label of labels) {
    const group = groups.get(label.fileId);
    if (group) {
      group.push(label);
    } else {
      groups.set(label.fileId, [label]);
    }
  }

  for (const group of groups.values()) {
    group.sort((a, b) => a.range.start - b.range.start || a.range.end - b.range.end);
  }
  return groups;
}

/** Digits needed for the largest line number any label reaches. */
export function outerPadding<FileId>(labels: readonly Label<FileId>[], files: Files<FileId>): number {
  const resolver = new Resolver(files);
  let maxLineNumber = 0;
  for (const label of labels) {
    maxLineNumber = Math.max(maxLineNumber, resolver.lineAt(label.fileId, label.range.end).number);
  }
  return maxLineNumber === 0 ? 0 : String(maxLineNumber).length;
}

function header<FileId>(diagnostic: Diagnostic<FileId>, locus?: Locus): HeaderEntry {
  return {
    type: "Header",
    locus,
    severity: diagnostic.severity,
    code: diagnostic.code,
    message: diagnostic.message
  };
}

function markSeverity<FileId>(label: Label<FileId>, severity: Severity): MarkSeverity {
  return label.style === "primary" ? severity : "secondary";
}

const BLANK = /^\p{White_Space}*$/u;

function textBefore(lineSource: string, byteOffset: number): string {
  return Array.from(lineSource)
    .slice(0, columnIndex(lineSource, 0, byteOffset))
    .join("");
}

function sourceLine(padding: number, line: Line, severity: MarkSeverity, mark: Mark): SourceLineEntry {
  return {
    type: "SourceLine",
    outerPadding: padding,
    lineNumber: line.number,
    source: line.source,
    marks: [{ severity, mark }]
  };
}

function labelLines<FileId>(
  label: Label<FileId>,
  severity: MarkSeverity,
  resolver: Resolver<FileId>,
  padding: number
): SourceLineEntry[] {
  const { fileId, range, message } = label;
  const startLine = resolver.lineAt(fileId, range.start);
  const endLine = resolver.lineAt(fileId, range.end);
  const markStart = range.start - startLine.range.start;

  // 2 │ (+ test "")
  //   │         ^^ expected `Int` but found `String`
  if (startLine.index === endLine.index) {
    const mark: Mark = {
      type: "Single",
      range: { start: markStart, end: range.end - startLine.range.start },
      message
    };
    return [sourceLine(padding, startLine, severity, mark)];
  }

  // 4 │   fizz₁ num = case (mod num 5) (mod num 3) of
  //   │ ╭─────────────^
  // 5 │ │     0 0 => "FizzBuzz"
  // 6 │ │     _ _ => num
  //   │ ╰──────────────^ `case` clauses have incompatible types
  const lines: SourceLineEntry[] = [];
  const top: Mark =
    BLANK.test(textBefore(startLine.source, markStart))
      ? { type: "MultiTopLeft" }
      : { type: "MultiTop", end: markStart };
  lines.push(sourceLine(padding, startLine, severity, top));

  for (let index = startLine.index + 1; index < endLine.index; index++) {
    lines.push(sourceLine(padding, resolver.line(fileId, index), severity, { type: "MultiLeft" }));
  }

  const bottom: Mark = { type: "MultiBottom", end: range.end - endLine.range.start, message };
  lines.push(sourceLine(padding, endLine, severity, bottom));
  return lines;
}

/**
 * Lays out a diagnostic as a header followed by one bordered snippet per file
 * and the diagnostic's notes.
 */
export function richEntries<FileId>(diagnostic: Diagnostic<FileId>, files: Files<FileId>): Entry[] {
  const resolver = new Resolver(files);
  const groups = groupLabels(diagnostic.labels);
  const padding = outerPadding(diagnostic.labels, files);

  const entries: Entry[] = [header(diagnostic)];
  if (groups.size > 0) {
    entries.push({ type: "Empty" });
  }

  for (const [fileId, labels] of groups) {
    entries.push({
      type: "SourceStart",
      outerPadding: padding,
      locus: resolver.locus(fileId, labels[0].range.start)
    });

    labels.forEach((label, i) => {
      entries.push(
        i === 0 ? { type: "SourceEmpty", outerPadding: padding } : { type: "SourceBreak", outerPadding: padding }
      );
      entries.push(...labelLines(label, markSeverity(label, diagnostic.severity), resolver, padding));
    });

    entries.push({ type: "SourceEmpty", outerPadding: padding });
  }

  for (const note of diagnostic.notes) {
    entries.push({ type: "SourceNote", outerPadding: padding, message: note });
  }
  entries.push({ type: "Empty" });

  return entries;
}

/**
 * One located header per primary label, or a single unlocated header when the
 * diagnostic has none.
 */
export function shortEntries<FileId>(diagnostic: Diagnostic<FileId>, files: Files<FileId>): Entry[] {
  const resolver = new Resolver(files);
  const headers = diagnostic.labels
    .filter((label) => label.style === "primary")
    .map((label) => header(diagnostic, resolver.locus(label.fileId, label.range.start)));

  return headers.length > 0 ? headers : [header(diagnostic)];
}
