import type { Severity } from "../diagnostics";
import type { ByteRange } from "../files";

export interface Locus {
  origin: string;
  lineNumber: number;
  columnNumber: number;
}

/** Severity a mark is drawn with: the diagnostic's for primary labels. */
export type MarkSeverity = Severity | "secondary";

/**
 * Connector shape drawn for one label on one source line. Offsets are in
 * bytes, relative to the start of that line.
 */
export type Mark =
  | { type: "Single"; range: ByteRange; message: string }
  | { type: "MultiTopLeft" }
  | { type: "MultiTop"; end: number }
  | { type: "MultiLeft" }
  | { type: "MultiBottom"; end: number; message: string };

export interface SourceMark {
  severity: MarkSeverity;
  mark: Mark;
}

export interface HeaderEntry {
  type: "Header";
  locus?: Locus;
  severity: Severity;
  code?: string;
  message: string;
}

export interface EmptyEntry {
  type: "Empty";
}

export interface SourceStartEntry {
  type: "SourceStart";
  outerPadding: number;
  locus: Locus;
}

export interface SourceBreakEntry {
  type: "SourceBreak";
  outerPadding: number;
}

export interface SourceEmptyEntry {
  type: "SourceEmpty";
  outerPadding: number;
}

export interface SourceLineEntry {
  type: "SourceLine";
  outerPadding: number;
  lineNumber: number;
  source: string;
  /** One slot per mark; `null` keeps an empty connector column. */
  marks: (SourceMark | null)[];
}

export interface SourceNoteEntry {
  type: "SourceNote";
  outerPadding: number;
  message: string;
}

export type Entry =
  | HeaderEntry
  | EmptyEntry
  | SourceStartEntry
  | SourceBreakEntry
  | SourceEmptyEntry
  | SourceLineEntry
  | SourceNoteEntry;

export function formatLocus(locus: Locus): string {
  return `${locus.origin}:${locus.lineNumber}:${locus.columnNumber}`;
}
