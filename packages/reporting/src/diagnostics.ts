import type { ByteRange } from "./files";

export type Severity = "bug" | "error" | "warning" | "note" | "help";

export type LabelStyle = "primary" | "secondary";

const SEVERITY_RANK: Record<Severity, number> = {
  help: 1,
  note: 2,
  warning: 3,
  error: 4,
  bug: 5
};

export const SEVERITIES: readonly Severity[] = ["bug", "error", "warning", "note", "help"];

export interface Label<FileId> {
  style: LabelStyle;
  fileId: FileId;
  range: ByteRange;
  message: string;
}

export interface Diagnostic<FileId> {
  severity: Severity;
  code?: string;
  message: string;
  labels: Label<FileId>[];
  notes: string[];
}

export interface DiagnosticInit<FileId> {
  code?: string;
  message?: string;
  labels?: Label<FileId>[];
  notes?: string[];
}

export function isSeverity(value: string): value is Severity {
  return Object.hasOwn(SEVERITY_RANK, value);
}

/** Orders severities from `help` (lowest) to `bug` (highest). */
export function compareSeverity(a: Severity, b: Severity): number {
  return SEVERITY_RANK[a] - SEVERITY_RANK[b];
}

export function createDiagnostic<FileId>(
  severity: Severity,
  init: DiagnosticInit<FileId> = {}
): Diagnostic<FileId> {
  return {
    severity,
    code: init.code,
    message: init.message ?? "",
    labels: init.labels ?? [],
    notes: init.notes ?? []
  };
}

export function bug<FileId>(message: string, init: DiagnosticInit<FileId> = {}): Diagnostic<FileId> {
  return createDiagnostic("bug", { ...init, message });
}

export function error<FileId>(message: string, init: DiagnosticInit<FileId> = {}): Diagnostic<FileId> {
  return createDiagnostic("error", { ...init, message });
}

export function warning<FileId>(message: string, init: DiagnosticInit<FileId> = {}): Diagnostic<FileId> {
  return createDiagnostic("warning", { ...init, message });
}

export function note<FileId>(message: string, init: DiagnosticInit<FileId> = {}): Diagnostic<FileId> {
  return createDiagnostic("note", { ...init, message });
}

export function help<FileId>(message: string, init: DiagnosticInit<FileId> = {}): Diagnostic<FileId> {
  return createDiagnostic("help", { ...init, message });
}

export function createLabel<FileId>(
  style: LabelStyle,
  fileId: FileId,
  start: number,
  end: number,
  message = ""
): Label<FileId> {
  if (start > end) {
    throw new RangeError(`Label range start (${start}) is after its end (${end})`);
  }
  return { style, fileId, range: { start, end }, message };
}

export function primaryLabel<FileId>(fileId: FileId, start: number, end: number, message = ""): Label<FileId> {
  return createLabel("primary", fileId, start, end, message);
}

export function secondaryLabel<FileId>(fileId: FileId, start: number, end: number, message = ""): Label<FileId> {
  return createLabel("secondary", fileId, start, end, message);
}
