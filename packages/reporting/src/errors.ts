export class ReportingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ReportingError";
  }
}

export type ResolutionQuery = "origin" | "lineIndex" | "line";

/**
 * Thrown when the source table cannot answer a query made while laying out a
 * diagnostic. It always points at a diagnostic that refers to a file, offset
 * or line the table does not have.
 */
export class ResolutionError extends ReportingError {
  readonly query: ResolutionQuery;
  readonly fileId: unknown;
  readonly index: number | undefined;

  constructor(query: ResolutionQuery, fileId: unknown, index?: number) {
    const target = index === undefined ? "" : ` at ${query === "line" ? "line index" : "byte"} ${index}`;
    super(`Unable to resolve ${query} for file ${String(fileId)}${target}`);
    this.name = "ResolutionError";
    this.query = query;
    this.fileId = fileId;
    this.index = index;
  }
}
