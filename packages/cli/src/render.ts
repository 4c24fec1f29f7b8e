import fs from "node:fs/promises";
import path from "node:path";
import fg from "fast-glob";
import pc from "picocolors";
import { loadConfig, mergeConfigs, normalizeConfig, type ColorChoice } from "@spanmark/config";
import {
  ColorSink,
  ResolutionError,
  SimpleFiles,
  createDiagnostic,
  createLabel,
  emit,
  entriesFor,
  type Config,
  type Diagnostic,
  type Entry,
  type Label,
  type TextOutput
} from "@spanmark/reporting";
import { parseRenderArgs, type OutputFormat } from "./args";
import { toDisplayPath } from "./fs-utils";
import { plural, printSummary, type Colors } from "./output";
import { parseReport, type ReportDiagnostic } from "./report";

export interface RenderOptions {
  config: Config;
  colors: boolean;
  format?: OutputFormat;
  quiet?: boolean;
  cwd?: string;
}

export interface RenderedReport {
  file: string;
  diagnostics: Entry[][];
}

export interface RenderResult {
  totalReports: number;
  diagnosticCount: number;
  errorCount: number;
  warningCount: number;
  reports: RenderedReport[];
}

export interface RunContext {
  cwd?: string;
  output: TextOutput;
  isTTY?: boolean;
}

interface LoadedReport {
  displayPath: string;
  files: SimpleFiles;
  diagnostics: Diagnostic<number>[];
}

/** `spanmark render`: flags, then the config file, then defaults. */
export async function runRender(args: readonly string[], context: RunContext): Promise<RenderResult> {
  const parsed = parseRenderArgs(args);
  const cwd = context.cwd ?? process.cwd();
  const { config: fileConfig } = await loadConfig({ cwd, explicitPath: parsed.configPath });
  const normalized = normalizeConfig(
    mergeConfigs(fileConfig, {
      displayStyle: parsed.style,
      color: parsed.color,
      charset: parsed.ascii ? "ascii" : undefined
    })
  );

  return renderReports(
    parsed.patterns,
    {
      config: normalized.render,
      colors: resolveColors(normalized.color, context.isTTY),
      format: parsed.format,
      quiet: parsed.quiet,
      cwd
    },
    context.output
  );
}

export function resolveColors(choice: ColorChoice, isTTY?: boolean): boolean {
  if (choice === "auto") {
    return isTTY ?? pc.isColorSupported;
  }
  return choice === "always";
}

export async function renderReports(
  patterns: readonly string[],
  options: RenderOptions,
  output: TextOutput
): Promise<RenderResult> {
  const cwd = options.cwd ?? process.cwd();
  const reportPaths = await fg([...patterns], {
    cwd,
    absolute: true,
    onlyFiles: true,
    unique: true
  });

  if (reportPaths.length === 0) {
    throw new Error("No report files found for the provided patterns.");
  }
  reportPaths.sort();

  const result: RenderResult = {
    totalReports: reportPaths.length,
    diagnosticCount: 0,
    errorCount: 0,
    warningCount: 0,
    reports: []
  };
  const sink = new ColorSink(output, { colors: options.colors });

  for (const reportPath of reportPaths) {
    const report = await loadReport(reportPath, cwd);
    const rendered: RenderedReport = { file: report.displayPath, diagnostics: [] };

    for (const diagnostic of report.diagnostics) {
      result.diagnosticCount++;
      if (diagnostic.severity === "error" || diagnostic.severity === "bug") {
        result.errorCount++;
      } else if (diagnostic.severity === "warning") {
        result.warningCount++;
      }

      try {
        if (options.format === "json") {
          rendered.diagnostics.push(entriesFor(diagnostic, report.files, options.config));
        } else {
          emit(sink, options.config, report.files, diagnostic);
        }
      } catch (error) {
        if (error instanceof ResolutionError) {
          throw new Error(describeResolutionError(error, report), { cause: error });
        }
        throw error;
      }
    }
    result.reports.push(rendered);
  }

  if (options.format === "json") {
    output.write(`${JSON.stringify(result, null, 2)}\n`);
  } else if (!options.quiet) {
    printRenderSummary(result, output, pc.createColors(options.colors));
  }

  return result;
}

async function loadReport(reportPath: string, cwd: string): Promise<LoadedReport> {
  const displayPath = toDisplayPath(reportPath, cwd);
  let raw: unknown;
  try {
    raw = JSON.parse(await fs.readFile(reportPath, "utf8"));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to read ${displayPath}: ${message}`);
  }

  const report = parseReport(raw, displayPath);
  const files = new SimpleFiles();
  const fileIds = new Map<string, number>();
  const baseDir = path.dirname(reportPath);

  const fileIdFor = async (file: string): Promise<number> => {
    const sourcePath = path.resolve(baseDir, file);
    const known = fileIds.get(sourcePath);
    if (known !== undefined) {
      return known;
    }
    let source: string;
    try {
      source = await fs.readFile(sourcePath, "utf8");
    } catch (error) {
      throw new Error(`Source file ${toDisplayPath(sourcePath, cwd)} referenced by ${displayPath} could not be read.`, {
        cause: error
      });
    }
    const id = files.add(toDisplayPath(sourcePath, cwd), source);
    fileIds.set(sourcePath, id);
    return id;
  };

  const diagnostics: Diagnostic<number>[] = [];
  for (const entry of report.diagnostics) {
    diagnostics.push(await toDiagnostic(entry, fileIdFor));
  }
  return { displayPath, files, diagnostics };
}

// Report report.json has a label outside src/a.txt (byte 41).
function describeResolutionError(error: ResolutionError, report: LoadedReport): string {
  const origin = typeof error.fileId === "number" ? report.files.origin(error.fileId) : undefined;
  const target = origin ?? "its source files";
  if (error.index === undefined) {
    return `Report ${report.displayPath} has a label in ${target} that cannot be resolved.`;
  }
  const position = error.query === "line" ? `line ${error.index + 1}` : `byte ${error.index}`;
  return `Report ${report.displayPath} has a label outside ${target} (${position}).`;
}

async function toDiagnostic(
  entry: ReportDiagnostic,
  fileIdFor: (file: string) => Promise<number>
): Promise<Diagnostic<number>> {
  const labels: Label<number>[] = [];
  for (const label of entry.labels) {
    labels.push(createLabel(label.style, await fileIdFor(label.file), label.start, label.end, label.message));
  }
  return createDiagnostic(entry.severity, {
    code: entry.code,
    message: entry.message,
    labels,
    notes: entry.notes
  });
}

function printRenderSummary(result: RenderResult, output: TextOutput, colors: Colors): void {
  const parts: string[] = [];
  if (result.errorCount > 0) {
    parts.push(plural(result.errorCount, "error"));
  }
  if (result.warningCount > 0) {
    parts.push(plural(result.warningCount, "warning"));
  }
  const suffix = parts.length > 0 ? ` with ${parts.join(" and ")}` : "";
  const summary = `Rendered ${plural(result.diagnosticCount, "diagnostic")} from ${plural(result.totalReports, "report")}${suffix}`;

  if (result.errorCount > 0) {
    printSummary(output, colors, "error", summary);
  } else if (result.warningCount > 0) {
    printSummary(output, colors, "warning", summary);
  } else {
    printSummary(output, colors, "success", summary);
  }
}
