import type { Diagnostic } from "../diagnostics";
import type { Files } from "../files";
import { DEFAULT_CONFIG, type Config } from "./config";
import type { Entry } from "./display-list";
import { richEntries, shortEntries } from "./layout";
import { Renderer } from "./renderer";
import { StringSink, type StyledWriter } from "./sink";

function writeEntries(entries: readonly Entry[], writer: StyledWriter, config: Config): void {
  const renderer = new Renderer(writer, config);
  for (const entry of entries) {
    renderer.render(entry);
  }
}

/**
 * Renders a diagnostic with source snippets.
 *
 * Throws a `ResolutionError` if a label refers to data `files` does not have;
 * errors thrown by `writer` propagate as they are.
 */
export function render<FileId>(
  diagnostic: Diagnostic<FileId>,
  files: Files<FileId>,
  writer: StyledWriter,
  config: Config = DEFAULT_CONFIG
): void {
  writeEntries(richEntries(diagnostic, files), writer, config);
}

/** Renders one `origin:line:col: severity: message` header per primary label. */
export function renderShort<FileId>(
  diagnostic: Diagnostic<FileId>,
  files: Files<FileId>,
  writer: StyledWriter,
  config: Config = DEFAULT_CONFIG
): void {
  writeEntries(shortEntries(diagnostic, files), writer, config);
}

export function entriesFor<FileId>(diagnostic: Diagnostic<FileId>, files: Files<FileId>, config: Config): Entry[] {
  return config.displayStyle === "short" ? shortEntries(diagnostic, files) : richEntries(diagnostic, files);
}

/** Renders in the display style `config` asks for. */
export function emit<FileId>(
  writer: StyledWriter,
  config: Config,
  files: Files<FileId>,
  diagnostic: Diagnostic<FileId>
): void {
  writeEntries(entriesFor(diagnostic, files, config), writer, config);
}

export function renderToString<FileId>(
  diagnostic: Diagnostic<FileId>,
  files: Files<FileId>,
  config: Config = DEFAULT_CONFIG
): string {
  const sink = new StringSink();
  emit(sink, config, files, diagnostic);
  return sink.toString();
}
