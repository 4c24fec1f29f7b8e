import { readFileSync } from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import pc from "picocolors";
import type { TextOutput } from "@spanmark/reporting";
import { printCliError } from "./output";
import { runRender, type RunContext } from "./render";

export interface CliContext extends RunContext {
  errorOutput: TextOutput;
}

/** Runs one CLI invocation and resolves to its exit code. */
export async function runCli(args: readonly string[], context: CliContext): Promise<number> {
  const cmd = args[0];

  if (!cmd || cmd === "help" || cmd === "--help" || cmd === "-h") {
    context.output.write(helpText());
    return 0;
  }

  if (cmd === "--version" || cmd === "-v") {
    context.output.write(`${readCliVersion()}\n`);
    return 0;
  }

  if (cmd === "render") {
    try {
      const result = await runRender(args.slice(1), context);
      return result.errorCount > 0 ? 1 : 0;
    } catch (error) {
      printCliError(error instanceof Error ? error.message : String(error), context.errorOutput);
      return 1;
    }
  }

  printCliError(`Unknown command: ${cmd}`, context.errorOutput);
  context.output.write(helpText());
  return 1;
}

function helpText(): string {
  return `${pc.bold("spanmark")}

Usage:
  spanmark render <reports...> [options]

Options:
  --style <rich|short>          Snippet or one-line output
  --color <auto|always|never>   Colorize output
  --ascii                       Draw with ASCII characters
  --config <path>               Use this config file
  --format <text|json>          Print rendered text or display entries
  -q, --quiet                   Skip the summary line
  -v, --version                 Print the version

`;
}

function readCliVersion(): string {
  const dir = path.dirname(fileURLToPath(import.meta.url));
  const pkg: unknown = JSON.parse(readFileSync(path.resolve(dir, "..", "package.json"), "utf8"));
  if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return "unknown";
}
