import type { ColorChoice } from "@spanmark/config";
import type { DisplayStyle } from "@spanmark/reporting";

export type OutputFormat = "text" | "json";

export interface RenderArgs {
  patterns: string[];
  style?: DisplayStyle;
  color?: ColorChoice;
  ascii: boolean;
  configPath?: string;
  format: OutputFormat;
  quiet: boolean;
}

const VALUE_FLAGS = new Set(["--style", "--color", "--config", "--format"]);
const BOOLEAN_FLAGS = new Set(["--ascii", "--quiet", "-q"]);

export function parseRenderArgs(args: readonly string[]): RenderArgs {
  const patterns: string[] = [];
  const values = new Map<string, string>();
  const switches = new Set<string>();

  for (let index = 0; index < args.length; index++) {
    const arg = args[index];
    if (VALUE_FLAGS.has(arg)) {
      const value = args[index + 1];
      if (value === undefined || value.startsWith("-")) {
        throw new Error(`${arg} flag expects a value.`);
      }
      values.set(arg, value);
      index++;
    } else if (BOOLEAN_FLAGS.has(arg)) {
      switches.add(arg);
    } else if (arg.startsWith("-")) {
      throw new Error(`Unknown flag ${arg}.`);
    } else {
      patterns.push(arg);
    }
  }

  if (patterns.length === 0) {
    throw new Error("No report patterns provided. Usage: spanmark render <reports...>");
  }

  const style = values.get("--style");
  const color = values.get("--color");
  const format = values.get("--format");

  return {
    patterns,
    style: style === undefined ? undefined : oneOf<DisplayStyle>(style, ["rich", "short"], "--style"),
    color: color === undefined ? undefined : oneOf<ColorChoice>(color, ["auto", "always", "never"], "--color"),
    ascii: switches.has("--ascii"),
    configPath: values.get("--config"),
    format: format === undefined ? "text" : oneOf(format, ["text", "json"], "--format"),
    quiet: switches.has("--quiet") || switches.has("-q")
  };
}

function oneOf<T extends string>(value: string, allowed: readonly T[], flag: string): T {
  const match = allowed.find((option) => option === value);
  if (match === undefined) {
    throw new Error(`Invalid ${flag} flag. Use ${allowed.map((option) => `"${option}"`).join(" or ")}.`);
  }
  return match;
}
