import pc from "picocolors";
import type { ColorName, StyleRole, StyleSpec } from "./config";

type Colors = ReturnType<typeof pc.createColors>;
type Formatter = (text: string) => string;

/** Destination for rendered text plus the style changes that decorate it. */
export interface StyledWriter {
  write(text: string): void;
  setStyle(role: StyleRole, style: StyleSpec): void;
  reset(): void;
}

/** Anything text can be written to, e.g. `process.stdout`. */
export interface TextOutput {
  write(text: string): unknown;
}

const identity: Formatter = (text) => text;

/** Collects plain text and drops style changes. */
export class StringSink implements StyledWriter {
  private readonly chunks: string[] = [];

  write(text: string): void {
    this.chunks.push(text);
  }

  setStyle(): void {}

  reset(): void {}

  toString(): string {
    return this.chunks.join("");
  }
}

function colorFormatter(colors: Colors, name: ColorName, intense: boolean): Formatter {
  switch (name) {
    case "black":
      return intense ? colors.blackBright : colors.black;
    case "red":
      return intense ? colors.redBright : colors.red;
    case "green":
      return intense ? colors.greenBright : colors.green;
    case "yellow":
      return intense ? colors.yellowBright : colors.yellow;
    case "blue":
      return intense ? colors.blueBright : colors.blue;
    case "magenta":
      return intense ? colors.magentaBright : colors.magenta;
    case "cyan":
      return intense ? colors.cyanBright : colors.cyan;
    case "white":
      return intense ? colors.whiteBright : colors.white;
    case "gray":
      return colors.gray;
  }
}

export function styleFormatter(colors: Colors, style: StyleSpec): Formatter {
  const formatters: Formatter[] = [];
  if (style.color) {
    formatters.push(colorFormatter(colors, style.color, style.intense ?? false));
  }
  if (style.bold) {
    formatters.push(colors.bold);
  }
  if (style.dim) {
    formatters.push(colors.dim);
  }
  if (style.underline) {
    formatters.push(colors.underline);
  }
  return (text) => formatters.reduce((styled, format) => format(styled), text);
}

export interface ColorSinkOptions {
  /** Defaults to picocolors' own terminal detection. */
  colors?: boolean;
}

/** Writes to a {@link TextOutput}, coloring text with picocolors. */
export class ColorSink implements StyledWriter {
  private readonly colors: Colors;
  private format: Formatter = identity;

  constructor(
    private readonly output: TextOutput,
    options: ColorSinkOptions = {}
  ) {
    this.colors = pc.createColors(options.colors ?? pc.isColorSupported);
  }

  write(text: string): void {
    this.output.write(text === "" ? text : this.format(text));
  }

  setStyle(_role: StyleRole, style: StyleSpec): void {
    this.format = styleFormatter(this.colors, style);
  }

  reset(): void {
    this.format = identity;
  }
}
