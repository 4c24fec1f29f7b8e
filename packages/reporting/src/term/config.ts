import type { Severity } from "../diagnostics";

export type DisplayStyle = "rich" | "short";

export type StyleRole =
  | "headerBug"
  | "headerError"
  | "headerWarning"
  | "headerNote"
  | "headerHelp"
  | "headerMessage"
  | "primaryLabelBug"
  | "primaryLabelError"
  | "primaryLabelWarning"
  | "primaryLabelNote"
  | "primaryLabelHelp"
  | "secondaryLabel"
  | "lineNumber"
  | "sourceBorder"
  | "noteBullet";

export type ColorName = "black" | "red" | "green" | "yellow" | "blue" | "magenta" | "cyan" | "white" | "gray";

export interface StyleSpec {
  color?: ColorName;
  /** Use the bright variant of `color`. */
  intense?: boolean;
  bold?: boolean;
  dim?: boolean;
  underline?: boolean;
}

export type Styles = Record<StyleRole, StyleSpec>;

export interface Chars {
  sourceBorderTopLeft: string;
  sourceBorderTop: string;
  sourceBorderLeft: string;
  sourceBorderLeftBreak: string;
  noteBullet: string;
  singlePrimaryCaret: string;
  singleSecondaryCaret: string;
  multiPrimaryCaretStart: string;
  multiPrimaryCaretEnd: string;
  multiSecondaryCaretStart: string;
  multiSecondaryCaretEnd: string;
  multiTopLeft: string;
  multiTop: string;
  multiBottomLeft: string;
  multiBottom: string;
  multiLeft: string;
}

export interface Config {
  displayStyle: DisplayStyle;
  styles: Styles;
  chars: Chars;
}

export interface ConfigOverrides {
  displayStyle?: DisplayStyle;
  styles?: Partial<Styles>;
  chars?: Partial<Chars>;
}

export const STYLE_ROLES: readonly StyleRole[] = [
  "headerBug",
  "headerError",
  "headerWarning",
  "headerNote",
  "headerHelp",
  "headerMessage",
  "primaryLabelBug",
  "primaryLabelError",
  "primaryLabelWarning",
  "primaryLabelNote",
  "primaryLabelHelp",
  "secondaryLabel",
  "lineNumber",
  "sourceBorder",
  "noteBullet"
];

export const COLOR_NAMES: readonly ColorName[] = [
  "black",
  "red",
  "green",
  "yellow",
  "blue",
  "magenta",
  "cyan",
  "white",
  "gray"
];

export const DISPLAY_STYLES: readonly DisplayStyle[] = ["rich", "short"];

export const CHAR_NAMES: readonly (keyof Chars)[] = [
  "sourceBorderTopLeft",
  "sourceBorderTop",
  "sourceBorderLeft",
  "sourceBorderLeftBreak",
  "noteBullet",
  "singlePrimaryCaret",
  "singleSecondaryCaret",
  "multiPrimaryCaretStart",
  "multiPrimaryCaretEnd",
  "multiSecondaryCaretStart",
  "multiSecondaryCaretEnd",
  "multiTopLeft",
  "multiTop",
  "multiBottomLeft",
  "multiBottom",
  "multiLeft"
];

export const UNICODE_CHARS: Readonly<Chars> = {
  sourceBorderTopLeft: "┌",
  sourceBorderTop: "─",
  sourceBorderLeft: "│",
  sourceBorderLeftBreak: "·",
  noteBullet: "=",
  singlePrimaryCaret: "^",
  singleSecondaryCaret: "-",
  multiPrimaryCaretStart: "^",
  multiPrimaryCaretEnd: "^",
  multiSecondaryCaretStart: "'",
  multiSecondaryCaretEnd: "'",
  multiTopLeft: "╭",
  multiTop: "─",
  multiBottomLeft: "╰",
  multiBottom: "─",
  multiLeft: "│"
};

export const ASCII_CHARS: Readonly<Chars> = {
  ...UNICODE_CHARS,
  sourceBorderTopLeft: "-",
  sourceBorderTop: "-",
  sourceBorderLeft: "|",
  sourceBorderLeftBreak: ".",
  multiTopLeft: "/",
  multiTop: "-",
  multiBottomLeft: "\\",
  multiBottom: "-",
  multiLeft: "|"
};

export const DEFAULT_STYLES: Readonly<Styles> = {
  headerBug: { color: "red", bold: true, intense: true },
  headerError: { color: "red", bold: true, intense: true },
  headerWarning: { color: "yellow", bold: true, intense: true },
  headerNote: { color: "green", bold: true, intense: true },
  headerHelp: { color: "cyan", bold: true, intense: true },
  headerMessage: { bold: true },
  primaryLabelBug: { color: "red" },
  primaryLabelError: { color: "red" },
  primaryLabelWarning: { color: "yellow" },
  primaryLabelNote: { color: "green" },
  primaryLabelHelp: { color: "cyan" },
  secondaryLabel: { color: "blue" },
  lineNumber: { color: "blue" },
  sourceBorder: { color: "blue" },
  noteBullet: { color: "blue" }
};

export const DEFAULT_CONFIG: Readonly<Config> = {
  displayStyle: "rich",
  styles: DEFAULT_STYLES,
  chars: UNICODE_CHARS
};

export function createConfig(overrides: ConfigOverrides = {}): Config {
  return {
    displayStyle: overrides.displayStyle ?? DEFAULT_CONFIG.displayStyle,
    styles: { ...DEFAULT_STYLES, ...overrides.styles },
    chars: { ...UNICODE_CHARS, ...overrides.chars }
  };
}

const HEADER_ROLES: Record<Severity, StyleRole> = {
  bug: "headerBug",
  error: "headerError",
  warning: "headerWarning",
  note: "headerNote",
  help: "headerHelp"
};

const PRIMARY_LABEL_ROLES: Record<Severity, StyleRole> = {
  bug: "primaryLabelBug",
  error: "primaryLabelError",
  warning: "primaryLabelWarning",
  note: "primaryLabelNote",
  help: "primaryLabelHelp"
};

export function headerRole(severity: Severity): StyleRole {
  return HEADER_ROLES[severity];
}

export function labelRole(severity: Severity | "secondary"): StyleRole {
  return severity === "secondary" ? "secondaryLabel" : PRIMARY_LABEL_ROLES[severity];
}
