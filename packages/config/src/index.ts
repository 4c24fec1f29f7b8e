import fs from "node:fs/promises";
import { createRequire } from "node:module";
import path from "node:path";
import { pathToFileURL } from "node:url";
import {
  CHAR_NAMES,
  COLOR_NAMES,
  DISPLAY_STYLES,
  STYLE_ROLES,
  type Chars,
  type StyleRole,
  type StyleSpec
} from "@spanmark/reporting";

import type { Charset, ColorChoice, NormalizedSpanmarkConfig, SpanmarkConfig } from "./types";
import { normalizeConfig } from "./normalize";

export * from "./types";
export * from "./normalize";

const DEFAULT_CONFIG_FILES = [
  "spanmark.config.js",
  "spanmark.config.mjs",
  "spanmark.config.cjs",
  "spanmark.config.json",
  ".spanmarkrc.json"
] as const;

const COLOR_CHOICES: readonly ColorChoice[] = ["auto", "always", "never"];
const CHARSETS: readonly Charset[] = ["unicode", "ascii"];
const STYLE_FLAGS = ["intense", "bold", "dim", "underline"] as const;

export interface LoadConfigOptions {
  cwd?: string;
  explicitPath?: string;
}

export interface LoadConfigResult {
  config: SpanmarkConfig;
  filepath?: string;
}

export function defineConfig(config: SpanmarkConfig): SpanmarkConfig {
  return config;
}

/**
 * Loads the config at `explicitPath`, or the first default config file found
 * in `cwd`. Resolves to an empty config when there is none.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<LoadConfigResult> {
  const cwd = options.cwd ? path.resolve(options.cwd) : process.cwd();
  const resolvedPath = await resolveConfigPath(cwd, options.explicitPath);

  if (!resolvedPath) {
    return { config: {} };
  }

  const raw = await loadConfigFile(resolvedPath);
  return { config: parseConfig(raw, path.basename(resolvedPath)), filepath: resolvedPath };
}

export async function loadAndNormalizeConfig(options: LoadConfigOptions = {}): Promise<NormalizedSpanmarkConfig> {
  const { config } = await loadConfig(options);
  return normalizeConfig(config);
}

/**
 * Checks an untrusted value against the config shape and returns the typed
 * config. Every problem found is listed in the thrown error.
 */
export function parseConfig(value: unknown, label = "config"): SpanmarkConfig {
  const errors: string[] = [];
  const config = readConfig(value, errors);
  if (errors.length > 0) {
    throw new Error(`Invalid ${label}:\n${errors.map((error) => `  - ${error}`).join("\n")}`);
  }
  return config;
}

export function validateConfig(value: unknown): string[] {
  const errors: string[] = [];
  readConfig(value, errors);
  return errors;
}

async function resolveConfigPath(cwd: string, explicitPath?: string): Promise<string | null> {
  if (explicitPath) {
    const absolutePath = path.isAbsolute(explicitPath) ? explicitPath : path.resolve(cwd, explicitPath);
    if (!(await fileExists(absolutePath))) {
      throw new Error(`Config file not found at ${absolutePath}`);
    }
    return absolutePath;
  }

  for (const filename of DEFAULT_CONFIG_FILES) {
    const candidate = path.join(cwd, filename);
    if (await fileExists(candidate)) {
      return candidate;
    }
  }

  return null;
}

async function loadConfigFile(filepath: string): Promise<unknown> {
  const basename = path.basename(filepath);
  const ext = path.extname(filepath).toLowerCase();
  try {
    if (ext === ".json") {
      return JSON.parse(await fs.readFile(filepath, "utf8"));
    }
    if (ext === ".cjs") {
      return createRequire(filepath)(filepath);
    }
    if (ext === ".js" || ext === ".mjs") {
      const mod: unknown = await import(pathToFileURL(filepath).href);
      return isPlainObject(mod) && "default" in mod ? mod.default : mod;
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to load ${basename}: ${message}`);
  }
  throw new Error(`Unsupported config file: ${basename}`);
}

function readConfig(value: unknown, errors: string[]): SpanmarkConfig {
  if (!isPlainObject(value)) {
    errors.push("Config must be a plain object.");
    return {};
  }

  validateSectionKeys(value, ["displayStyle", "color", "charset", "chars", "styles"], "", errors);

  const config: SpanmarkConfig = {
    displayStyle: readEnum(value.displayStyle, DISPLAY_STYLES, "displayStyle", errors),
    color: readEnum(value.color, COLOR_CHOICES, "color", errors),
    charset: readEnum(value.charset, CHARSETS, "charset", errors)
  };

  if (value.chars !== undefined) {
    config.chars = readChars(value.chars, errors);
  }
  if (value.styles !== undefined) {
    config.styles = readStyles(value.styles, errors);
  }
  return config;
}

function readChars(value: unknown, errors: string[]): Partial<Chars> {
  const chars: Partial<Chars> = {};
  if (!isPlainObject(value)) {
    errors.push("chars section must be an object.");
    return chars;
  }

  for (const [key, entry] of Object.entries(value)) {
    const name = CHAR_NAMES.find((candidate) => candidate === key);
    if (!name) {
      errors.push(`Unknown option "chars.${key}".`);
    } else if (typeof entry !== "string" || entry.length === 0) {
      errors.push(`chars.${key} must be a non-empty string.`);
    } else {
      chars[name] = entry;
    }
  }
  return chars;
}

function readStyles(value: unknown, errors: string[]): Partial<Record<StyleRole, StyleSpec>> {
  const styles: Partial<Record<StyleRole, StyleSpec>> = {};
  if (!isPlainObject(value)) {
    errors.push("styles section must be an object.");
    return styles;
  }

  for (const [key, entry] of Object.entries(value)) {
    const role = STYLE_ROLES.find((candidate) => candidate === key);
    if (!role) {
      errors.push(`Unknown option "styles.${key}".`);
      continue;
    }
    const style = readStyle(entry, `styles.${key}`, errors);
    if (style) {
      styles[role] = style;
    }
  }
  return styles;
}

function readStyle(value: unknown, label: string, errors: string[]): StyleSpec | undefined {
  if (!isPlainObject(value)) {
    errors.push(`${label} must be an object.`);
    return undefined;
  }

  validateSectionKeys(value, ["color", ...STYLE_FLAGS], label, errors);
  const style: StyleSpec = {};
  const color = readEnum(value.color, COLOR_NAMES, `${label}.color`, errors);
  if (color) {
    style.color = color;
  }
  for (const flag of STYLE_FLAGS) {
    const flagValue = value[flag];
    if (flagValue === undefined) {
      continue;
    }
    if (typeof flagValue === "boolean") {
      style[flag] = flagValue;
    } else {
      errors.push(`${label}.${flag} must be a boolean.`);
    }
  }
  return style;
}

function readEnum<T extends string>(
  value: unknown,
  allowed: readonly T[],
  label: string,
  errors: string[]
): T | undefined {
  if (value === undefined) {
    return undefined;
  }
  const match = allowed.find((option) => option === value);
  if (match === undefined) {
    errors.push(`${label} must be one of ${allowed.map((option) => `"${option}"`).join(", ")}.`);
  }
  return match;
}

function validateSectionKeys(
  section: Record<string, unknown>,
  allowed: readonly string[],
  label: string,
  errors: string[]
): void {
  for (const key of Object.keys(section)) {
    if (!allowed.includes(key)) {
      errors.push(`Unknown option "${label ? `${label}.` : ""}${key}".`);
    }
  }
}

async function fileExists(filepath: string): Promise<boolean> {
  try {
    await fs.access(filepath);
    return true;
  } catch {
    return false;
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
