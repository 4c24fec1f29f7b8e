import os from "node:os";
import path from "node:path";
import fs from "fs-extra";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ASCII_CHARS, UNICODE_CHARS } from "@spanmark/reporting";
import {
  defineConfig,
  loadAndNormalizeConfig,
  loadConfig,
  mergeConfigs,
  normalizeConfig,
  parseConfig,
  validateConfig
} from "../src/index";

let workspace: string;

beforeEach(async () => {
  workspace = await fs.mkdtemp(path.join(os.tmpdir(), "spanmark-config-"));
});

afterEach(async () => {
  await fs.remove(workspace);
});

describe("loadConfig", () => {
  it("returns an empty config when no file exists", async () => {
    await expect(loadConfig({ cwd: workspace })).resolves.toEqual({ config: {} });
  });

  it("discovers spanmark.config.json", async () => {
    await fs.writeJson(path.join(workspace, "spanmark.config.json"), { displayStyle: "short", color: "never" });

    const result = await loadConfig({ cwd: workspace });

    expect(result.filepath).toBe(path.join(workspace, "spanmark.config.json"));
    expect(result.config.displayStyle).toBe("short");
    expect(result.config.color).toBe("never");
  });

  it("falls back to .spanmarkrc.json", async () => {
    await fs.writeJson(path.join(workspace, ".spanmarkrc.json"), { charset: "ascii" });

    const result = await loadConfig({ cwd: workspace });

    expect(result.config.charset).toBe("ascii");
  });

  it("loads the default export of an ES module config", async () => {
    await fs.writeFile(
      path.join(workspace, "spanmark.config.mjs"),
      'export default { displayStyle: "short", chars: { noteBullet: "*" } };\n'
    );

    const result = await loadConfig({ cwd: workspace });

    expect(result.filepath).toBe(path.join(workspace, "spanmark.config.mjs"));
    expect(result.config.displayStyle).toBe("short");
    expect(result.config.chars).toEqual({ noteBullet: "*" });
  });

  it("loads a CommonJS config", async () => {
    await fs.writeFile(path.join(workspace, "spanmark.config.cjs"), 'module.exports = { color: "never", charset: "ascii" };\n');

    const result = await loadConfig({ cwd: workspace });

    expect(result.filepath).toBe(path.join(workspace, "spanmark.config.cjs"));
    expect(result.config.color).toBe("never");
    expect(result.config.charset).toBe("ascii");
  });

  it("validates what a module config exports", async () => {
    await fs.writeFile(path.join(workspace, "spanmark.config.cjs"), 'module.exports = { color: "rainbow" };\n');

    await expect(loadConfig({ cwd: workspace })).rejects.toThrow(
      'Invalid spanmark.config.cjs:\n  - color must be one of "auto", "always", "never".'
    );
  });

  it("loads an explicit path relative to cwd", async () => {
    await fs.outputJson(path.join(workspace, "conf", "render.json"), { chars: { noteBullet: "*" } });

    const result = await loadConfig({ cwd: workspace, explicitPath: "conf/render.json" });

    expect(result.config.chars).toEqual({ noteBullet: "*" });
  });

  it("rejects a missing explicit path", async () => {
    await expect(loadConfig({ cwd: workspace, explicitPath: "nope.json" })).rejects.toThrow(
      `Config file not found at ${path.join(workspace, "nope.json")}`
    );
  });

  it("reports malformed JSON with the file name", async () => {
    await fs.writeFile(path.join(workspace, "spanmark.config.json"), "{ not json");

    await expect(loadConfig({ cwd: workspace })).rejects.toThrow("Failed to load spanmark.config.json:");
  });

  it("normalizes what it loads", async () => {
    await fs.writeJson(path.join(workspace, "spanmark.config.json"), { charset: "ascii", color: "always" });

    const normalized = await loadAndNormalizeConfig({ cwd: workspace });

    expect(normalized.color).toBe("always");
    expect(normalized.render.chars).toEqual(ASCII_CHARS);
  });
});

describe("parseConfig", () => {
  it("accepts a full config", () => {
    const config = parseConfig({
      displayStyle: "rich",
      color: "auto",
      charset: "unicode",
      chars: { multiLeft: "┃" },
      styles: { lineNumber: { color: "gray", bold: true } }
    });

    expect(config.chars).toEqual({ multiLeft: "┃" });
    expect(config.styles).toEqual({ lineNumber: { color: "gray", bold: true } });
  });

  it("lists every problem at once", () => {
    expect(() =>
      parseConfig(
        {
          displayStyle: "fancy",
          extra: true,
          chars: { noteBullet: "", elbow: "+" },
          styles: { lineNumber: { color: "pink", bold: "yes" } }
        },
        "spanmark.config.json"
      )
    ).toThrow(
      [
        "Invalid spanmark.config.json:",
        '  - Unknown option "extra".',
        '  - displayStyle must be one of "rich", "short".',
        "  - chars.noteBullet must be a non-empty string.",
        '  - Unknown option "chars.elbow".',
        '  - styles.lineNumber.color must be one of "black", "red", "green", "yellow", "blue", "magenta", "cyan", "white", "gray".',
        "  - styles.lineNumber.bold must be a boolean."
      ].join("\n")
    );
  });

  it("rejects non-objects", () => {
    expect(validateConfig([])).toEqual(["Config must be a plain object."]);
    expect(validateConfig({ styles: { nope: {} } })).toEqual(['Unknown option "styles.nope".']);
  });

  it("passes typed configs through defineConfig untouched", () => {
    const config = { displayStyle: "short" } as const;
    expect(defineConfig(config)).toBe(config);
  });
});

describe("normalizeConfig", () => {
  it("fills in defaults", () => {
    const normalized = normalizeConfig({});

    expect(normalized.color).toBe("auto");
    expect(normalized.render.displayStyle).toBe("rich");
    expect(normalized.render.chars).toEqual(UNICODE_CHARS);
  });

  it("layers char overrides over the chosen charset", () => {
    const normalized = normalizeConfig({ charset: "ascii", chars: { noteBullet: "*" } });

    expect(normalized.render.chars.sourceBorderLeft).toBe("|");
    expect(normalized.render.chars.noteBullet).toBe("*");
  });
});

describe("mergeConfigs", () => {
  it("lets later configs win without clearing earlier values", () => {
    const merged = mergeConfigs(
      { displayStyle: "short", color: "never", chars: { noteBullet: "*" } },
      { color: "always", chars: { multiLeft: "!" } }
    );

    expect(merged).toEqual({
      displayStyle: "short",
      color: "always",
      charset: undefined,
      chars: { noteBullet: "*", multiLeft: "!" },
      styles: {}
    });
  });
});
