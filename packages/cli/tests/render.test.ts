import { describe, expect, it } from "vitest";
import { ResolutionError } from "@spanmark/reporting";
import { runRender } from "../src/render";
import { MemoryOutput } from "./harness/output";
import { createTempWorkspace } from "./harness/tempWorkspace";

const BUILD_REPORT = {
  diagnostics: [
    {
      severity: "error",
      code: "E0001",
      message: "bad bar",
      labels: [{ file: "../src/test.txt", start: 4, end: 7, message: "oops" }]
    }
  ]
};

async function buildWorkspace() {
  return createTempWorkspace({
    "src/test.txt": "foo\nbar\n",
    "reports/build.json": JSON.stringify(BUILD_REPORT)
  });
}

describe("spanmark render", () => {
  it("renders rich snippets followed by a summary", async () => {
    const workspace = await buildWorkspace();
    const output = new MemoryOutput();

    const result = await runRender(["reports/*.json", "--color", "never"], { cwd: workspace.rootDir, output });

    expect(output.text).toBe(
      [
        "error[E0001]: bad bar",
        "",
        "  ┌── src/test.txt:2:1 ───",
        "  │",
        "2 │ bar",
        "  │ ^^^ oops",
        "  │",
        "",
        "✖ Rendered 1 diagnostic from 1 report with 1 error",
        ""
      ].join("\n")
    );
    expect(result.errorCount).toBe(1);
    expect(result.totalReports).toBe(1);
  });

  it("draws with ASCII characters on request", async () => {
    const workspace = await buildWorkspace();
    const output = new MemoryOutput();

    await runRender(["reports/build.json", "--ascii", "--quiet", "--color", "never"], {
      cwd: workspace.rootDir,
      output
    });

    expect(output.text.split("\n").slice(2, 7)).toEqual([
      "  --- src/test.txt:2:1 ---",
      "  |",
      "2 | bar",
      "  | ^^^ oops",
      "  |"
    ]);
  });

  it("renders short headers across reports in path order", async () => {
    const workspace = await createTempWorkspace({
      "lib.txt": "abc\n",
      "b.json": JSON.stringify({ diagnostics: [{ severity: "note", message: "just saying" }] }),
      "a.json": JSON.stringify({
        diagnostics: [{ severity: "warning", code: "W1", message: "unused", labels: [{ file: "lib.txt", start: 0, end: 3 }] }]
      })
    });
    const output = new MemoryOutput();

    const result = await runRender(["*.json", "--style", "short", "--color", "never"], {
      cwd: workspace.rootDir,
      output
    });

    expect(output.text).toBe(
      [
        "lib.txt:1:1: warning[W1]: unused",
        "note: just saying",
        "⚠ Rendered 2 diagnostics from 2 reports with 1 warning",
        ""
      ].join("\n")
    );
    expect(result.errorCount).toBe(0);
    expect(result.warningCount).toBe(1);
  });

  it("takes settings from the config file", async () => {
    const workspace = await buildWorkspace();
    await workspace.writeJson("spanmark.config.json", { displayStyle: "short", color: "never" });
    const output = new MemoryOutput();

    await runRender(["reports/*.json", "--quiet"], { cwd: workspace.rootDir, output });

    expect(output.text).toBe("src/test.txt:2:1: error[E0001]: bad bar\n");
  });

  it("lets flags override the config file", async () => {
    const workspace = await buildWorkspace();
    await workspace.writeJson("conf/render.json", { displayStyle: "short", color: "never" });
    const output = new MemoryOutput();

    await runRender(["reports/*.json", "--config", "conf/render.json", "--style", "rich", "-q"], {
      cwd: workspace.rootDir,
      output
    });

    expect(output.text.split("\n")[0]).toBe("error[E0001]: bad bar");
    expect(output.text.split("\n")[2]).toBe("  ┌── src/test.txt:2:1 ───");
  });

  it("colors output when asked to", async () => {
    const workspace = await buildWorkspace();
    const output = new MemoryOutput();

    await runRender(["reports/*.json", "--color", "always", "--style", "short"], { cwd: workspace.rootDir, output });

    expect(output.text).not.toBe(output.plain);
    expect(output.plain).toBe(
      "src/test.txt:2:1: error[E0001]: bad bar\n✖ Rendered 1 diagnostic from 1 report with 1 error\n"
    );
  });

  it("prints display entries as JSON", async () => {
    const workspace = await buildWorkspace();
    const output = new MemoryOutput();

    const result = await runRender(["reports/*.json", "--format", "json", "--style", "short"], {
      cwd: workspace.rootDir,
      output
    });

    const printed: unknown = JSON.parse(output.text);
    expect(printed).toEqual({
      totalReports: 1,
      diagnosticCount: 1,
      errorCount: 1,
      warningCount: 0,
      reports: [
        {
          file: "reports/build.json",
          diagnostics: [
            [
              {
                type: "Header",
                locus: { origin: "src/test.txt", lineNumber: 2, columnNumber: 1 },
                severity: "error",
                code: "E0001",
                message: "bad bar"
              }
            ]
          ]
        }
      ]
    });
    expect(result.reports).toHaveLength(1);
  });

  it("fails when no report matches", async () => {
    const workspace = await createTempWorkspace();

    await expect(runRender(["*.json"], { cwd: workspace.rootDir, output: new MemoryOutput() })).rejects.toThrow(
      "No report files found for the provided patterns."
    );
  });

  it("lists report validation problems", async () => {
    const workspace = await createTempWorkspace({
      "reports/bad.json": JSON.stringify({
        diagnostics: [
          { severity: "fatal", message: "x" },
          { severity: "error", message: "y", labels: [{ file: "a.txt", start: 5, end: 2 }] }
        ]
      })
    });

    const run = runRender(["reports/bad.json"], { cwd: workspace.rootDir, output: new MemoryOutput() });

    await expect(run).rejects.toThrow("Invalid report reports/bad.json:\n  - diagnostics.0.severity: ");
    await expect(run).rejects.toThrow("  - diagnostics.1.labels.0.end: start must not be after end");
  });

  it("reports malformed JSON", async () => {
    const workspace = await createTempWorkspace({ "broken.json": "{" });

    await expect(
      runRender(["broken.json"], { cwd: workspace.rootDir, output: new MemoryOutput() })
    ).rejects.toThrow("Failed to read broken.json:");
  });

  it("reports unreadable source files", async () => {
    const workspace = await createTempWorkspace({
      "report.json": JSON.stringify({
        diagnostics: [{ severity: "error", message: "gone", labels: [{ file: "missing.txt", start: 0, end: 0 }] }]
      })
    });

    await expect(
      runRender(["report.json"], { cwd: workspace.rootDir, output: new MemoryOutput() })
    ).rejects.toThrow("Source file missing.txt referenced by report.json could not be read.");
  });

  it("names the report and source file when a label is out of range", async () => {
    const workspace = await createTempWorkspace({
      "short.txt": "abc\n",
      "report.json": JSON.stringify({
        diagnostics: [{ severity: "error", message: "far", labels: [{ file: "short.txt", start: 40, end: 41 }] }]
      })
    });

    const run = runRender(["report.json", "--color", "never"], { cwd: workspace.rootDir, output: new MemoryOutput() });

    await expect(run).rejects.toThrow("Report report.json has a label outside short.txt (byte 41).");
    await expect(run).rejects.toHaveProperty("cause", expect.any(ResolutionError));
  });
});
