import pc from "picocolors";
import type { TextOutput } from "@spanmark/reporting";

export type Colors = ReturnType<typeof pc.createColors>;

export type SummaryKind = "success" | "error" | "warning";

const SUMMARY_ICONS: Record<SummaryKind, string> = {
  success: "✔",
  warning: "⚠",
  error: "✖"
};

function summaryColor(colors: Colors, kind: SummaryKind): (text: string) => string {
  switch (kind) {
    case "success":
      return colors.green;
    case "warning":
      return colors.yellow;
    case "error":
      return colors.red;
  }
}

export function printSummary(
  output: TextOutput,
  colors: Colors,
  kind: SummaryKind,
  message: string
): void {
  output.write(`${summaryColor(colors, kind)(`${SUMMARY_ICONS[kind]} ${message}`)}\n`);
}

export function printCliError(message: string, output: TextOutput = process.stderr): void {
  output.write(`${pc.red(`✖ ${message}`)}\n`);
}

export function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? "" : "s"}`;
}
