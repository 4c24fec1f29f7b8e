import stripAnsiModule from "strip-ansi";
import type { TextOutput } from "@spanmark/reporting";

export const stripAnsi = (value: string): string => stripAnsiModule(value);

/** Collects everything the CLI writes. */
export class MemoryOutput implements TextOutput {
  text = "";

  write(chunk: string): void {
    this.text += chunk;
  }

  get plain(): string {
    return stripAnsi(this.text).replace(/\r\n/g, "\n");
  }
}
