import { columnIndex } from "../files";
import { headerRole, labelRole, type Config, type StyleRole } from "./config";
import {
  formatLocus,
  type Entry,
  type HeaderEntry,
  type Locus,
  type SourceLineEntry,
  type SourceMark
} from "./display-list";
import type { StyledWriter } from "./sink";

function trimLineEnding(source: string): string {
  return source.replace(/\r?\n$/, "");
}

function charCount(text: string): number {
  return Array.from(text).length;
}

/**
 * Writes entries to a {@link StyledWriter}. Layout decisions are already made
 * by the time an entry gets here; this only draws borders, gutters and marks.
 */
export class Renderer {
  constructor(
    private readonly writer: StyledWriter,
    private readonly config: Config
  ) {}

  render(entry: Entry): void {
    switch (entry.type) {
      case "Header":
        this.renderHeader(entry);
        break;
      case "Empty":
        this.writer.write("\n");
        break;
      case "SourceStart":
        this.renderSourceStart(entry.outerPadding, entry.locus);
        break;
      case "SourceBreak":
        this.outerGutter(entry.outerPadding);
        this.styled("sourceBorder", this.config.chars.sourceBorderLeftBreak);
        this.writer.write("\n");
        break;
      case "SourceEmpty":
        this.outerGutter(entry.outerPadding);
        this.borderLeft();
        this.writer.write("\n");
        break;
      case "SourceLine":
        this.renderSourceLine(entry);
        break;
      case "SourceNote":
        this.renderNote(entry.outerPadding, entry.message);
        break;
    }
  }

  // test:2:9: error[E0001]: unexpected type in `+` application
  private renderHeader(entry: HeaderEntry): void {
    if (entry.locus) {
      this.writer.write(`${formatLocus(entry.locus)}: `);
    }
    const label = entry.code !== undefined ? `${entry.severity}[${entry.code}]` : entry.severity;
    this.styled(headerRole(entry.severity), label);
    this.styled("headerMessage", `: ${entry.message}`);
    this.writer.write("\n");
  }

  //   ┌── test:2:9 ───
  private renderSourceStart(outerPadding: number, locus: Locus): void {
    const { sourceBorderTopLeft, sourceBorderTop } = this.config.chars;
    this.outerGutter(outerPadding);
    this.styled("sourceBorder", `${sourceBorderTopLeft}${sourceBorderTop.repeat(2)}`);
    this.writer.write(` ${formatLocus(locus)} `);
    this.styled("sourceBorder", sourceBorderTop.repeat(3));
    this.writer.write("\n");
  }

  //   = expected type `Int`
  //        found type `String`
  private renderNote(outerPadding: number, message: string): void {
    const bullet = this.config.chars.noteBullet;
    const [first, ...rest] = message.split("\n");

    this.outerGutter(outerPadding);
    this.styled("noteBullet", bullet);
    this.writer.write(` ${first}\n`);

    const indent = " ".repeat(charCount(bullet) + 1);
    for (const line of rest) {
      this.outerGutter(outerPadding);
      this.writer.write(`${indent}${line}\n`);
    }
  }

  private renderSourceLine(entry: SourceLineEntry): void {
    const { outerPadding, lineNumber, marks } = entry;
    const source = trimLineEnding(entry.source);
    const slots = marks.filter((mark) => mark === null || mark.mark.type !== "Single");

    this.styled("lineNumber", String(lineNumber).padStart(outerPadding));
    this.writer.write(" ");
    this.borderLeft();
    this.writer.write(" ");
    for (const slot of slots) {
      this.renderSourceSlot(slot);
    }
    this.writer.write(`${source}\n`);

    for (const mark of marks) {
      if (mark === null || mark.mark.type === "MultiTopLeft" || mark.mark.type === "MultiLeft") {
        continue;
      }
      this.renderUnderline(outerPadding, source, slots, mark);
    }
  }

  private renderSourceSlot(slot: SourceMark | null): void {
    if (slot === null) {
      this.writer.write("  ");
      return;
    }
    const { chars } = this.config;
    switch (slot.mark.type) {
      case "MultiTopLeft":
        this.styled(labelRole(slot.severity), chars.multiTopLeft);
        this.writer.write(" ");
        break;
      case "MultiLeft":
      case "MultiBottom":
        this.styled(labelRole(slot.severity), chars.multiLeft);
        this.writer.write(" ");
        break;
      default:
        this.writer.write("  ");
    }
  }

  //   │         ^^ expected `Int` but found `String`
  //   │ ╭─────────────^
  //   │ ╰──────────────^ `case` clauses have incompatible types
  private renderUnderline(
    outerPadding: number,
    source: string,
    slots: (SourceMark | null)[],
    current: SourceMark
  ): void {
    const { chars } = this.config;
    const role = labelRole(current.severity);
    const primary = current.severity !== "secondary";
    const slotIndex = slots.indexOf(current);

    this.outerGutter(outerPadding);
    this.borderLeft();
    this.writer.write(" ");
    for (const slot of slotIndex === -1 ? slots : slots.slice(0, slotIndex)) {
      if (slot === null) {
        this.writer.write("  ");
      } else {
        this.styled(labelRole(slot.severity), chars.multiLeft);
        this.writer.write(" ");
      }
    }

    const trailingWidth = slotIndex === -1 ? 0 : (slots.length - slotIndex - 1) * 2;
    const mark = current.mark;
    switch (mark.type) {
      case "Single": {
        const start = columnIndex(source, 0, mark.range.start);
        const end = columnIndex(source, 0, mark.range.end);
        const caret = primary ? chars.singlePrimaryCaret : chars.singleSecondaryCaret;
        this.writer.write(" ".repeat(start));
        this.styled(role, `${caret.repeat(Math.max(1, end - start))}${withMessage(mark.message)}`);
        break;
      }
      case "MultiTop": {
        const column = columnIndex(source, 0, mark.end);
        const caret = primary ? chars.multiPrimaryCaretStart : chars.multiSecondaryCaretStart;
        this.styled(role, `${chars.multiTopLeft}${chars.multiTop.repeat(trailingWidth + column + 1)}${caret}`);
        break;
      }
      case "MultiBottom": {
        const column = columnIndex(source, 0, mark.end);
        const caret = primary ? chars.multiPrimaryCaretEnd : chars.multiSecondaryCaretEnd;
        this.styled(
          role,
          `${chars.multiBottomLeft}${chars.multiBottom.repeat(trailingWidth + column)}${caret}${withMessage(mark.message)}`
        );
        break;
      }
    }
    this.writer.write("\n");
  }

  private outerGutter(outerPadding: number): void {
    this.writer.write(" ".repeat(outerPadding + 1));
  }

  private borderLeft(): void {
    this.styled("sourceBorder", this.config.chars.sourceBorderLeft);
  }

  private styled(role: StyleRole, text: string): void {
    this.writer.setStyle(role, this.config.styles[role]);
    this.writer.write(text);
    this.writer.reset();
  }
}

function withMessage(message: string): string {
  return message ? ` ${message}` : "";
}
