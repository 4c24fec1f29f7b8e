import type { Chars, Config, DisplayStyle, StyleRole, StyleSpec } from "@spanmark/reporting";

export type ColorChoice = "auto" | "always" | "never";

export type Charset = "unicode" | "ascii";

export interface SpanmarkConfig {
  displayStyle?: DisplayStyle;
  color?: ColorChoice;
  /** Base glyph set; `chars` overrides individual glyphs on top of it. */
  charset?: Charset;
  chars?: Partial<Chars>;
  styles?: Partial<Record<StyleRole, StyleSpec>>;
}

export interface NormalizedSpanmarkConfig {
  color: ColorChoice;
  render: Config;
}
