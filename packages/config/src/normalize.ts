import { ASCII_CHARS, UNICODE_CHARS, createConfig } from "@spanmark/reporting";

import type { NormalizedSpanmarkConfig, SpanmarkConfig } from "./types";

/**
 * Later configs win; `chars` and `styles` merge key by key. Typically called
 * as `mergeConfigs(fileConfig, cliFlags)`.
 */
export function mergeConfigs(...configs: SpanmarkConfig[]): SpanmarkConfig {
  return configs.reduce<SpanmarkConfig>(
    (merged, config) => ({
      displayStyle: config.displayStyle ?? merged.displayStyle,
      color: config.color ?? merged.color,
      charset: config.charset ?? merged.charset,
      chars: { ...merged.chars, ...config.chars },
      styles: { ...merged.styles, ...config.styles }
    }),
    {}
  );
}

export function normalizeConfig(config: SpanmarkConfig): NormalizedSpanmarkConfig {
  const baseChars = config.charset === "ascii" ? ASCII_CHARS : UNICODE_CHARS;

  return {
    color: config.color ?? "auto",
    render: createConfig({
      displayStyle: config.displayStyle,
      chars: { ...baseChars, ...config.chars },
      styles: config.styles
    })
  };
}
