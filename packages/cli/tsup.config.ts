import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/index.ts"],
  format: ["esm"],
  sourcemap: true,
  clean: true,
  splitting: false,
  platform: "node",
  target: "node20",
  banner: {
    js: "#!/usr/bin/env node"
  },
  // Workspace packages are bundled; npm dependencies stay in node_modules.
  noExternal: [/^@spanmark\//],
  external: [/^node:/, "fast-glob", "picocolors", "zod"]
});
