import path from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "tsup";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  entry: ["src/index.ts"],
  format: ["esm", "cjs"],
  platform: "node",
  sourcemap: true,
  clean: true,
  target: "node20",
  external: ["@spanmark/reporting"],
  tsconfig: path.resolve(__dirname, "tsconfig.json")
});
