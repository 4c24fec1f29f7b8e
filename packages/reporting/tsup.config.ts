import path from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "tsup";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  entry: ["src/index.ts"],
  format: ["esm", "cjs"],
  platform: "node",
  target: "node20",
  external: ["picocolors"],
  sourcemap: true,
  clean: true,
  tsconfig: path.resolve(__dirname, "tsconfig.json")
});
