import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/cli.ts"],
  format: ["esm"],
  target: "node20",
  sourcemap: true,
  clean: true,
  // Native and platform-specific packages are resolved at run time
  external: ["better-sqlite3", "sqlite-vec"],
});
