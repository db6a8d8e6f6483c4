import { defineConfig } from "tsup";

export default defineConfig({
  entry:    { index: "src/index.ts" },
  format:   ["esm", "cjs"],
  dts:      true,
  clean:    true,
  // The store and bridge use node:fs, node:crypto and node:perf_hooks.
  platform: "node",
  target:   "node20",
});
