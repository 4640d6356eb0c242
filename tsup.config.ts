import { defineConfig } from "tsup";

export default defineConfig({
  entry:    { index: "src/index.ts" },
  format:   ["esm", "cjs"],
  dts:      true,
  clean:    true,
  // Table.load reads through node:fs; everything else is platform-free.
  platform: "node",
  target:   "node20",
});
