import { defineConfig } from "tsup";

export default defineConfig({
  entry:    { index: "src/index.ts" },
  format:   ["esm", "cjs"],
  dts:      true,
  clean:    true,
  // binrec reaches node:zlib and node:crypto, and logs through winston.
  platform: "node",
  target:   "node20",
});
