import { defineConfig } from "tsup";

export default defineConfig({
  entry:    { index: "src/index.ts" },
  format:   ["esm", "cjs"],
  dts:      true,
  clean:    true,
  // platform "neutral": @tagimage/core uses only DataView and typed arrays,
  // which behave identically in browsers and Node.js.
  platform: "neutral",
});
