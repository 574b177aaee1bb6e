import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/cli.ts"],
  format: ["esm"],
  platform: "node",
  target: "node20",
  clean: true,
  // Bundle the workspace engine; keep its npm dependencies external.
  noExternal: ["@passgauge/engine"],
});
