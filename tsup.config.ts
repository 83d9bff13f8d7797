import { defineConfig } from "tsup";

export default defineConfig({
  entry: {
    index: "src/index.ts",
    "cli/index": "src/cli/index.ts",
  },
  format: "esm",
  target: "node20",
  platform: "node",
  splitting: true,
  clean: true,
  dts: false,
  sourcemap: false,
  outDir: "dist",
  // The SDK workspace ships TypeScript sources only, so it is bundled
  noExternal: ["@relaybot/sdk"],
  skipNodeModulesBundle: true,
});
