import { defineConfig } from "tsup";

export default defineConfig({
  entry: { cli: "src/cli.ts" },
  format: ["cjs"],
  platform: "node",
  target: "node20",
  // Workspace packages resolve to their TypeScript sources, so they go into the bundle
  noExternal: [/^@autolayer\//],
  clean: true,
  sourcemap: true,
  splitting: false,
  esbuildOptions(options) {
    options.keepNames = true;
  },
});
