import { defineConfig } from "tsup";

export default defineConfig([
  {
    entry: ["src/cli.ts"],
    format: ["esm"],
    target: "node20",
    dts: true,
    clean: true,
    banner: {
      js: "#!/usr/bin/env node",
    },
  },
  {
    entry: { "skillrig-hooks": "src/bridge/opencode-plugin.ts" },
    outDir: "bundle/hooks",
    format: ["esm"],
    target: "node20",
    splitting: false,
    outExtension: () => ({ js: ".js" }),
  },
  {
    entry: { "skillrig-hook": "src/bridge/claude-entry.ts" },
    outDir: "bundle/hooks",
    format: ["esm"],
    target: "node20",
    splitting: false,
    outExtension: () => ({ js: ".mjs" }),
  },
]);
