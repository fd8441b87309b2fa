import { defineConfig } from "tsup";

export default defineConfig({
  // CLI entry point (with shebang for executable)
  entry: ["src/cli.ts"],
  format: ["esm"],
  sourcemap: true,
  clean: true,
  target: "node20",
  banner: {
    js: "#!/usr/bin/env node",
  },
});
