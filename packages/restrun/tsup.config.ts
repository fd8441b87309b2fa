import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/index.ts"],
  format: ["esm"],
  dts: true,
  sourcemap: true,
  clean: true,
  target: "node20",
  // loadCommandSchema() reads restic.json beside the bundle
  onSuccess: "cp src/schema/restic.json dist/restic.json",
});
