import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/**/*.ts"],
  format: ["esm"],
  dts: true,
  clean: true,
  splitting: false,
  bundle: false,
  outDir: "dist",
});
