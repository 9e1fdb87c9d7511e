import { defineConfig } from "tsdown";

export default defineConfig({
	entry: ["src/index.ts"],
	format: ["esm"],
	dts: true,
	sourcemap: true,
	outDir: "dist/bundle",
	clean: true,
	fixedExtension: true,
});
