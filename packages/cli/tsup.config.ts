import { defineConfig } from "tsup"

export default defineConfig({
	entry: ["src/index.ts"],
	format: ["esm"],
	target: "node20",
	outDir: "dist",
	clean: true,
	splitting: false,
	sourcemap: false,
	dts: false,
	// Bundle @podplan/core into the output
	noExternal: [/@podplan\//],
	// Keep all npm dependencies external (installed by users)
	external: ["commander", "yaml", "zod"],
	banner: {
		js: "#!/usr/bin/env node",
	},
})
