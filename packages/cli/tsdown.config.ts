import { defineConfig } from "tsdown";

// Workspace packages export their TypeScript sources, so they are bundled in.
export default defineConfig({
	entry: ["./src/index.ts"],
	format: ["esm"],
	platform: "node",
	sourcemap: true,
	clean: true,
	noExternal: [/^@strata\//, /^strata(\/|$)/],
});
