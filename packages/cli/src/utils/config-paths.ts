// =============================================================================
// Config file discovery paths
// =============================================================================
// Every candidate path the CLI probes for the user's strata config: base
// filenames multiplied by the usual source directories.

const baseNames = ["strata.config", "strata"];

const extensions = [".ts", ".mts", ".js", ".mjs"];

const directoryPrefixes = ["", "src/", "src/lib/", "src/server/", "src/config/", "lib/", "server/", "config/"];

export const possibleConfigPaths: string[] = [];

for (const dir of directoryPrefixes) {
	for (const base of baseNames) {
		for (const ext of extensions) {
			possibleConfigPaths.push(`${dir}${base}${ext}`);
		}
	}
}
