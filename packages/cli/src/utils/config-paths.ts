// =============================================================================
// Config file discovery paths
// =============================================================================
// Every candidate path the CLI probes for the user's nomina config, in order:
// base file names crossed with extensions and the usual config directories.

const baseNames = ["nomina.config", "nomina"];

const extensions = [".ts", ".mts", ".js", ".mjs", ".json"];

const directoryPrefixes = ["", "config/", "src/", "src/config/"];

export const possibleConfigPaths: string[] = [];

for (const dir of directoryPrefixes) {
	for (const base of baseNames) {
		for (const ext of extensions) {
			possibleConfigPaths.push(`${dir}${base}${ext}`);
		}
	}
}
