import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

function source(path: string): string {
	return fileURLToPath(new URL(path, import.meta.url));
}

export default defineConfig({
	test: {
		environment: "node",
		include: ["packages/*/src/**/*.test.ts"],
		coverage: {
			provider: "v8",
			reporter: ["text", "lcov", "json-summary"],
			include: ["packages/*/src/**/*.ts"],
			exclude: ["**/__tests__/**", "**/*.test.ts", "**/test-utils/**", "packages/cli/src/index.ts"],
			thresholds: {
				lines: 80,
				branches: 75,
				functions: 80,
				statements: 80,
			},
		},
	},
	resolve: {
		alias: [
			{ find: "@nomina/core/logger", replacement: source("./packages/core/src/logger/index.ts") },
			{ find: "@nomina/core", replacement: source("./packages/core/src/index.ts") },
			{ find: "@nomina/memory-model", replacement: source("./packages/memory-model/src/index.ts") },
			{ find: "@nomina/test-utils", replacement: source("./packages/test-utils/src/index.ts") },
			{ find: /^nomina$/, replacement: source("./packages/nomina/src/index.ts") },
		],
	},
});
