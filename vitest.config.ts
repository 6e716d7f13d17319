import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		include: ["apps/**/*.test.ts", "packages/**/*.test.ts"],
		exclude: ["**/node_modules/**", "**/dist/**"],
		globals: true,
		environment: "node",
		testTimeout: 30000,
		hookTimeout: 30000,
		coverage: {
			provider: "v8",
			reporter: ["text", "json-summary", "html"],
			reportsDirectory: "./coverage",
			exclude: [
				"**/*.test.ts",
				"**/node_modules/**",
				"**/dist/**",
				// Barrel index files (re-exports only)
				"**/packages/*/src/index.ts",
				"**/packages/*/src/*/index.ts",
				// Type-only files
				"**/packages/logger/src/types.ts",
				// Process entry point
				"**/apps/sample-host/src/index.ts",
			],
			thresholds: {
				statements: 85,
				branches: 80,
				functions: 85,
				lines: 85,
			},
		},
	},
	resolve: {
		extensions: [".ts", ".js", ".json"],
	},
});
