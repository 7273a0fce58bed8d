import { defineConfig } from "vitest/config"

export default defineConfig({
	test: {
		include: ["test/**/*.test.ts"],
		exclude: ["test/contract/**/*.test.ts"], // Contract tests are manual-only
		globals: false, // Explicit imports preferred
		environment: "node",
		testTimeout: 30000,
		setupFiles: ["test/helpers/setup.ts"],
		coverage: {
			provider: "v8",
			reporter: ["text", "json-summary", "html"],
			include: ["src/**/*.ts"],
			exclude: ["src/ui/**", "src/cli/**", "src/logger.ts"],
			thresholds: {
				// Parsing and normalization carry the data integrity
				"src/biosample.ts": { statements: 85, branches: 70 },
				"src/dataset.ts": { statements: 85, branches: 60 },
				"src/standardize/**": { statements: 85, branches: 70 },
				"src/stats/summary.ts": { statements: 90 },
			},
		},
	},
})
