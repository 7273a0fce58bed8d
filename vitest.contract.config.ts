import { defineConfig } from "vitest/config"

/**
 * Vitest config for contract tests (manual-only).
 *
 * Run with: npm run test:contract
 *
 * These tests call the live NCBI E-utilities service to detect changes in
 * the BioSample XML format. Run them manually before releases.
 */
export default defineConfig({
	test: {
		include: ["test/contract/**/*.test.ts"],
		globals: false,
		environment: "node",
		setupFiles: ["test/helpers/setup.ts"],
		testTimeout: 60000, // Network tests need longer timeout
		retry: 2, // Retry flaky network tests
		sequence: {
			shuffle: false, // Run in order to stay under the E-utilities rate limit
		},
	},
})
