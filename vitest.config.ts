// CHANGE: Vitest configuration for the matcher core
// PURITY: SHELL (configuration only)
// INVARIANT: Test discovery limited to test/**; CORE held to full coverage

import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		globals: false, // tests import describe/it/expect from "vitest"
		environment: "node",
		include: ["test/**/*.{test,spec}.ts"],
		exclude: ["node_modules", "dist"],
		coverage: {
			provider: "v8",
			reporter: ["text", "json", "html"],
			include: ["src/**/*.ts"],
			thresholds: {
				"src/core/**/*.ts": {
					branches: 100,
					functions: 100,
					lines: 100,
					statements: 100,
				},
			},
		},
		clearMocks: true,
		mockReset: true,
		restoreMocks: true,
	},
});
