import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		include: ["tests/**/*.test.ts"],
		exclude: ["**/node_modules/**", "**/dist/**"],
		env: {
			// Keep build logs out of test output.
			LOG_LEVEL: "silent",
		},
	},
});
