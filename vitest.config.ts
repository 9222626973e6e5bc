import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		environment: "node",
		include: ["scripts/**/__tests__/**/*.test.ts"],
		exclude: ["**/node_modules/**", "**/dist/**"],
		globals: false,
	},
});
