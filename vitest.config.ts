import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		environment: "node",
		include: ["packages/**/test/**/*.test.ts"],
		exclude: ["node_modules/**"],
		coverage: {
			reporter: ["text"],
			include: ["packages/*/src/**/*.ts"],
		},
	},
});
