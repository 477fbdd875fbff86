import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";
import solidPlugin from "vite-plugin-solid";

export default defineConfig({
	plugins: [solidPlugin()],
	test: {
		environment: "jsdom",
		globals: true,
		setupFiles: ["./src/test/setup.ts"],
		include: ["src/**/*.{test,spec}.{ts,tsx}"],
		coverage: {
			provider: "v8",
			reporter: ["text", "json", "html"],
			include: ["src/**/*.{ts,tsx}"],
			exclude: ["src/test/**", "src/**/*.test.*", "src/**/*.spec.*"],
		},
	},
	resolve: {
		conditions: ["development", "browser"],
		alias: {
			"~": fileURLToPath(new URL("./src", import.meta.url)),
		},
	},
});
