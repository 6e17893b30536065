import path from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const root = path.dirname(fileURLToPath(import.meta.url));
const src = (subpath: string) => path.resolve(root, "src", subpath);

export default defineConfig({
	resolve: {
		alias: [
			{ find: /^#cli\/(.*)$/, replacement: src("cli/$1") },
			{ find: /^#clipboard\/(.*)$/, replacement: src("clipboard/$1") },
			{ find: /^#commands\/(.*)$/, replacement: src("commands/$1") },
			{ find: /^#config\/(.*)$/, replacement: src("config/$1") },
			{ find: /^#config$/, replacement: src("config/index") },
			{ find: /^#core\/(.*)$/, replacement: src("$1") },
			{ find: /^#remote\/(.*)$/, replacement: src("remote/$1") },
			{ find: /^#sync\/(.*)$/, replacement: src("sync/$1") },
		],
	},
	test: {
		environment: "node",
		include: ["tests/**/*.test.ts"],
		exclude: ["**/dist/**", "**/node_modules/**"],
		unstubEnvs: true,
		restoreMocks: true,
	},
});
