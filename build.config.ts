import path from "node:path";
import { defineBuildConfig } from "unbuild";

export default defineBuildConfig({
	entries: [
		{ input: "src/cli/index", name: "cli" },
		{ input: "src/api", name: "api" },
	],
	declaration: true,
	clean: true,
	sourcemap: true,
	rollup: {
		emitCJS: false,
		alias: {
			entries: [
				{
					find: /^#cli\/(.*)$/,
					replacement: path.resolve("src/cli/$1"),
				},
				{
					find: /^#clipboard\/(.*)$/,
					replacement: path.resolve("src/clipboard/$1"),
				},
				{
					find: /^#commands\/(.*)$/,
					replacement: path.resolve("src/commands/$1"),
				},
				{
					find: /^#config\/(.*)$/,
					replacement: path.resolve("src/config/$1"),
				},
				{
					find: "#config",
					replacement: path.resolve("src/config/index"),
				},
				{
					find: /^#core\/(.*)$/,
					replacement: path.resolve("src/$1"),
				},
				{
					find: /^#remote\/(.*)$/,
					replacement: path.resolve("src/remote/$1"),
				},
				{
					find: /^#sync\/(.*)$/,
					replacement: path.resolve("src/sync/$1"),
				},
			],
		},
		esbuild: {
			minify: true,
		},
	},
});
