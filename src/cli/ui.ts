import path from "node:path";
import pc from "picocolors";
import { toPosixPath } from "#core/paths";

export const symbols = {
	error: pc.red("✖"),
	success: pc.green("✔"),
	info: pc.blue("ℹ"),
	warn: pc.yellow("⚠"),
};

let _silentMode = false;
let _verboseMode = false;

export const setSilentMode = (silent: boolean) => {
	_silentMode = silent;
};

export const setVerboseMode = (verbose: boolean) => {
	_verboseMode = verbose;
};

export const ui = {
	// Formatters
	path: (value: string) => {
		const rel = path.relative(process.cwd(), value);
		const selected = rel.length < value.length ? rel : value;
		return toPosixPath(selected);
	},

	line: (text: string = "") => {
		if (_silentMode) return;
		process.stdout.write(`${text}\n`);
	},

	// Errors are never silenced
	error: (text: string) => {
		process.stderr.write(`${text}\n`);
	},

	debug: (text: string) => {
		if (!_verboseMode) return;
		process.stderr.write(`${pc.dim(text)}\n`);
	},
};
