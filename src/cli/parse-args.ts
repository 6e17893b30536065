import process from "node:process";

import cac from "cac";
import { MIN_WATCH_INTERVAL_MS } from "#config/schema";
import { ExitCode } from "./exit-code";
import type { CliCommand, CliOptions, PeerCommandName } from "./types";

export const COMMANDS = [
	"watch",
	"send",
	"recv",
	"peek",
	"copy",
	"paste",
	"clear",
	"backend",
	"doctor",
	"history",
	"fx",
	"init",
] as const;
export type Command = (typeof COMMANDS)[number];

export type ParsedArgs = {
	command: Command | null;
	options: CliOptions;
	positionals: string[];
	rawArgs: string[];
	help: boolean;
	parsed: CliCommand;
};

const PEER_COMMANDS = new Set<Command>(["watch", "send", "recv", "peek"]);
const COMMAND_OPTIONS = new Map<string, Command>([
	["--interval-ms", "watch"],
	["--list", "fx"],
	["-l", "fx"],
	["--dry-run", "fx"],
	["-n", "fx"],
	["--peer", "history"],
	["--fx", "history"],
]);
const VALUE_FLAGS = new Set(["--config", "--interval-ms"]);

const isCommand = (value: string): value is Command =>
	COMMANDS.some((command) => command === value);

const isPeerCommand = (command: Command): command is PeerCommandName =>
	PEER_COMMANDS.has(command);

const findCommandIndex = (rawArgs: string[]) => {
	for (let index = 0; index < rawArgs.length; index += 1) {
		const arg = rawArgs[index];
		if (arg.startsWith("-")) {
			const [flag] = arg.split("=");
			if (VALUE_FLAGS.has(flag) && !arg.includes("=")) {
				index += 1;
			}
			continue;
		}
		return index;
	}
	return -1;
};

const parsePositionals = (rawArgs: string[]) => {
	const commandIndex = findCommandIndex(rawArgs);
	const tail = commandIndex === -1 ? [] : rawArgs.slice(commandIndex + 1);
	const positionals: string[] = [];
	for (let index = 0; index < tail.length; index += 1) {
		const arg = tail[index];
		if (VALUE_FLAGS.has(arg)) {
			index += 1;
			continue;
		}
		if (arg.startsWith("-")) {
			continue;
		}
		positionals.push(arg);
	}
	return positionals;
};

const getCommandFromArgs = (rawArgs: string[]) => {
	const commandIndex = findCommandIndex(rawArgs);
	if (commandIndex === -1) {
		return null;
	}
	const command = rawArgs[commandIndex];
	if (!isCommand(command)) {
		throw new Error(`Unknown command '${command}'.`);
	}
	return command;
};

const assertCommandOptions = (command: Command | null, rawArgs: string[]) => {
	for (const arg of rawArgs) {
		const [flag] = arg.split("=");
		const owner = COMMAND_OPTIONS.get(flag);
		if (owner && owner !== command) {
			throw new Error(`${flag} is only valid for ${owner}.`);
		}
	}
};

const assertPositionals = (command: Command | null, positionals: string[]) => {
	if (command === null || command === "copy" || command === "fx") {
		return;
	}
	if (isPeerCommand(command)) {
		if (positionals.length > 1) {
			throw new Error(`Usage: clipbridge ${command} [peer]`);
		}
		return;
	}
	if (positionals.length > 0) {
		throw new Error(`${command} does not take arguments.`);
	}
};

const parseIntervalMs = (value: unknown) => {
	if (value === undefined) {
		return undefined;
	}
	const intervalMs = Number(value);
	if (!Number.isFinite(intervalMs) || intervalMs < MIN_WATCH_INTERVAL_MS) {
		throw new Error(
			`--interval-ms must be a number of at least ${MIN_WATCH_INTERVAL_MS}.`,
		);
	}
	return intervalMs;
};

type CacResult = ReturnType<ReturnType<typeof cac>["parse"]>;

const buildOptions = (result: CacResult) => {
	const config = result.options.config;
	if (config !== undefined && (typeof config !== "string" || !config)) {
		throw new Error("--config expects a path.");
	}
	const options: CliOptions = {
		config,
		intervalMs: parseIntervalMs(result.options.intervalMs),
		json: Boolean(result.options.json),
		silent: Boolean(result.options.silent),
		verbose: Boolean(result.options.verbose),
	};
	return options;
};

const buildParsedCommand = (
	command: Command | null,
	options: CliOptions,
	positionals: string[],
	flags: CacResult["options"],
): CliCommand => {
	switch (command) {
		case "watch":
		case "send":
		case "recv":
		case "peek":
			return { command, peer: positionals[0], options };
		case "copy":
			return { command: "copy", text: positionals, options };
		case "paste":
			return { command: "paste", options };
		case "clear":
			return { command: "clear", options };
		case "backend":
			return { command: "backend", options };
		case "doctor":
			return { command: "doctor", options };
		case "history":
			return {
				command: "history",
				filter: { peer: Boolean(flags.peer), fx: Boolean(flags.fx) },
				options,
			};
		case "fx":
			return {
				command: "fx",
				names: positionals,
				list: Boolean(flags.list),
				dryRun: Boolean(flags.dryRun),
				options,
			};
		case "init":
			return { command: "init", options };
		default:
			return { command: null, options };
	}
};

/**
 * Parses `argv` (node and script path included) and throws on invalid
 * input.
 */
export const parseArgv = (argv: string[]): ParsedArgs => {
	const cli = cac("clipbridge");

	cli
		.option("--config <path>", "Path to config file")
		.option("--json", "Output JSON")
		.option("--silent", "Suppress non-error output")
		.option("--verbose", "Enable verbose logging")
		.option("-h, --help", "Display help");

	cli
		.command("watch [peer]", "Keep the clipboard in sync with a peer")
		.option("--interval-ms <n>", "Polling interval in milliseconds");
	cli.command("send [peer]", "Send the local clipboard to a peer");
	cli.command("recv [peer]", "Replace the local clipboard with a peer's");
	cli.command("peek [peer]", "Print a peer's clipboard");
	cli.command("copy [...text]", "Copy text (or stdin) to the clipboard");
	cli.command("paste", "Print the clipboard");
	cli.command("clear", "Empty the clipboard");
	cli.command("backend", "Show the detected clipboard backend");
	cli.command("doctor", "Check the clipboard setup");
	cli
		.command("history", "Show recent transfers")
		.option("--peer", "Only peer transfers")
		.option("--fx", "Only transforms");
	cli
		.command("fx [...names]", "Run clipboard transforms")
		.option("-l, --list", "List configured transforms")
		.option("-n, --dry-run", "Print the result instead of copying it");
	cli.command("init", "Create a config interactively");

	const result = cli.parse(argv, { run: false });
	const rawArgs = argv.slice(2);
	const command = getCommandFromArgs(rawArgs);
	assertCommandOptions(command, rawArgs);
	const options = buildOptions(result);
	const positionals = parsePositionals(rawArgs);
	assertPositionals(command, positionals);
	return {
		command,
		options,
		positionals,
		rawArgs,
		help: Boolean(result.options.help),
		parsed: buildParsedCommand(command, options, positionals, result.options),
	};
};

export const parseArgs = (argv = process.argv): ParsedArgs => {
	try {
		return parseArgv(argv);
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		console.error(message);
		process.exit(ExitCode.InvalidArgument);
	}
};
