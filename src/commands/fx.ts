import { type LocalClipboard, SystemClipboard } from "#clipboard/local";
import {
	type ClipbridgeConfig,
	loadConfig,
	type TransformConfig,
} from "#config";
import { ConfigurationError, getErrorMessage } from "#core/errors";
import { formatSize } from "#core/format";
import { createHistoryRecorder } from "#core/history";
import { getTransformCommand, runTransform } from "#core/transform";
import type { HistoryRecorder } from "#sync/types";

type FxOptions = {
	configPath?: string;
	names: string[];
	dryRun?: boolean;
	logger?: (message: string) => void;
};

type FxDeps = {
	clipboard?: LocalClipboard;
	run?: (command: string[], input: Uint8Array) => Promise<Uint8Array>;
	history?: HistoryRecorder;
	output?: { write(chunk: Uint8Array | string): unknown };
};

export type FxResult = {
	chain: string;
	originalBytes: number;
	bytes: number;
	dryRun: boolean;
};

type TransformStep = {
	name: string;
	command: string[];
};

const DESCRIPTION_WIDTH = 50;

const resolveSteps = (
	config: ClipbridgeConfig,
	names: string[],
): TransformStep[] => {
	const transforms = config.fx ?? {};
	return names.map((name) => {
		const transform = Object.hasOwn(transforms, name)
			? transforms[name]
			: undefined;
		if (!transform) {
			const known = Object.keys(transforms);
			const hint =
				known.length > 0
					? ` Known transforms: ${known.join(", ")}.`
					: " No transforms are configured.";
			throw new ConfigurationError(`unknown transform "${name}".${hint}`);
		}
		return { name, command: getTransformCommand(transform) };
	});
};

/**
 * Pipes the clipboard through the named transforms in order. Every name is
 * checked before the clipboard is read, and the clipboard is only written
 * once the whole chain has produced output.
 */
export const runFx = async (
	options: FxOptions,
	deps: FxDeps = {},
): Promise<FxResult> => {
	if (options.names.length === 0) {
		throw new Error("Usage: clipbridge fx <name> [name...] [--dry-run]");
	}
	const { config } = await loadConfig(options.configPath);
	const steps = resolveSteps(config, options.names);
	const clipboard =
		deps.clipboard ?? new SystemClipboard({ logger: options.logger });
	const run = deps.run ?? runTransform;

	const original = await clipboard.read();
	let data = original;
	for (const [index, step] of steps.entries()) {
		const label = `transform "${step.name}" (step ${index + 1})`;
		options.logger?.(`${label}: ${step.command.join(" ")}`);
		try {
			data = await run(step.command, data);
		} catch (error) {
			throw new Error(
				`${label} failed: ${getErrorMessage(error)}; clipboard unchanged`,
				{ cause: error },
			);
		}
		if (data.byteLength === 0) {
			throw new Error(`${label} produced empty output; clipboard unchanged`);
		}
	}

	const result: FxResult = {
		chain: options.names.join(" → "),
		originalBytes: original.byteLength,
		bytes: data.byteLength,
		dryRun: Boolean(options.dryRun),
	};
	if (options.dryRun) {
		(deps.output ?? process.stdout).write(data);
		return result;
	}

	await clipboard.write(data);
	const history = deps.history ?? createHistoryRecorder();
	try {
		await history({
			command: `fx:${result.chain}`,
			target: "",
			size: data.byteLength,
		});
	} catch (error) {
		options.logger?.(`history: ${getErrorMessage(error)}`);
	}
	return result;
};

export const formatFxResult = (result: FxResult) =>
	`fx ${result.chain}: ${formatSize(result.originalBytes)} → ${formatSize(result.bytes)}`;

const describeTransform = (transform: TransformConfig) => {
	if (transform.description) {
		return transform.description;
	}
	const description =
		transform.shell !== undefined
			? `sh -c ${JSON.stringify(transform.shell)}`
			: (transform.cmd ?? []).join(" ");
	return description.length > DESCRIPTION_WIDTH
		? `${description.slice(0, DESCRIPTION_WIDTH - 3)}...`
		: description;
};

/**
 * NAME/DESCRIPTION table of the configured transforms, sorted by name.
 */
export const formatFxList = (config: ClipbridgeConfig) => {
	const transforms = Object.entries(config.fx ?? {});
	if (transforms.length === 0) {
		return [
			"No transforms defined.",
			"",
			"Add transforms to your config:",
			'  "fx": {',
			'    "pretty-json": { "cmd": ["jq", "."], "description": "Format JSON" }',
			"  }",
		];
	}
	const lines = [`${"NAME".padEnd(20)}  DESCRIPTION`];
	for (const [name, transform] of transforms.sort(([a], [b]) =>
		a.localeCompare(b),
	)) {
		lines.push(`${name.padEnd(20)}  ${describeTransform(transform)}`);
	}
	return lines;
};

export const listTransforms = async (configPath?: string) => {
	const { config } = await loadConfig(configPath);
	return formatFxList(config);
};
