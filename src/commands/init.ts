import { access } from "node:fs/promises";
import {
	confirm as clackConfirm,
	isCancel as clackIsCancel,
	select as clackSelect,
	text as clackText,
} from "@clack/prompts";
import {
	type ClipbridgeConfig,
	DEFAULT_REMOTE_COMMAND,
	DEFAULT_WATCH_INTERVAL_MS,
	MIN_WATCH_INTERVAL_MS,
	type PeerConfig,
	resolveConfigPath,
	writeConfig,
} from "#config";
import { PeerNameSchema } from "#config/schema";

type InitOptions = {
	configPath?: string;
};

type SelectPrompt = (opts: {
	message: string;
	options: Array<{ value: string; label: string }>;
	initialValue?: string;
}) => Promise<string | symbol>;

type PromptDeps = {
	confirm?: typeof clackConfirm;
	isCancel?: typeof clackIsCancel;
	select?: SelectPrompt;
	text?: typeof clackText;
};

export type InitResult = {
	configPath: string;
	written: boolean;
	config?: ClipbridgeConfig;
};

const exists = async (target: string) => {
	try {
		await access(target);
		return true;
	} catch {
		return false;
	}
};

const cancelled = () => new Error("Init cancelled.");

const validatePeerName =
	(taken: Record<string, PeerConfig>) => (value: string | undefined) => {
		if (!value) return undefined;
		if (!PeerNameSchema.safeParse(value).success) {
			return "Use letters, digits, '.', '_' or '-', starting with a letter or digit.";
		}
		if (Object.hasOwn(taken, value)) {
			return `Peer "${value}" is already added.`;
		}
		return undefined;
	};

const validateInterval = (value: string | undefined) => {
	const intervalMs = Number(value);
	if (!Number.isInteger(intervalMs) || intervalMs < MIN_WATCH_INTERVAL_MS) {
		return `Enter a whole number of at least ${MIN_WATCH_INTERVAL_MS}.`;
	}
	return undefined;
};

const promptPeers = async (
	confirm: typeof clackConfirm,
	text: typeof clackText,
	isCancel: typeof clackIsCancel,
) => {
	const peers: Record<string, PeerConfig> = {};
	while (true) {
		const name = await text({
			message: "Peer name (leave empty to finish)",
			placeholder: "work",
			validate: validatePeerName(peers),
		});
		if (isCancel(name)) throw cancelled();
		if (!name) break;
		const ssh = await text({
			message: "SSH destination",
			placeholder: "user@hostname",
			validate: (value) => (value ? undefined : "An ssh destination is required."),
		});
		if (isCancel(ssh)) throw cancelled();
		const remoteCmd = await text({
			message: "Command on the peer",
			initialValue: DEFAULT_REMOTE_COMMAND,
		});
		if (isCancel(remoteCmd)) throw cancelled();
		peers[name] =
			remoteCmd && remoteCmd !== DEFAULT_REMOTE_COMMAND
				? { ssh, remoteCmd }
				: { ssh };
		const another = await confirm({
			message: "Add another peer?",
			initialValue: false,
		});
		if (isCancel(another)) throw cancelled();
		if (!another) break;
	}
	return peers;
};

const promptDefaultPeer = async (
	names: string[],
	select: SelectPrompt,
	isCancel: typeof clackIsCancel,
) => {
	if (names.length <= 1) {
		return names[0];
	}
	const answer = await select({
		message: "Default peer",
		options: names.map((name) => ({ value: name, label: name })),
		initialValue: names[0],
	});
	if (isCancel(answer)) throw cancelled();
	return answer;
};

const buildConfig = (
	peers: Record<string, PeerConfig>,
	defaultPeer: string | undefined,
	intervalMs: number,
): ClipbridgeConfig => {
	const config: ClipbridgeConfig = { peers };
	if (defaultPeer) {
		config.defaults = { peer: defaultPeer };
	}
	if (intervalMs !== DEFAULT_WATCH_INTERVAL_MS) {
		config.watch = { intervalMs };
	}
	return config;
};

/**
 * Walks through peer setup and writes the config file. Declining to
 * overwrite an existing file leaves it untouched.
 */
export const initConfig = async (
	options: InitOptions = {},
	deps: PromptDeps = {},
): Promise<InitResult> => {
	const confirm = deps.confirm ?? clackConfirm;
	const isCancel = deps.isCancel ?? clackIsCancel;
	const select: SelectPrompt = deps.select ?? clackSelect;
	const text = deps.text ?? clackText;
	const configPath = resolveConfigPath(options.configPath);

	if (await exists(configPath)) {
		const overwrite = await confirm({
			message: `Config already exists at ${configPath}. Overwrite?`,
			initialValue: false,
		});
		if (isCancel(overwrite)) throw cancelled();
		if (!overwrite) {
			return { configPath, written: false };
		}
	}

	const peers = await promptPeers(confirm, text, isCancel);
	const defaultPeer = await promptDefaultPeer(
		Object.keys(peers),
		select,
		isCancel,
	);
	const intervalAnswer = await text({
		message: "Watch polling interval (ms)",
		initialValue: String(DEFAULT_WATCH_INTERVAL_MS),
		validate: validateInterval,
	});
	if (isCancel(intervalAnswer)) throw cancelled();

	const config = buildConfig(peers, defaultPeer, Number(intervalAnswer));
	await writeConfig(configPath, config);
	return { configPath, written: true, config };
};
