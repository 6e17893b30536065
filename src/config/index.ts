import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import type {
	ClipbridgeConfig,
	ClipbridgeDefaults,
	PeerConfig,
	PeerDescriptor,
	TransformConfig,
	WatchConfig,
} from "#config/schema";
import {
	ConfigSchema,
	DEFAULT_REMOTE_COMMAND,
	DEFAULT_WATCH_INTERVAL_MS,
} from "#config/schema";
import { ConfigurationError, getErrnoCode, getErrorMessage } from "#core/errors";
import { resolveConfigPath } from "#core/paths";

export type {
	ClipbridgeConfig,
	ClipbridgeDefaults,
	PeerConfig,
	PeerDescriptor,
	TransformConfig,
	WatchConfig,
};
export {
	DEFAULT_REMOTE_COMMAND,
	DEFAULT_WATCH_INTERVAL_MS,
	MIN_WATCH_INTERVAL_MS,
} from "#config/schema";
export { resolveConfigPath };

export type ResolvedPeer = {
	name: string;
	peer: PeerDescriptor;
};

export type LoadedConfig = {
	config: ClipbridgeConfig;
	resolvedPath: string;
};

export const validateConfig = (input: unknown): ClipbridgeConfig => {
	if (typeof input !== "object" || input === null || Array.isArray(input)) {
		throw new ConfigurationError("Config must be a JSON object.");
	}
	const parsed = ConfigSchema.safeParse(input);
	if (!parsed.success) {
		const details = parsed.error.issues
			.map((issue) => `${issue.path.join(".") || "config"} ${issue.message}`)
			.join("; ");
		throw new ConfigurationError(`Config does not match schema: ${details}.`);
	}
	return parsed.data;
};

export const loadConfig = async (configPath?: string): Promise<LoadedConfig> => {
	const resolvedPath = resolveConfigPath(configPath);
	let raw: string;
	try {
		raw = await readFile(resolvedPath, "utf8");
	} catch (error) {
		if (getErrnoCode(error) === "ENOENT") {
			throw new ConfigurationError(
				`Config file not found: ${resolvedPath}\n\nPeers are not configured. Run \`clipbridge init\` or create the file by hand.`,
			);
		}
		throw new ConfigurationError(
			`Failed to read config at ${resolvedPath}: ${getErrorMessage(error)}`,
			{ cause: error },
		);
	}
	let parsed: unknown;
	try {
		parsed = JSON.parse(raw);
	} catch (error) {
		throw new ConfigurationError(
			`Invalid JSON in ${resolvedPath}: ${getErrorMessage(error)}`,
			{ cause: error },
		);
	}
	return { config: validateConfig(parsed), resolvedPath };
};

export const writeConfig = async (
	configPath: string,
	config: ClipbridgeConfig,
) => {
	await mkdir(path.dirname(configPath), { recursive: true });
	const data = `${JSON.stringify(config, null, 2)}\n`;
	await writeFile(configPath, data, { encoding: "utf8", mode: 0o600 });
};

export const toPeerDescriptor = (peer: PeerConfig): PeerDescriptor => ({
	address: peer.ssh,
	remoteCommand: peer.remoteCmd ?? DEFAULT_REMOTE_COMMAND,
});

export const getDefaultPeerName = (config: ClipbridgeConfig) => {
	const name = config.defaults?.peer;
	if (!name) {
		throw new ConfigurationError(
			"no default peer configured; pass a peer name or set defaults.peer in the config.",
		);
	}
	return name;
};

export const getPeer = (
	config: ClipbridgeConfig,
	name: string,
): PeerDescriptor => {
	const peers = config.peers ?? {};
	const peer = Object.hasOwn(peers, name) ? peers[name] : undefined;
	if (!peer) {
		const known = Object.keys(peers);
		const hint =
			known.length > 0
				? ` Known peers: ${known.join(", ")}.`
				: " No peers are configured.";
		throw new ConfigurationError(`unknown peer "${name}".${hint}`);
	}
	return toPeerDescriptor(peer);
};

/**
 * Picks the named peer, or the configured default when no name is given.
 */
export const resolvePeer = (
	config: ClipbridgeConfig,
	name?: string,
): ResolvedPeer => {
	const peerName = name ?? getDefaultPeerName(config);
	return { name: peerName, peer: getPeer(config, peerName) };
};

export const resolveWatchInterval = (
	config: ClipbridgeConfig,
	override?: number,
) => override ?? config.watch?.intervalMs ?? DEFAULT_WATCH_INTERVAL_MS;
