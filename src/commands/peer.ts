import { type LocalClipboard, SystemClipboard } from "#clipboard/local";
import { loadConfig, type PeerDescriptor, resolvePeer } from "#config";
import { getErrorMessage } from "#core/errors";
import { formatSize } from "#core/format";
import { createHistoryRecorder } from "#core/history";
import { type RemoteClipboard, SshRemoteClipboard } from "#remote/ssh";
import type { HistoryRecord, HistoryRecorder } from "#sync/types";

type PeerCommandOptions = {
	configPath?: string;
	peer?: string;
	logger?: (message: string) => void;
};

type PeerDeps = {
	local?: LocalClipboard;
	createRemote?: (peer: PeerDescriptor) => RemoteClipboard;
	history?: HistoryRecorder;
};

export type PeerOutput = {
	write(chunk: Uint8Array | string): unknown;
};

export type TransferResult = {
	peerName: string;
	address: string;
	bytes: number;
};

const connect = async (options: PeerCommandOptions, deps: PeerDeps) => {
	const { config } = await loadConfig(options.configPath);
	const { name, peer } = resolvePeer(config, options.peer);
	const remote =
		deps.createRemote?.(peer) ??
		new SshRemoteClipboard(peer, { showErrors: true, logger: options.logger });
	return {
		name,
		peer,
		remote,
		history: deps.history ?? createHistoryRecorder(),
	};
};

const recordTransfer = async (
	history: HistoryRecorder,
	record: HistoryRecord,
	logger?: (message: string) => void,
) => {
	try {
		await history(record);
	} catch (error) {
		logger?.(`history: ${getErrorMessage(error)}`);
	}
};

const describePeer = (name: string, peer: Pick<PeerDescriptor, "address">) =>
	`peer "${name}" (${peer.address})`;

/**
 * One-shot push of the local clipboard to a peer.
 */
export const sendToPeer = async (
	options: PeerCommandOptions,
	deps: PeerDeps = {},
): Promise<TransferResult> => {
	const { name, peer, remote, history } = await connect(options, deps);
	const local = deps.local ?? new SystemClipboard({ logger: options.logger });
	const data = await local.read();
	try {
		await remote.write(data);
	} catch (error) {
		throw new Error(
			`failed to send to ${describePeer(name, peer)}: ${getErrorMessage(error)}`,
			{ cause: error },
		);
	}
	await recordTransfer(
		history,
		{ command: "send", target: name, size: data.byteLength },
		options.logger,
	);
	return { peerName: name, address: peer.address, bytes: data.byteLength };
};

/**
 * One-shot pull of a peer's clipboard into the local one.
 */
export const receiveFromPeer = async (
	options: PeerCommandOptions,
	deps: PeerDeps = {},
): Promise<TransferResult> => {
	const { name, peer, remote, history } = await connect(options, deps);
	let data: Uint8Array;
	try {
		data = await remote.read();
	} catch (error) {
		throw new Error(
			`failed to receive from ${describePeer(name, peer)}: ${getErrorMessage(error)}`,
			{ cause: error },
		);
	}
	const local = deps.local ?? new SystemClipboard({ logger: options.logger });
	await local.write(data);
	await recordTransfer(
		history,
		{ command: "recv", target: name, size: data.byteLength },
		options.logger,
	);
	return { peerName: name, address: peer.address, bytes: data.byteLength };
};

/**
 * Writes a peer's clipboard to `output` without touching the local one.
 */
export const peekAtPeer = async (
	options: PeerCommandOptions,
	deps: PeerDeps & { output?: PeerOutput } = {},
): Promise<TransferResult> => {
	const { name, peer, remote, history } = await connect(options, deps);
	let data: Uint8Array;
	try {
		data = await remote.read();
	} catch (error) {
		throw new Error(
			`failed to peek from ${describePeer(name, peer)}: ${getErrorMessage(error)}`,
			{ cause: error },
		);
	}
	(deps.output ?? process.stdout).write(data);
	await recordTransfer(
		history,
		{ command: "peek", target: name, size: 0 },
		options.logger,
	);
	return { peerName: name, address: peer.address, bytes: data.byteLength };
};

export const formatTransfer = (
	kind: "sent" | "received",
	result: TransferResult,
) => {
	const size = formatSize(result.bytes);
	const peer = describePeer(result.peerName, { address: result.address });
	return kind === "sent"
		? `sent ${size} to ${peer}`
		: `received ${size} from ${peer}`;
};
