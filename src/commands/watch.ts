import { type LocalClipboard, SystemClipboard } from "#clipboard/local";
import { symbols, ui } from "#cli/ui";
import {
	loadConfig,
	type PeerDescriptor,
	resolvePeer,
	resolveWatchInterval,
} from "#config";
import { getErrorMessage } from "#core/errors";
import { formatSize } from "#core/format";
import { createHistoryRecorder } from "#core/history";
import { type RemoteClipboard, SshRemoteClipboard } from "#remote/ssh";
import type {
	HistoryRecorder,
	PropagationEvent,
	PropagationFailure,
	WatchReporter,
} from "#sync/types";
import { WatchSession } from "#sync/watch-session";

export type WatchOptions = {
	configPath?: string;
	peer?: string;
	intervalMs?: number;
	logger?: (message: string) => void;
};

export type WatchDeps = {
	local?: LocalClipboard;
	createRemote?: (peer: PeerDescriptor) => RemoteClipboard;
	history?: HistoryRecorder;
	/** replaces SIGINT/SIGTERM handling */
	signal?: AbortSignal;
	reporter?: WatchReporter;
};

export const formatPropagation = (event: PropagationEvent) =>
	event.direction === "send"
		? `→ sent ${formatSize(event.bytes)} to ${event.peerName}`
		: `← received ${formatSize(event.bytes)} from ${event.peerName}`;

export const formatFailure = (failure: PropagationFailure) =>
	`watch: failed to ${failure.direction}: ${getErrorMessage(failure.error)}`;

export const consoleReporter: WatchReporter = {
	propagated: (event) => ui.line(formatPropagation(event)),
	failed: (failure) => ui.error(`${symbols.error} ${formatFailure(failure)}`),
};

/**
 * Aborts on SIGINT or SIGTERM until disposed. An external signal, when
 * given, is used as is and no process handlers are installed.
 */
export const bindShutdownSignals = (external?: AbortSignal) => {
	if (external) {
		return { signal: external, dispose: () => {} };
	}
	const controller = new AbortController();
	const stop = () => controller.abort();
	process.once("SIGINT", stop);
	process.once("SIGTERM", stop);
	return {
		signal: controller.signal,
		dispose: () => {
			process.off("SIGINT", stop);
			process.off("SIGTERM", stop);
		},
	};
};

export const runWatch = async (options: WatchOptions, deps: WatchDeps = {}) => {
	const { config } = await loadConfig(options.configPath);
	const { name, peer } = resolvePeer(config, options.peer);
	const intervalMs = resolveWatchInterval(config, options.intervalMs);
	const remote =
		deps.createRemote?.(peer) ??
		new SshRemoteClipboard(peer, { logger: options.logger });
	const local = deps.local ?? new SystemClipboard({ logger: options.logger });

	const shutdown = bindShutdownSignals(deps.signal);
	try {
		const session = new WatchSession({
			peerName: name,
			local,
			remote,
			signal: shutdown.signal,
			intervalMs,
			reporter: deps.reporter ?? consoleReporter,
			history: deps.history ?? createHistoryRecorder(),
			logger: options.logger,
		});
		ui.line(`Watching clipboard with peer "${name}" (${peer.address})`);
		ui.line("Press Ctrl+C to stop");
		ui.line();
		await session.run();
	} finally {
		shutdown.dispose();
	}
	ui.line();
	ui.line("Stopping watch...");
	return { peerName: name, peer, intervalMs };
};
