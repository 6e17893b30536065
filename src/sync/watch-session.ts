import type { LocalClipboard } from "#clipboard/local";
import {
	DEFAULT_WATCH_INTERVAL_MS,
	MIN_WATCH_INTERVAL_MS,
} from "#config/schema";
import { ConfigurationError, getErrorMessage } from "#core/errors";
import type { RemoteClipboard } from "#remote/ssh";
import {
	type Fingerprint,
	fingerprint,
	ZERO_FINGERPRINT,
} from "#sync/fingerprint";
import type {
	HistoryCommand,
	HistoryRecorder,
	SessionStatus,
	SyncState,
	TickOutcome,
	WatchReporter,
	WatchSessionOptions,
} from "#sync/types";

const silentReporter: WatchReporter = {
	propagated: () => {},
	failed: () => {},
};

export const validateInterval = (intervalMs: number) => {
	if (!Number.isFinite(intervalMs) || intervalMs < MIN_WATCH_INTERVAL_MS) {
		throw new ConfigurationError(
			`watch interval must be at least ${MIN_WATCH_INTERVAL_MS} ms (got ${intervalMs}).`,
		);
	}
	return intervalMs;
};

/**
 * Resolves after `ms`, or as soon as `signal` aborts.
 */
const wait = (ms: number, signal: AbortSignal) =>
	new Promise<void>((resolve) => {
		if (signal.aborted) {
			resolve();
			return;
		}
		const onAbort = () => {
			clearTimeout(timer);
			resolve();
		};
		const timer = setTimeout(() => {
			signal.removeEventListener("abort", onAbort);
			resolve();
		}, ms);
		signal.addEventListener("abort", onAbort, { once: true });
	});

/**
 * Two-way clipboard sync with one peer, driven by polling.
 *
 * Each tick looks at the local clipboard first and pushes it when it differs
 * from both tracked fingerprints; only when nothing was pushed does it look
 * at the peer and pull. Comparing against both fingerprints is what keeps a
 * value that was just received from being sent straight back.
 */
export class WatchSession {
	readonly peerName: string;
	readonly intervalMs: number;
	private readonly local: LocalClipboard;
	private readonly remote: RemoteClipboard;
	private readonly signal: AbortSignal;
	private readonly reporter: WatchReporter;
	private readonly history?: HistoryRecorder;
	private readonly logger?: (message: string) => void;
	private readonly tracked: SyncState = {
		lastLocalFingerprint: ZERO_FINGERPRINT,
		lastRemoteFingerprint: ZERO_FINGERPRINT,
	};
	private active = false;

	constructor(options: WatchSessionOptions) {
		this.peerName = options.peerName;
		this.intervalMs = validateInterval(
			options.intervalMs ?? DEFAULT_WATCH_INTERVAL_MS,
		);
		this.local = options.local;
		this.remote = options.remote;
		this.signal = options.signal;
		this.reporter = options.reporter ?? silentReporter;
		this.history = options.history;
		this.logger = options.logger;
	}

	get status(): SessionStatus {
		return this.signal.aborted ? "stopped" : "running";
	}

	get state(): Readonly<SyncState> {
		return { ...this.tracked };
	}

	/**
	 * Best-effort first read of both sides. A side that cannot be read keeps
	 * the zero fingerprint, so its first successful read counts as a change.
	 */
	async initialize(): Promise<void> {
		try {
			this.tracked.lastLocalFingerprint = fingerprint(await this.local.read());
		} catch (error) {
			this.logger?.(`initial local read failed: ${getErrorMessage(error)}`);
		}
		try {
			this.tracked.lastRemoteFingerprint = fingerprint(
				await this.remote.read(),
			);
		} catch (error) {
			this.logger?.(`initial remote read failed: ${getErrorMessage(error)}`);
		}
	}

	async tick(): Promise<TickOutcome> {
		if (this.signal.aborted) {
			return { kind: "stopped" };
		}

		let localData: Uint8Array;
		try {
			localData = await this.local.read();
		} catch (error) {
			this.logger?.(`local read failed: ${getErrorMessage(error)}`);
			return { kind: "local-unreadable", error };
		}
		const localFp = fingerprint(localData);

		if (
			localFp !== this.tracked.lastLocalFingerprint &&
			localFp !== this.tracked.lastRemoteFingerprint
		) {
			try {
				await this.remote.write(localData);
			} catch (error) {
				this.reporter.failed({
					direction: "send",
					peerName: this.peerName,
					error,
				});
				return { kind: "send-failed", error };
			}
			const bytes = localData.byteLength;
			this.reporter.propagated({
				direction: "send",
				peerName: this.peerName,
				bytes,
			});
			this.tracked.lastLocalFingerprint = localFp;
			// the peer now holds this value; don't mistake it for a remote change
			this.tracked.lastRemoteFingerprint = localFp;
			await this.record("watch:send", bytes);
			return { kind: "sent", bytes, fingerprint: localFp };
		}

		let remoteData: Uint8Array;
		try {
			remoteData = await this.remote.read();
		} catch (error) {
			this.logger?.(`remote read failed: ${getErrorMessage(error)}`);
			return { kind: "remote-unreadable", error };
		}
		const remoteFp = fingerprint(remoteData);

		let outcome: TickOutcome = { kind: "idle" };
		if (
			remoteFp !== this.tracked.lastRemoteFingerprint &&
			remoteFp !== this.tracked.lastLocalFingerprint
		) {
			outcome = await this.pull(remoteData, remoteFp);
		}

		// Reset to what was observed this tick, even right after a pull. The
		// local side catches up on the next tick, when the pulled value reads
		// back equal to lastRemoteFingerprint.
		this.tracked.lastLocalFingerprint = localFp;
		this.tracked.lastRemoteFingerprint = remoteFp;
		return outcome;
	}

	/**
	 * Polls until the signal aborts. A tick in flight when that happens is
	 * allowed to finish; no further tick starts.
	 */
	async run(): Promise<void> {
		if (this.active) {
			throw new Error("watch session is already running.");
		}
		if (this.signal.aborted) {
			return;
		}
		this.active = true;
		try {
			await this.initialize();
			while (!this.signal.aborted) {
				await wait(this.intervalMs, this.signal);
				if (this.signal.aborted) break;
				await this.tick();
			}
		} finally {
			this.active = false;
		}
	}

	private async pull(
		remoteData: Uint8Array,
		remoteFp: Fingerprint,
	): Promise<TickOutcome> {
		try {
			await this.local.write(remoteData);
		} catch (error) {
			this.reporter.failed({
				direction: "receive",
				peerName: this.peerName,
				error,
			});
			return { kind: "receive-failed", error };
		}
		const bytes = remoteData.byteLength;
		this.reporter.propagated({
			direction: "receive",
			peerName: this.peerName,
			bytes,
		});
		this.tracked.lastRemoteFingerprint = remoteFp;
		this.tracked.lastLocalFingerprint = remoteFp;
		await this.record("watch:recv", bytes);
		return { kind: "received", bytes, fingerprint: remoteFp };
	}

	private async record(command: HistoryCommand, size: number) {
		if (!this.history) return;
		try {
			await this.history({ command, target: this.peerName, size });
		} catch (error) {
			this.logger?.(`history: ${getErrorMessage(error)}`);
		}
	}
}
