import type { LocalClipboard } from "#clipboard/local";
import type { RemoteClipboard } from "#remote/ssh";
import type { Fingerprint } from "#sync/fingerprint";

export type SyncState = {
	lastLocalFingerprint: Fingerprint;
	lastRemoteFingerprint: Fingerprint;
};

export type SessionStatus = "running" | "stopped";

export type Direction = "send" | "receive";

export type PropagationEvent = {
	direction: Direction;
	peerName: string;
	bytes: number;
};

export type PropagationFailure = {
	direction: Direction;
	peerName: string;
	error: unknown;
};

export interface WatchReporter {
	propagated(event: PropagationEvent): void;
	failed(failure: PropagationFailure): void;
}

export type HistoryCommand =
	| "send"
	| "recv"
	| "peek"
	| "watch:send"
	| "watch:recv"
	| `fx:${string}`;

export type HistoryRecord = {
	command: HistoryCommand;
	target: string;
	size: number;
};

export type HistoryRecorder = (record: HistoryRecord) => Promise<void>;

export type TickOutcome =
	| { kind: "stopped" }
	| { kind: "idle" }
	| { kind: "local-unreadable"; error: unknown }
	| { kind: "remote-unreadable"; error: unknown }
	| { kind: "sent"; bytes: number; fingerprint: Fingerprint }
	| { kind: "send-failed"; error: unknown }
	| { kind: "received"; bytes: number; fingerprint: Fingerprint }
	| { kind: "receive-failed"; error: unknown };

export type WatchSessionOptions = {
	peerName: string;
	local: LocalClipboard;
	remote: RemoteClipboard;
	/** cancellation token; aborting it stops the session for good */
	signal: AbortSignal;
	intervalMs?: number;
	reporter?: WatchReporter;
	history?: HistoryRecorder;
	logger?: (message: string) => void;
};
